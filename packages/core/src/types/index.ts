export * from './json.js';
export * from './policy-spec.js';
export * from './placement.js';
export * from './resource.js';
