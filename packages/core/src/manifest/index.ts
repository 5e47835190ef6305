export { createManifestSet, type ManifestSet } from './manifest-set.js';
export { parseManifestDocuments } from './parser.js';
