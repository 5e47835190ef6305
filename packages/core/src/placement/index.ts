export {
  normalizeLabelPredicate,
  normalizeLabelPredicates,
  isLabelPredicateInput,
} from './label-predicates.js';
export { resolvePlacementRule } from './resolver.js';
