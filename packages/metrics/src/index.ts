// ---------------------------------------------------------------------------
// @fairness-check/metrics — accuracy and group fairness differences
// ---------------------------------------------------------------------------

export { groupBy, type Group } from './groups.js';
export {
  accuracy,
  selectionRates,
  truePositiveRates,
  demographicParityDifference,
  equalOpportunityDifference,
  type GroupRate,
} from './fairness.js';
