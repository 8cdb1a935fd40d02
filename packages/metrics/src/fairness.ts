// ---------------------------------------------------------------------------
// Fairness Metrics
// ---------------------------------------------------------------------------

import type { Label, SensitiveValue } from '@fairness-check/types';
import { assertSameLength, groupBy } from './groups.js';

export interface GroupRate {
  value: SensitiveValue;
  size: number;
  rate: number;
}

/**
 * Accuracy: fraction of indices where the prediction equals the true label.
 *
 * Returns 0 for empty input instead of NaN.
 */
export function accuracy(yTrue: readonly Label[], yPred: readonly Label[]): number {
  assertSameLength('accuracy', yTrue, yPred);
  const n = yTrue.length;
  if (n === 0) return 0;

  let correct = 0;
  for (let i = 0; i < n; i++) {
    if (yTrue[i] === yPred[i]) correct++;
  }
  return correct / n;
}

/**
 * Selection rate per group: P(Ŷ=1 | A=a) for every distinct value a.
 *
 * Groups appear in order of first appearance in `sensitive`.
 */
export function selectionRates(
  yPred: readonly Label[],
  sensitive: readonly SensitiveValue[],
): GroupRate[] {
  assertSameLength('selectionRates', yPred, sensitive);

  return groupBy(sensitive).map(({ value, indices }) => {
    let positive = 0;
    for (const i of indices) {
      if (yPred[i] === 1) positive++;
    }
    return { value, size: indices.length, rate: positive / indices.length };
  });
}

/**
 * True positive rate per group: P(Ŷ=1 | Y=1, A=a).
 *
 * Groups without any positive label are left out. `size` is the number of
 * positives in the group, the TPR denominator.
 */
export function truePositiveRates(
  yTrue: readonly Label[],
  yPred: readonly Label[],
  sensitive: readonly SensitiveValue[],
): GroupRate[] {
  assertSameLength('truePositiveRates', yTrue, yPred, sensitive);

  const rates: GroupRate[] = [];
  for (const { value, indices } of groupBy(sensitive)) {
    let positives = 0;
    let truePositives = 0;
    for (const i of indices) {
      if (yTrue[i] !== 1) continue;
      positives++;
      if (yPred[i] === 1) truePositives++;
    }
    if (positives > 0) {
      rates.push({ value, size: positives, rate: truePositives / positives });
    }
  }
  return rates;
}

function spread(rates: readonly GroupRate[]): number {
  if (rates.length < 2) return 0;
  let min = Infinity;
  let max = -Infinity;
  for (const { rate } of rates) {
    if (rate < min) min = rate;
    if (rate > max) max = rate;
  }
  return max - min;
}

/**
 * Demographic Parity Difference: max_a P(Ŷ=1|A=a) - min_a P(Ŷ=1|A=a)
 *
 * Spread of selection rates across all groups. 0 means every group is
 * selected at the same rate; zero or one group yields 0.
 */
export function demographicParityDifference(
  yPred: readonly Label[],
  sensitive: readonly SensitiveValue[],
): number {
  return spread(selectionRates(yPred, sensitive));
}

/**
 * Equal Opportunity Difference: spread of TPR across groups.
 *
 * Only groups with at least one positive label take part. If fewer than two
 * groups qualify the result is 0.
 */
export function equalOpportunityDifference(
  yTrue: readonly Label[],
  yPred: readonly Label[],
  sensitive: readonly SensitiveValue[],
): number {
  return spread(truePositiveRates(yTrue, yPred, sensitive));
}
