import type { EvaluationReport, GroupReport } from '@fairness-check/types'

const RULE = '='.repeat(60)

export function formatPercent(value: number): string {
  return `${(value * 100).toFixed(2)}%`
}

function thresholdLine(name: string, met: boolean, threshold: number): string {
  return met ? `✓ ${name} threshold met` : `⚠️  Warning: ${name} exceeds ${threshold} threshold`
}

function formatRate(rate: number | null): string {
  return rate === null ? '-' : rate.toFixed(4)
}

function groupTable(groups: readonly GroupReport[]): string[] {
  const header = ['group', 'size', 'selection_rate', 'true_positive_rate']
  const rows = groups.map((g) => [String(g.value), String(g.size), formatRate(g.selection_rate), formatRate(g.true_positive_rate)])
  const widths = header.map((h, i) => Math.max(h.length, ...rows.map((r) => (r[i] ?? '').length)))
  const line = (cells: string[]) => '  ' + cells.map((c, i) => c.padEnd(widths[i] ?? 0)).join('  ').trimEnd()
  return [line(header), ...rows.map(line)]
}

/** Human-readable report. Ends with a newline. */
export function formatReport(report: EvaluationReport, options: { verbose?: boolean } = {}): string {
  const metrics = report.fairness_metrics
  const lines = [
    '',
    RULE,
    'FAIRNESS TEST RESULTS',
    RULE,
    '',
    `Total predictions: ${report.total_predictions}`,
    `Accuracy: ${formatPercent(report.accuracy)}`,
    '',
    'Fairness Metrics:',
    `  demographic_parity_difference: ${metrics.demographic_parity_difference.toFixed(4)}`,
    `  equal_opportunity_difference: ${metrics.equal_opportunity_difference.toFixed(4)}`,
  ]

  if (options.verbose && report.groups.length > 0) {
    lines.push('', 'Groups:', ...groupTable(report.groups))
  }

  lines.push(
    '',
    thresholdLine('Demographic parity difference', report.thresholds_met.demographic_parity, report.thresholds.demographic_parity),
    thresholdLine('Equal opportunity difference', report.thresholds_met.equal_opportunity, report.thresholds.equal_opportunity),
  )
  return lines.join('\n') + '\n'
}

export function thresholdsMet(report: EvaluationReport): boolean {
  return report.thresholds_met.demographic_parity && report.thresholds_met.equal_opportunity
}
