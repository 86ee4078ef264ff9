// node/src/views/metric-table.ts — MetricReport → display rows (API + HTML share this)
import type { MetricName, MetricReport, MetricValue } from '../types/core';
import { METRIC_NAMES } from '../types/core';
import { METRIC_LABELS } from '../services/metrics-engine';

export const NOT_APPLICABLE = 'N/A';

export interface MetricRow {
  name: MetricName;
  label: string;
  display: string;
  applicable: boolean;
}

/** Scores with 3 decimals; durations in seconds with 2 decimals. */
export function formatMetric(value: MetricValue): string {
  if (value.kind === 'notApplicable') return NOT_APPLICABLE;
  if (value.unit === 'ms') return `${(value.value / 1000).toFixed(2)} s`;
  return value.value.toFixed(3);
}

export function toMetricRows(report: MetricReport): MetricRow[] {
  return METRIC_NAMES.map((name) => ({
    name,
    label: METRIC_LABELS[name],
    display: formatMetric(report[name]),
    applicable: report[name].kind === 'computed',
  }));
}
