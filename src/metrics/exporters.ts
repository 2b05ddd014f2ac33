/**
 * Metric Exporters
 *
 * Export registered metrics to Prometheus text format or JSON.
 * Values are calculated while exporting; a label-shape violation aborts
 * the export and propagates to the caller.
 */

import type { Labels, MetricType, MetricValue } from './types.js'

/**
 * What an exporter needs from a metric. Registered metrics satisfy it.
 */
export interface ExportableMetric extends AsyncIterable<MetricValue> {
  readonly qualifiedName: string
  readonly description: string
  readonly type: MetricType
}

export type ExportFormat = 'prometheus' | 'json'

/**
 * Format labels for Prometheus output: {key="value", key2="value2"}
 * Labels keep the order in which the metric produced them.
 */
function formatLabels(labels: Readonly<Labels>): string {
  const entries = Object.entries(labels)
  if (entries.length === 0) return ''

  const formatted = entries
    .map(([k, v]) => `${k}="${escapeLabelValue(v)}"`)
    .join(', ')

  return `{${formatted}}`
}

/**
 * Escape special characters in Prometheus label values
 */
function escapeLabelValue(value: string): string {
  return value
    .replace(/\\/g, '\\\\')
    .replace(/"/g, '\\"')
    .replace(/\n/g, '\\n')
}

/**
 * Escape special characters in HELP text
 */
function escapeHelp(text: string): string {
  return text.replace(/\\/g, '\\\\').replace(/\n/g, '\\n')
}

function formatValue(value: number): string {
  if (Number.isNaN(value)) return 'NaN'
  if (value === Infinity) return '+Inf'
  if (value === -Infinity) return '-Inf'
  return String(value)
}

/**
 * Export metrics to Prometheus text format
 *
 * Format:
 * # HELP metric_name Description
 * # TYPE metric_name type
 * metric_name{label="value"} 123
 *
 * Blocks are emitted in the order given, separated by a newline, with no
 * trailing newline.
 */
export async function exportPrometheus(metrics: Iterable<ExportableMetric>): Promise<string> {
  const blocks: string[] = []

  for (const metric of metrics) {
    const name = metric.qualifiedName
    const lines = [`# HELP ${name} ${escapeHelp(metric.description)}`, `# TYPE ${name} ${metric.type}`]

    for await (const value of metric) {
      lines.push(`${name}${formatLabels(value.labels)} ${formatValue(value.value)}`)
    }

    blocks.push(lines.join('\n'))
  }

  return blocks.join('\n')
}

/**
 * JSON snapshot of one metric
 */
export interface JsonMetricSnapshot {
  type: MetricType
  description: string
  values: Array<{ labels: Readonly<Labels>; value: number }>
}

/**
 * Export metrics to JSON format. Non-finite values serialize as null.
 */
export async function exportJson(metrics: Iterable<ExportableMetric>): Promise<string> {
  const snapshot: Record<string, JsonMetricSnapshot> = {}

  for (const metric of metrics) {
    const values: JsonMetricSnapshot['values'] = []
    for await (const value of metric) {
      values.push({ labels: value.labels, value: value.value })
    }
    snapshot[metric.qualifiedName] = {
      type: metric.type,
      description: metric.description,
      values,
    }
  }

  return JSON.stringify({ metrics: snapshot }, null, 2)
}

/**
 * Export metrics in the requested format
 */
export function exportMetrics(
  metrics: Iterable<ExportableMetric>,
  format: ExportFormat = 'prometheus'
): Promise<string> {
  return format === 'json' ? exportJson(metrics) : exportPrometheus(metrics)
}
