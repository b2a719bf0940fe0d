/**
 * Dishmatch Metrics
 *
 * Process-local counters and timings for the recommendation core.
 * Holds no user ids and no preference contents, only how often each
 * path ran and how long suggestions took.
 *
 *   record('suggestion_neighbors');
 *   timed('suggestion_ms', () => suggestRecipe(input));
 *   logSnapshot();
 */

/**
 * - suggestion_*: one per suggestion, by policy mode
 * - catalog_exhausted: NoMoreRecipesError raised
 * - neighbor_error: graph or report requested without neighbors
 */
export type MetricName =
  | 'suggestion_cold_start'
  | 'suggestion_neighbors'
  | 'suggestion_fallback'
  | 'catalog_exhausted'
  | 'preference_added'
  | 'preference_removed'
  | 'graph_built'
  | 'report_built'
  | 'neighbor_error'
  | 'table_loaded';

export const DURATION_METRICS = ['suggestion_ms'] as const;

export type DurationMetricName = (typeof DURATION_METRICS)[number];

export interface DurationStats {
  latest: number;
  max: number;
  count: number;
  sum: number;
}

export type MetricsSnapshot = Partial<Record<MetricName, number>>;

export type DurationSnapshot = Partial<Record<DurationMetricName, DurationStats>>;

let counters: MetricsSnapshot = {};
let durations: DurationSnapshot = {};

export function record(name: MetricName): void {
  counters[name] = getMetric(name) + 1;
}

export function recordDuration(name: DurationMetricName, durationMs: number): void {
  const previous = durations[name];
  durations[name] = previous
    ? {
        latest: durationMs,
        max: Math.max(previous.max, durationMs),
        count: previous.count + 1,
        sum: previous.sum + durationMs,
      }
    : { latest: durationMs, max: durationMs, count: 1, sum: durationMs };
}

/**
 * Run fn and record how long it took, whether it returned or threw
 */
export function timed<T>(name: DurationMetricName, fn: () => T): T {
  const startedAt = Date.now();
  try {
    return fn();
  } finally {
    recordDuration(name, Date.now() - startedAt);
  }
}

/**
 * @returns 0 for a metric never recorded
 */
export function getMetric(name: MetricName): number {
  return counters[name] ?? 0;
}

export function getSnapshot(): MetricsSnapshot {
  return { ...counters };
}

export function getDurationSnapshot(): DurationSnapshot {
  const copy: DurationSnapshot = {};
  for (const name of DURATION_METRICS) {
    const stats = durations[name];
    if (stats) copy[name] = { ...stats };
  }
  return copy;
}

/**
 * Test helper
 */
export function resetMetrics(): void {
  counters = {};
  durations = {};
}

/**
 * Print counters outside production, once anything was recorded
 */
export function logSnapshot(): void {
  if (process.env.NODE_ENV === 'production') return;

  const snapshot = getSnapshot();
  if (Object.keys(snapshot).length === 0) return;

  console.log('[Metrics]', JSON.stringify(snapshot));
}
