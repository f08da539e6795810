/**
 * shared/metrics.ts — Prometheus metrics via prom-client
 *
 * A batch run is short-lived, so there is no scrape endpoint: the registry is
 * dumped in text format to METRICS_FILE when the run ends.
 *
 * Metrics:
 *   analog_fits_total             — Counter by outcome (accepted / failed error code)
 *   analog_rejections_total       — Counter by rejection reason
 *   analog_fit_duration_seconds   — Histogram of fit + extend time per series
 *   analog_series_extended_total  — Counter of written files
 */
import { writeFile } from 'fs/promises';
import { Registry, Counter, Histogram } from 'prom-client';

export const registry = new Registry();

export const fitsTotal = new Counter({
  name: 'analog_fits_total',
  help: 'Analog selections by outcome',
  labelNames: ['outcome'] as const,
  registers: [registry],
});

export const rejectionsTotal = new Counter({
  name: 'analog_rejections_total',
  help: 'Rejected analog candidates by reason',
  labelNames: ['reason'] as const,
  registers: [registry],
});

export const fitDuration = new Histogram({
  name: 'analog_fit_duration_seconds',
  help: 'Time spent selecting and extending one series',
  labelNames: ['outcome'] as const,
  buckets: [0.001, 0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1],
  registers: [registry],
});

export const seriesExtended = new Counter({
  name: 'analog_series_extended_total',
  help: 'Extended series files written',
  registers: [registry],
});

/** Write the registry in Prometheus text format. */
export async function writeMetricsFile(path: string): Promise<void> {
  await writeFile(path, await registry.metrics(), 'utf8');
}
