/**
 * Run metrics using `prom-client`.
 *
 * Metrics:
 * - `subsift_tasks_total{source,outcome}` (Counter)
 * - `subsift_task_duration_seconds{source}` (Histogram)
 * - `subsift_names_emitted_total` (Counter)
 *
 * The CLI prints `register.metrics()` to stderr when `--metrics` is given.
 */

import { Counter, Histogram, Registry } from 'prom-client';
import type { TaskOutcome } from './types';

export const register = new Registry();

export const tasksTotal = new Counter({
  name: 'subsift_tasks_total',
  help: 'Source tasks settled, by source and outcome',
  labelNames: ['source', 'outcome'] as const,
  registers: [register],
});

export const taskDuration = new Histogram({
  name: 'subsift_task_duration_seconds',
  help: 'Time from a task taking a concurrency slot until it settled',
  labelNames: ['source'] as const,
  buckets: [0.1, 0.25, 0.5, 1, 2, 5, 10, 15, 30, 60],
  registers: [register],
});

export const namesEmitted = new Counter({
  name: 'subsift_names_emitted_total',
  help: 'Names written to the output after filtering',
  registers: [register],
});

export function recordTask(source: string, outcome: TaskOutcome, seconds: number): void {
  tasksTotal.inc({ source, outcome });
  if (!isFinite(seconds) || seconds < 0) return;
  taskDuration.observe({ source }, seconds);
}

export function incEmitted(count = 1): void {
  namesEmitted.inc(count);
}

const metrics = { register, recordTask, incEmitted };
export default metrics;
