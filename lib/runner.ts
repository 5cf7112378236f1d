import pLimit from 'p-limit';
import { z } from 'zod';
import { CONFIG } from './config';
import { ConfigError, isRecoverable, TimeoutError } from './errors';
import logger from './logger';
import { recordTask } from './metrics';
import { channel, Receiver, Sender } from './net/channel';
import { MAX_TIMEOUT_MS, withTimeout } from './net/timeout';
import { createRegistry } from './sources';
import type { Batch, DataSource, SourceMode, SourceRegistry, Task, TaskOutcome } from './types';

export interface RunnerConfig {
  concurrency: number;
  timeoutMs: number;
  excluded: ReadonlySet<string>;
  mode: SourceMode;
  /** Merge stream capacity; defaults to `concurrency`. */
  channelCapacity?: number;
}

const runnerConfigSchema = z.object({
  concurrency: z.number().int('concurrency must be an integer').positive('concurrency must be positive'),
  timeoutMs: z
    .number()
    .finite('timeout must be finite')
    .positive('timeout must be positive')
    .max(MAX_TIMEOUT_MS, `timeout must be at most ${MAX_TIMEOUT_MS / 1000} seconds`),
  mode: z.enum(['free', 'all']),
  channelCapacity: z
    .number()
    .refine((n) => n === Infinity || (Number.isInteger(n) && n > 0), 'channel capacity must be a positive integer')
    .optional(),
});

export const DEFAULT_RUNNER_CONFIG: RunnerConfig = {
  concurrency: CONFIG.CONCURRENCY_DEFAULT,
  timeoutMs: CONFIG.TIMEOUT_SECONDS_DEFAULT * 1000,
  excluded: new Set(),
  mode: 'free',
};

/** Reject an invalid configuration before anything is scheduled. */
export function validateRunnerConfig(config: RunnerConfig): void {
  const parsed = runnerConfigSchema.safeParse(config);
  if (!parsed.success) {
    const message = parsed.error.issues.map((i) => i.message).join('; ');
    throw new ConfigError(`invalid runner configuration: ${message}`);
  }
}

/**
 * Fans roots × enabled sources out into tasks, runs them under one global
 * concurrency gate with a per-task timeout, and merges every successful batch
 * into a single stream.
 *
 * A task's failure or timeout is logged and dropped; it never reaches the
 * caller or touches another task. Builder methods return a new `Runner`.
 *
 * Example:
 * const stream = new Runner().concurrency(50).timeout(10).allSources().exclude(['wayback']).run(['example.com']);
 * for await (const batch of stream) { ... }
 */
export class Runner {
  private readonly registry: SourceRegistry;
  private readonly config: RunnerConfig;

  constructor(registry?: SourceRegistry, config: RunnerConfig = DEFAULT_RUNNER_CONFIG) {
    this.registry = registry ?? createRegistry();
    this.config = config;
  }

  concurrency(n: number): Runner {
    return this.with({ concurrency: n });
  }

  /** Per-task timeout in seconds. */
  timeout(seconds: number): Runner {
    return this.with({ timeoutMs: seconds * 1000 });
  }

  freeSources(): Runner {
    return this.with({ mode: 'free' });
  }

  /** Free sources plus the ones that need a credential. */
  allSources(): Runner {
    return this.with({ mode: 'all' });
  }

  exclude(names: Iterable<string>): Runner {
    const excluded = new Set(this.config.excluded);
    for (const n of names) excluded.add(n.trim().toLowerCase());
    return this.with({ excluded });
  }

  channelCapacity(n: number): Runner {
    return this.with({ channelCapacity: n });
  }

  get settings(): Readonly<RunnerConfig> {
    return this.config;
  }

  /** Sources a run would use: the mode's sources minus exclusions. */
  enabledSources(): DataSource[] {
    const { mode, excluded } = this.config;
    const candidates = mode === 'all' ? [...this.registry.free, ...this.registry.keyed] : this.registry.free;
    return candidates.filter((s) => !excluded.has(s.name.toLowerCase()));
  }

  /** One task per (unique root, enabled source). */
  plan(roots: Iterable<string>): Task[] {
    const sources = this.enabledSources();
    const tasks: Task[] = [];
    for (const host of new Set(roots)) {
      for (const source of sources) tasks.push({ host, source });
    }
    return tasks;
  }

  /**
   * Start every task and return the merged stream of batches. Throws
   * `ConfigError` before scheduling anything when the configuration is
   * invalid. The stream ends once every task has settled.
   */
  run(roots: Iterable<string>): Receiver<Batch> {
    validateRunnerConfig(this.config);
    this.warnUnknownExclusions();

    const tasks = this.plan(roots);
    const { concurrency, timeoutMs } = this.config;
    const [tx, rx] = channel<Batch>(this.config.channelCapacity ?? concurrency);
    const limit = pLimit(concurrency);

    logger.debug({ tasks: tasks.length, concurrency, timeoutMs }, 'starting run');
    for (const task of tasks) {
      const taskTx = tx.clone();
      void limit(() => this.execute(task, taskTx)).finally(() => taskTx.close());
    }
    // only the task handles keep the stream open now
    tx.close();
    return rx;
  }

  private async execute(task: Task, tx: Sender<Batch>): Promise<void> {
    const { host, source } = task;
    const controller = new AbortController();
    const started = Date.now();
    let outcome: TaskOutcome = 'ok';
    let batch: Batch | undefined;
    try {
      batch = await withTimeout(source.fetch(host, controller.signal), this.config.timeoutMs, () => controller.abort());
    } catch (err) {
      outcome = err instanceof TimeoutError ? 'timeout' : 'failed';
      this.report(task, err);
    } finally {
      recordTask(source.name, outcome, (Date.now() - started) / 1000);
    }
    // untimed: a full stream holds this slot until the consumer drains it
    if (batch) await tx.send(batch);
  }

  private report({ host, source }: Task, err: unknown): void {
    if (err instanceof TimeoutError) {
      logger.warn({ source: source.name, host, timeoutMs: err.ms }, 'source timed out');
    } else if (isRecoverable(err)) {
      logger.warn({ source: source.name, host, reason: err.message }, 'source failed');
    } else {
      logger.error({ source: source.name, host, err }, 'source threw unexpectedly');
    }
  }

  private warnUnknownExclusions(): void {
    const known = new Set([...this.registry.free, ...this.registry.keyed].map((s) => s.name.toLowerCase()));
    for (const name of this.config.excluded) {
      if (!known.has(name)) logger.warn({ source: name }, 'excluded source is not registered');
    }
  }

  private with(patch: Partial<RunnerConfig>): Runner {
    return new Runner(this.registry, { ...this.config, ...patch });
  }
}

export default Runner;
