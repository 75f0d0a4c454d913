/**
 * Conversion Worker Pool - bounded, FIFO dispatch of conversion jobs
 *
 * Every write a worker makes is guarded by the registration ticket it was
 * dispatched with and by the status it expects, so a result that arrives after
 * a timeout, a clear or a re-registration is discarded instead of written.
 */

import pLimit from 'p-limit';
import { ConversionTimeoutError, UnknownJobError, describeError } from '../../common/errors';
import type { Logger } from '../../common/logger';
import type { ConversionResult, Converter } from '../conversion/conversion.types';
import { JobStatusStore } from './batch.store';
import { JobStatus, PoolStats } from './batch.types';

export interface WorkerPoolOptions {
  store: JobStatusStore;
  converter: Converter;
  concurrency: number;
  timeoutSeconds: number;
  logger: Logger;
}

export class ConversionWorkerPool {
  private readonly store: JobStatusStore;
  private readonly converter: Converter;
  private readonly limit: ReturnType<typeof pLimit>;
  private readonly timeoutSeconds: number;
  private readonly log: Logger;
  private readonly inFlight = new Set<Promise<void>>();
  private readonly latestByPath = new Map<string, Promise<void>>();

  readonly concurrency: number;

  constructor(options: WorkerPoolOptions) {
    this.store = options.store;
    this.converter = options.converter;
    this.concurrency = Math.max(1, Math.floor(options.concurrency));
    this.timeoutSeconds = options.timeoutSeconds;
    this.limit = pLimit(this.concurrency);
    this.log = options.logger.child({ module: 'pool' });
  }

  /**
   * Enqueue one registered path. Returns immediately; progress is only
   * visible through the store.
   */
  submit(filePath: string): void {
    const ticket = this.store.ticketOf(filePath);
    if (ticket === undefined) {
      this.log.warn({ filePath }, 'Ignoring submission for an unregistered path');
      return;
    }

    // A path cleared and queued again while its earlier job still runs waits
    // for that job, so one path never has two conversions in flight
    const previous = this.latestByPath.get(filePath);
    const dispatch = () => this.limit(() => this.run(filePath, ticket));

    const task = (previous ? previous.then(dispatch) : dispatch()).catch(err => {
      this.log.error({ err, filePath }, 'Worker failed outside the job boundary');
    });

    this.latestByPath.set(filePath, task);
    this.inFlight.add(task);
    void task.finally(() => {
      this.inFlight.delete(task);
      if (this.latestByPath.get(filePath) === task) {
        this.latestByPath.delete(filePath);
      }
    });
  }

  get activeCount(): number {
    return this.limit.activeCount;
  }

  get pendingCount(): number {
    return this.limit.pendingCount;
  }

  stats(): PoolStats {
    return {
      concurrency: this.concurrency,
      active: this.activeCount,
      pending: this.pendingCount,
    };
  }

  /**
   * Resolves once every job submitted so far (and any submitted meanwhile) has settled
   */
  async onIdle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all(this.inFlight);
    }
  }

  private async run(filePath: string, ticket: number): Promise<void> {
    if (!this.write(filePath, ticket, 'Queued', 'Processing', null)) {
      this.log.info({ filePath }, 'Job no longer queued, skipping');
      return;
    }

    this.log.info({ filePath }, 'Converting');

    try {
      const result = await this.convertWithTimeout(filePath);
      this.write(filePath, ticket, 'Processing', 'Completed', `Successfully converted to: ${result.outputPath}`);
      this.log.info({ filePath, outputPath: result.outputPath, duration: result.duration }, 'Completed');
    } catch (err) {
      const message = describeError(err);
      this.write(filePath, ticket, 'Processing', 'Error', message);
      if (err instanceof ConversionTimeoutError) {
        this.log.warn({ filePath, timeoutSeconds: this.timeoutSeconds }, 'Conversion timed out');
      } else {
        this.log.error({ err, filePath }, 'Conversion failed');
      }
    }
  }

  /**
   * Race the converter against the per-job timeout. On timeout the converter's
   * signal is aborted and its eventual outcome is only logged.
   */
  private async convertWithTimeout(filePath: string): Promise<ConversionResult> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const conversion = this.converter.convert(filePath, {
      timeoutSeconds: this.timeoutSeconds,
      signal: controller.signal,
    });

    const timeout = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new ConversionTimeoutError(this.timeoutSeconds));
      }, this.timeoutSeconds * 1000);
    });

    try {
      return await Promise.race([conversion, timeout]);
    } catch (err) {
      if (err instanceof ConversionTimeoutError) {
        void conversion.then(
          result => this.log.debug({ filePath, outputPath: result.outputPath }, 'Discarding late result of a timed out job'),
          lateErr => this.log.debug({ err: lateErr, filePath }, 'Timed out job settled with an error')
        );
      }
      throw err;
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * Guarded store write. An UnknownJobError means the store was cleared under
   * the job; it ends the job without touching the store.
   */
  private write(
    filePath: string,
    ticket: number,
    from: JobStatus,
    to: JobStatus,
    message: string | null
  ): boolean {
    try {
      const written = this.store.transition(filePath, to, message, { from, ticket });
      if (!written) {
        this.log.debug({ filePath, from, to }, 'Stale job update discarded');
      }
      return written;
    } catch (err) {
      if (err instanceof UnknownJobError) {
        this.log.warn({ filePath, to }, 'Job was removed before it could be updated');
        return false;
      }
      throw err;
    }
  }
}
