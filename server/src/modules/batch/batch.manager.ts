/**
 * Batch Manager - wires expansion, status tracking and the worker pool
 *
 * One manager is created at process start and handed to the HTTP layer.
 * Nothing in this module keeps state at module scope.
 */

import { v4 as uuidv4 } from 'uuid';
import { ValidationError } from '../../common/errors';
import type { Logger } from '../../common/logger';
import type { Converter } from '../conversion/conversion.types';
import { PatternExpander } from './batch.expander';
import { ConversionWorkerPool } from './batch.pool';
import { StatusPoller } from './batch.poller';
import { Clock, JobStatusStore } from './batch.store';
import { BatchResult } from './batch.types';

export class BatchCoordinator {
  private readonly log: Logger;

  constructor(
    private readonly expander: PatternExpander,
    private readonly store: JobStatusStore,
    private readonly pool: ConversionWorkerPool,
    logger: Logger
  ) {
    this.log = logger.child({ module: 'batch' });
  }

  /**
   * Expand patterns and queue every file that is not already queued or
   * processing. Resolves as soon as the jobs are enqueued; it never waits
   * for a conversion.
   */
  async submit(patterns: readonly string[]): Promise<BatchResult> {
    if (!Array.isArray(patterns) || patterns.some(pattern => typeof pattern !== 'string')) {
      throw new ValidationError('paths must be a list of strings');
    }
    if (!patterns.some(pattern => pattern.trim().length > 0)) {
      throw new ValidationError('No file paths provided');
    }

    const batchId = uuidv4();
    const { files, unmatched } = await this.expander.expand(patterns);

    const queuedFiles: string[] = [];
    for (const filePath of files) {
      if (this.store.register(filePath)) {
        queuedFiles.push(filePath);
        this.pool.submit(filePath);
      } else {
        this.log.debug({ batchId, filePath }, 'Already queued or processing, not resubmitted');
      }
    }

    this.log.info(
      { batchId, resolved: files.length, queued: queuedFiles.length, unmatched: unmatched.length },
      'Batch submitted'
    );

    return {
      batchId,
      queuedCount: queuedFiles.length,
      queuedFiles,
      unmatchedPatterns: unmatched,
    };
  }

  /**
   * Drop every job record. Jobs still waiting in the pool notice the missing
   * record and skip their conversion.
   */
  clear(): void {
    const removed = this.store.size;
    this.store.clear();
    this.log.info({ removed }, 'Job status cleared');
  }
}

export interface BatchManagerOptions {
  converter: Converter;
  logger: Logger;
  baseDir: string;
  supportedExtensions: readonly string[];
  concurrency: number;
  timeoutSeconds: number;
  clock?: Clock;
}

export interface BatchManager {
  store: JobStatusStore;
  pool: ConversionWorkerPool;
  coordinator: BatchCoordinator;
  poller: StatusPoller;
}

/**
 * Create the store, pool, coordinator and poller for one process
 */
export function createBatchManager(options: BatchManagerOptions): BatchManager {
  const store = new JobStatusStore(options.clock);
  const expander = new PatternExpander({
    baseDir: options.baseDir,
    supportedExtensions: options.supportedExtensions,
    logger: options.logger,
  });
  const pool = new ConversionWorkerPool({
    store,
    converter: options.converter,
    concurrency: options.concurrency,
    timeoutSeconds: options.timeoutSeconds,
    logger: options.logger,
  });

  return {
    store,
    pool,
    coordinator: new BatchCoordinator(expander, store, pool, options.logger),
    poller: new StatusPoller(store),
  };
}
