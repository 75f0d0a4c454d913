/**
 * Batch Module - pattern submission, bounded conversion queue, status polling
 */

export { batchRoutes } from './batch.routes';
export { BatchCoordinator, createBatchManager } from './batch.manager';
export type { BatchManager, BatchManagerOptions } from './batch.manager';
export { PatternExpander } from './batch.expander';
export { ConversionWorkerPool } from './batch.pool';
export { JobStatusStore } from './batch.store';
export { StatusPoller } from './batch.poller';
export * from './batch.types';
