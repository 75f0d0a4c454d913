/**
 * Batch Conversion Types
 */

import type { JobStatus } from '../../common/constants';

export type { JobStatus };

/**
 * Public view of one job, keyed by the source file's absolute path
 */
export interface JobRecord {
  status: JobStatus;
  message: string | null;
  timestamp: string;
}

export type JobSnapshot = Record<string, JobRecord>;

/**
 * Restricts a transition to the state the writer last saw.
 * A write whose guard does not match is skipped.
 */
export interface TransitionGuard {
  from?: JobStatus;
  ticket?: number;
}

export type StatusCounts = Record<JobStatus, number> & { total: number };

export interface ExpansionResult {
  files: string[];
  unmatched: string[];
}

export interface BatchResult {
  batchId: string;
  queuedCount: number;
  queuedFiles: string[];
  unmatchedPatterns: string[];
}

export interface SubmitResponse {
  success: boolean;
  batchId?: string;
  queued: number;
  files: string[];
  unmatched?: string[];
  message?: string;
}

export interface StatusEntry {
  status: JobStatus;
  message: string;
  timestamp: string;
}

export type StatusResponse = Record<string, StatusEntry>;

export interface PoolStats {
  concurrency: number;
  active: number;
  pending: number;
}
