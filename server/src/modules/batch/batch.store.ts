/**
 * Job Status Store - the single owner of every job record
 *
 * Each method runs to completion without yielding to the event loop, so no
 * caller can observe a record halfway through a transition. Records never
 * leave the store by reference: reads return copies.
 */

import { QUEUED_MESSAGE, isTerminalStatus } from '../../common/constants';
import { UnknownJobError } from '../../common/errors';
import { JobRecord, JobSnapshot, JobStatus, StatusCounts, TransitionGuard } from './batch.types';

interface StoredJob extends JobRecord {
  ticket: number;
}

export type Clock = () => Date;

export class JobStatusStore {
  private readonly jobs = new Map<string, StoredJob>();
  private nextTicket = 1;

  constructor(private readonly clock: Clock = () => new Date()) {}

  /**
   * Queue a path. Returns false while the path is Queued or Processing;
   * a terminal record is replaced by a fresh Queued one.
   */
  register(filePath: string): boolean {
    const existing = this.jobs.get(filePath);
    if (existing && !isTerminalStatus(existing.status)) {
      return false;
    }

    this.jobs.set(filePath, {
      status: 'Queued',
      message: QUEUED_MESSAGE,
      timestamp: this.clock().toISOString(),
      ticket: this.nextTicket++,
    });
    return true;
  }

  /**
   * Overwrite status, message and timestamp of a registered path.
   *
   * @throws UnknownJobError when the path was never registered (or was cleared)
   * @returns false when a guard is given and the record no longer matches it
   */
  transition(
    filePath: string,
    status: JobStatus,
    message: string | null = null,
    guard: TransitionGuard = {}
  ): boolean {
    const job = this.jobs.get(filePath);
    if (!job) {
      throw new UnknownJobError(filePath);
    }

    if (guard.from !== undefined && job.status !== guard.from) return false;
    if (guard.ticket !== undefined && job.ticket !== guard.ticket) return false;

    this.jobs.set(filePath, {
      status,
      message,
      timestamp: this.clock().toISOString(),
      ticket: job.ticket,
    });
    return true;
  }

  get(filePath: string): JobRecord | undefined {
    const job = this.jobs.get(filePath);
    return job ? toRecord(job) : undefined;
  }

  ticketOf(filePath: string): number | undefined {
    return this.jobs.get(filePath)?.ticket;
  }

  /**
   * Point-in-time copy of every record, in registration order
   */
  snapshot(): JobSnapshot {
    const snapshot: JobSnapshot = {};
    for (const [filePath, job] of this.jobs) {
      snapshot[filePath] = toRecord(job);
    }
    return snapshot;
  }

  counts(): StatusCounts {
    const counts: StatusCounts = { Queued: 0, Processing: 0, Completed: 0, Error: 0, total: 0 };
    for (const job of this.jobs.values()) {
      counts[job.status]++;
      counts.total++;
    }
    return counts;
  }

  clear(): void {
    this.jobs.clear();
  }

  get size(): number {
    return this.jobs.size;
  }
}

function toRecord({ status, message, timestamp }: StoredJob): JobRecord {
  return { status, message, timestamp };
}
