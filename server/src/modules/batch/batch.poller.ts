/**
 * Status Poller - read-only view of the job store for polling clients
 */

import { JobStatusStore } from './batch.store';
import { StatusCounts, StatusResponse } from './batch.types';

export class StatusPoller {
  constructor(private readonly store: JobStatusStore) {}

  poll(): StatusResponse {
    const response: StatusResponse = {};
    for (const [filePath, record] of Object.entries(this.store.snapshot())) {
      response[filePath] = {
        status: record.status,
        message: record.message ?? '',
        timestamp: record.timestamp,
      };
    }
    return response;
  }

  summary(): StatusCounts {
    return this.store.counts();
  }
}
