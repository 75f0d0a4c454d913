import { describe, it, expect } from 'vitest';
import { JobStatusStore } from '../../src/modules/batch/batch.store';
import { UnknownJobError } from '../../src/common/errors';

function steppingClock(start = Date.UTC(2024, 0, 1)) {
  let tick = 0;
  return () => new Date(start + 1000 * tick++);
}

describe('JobStatusStore', () => {
  it('registers a new path as Queued', () => {
    const store = new JobStatusStore(steppingClock());

    expect(store.register('/docs/a.pdf')).toBe(true);
    expect(store.get('/docs/a.pdf')).toEqual({
      status: 'Queued',
      message: 'Waiting to be processed',
      timestamp: '2024-01-01T00:00:00.000Z',
    });
  });

  it('refuses to register a path that is queued or processing', () => {
    const store = new JobStatusStore();
    store.register('/docs/a.pdf');

    expect(store.register('/docs/a.pdf')).toBe(false);

    store.transition('/docs/a.pdf', 'Processing');
    expect(store.register('/docs/a.pdf')).toBe(false);
    expect(store.get('/docs/a.pdf')?.status).toBe('Processing');
  });

  it.each(['Completed', 'Error'] as const)('re-queues a path that ended as %s', status => {
    const store = new JobStatusStore();
    store.register('/docs/a.pdf');
    const firstTicket = store.ticketOf('/docs/a.pdf');
    store.transition('/docs/a.pdf', 'Processing');
    store.transition('/docs/a.pdf', status, 'done');

    expect(store.register('/docs/a.pdf')).toBe(true);
    expect(store.get('/docs/a.pdf')?.status).toBe('Queued');
    expect(store.ticketOf('/docs/a.pdf')).not.toBe(firstTicket);
    expect(store.size).toBe(1);
  });

  it('throws UnknownJobError when transitioning an unregistered path', () => {
    const store = new JobStatusStore();

    expect(() => store.transition('/docs/missing.pdf', 'Processing')).toThrow(UnknownJobError);
  });

  it('overwrites status, message and timestamp together', () => {
    const store = new JobStatusStore(steppingClock());
    store.register('/docs/a.pdf');

    expect(store.transition('/docs/a.pdf', 'Error', 'broken file')).toBe(true);
    expect(store.get('/docs/a.pdf')).toEqual({
      status: 'Error',
      message: 'broken file',
      timestamp: '2024-01-01T00:00:01.000Z',
    });
  });

  it('skips a guarded write when the expected status no longer holds', () => {
    const store = new JobStatusStore();
    store.register('/docs/a.pdf');
    store.transition('/docs/a.pdf', 'Processing');
    store.transition('/docs/a.pdf', 'Error', 'Conversion timed out after 120s');

    const written = store.transition('/docs/a.pdf', 'Completed', 'late result', { from: 'Processing' });

    expect(written).toBe(false);
    expect(store.get('/docs/a.pdf')?.message).toBe('Conversion timed out after 120s');
  });

  it('skips a guarded write carrying the ticket of an earlier registration', () => {
    const store = new JobStatusStore();
    store.register('/docs/a.pdf');
    const staleTicket = store.ticketOf('/docs/a.pdf');
    store.clear();
    store.register('/docs/a.pdf');

    expect(store.transition('/docs/a.pdf', 'Processing', null, { ticket: staleTicket })).toBe(false);
    expect(store.get('/docs/a.pdf')?.status).toBe('Queued');
  });

  it('returns snapshots that cannot mutate the store', () => {
    const store = new JobStatusStore();
    store.register('/docs/a.pdf');

    const snapshot = store.snapshot();
    snapshot['/docs/a.pdf'].status = 'Completed';
    delete snapshot['/docs/a.pdf'];

    expect(store.get('/docs/a.pdf')?.status).toBe('Queued');
    expect(Object.keys(store.snapshot())).toEqual(['/docs/a.pdf']);
  });

  it('keeps registration order in snapshots', () => {
    const store = new JobStatusStore();
    store.register('/docs/b.pdf');
    store.register('/docs/a.pdf');
    store.register('/docs/c.pdf');

    expect(Object.keys(store.snapshot())).toEqual(['/docs/b.pdf', '/docs/a.pdf', '/docs/c.pdf']);
  });

  it('counts records per status', () => {
    const store = new JobStatusStore();
    store.register('/docs/a.pdf');
    store.register('/docs/b.pdf');
    store.register('/docs/c.pdf');
    store.transition('/docs/b.pdf', 'Processing');
    store.transition('/docs/c.pdf', 'Error', 'bad');

    expect(store.counts()).toEqual({ Queued: 1, Processing: 1, Completed: 0, Error: 1, total: 3 });
  });

  it('clears every record at once', () => {
    const store = new JobStatusStore();
    store.register('/docs/a.pdf');
    store.register('/docs/b.pdf');

    store.clear();

    expect(store.snapshot()).toEqual({});
    expect(store.size).toBe(0);
    expect(store.get('/docs/a.pdf')).toBeUndefined();
  });
});
