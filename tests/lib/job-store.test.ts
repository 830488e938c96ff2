import { describe, it, expect, beforeEach } from 'vitest';
import { CANCELLED_MESSAGE, JobStore, isTerminal } from '@/lib/job-store';
import { CancelledError, InvalidStateError, NotFoundError } from '@/lib/errors';
import { progressEvent } from '@/lib/progress';
import type { JobStatus } from '@/lib/types';
import { makeTracklist } from '../support/fixtures';

describe('JobStore', () => {
  let store: JobStore;

  beforeEach(() => {
    store = new JobStore();
  });

  describe('createJob', () => {
    it('creates a pending job with a live signal', () => {
      const { job, signal } = store.createJob(makeTracklist(2));

      expect(job.id).toMatch(/^job_\d+_\d+$/);
      expect(job).toMatchObject({
        status: 'pending',
        progress: 0,
        message: 'Job created',
        results: [],
        events: [],
      });
      expect(job.startTime).toBeInstanceOf(Date);
      expect(job.endTime).toBeUndefined();
      expect(job.tracklist.tracks).toHaveLength(2);
      expect(signal.aborted).toBe(false);
    });

    it('hands out distinct ids', () => {
      const ids = Array.from({ length: 5 }, () => store.createJob(makeTracklist(1)).job.id);
      expect(new Set(ids).size).toBe(5);
    });

    it('stores its own copy of the tracklist', () => {
      const tracklist = makeTracklist(1);
      const { job } = store.createJob(tracklist);

      tracklist.tracks[0].title = 'Changed';

      expect(store.getJob(job.id).tracklist.tracks[0].title).toBe('Track 1');
    });
  });

  describe('getJob', () => {
    it('returns a copy the caller cannot change the store through', () => {
      const { job } = store.createJob(makeTracklist(1));

      const copy = store.getJob(job.id);
      copy.status = 'completed';
      copy.results.push('/tmp/x.mp3');

      expect(store.getJob(job.id)).toMatchObject({ status: 'pending', results: [] });
    });

    it('throws NotFoundError for an unknown id', () => {
      expect(() => store.getJob('job_missing')).toThrow(new NotFoundError('job_missing'));
    });
  });

  describe('updates', () => {
    it('records progress and events', () => {
      const { job } = store.createJob(makeTracklist(1));

      store.updateProgress(job.id, 12.5, 'Downloading... 50%');
      store.appendEvent(job.id, progressEvent('downloading', 12.5, 'Downloading... 50%'));

      const stored = store.getJob(job.id);
      expect(stored.progress).toBe(12.5);
      expect(stored.message).toBe('Downloading... 50%');
      expect(stored.events).toHaveLength(1);
      expect(stored.events[0]).toMatchObject({ stage: 'downloading', progress: 12.5 });
    });

    it('stores progress values as given', () => {
      const { job } = store.createJob(makeTracklist(1));
      store.updateProgress(job.id, 150, 'odd');
      expect(store.getJob(job.id).progress).toBe(150);
    });

    it('completes a job at 100%', () => {
      const { job } = store.createJob(makeTracklist(2));
      store.updateStatus(job.id, 'processing', [], 'Starting');
      store.updateStatus(job.id, 'completed', ['/out/01.mp3', '/out/02.mp3'], 'Done');

      const stored = store.getJob(job.id);
      expect(stored).toMatchObject({
        status: 'completed',
        progress: 100,
        message: 'Done',
        results: ['/out/01.mp3', '/out/02.mp3'],
      });
      expect(stored.error).toBeUndefined();
      expect(stored.endTime).toBeInstanceOf(Date);
    });

    it('records the message as the error of a failed job', () => {
      const { job } = store.createJob(makeTracklist(1));
      store.updateStatus(job.id, 'failed', [], 'download failed with status: 404');

      const stored = store.getJob(job.id);
      expect(stored.status).toBe('failed');
      expect(stored.error).toBe('download failed with status: 404');
      expect(stored.endTime).toBeInstanceOf(Date);
    });

    it('refuses every update once a job is terminal', () => {
      const { job } = store.createJob(makeTracklist(1));
      store.updateStatus(job.id, 'completed', [], 'Done');

      expect(() => store.updateStatus(job.id, 'processing', [], 'again')).toThrow(InvalidStateError);
      expect(() => store.updateProgress(job.id, 50, 'late')).toThrow(InvalidStateError);
      expect(() => store.appendEvent(job.id, progressEvent('processing', 50, 'late'))).toThrow(InvalidStateError);
      expect(() => store.cancelJob(job.id)).toThrow(new InvalidStateError(job.id, 'completed'));
      expect(store.getJob(job.id).status).toBe('completed');
    });

    it('throws NotFoundError when updating an unknown job', () => {
      expect(() => store.updateProgress('nope', 1, 'x')).toThrow(NotFoundError);
      expect(() => store.cancelJob('nope')).toThrow(NotFoundError);
    });
  });

  describe('cancelJob', () => {
    it('cancels a pending job and aborts its signal', () => {
      const { job, signal } = store.createJob(makeTracklist(1));

      store.cancelJob(job.id);

      const stored = store.getJob(job.id);
      expect(stored.status).toBe('cancelled');
      expect(stored.message).toBe(CANCELLED_MESSAGE);
      expect(stored.error).toBeUndefined();
      expect(stored.endTime).toBeInstanceOf(Date);
      expect(signal.aborted).toBe(true);
      expect(signal.reason).toBeInstanceOf(CancelledError);
    });

    it('lets abort listeners see the cancelled state', () => {
      const { job, signal } = store.createJob(makeTracklist(1));
      store.updateStatus(job.id, 'processing', [], 'Working');

      let seen = '';
      signal.addEventListener('abort', () => {
        seen = store.getJob(job.id).status;
      });
      store.cancelJob(job.id);

      expect(seen).toBe('cancelled');
    });
  });

  describe('listJobs', () => {
    it('pages through jobs in creation order', () => {
      const ids = Array.from({ length: 25 }, () => store.createJob(makeTracklist(1)).job.id);

      const page = store.listJobs(2, 10);

      expect(page).toMatchObject({ page: 2, pageSize: 10, totalJobs: 25, totalPages: 3 });
      expect(page.jobs.map(j => j.id)).toEqual(ids.slice(10, 20));
      expect(store.listJobs(3, 10).jobs.map(j => j.id)).toEqual(ids.slice(20));
    });

    it('returns an empty page past the last one', () => {
      for (let i = 0; i < 25; i++) store.createJob(makeTracklist(1));

      const page = store.listJobs(4, 10);

      expect(page.jobs).toEqual([]);
      expect(page).toMatchObject({ page: 4, totalJobs: 25, totalPages: 3 });
    });

    it('falls back to defaults for out of range parameters', () => {
      for (let i = 0; i < 3; i++) store.createJob(makeTracklist(1));

      expect(store.listJobs(0, 0)).toMatchObject({ page: 1, pageSize: 10 });
      expect(store.listJobs(-2, 101)).toMatchObject({ page: 1, pageSize: 10 });
      expect(store.listJobs(Number.NaN, 2.5)).toMatchObject({ page: 1, pageSize: 10 });
      expect(store.listJobs(1, 100)).toMatchObject({ page: 1, pageSize: 100, totalPages: 1 });
    });

    it('reports an empty store', () => {
      expect(store.listJobs(1, 10)).toEqual({ jobs: [], page: 1, pageSize: 10, totalJobs: 0, totalPages: 0 });
    });
  });
});

describe('isTerminal', () => {
  it('knows which statuses are final', () => {
    const statuses: JobStatus[] = ['pending', 'processing', 'completed', 'failed', 'cancelled'];
    expect(statuses.filter(isTerminal)).toEqual(['completed', 'failed', 'cancelled']);
  });
});
