import { CancelledError, InvalidStateError, NotFoundError } from './errors';
import { PROGRESS_COMPLETE } from './progress';
import type { Job, JobPage, JobStatus, ProgressEvent, Tracklist } from './types';

export const DEFAULT_PAGE_SIZE = 10;
export const MAX_PAGE_SIZE = 100;

export const CANCELLED_MESSAGE = 'cancelled by caller';

const TERMINAL_STATUSES: ReadonlySet<JobStatus> = new Set(['completed', 'failed', 'cancelled']);

export function isTerminal(status: JobStatus): boolean {
  return TERMINAL_STATUSES.has(status);
}

export interface CreatedJob {
  job: Job;
  signal: AbortSignal;
}

/**
 * In-memory job registry. Every operation runs to completion synchronously,
 * so callers on the event loop never observe a half-applied update, and jobs
 * only ever leave the store as copies.
 */
export class JobStore {
  private jobs = new Map<string, Job>();
  private controllers = new Map<string, AbortController>();
  private sequence = 0;

  createJob(tracklist: Tracklist): CreatedJob {
    const id = `job_${Date.now()}_${++this.sequence}`;
    if (this.jobs.has(id)) {
      throw new Error(`duplicate job id ${id}`);
    }

    const job: Job = {
      id,
      status: 'pending',
      progress: 0,
      message: 'Job created',
      results: [],
      events: [],
      startTime: new Date(),
      tracklist: structuredClone(tracklist),
    };
    const controller = new AbortController();

    this.jobs.set(id, job);
    this.controllers.set(id, controller);

    return { job: structuredClone(job), signal: controller.signal };
  }

  getJob(id: string): Job {
    return structuredClone(this.find(id));
  }

  updateProgress(id: string, percent: number, message: string): void {
    const job = this.findActive(id);
    job.progress = percent;
    job.message = message;
  }

  appendEvent(id: string, event: ProgressEvent): void {
    this.findActive(id).events.push(structuredClone(event));
  }

  updateStatus(id: string, status: JobStatus, results: string[], message: string): void {
    const job = this.findActive(id);

    job.status = status;
    job.results = [...results];
    job.message = message;

    if (status === 'completed') {
      job.progress = PROGRESS_COMPLETE;
    }
    if (status === 'failed') {
      job.error = message;
    }
    if (isTerminal(status)) {
      this.controllers.delete(id);
      job.endTime = new Date();
    }
  }

  cancelJob(id: string): void {
    const job = this.findActive(id);
    const controller = this.controllers.get(id);
    this.controllers.delete(id);

    // Recorded before aborting so abort listeners already see a terminal job
    job.status = 'cancelled';
    job.message = CANCELLED_MESSAGE;
    job.endTime = new Date();

    controller?.abort(new CancelledError(CANCELLED_MESSAGE));
  }

  listJobs(page: number, pageSize: number): JobPage {
    const safePage = Number.isInteger(page) && page >= 1 ? page : 1;
    const safeSize =
      Number.isInteger(pageSize) && pageSize >= 1 && pageSize <= MAX_PAGE_SIZE ? pageSize : DEFAULT_PAGE_SIZE;

    // Map order is creation order; the sort is stable, so it breaks startTime ties
    const ordered = Array.from(this.jobs.values()).sort(
      (a, b) => a.startTime.getTime() - b.startTime.getTime()
    );

    const start = (safePage - 1) * safeSize;
    return {
      jobs: ordered.slice(start, start + safeSize).map(job => structuredClone(job)),
      page: safePage,
      pageSize: safeSize,
      totalJobs: ordered.length,
      totalPages: Math.ceil(ordered.length / safeSize),
    };
  }

  private find(id: string): Job {
    const job = this.jobs.get(id);
    if (!job) {
      throw new NotFoundError(id);
    }
    return job;
  }

  private findActive(id: string): Job {
    const job = this.find(id);
    if (isTerminal(job.status)) {
      throw new InvalidStateError(id, job.status);
    }
    return job;
  }
}
