import { mkdir, rm } from 'node:fs/promises';
import path from 'node:path';
import type { AudioEngine } from './audio/engine';
import type { AppConfig } from './config';
import type { Downloader } from './downloader';
import { CancelledError, DeadlineExceededError, InvalidStateError, errorMessage } from './errors';
import { JobStore, isTerminal } from './job-store';
import { PROGRESS_COMPLETE, type ProgressObserver, downloadProgress, progressEvent } from './progress';
import { runSplitPipeline } from './split-pipeline';
import type { Job, Tracklist } from './types';

export interface JobRunnerDeps {
  store: JobStore;
  downloader: Downloader;
  engine: AudioEngine;
  config: Pick<AppConfig, 'outputDir' | 'tempDir' | 'jobTimeoutMs'>;
}

export interface ProcessOptions {
  url: string;
  fileExtension: string;
  maxConcurrentTasks: number;
}

/**
 * Drives one job through download and splitting, and records everything that
 * happens on the job in the store.
 */
export class JobRunner {
  constructor(private readonly deps: JobRunnerDeps) {}

  // Creates the job and processes it in the background
  start(tracklist: Tracklist, options: ProcessOptions): Job {
    const { job, signal } = this.deps.store.createJob(tracklist);
    console.log(`[job-runner] job ${job.id} created for "${tracklist.artist} - ${tracklist.name}"`);

    this.run(job.id, signal, options).catch(error => {
      console.error(`[job-runner] job ${job.id} stopped unexpectedly:`, error);
    });
    return job;
  }

  async run(jobId: string, jobSignal: AbortSignal, options: ProcessOptions): Promise<void> {
    const { store, downloader, engine, config } = this.deps;
    const observer = this.observerFor(jobId);

    const deadline = new AbortController();
    const timer = setTimeout(() => deadline.abort(new DeadlineExceededError(config.jobTimeoutMs)), config.jobTimeoutMs);
    const { signal, dispose } = linkSignals(jobSignal, deadline.signal);
    const workDir = path.join(config.tempDir, jobId);

    try {
      const { tracklist } = store.getJob(jobId);
      store.updateStatus(jobId, 'processing', [], 'Starting download and processing');
      observer.emit(progressEvent('initializing', 0, 'Starting download and processing'));

      await mkdir(workDir, { recursive: true });
      observer.emit(progressEvent('downloading', downloadProgress(0), 'Downloading source audio...'));

      const sourceFile = await downloader.download(options.url, workDir, {
        signal,
        onProgress: (percent, message) => observer.emit(progressEvent('downloading', downloadProgress(percent), message)),
      });
      if (signal.aborted) {
        throw signal.reason;
      }
      console.log(`[job-runner] job ${jobId} downloaded ${sourceFile}`);

      const results = await runSplitPipeline({
        tracklist,
        sourceFile,
        outputDir: config.outputDir,
        fileExtension: options.fileExtension,
        concurrencyLimit: options.maxConcurrentTasks,
        engine,
        coverArtPath: path.join(workDir, 'cover.jpg'),
        signal,
        observer,
      });

      observer.emit(progressEvent('complete', PROGRESS_COMPLETE, 'Processing completed'));
      store.updateStatus(jobId, 'completed', results, 'Processing completed successfully');
      console.log(`[job-runner] job ${jobId} completed with ${results.length} tracks`);
    } catch (error) {
      this.finishWithError(jobId, signal.aborted ? signal.reason : error);
    } finally {
      clearTimeout(timer);
      dispose();
      await rm(workDir, { recursive: true, force: true });
    }
  }

  private finishWithError(jobId: string, reason: unknown): void {
    const { store } = this.deps;
    const job = store.getJob(jobId);
    if (isTerminal(job.status)) {
      // cancelJob already recorded the outcome
      console.log(`[job-runner] job ${jobId} stopped after it was ${job.status}`);
      return;
    }

    if (reason instanceof CancelledError) {
      store.updateStatus(jobId, 'cancelled', job.results, 'Processing was cancelled');
      console.warn(`[job-runner] job ${jobId} cancelled`);
      return;
    }

    const message = errorMessage(reason);
    store.appendEvent(jobId, progressEvent('error', job.progress, message, { error: message }));
    store.updateStatus(jobId, 'failed', [], message);
    console.error(`[job-runner] job ${jobId} failed:`, reason);
  }

  private observerFor(jobId: string): ProgressObserver {
    const { store } = this.deps;
    return {
      emit: event => {
        try {
          store.updateProgress(jobId, event.progress, event.message);
          store.appendEvent(jobId, event);
        } catch (error) {
          // Late progress from work still in flight after the job ended
          if (!(error instanceof InvalidStateError)) {
            throw error;
          }
        }
      },
    };
  }
}

function linkSignals(...signals: AbortSignal[]): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const listeners = signals.map(source => {
    const onAbort = () => controller.abort(source.reason);
    if (source.aborted) {
      onAbort();
    } else {
      source.addEventListener('abort', onAbort, { once: true });
    }
    return () => source.removeEventListener('abort', onAbort);
  });
  return { signal: controller.signal, dispose: () => listeners.forEach(remove => remove()) };
}
