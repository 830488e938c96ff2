import { stat } from 'node:fs/promises';
import { NextResponse } from 'next/server';
import { FfmpegEngine } from './audio/ffmpeg';
import { loadConfig } from './config';
import { HttpDownloader } from './downloader';
import {
  ArchiveError,
  EmptyInputError,
  InvalidDurationError,
  InvalidStateError,
  InvalidTimestampError,
  InvalidTracklistError,
  NotFoundError,
} from './errors';
import { JobRunner } from './job-runner';
import { JobStore } from './job-store';
import type { Job, ProgressEvent, Track } from './types';

// One store and runner per server process
export const config = loadConfig();
export const jobStore = new JobStore();
export const jobRunner = new JobRunner({
  store: jobStore,
  downloader: new HttpDownloader(),
  engine: new FfmpegEngine(config.ffmpegPath),
  config,
});

export type SerializedEvent = Omit<ProgressEvent, 'data'> & { data?: string };
export type SerializedJob = Omit<Job, 'events'> & { events: SerializedEvent[] };

export function serializeEvent(event: ProgressEvent): SerializedEvent {
  const { data, ...rest } = event;
  return data ? { ...rest, data: Buffer.from(data).toString('base64') } : rest;
}

export function serializeJob(job: Job): SerializedJob {
  return { ...job, events: job.events.map(serializeEvent) };
}

/**
 * Adds download details to each track of a completed job. `job` is already a
 * copy handed out by the store, so the stored tracklist stays untouched.
 */
export async function withDownloadInfo(job: Job): Promise<Job> {
  if (job.status !== 'completed' || job.results.length === 0) {
    return job;
  }

  const tracks: Track[] = await Promise.all(
    job.tracklist.tracks.map(async (track, index) => {
      const result = job.results[index];
      if (!result) {
        return track;
      }
      const info = await stat(result).catch(() => undefined);
      return {
        ...track,
        downloadUrl: `/api/jobs/${job.id}/tracks/${index + 1}/download`,
        sizeBytes: info?.size ?? 0,
        available: info !== undefined,
      };
    })
  );
  return { ...job, tracklist: { ...job.tracklist, tracks } };
}

export function errorResponse(error: unknown, fallback: string): NextResponse {
  if (error instanceof NotFoundError) {
    return NextResponse.json({ error: error.message }, { status: 404 });
  }
  if (
    error instanceof InvalidStateError ||
    error instanceof InvalidTracklistError ||
    error instanceof EmptyInputError ||
    error instanceof InvalidDurationError ||
    error instanceof InvalidTimestampError
  ) {
    return NextResponse.json({ error: error.message }, { status: 400 });
  }

  if (error instanceof ArchiveError) {
    console.error(fallback, error);
    return NextResponse.json({ error: `cannot create zip archive: ${error.message}` }, { status: 500 });
  }

  console.error(fallback, error);
  return NextResponse.json({ error: fallback }, { status: 500 });
}
