import path from 'node:path';
import pLimit from 'p-limit';
import type { AudioEngine } from './audio/engine';
import { CancelledError, SplitError, errorMessage } from './errors';
import { PROGRESS_PROCESSING_START, type ProgressObserver, processingProgress, progressEvent } from './progress';
import type { Track, Tracklist } from './types';
import { sanitizeFilename } from './utils';

export const DEFAULT_CONCURRENCY = 4;
export const MAX_CONCURRENCY = 10;

export interface SplitPipelineOptions {
  tracklist: Tracklist;
  sourceFile: string;
  outputDir: string;
  fileExtension: string;
  concurrencyLimit: number;
  engine: AudioEngine;
  // Where to extract the source's embedded cover; skipped when absent
  coverArtPath?: string;
  signal?: AbortSignal;
  observer?: ProgressObserver;
}

export function resolveConcurrency(limit: number): number {
  if (!Number.isInteger(limit) || limit < 1 || limit > MAX_CONCURRENCY) {
    console.warn(
      `[split-pipeline] concurrency limit ${limit} is outside 1-${MAX_CONCURRENCY}, using ${DEFAULT_CONCURRENCY}`
    );
    return DEFAULT_CONCURRENCY;
  }
  return limit;
}

// Output path without extension, e.g. "<outputDir>/<set artist> - <set name>/03 - <title>"
export function trackOutputPath(outputDir: string, tracklist: Tracklist, track: Track): string {
  const number = String(track.trackNumber).padStart(2, '0');
  const setDir = sanitizeFilename(`${tracklist.artist} - ${tracklist.name}`);
  return path.join(outputDir, setDir, `${number} - ${sanitizeFilename(track.title)}`);
}

/**
 * Splits every track of the tracklist out of the source file with at most
 * `concurrencyLimit` engine calls in flight. Resolves with output paths in
 * tracklist order. Rejects with the first SplitError, or with CancelledError
 * as soon as `signal` aborts; engine calls already running are left to finish
 * on their own and files they produced stay on disk.
 */
export async function runSplitPipeline(options: SplitPipelineOptions): Promise<string[]> {
  const { tracklist, sourceFile, outputDir, fileExtension, engine, observer } = options;
  const tracks = tracklist.tracks;
  const total = tracks.length;

  if (options.signal?.aborted) {
    throw new CancelledError();
  }

  const concurrency = resolveConcurrency(options.concurrencyLimit);
  const controller = new AbortController();
  const onCallerAbort = () => abortOnce(controller, new CancelledError());
  options.signal?.addEventListener('abort', onCallerAbort, { once: true });

  try {
    const coverArtPath = await extractCoverArt(engine, sourceFile, options.coverArtPath, controller.signal);
    if (controller.signal.aborted) {
      throw controller.signal.reason;
    }

    observer?.emit(progressEvent('processing', PROGRESS_PROCESSING_START, 'Starting track processing...'));

    const limit = pLimit(concurrency);
    const results: string[] = new Array<string>(total).fill('');
    let completed = 0;

    const units = tracks.map((track, index) => {
      if (controller.signal.aborted) {
        return Promise.resolve();
      }

      return limit(async () => {
        // The slot may have been granted after a failure or cancellation
        if (controller.signal.aborted) {
          return;
        }

        const outputPath = trackOutputPath(outputDir, tracklist, track);
        try {
          await engine.split({
            inputPath: sourceFile,
            outputPath,
            fileExtension,
            track,
            trackCount: total,
            artist: tracklist.artist,
            name: tracklist.name,
            coverArtPath,
            signal: controller.signal,
          });
        } catch (error) {
          if (!abortOnce(controller, new SplitError(track.trackNumber, track.title, error))) {
            console.warn(`[split-pipeline] ignoring failure of track ${track.trackNumber}: ${errorMessage(error)}`);
          }
          return;
        }

        results[index] = `${outputPath}.${fileExtension}`;
        if (controller.signal.aborted) {
          return;
        }

        completed++;
        observer?.emit(
          progressEvent(
            'processing',
            processingProgress(completed, total),
            `Processed track ${completed}/${total}: ${track.title}`
          )
        );
      });
    });

    await Promise.race([Promise.all(units), whenAborted(controller.signal)]);
    return results;
  } finally {
    options.signal?.removeEventListener('abort', onCallerAbort);
  }
}

async function extractCoverArt(
  engine: AudioEngine,
  sourceFile: string,
  coverArtPath: string | undefined,
  signal: AbortSignal
): Promise<string | undefined> {
  if (!coverArtPath) {
    return undefined;
  }
  try {
    await engine.extractCoverArt(sourceFile, coverArtPath, signal);
    return coverArtPath;
  } catch (error) {
    console.warn(`[split-pipeline] no cover art extracted, continuing without: ${errorMessage(error)}`);
    return undefined;
  }
}

// Only the first reason sticks; later callers get false
function abortOnce(controller: AbortController, reason: Error): boolean {
  if (controller.signal.aborted) {
    return false;
  }
  controller.abort(reason);
  return true;
}

function whenAborted(signal: AbortSignal): Promise<never> {
  return new Promise((_, reject) => {
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }
    signal.addEventListener('abort', () => reject(signal.reason), { once: true });
  });
}
