import { isSupportedExtension } from './audio/engine';
import { InvalidTracklistError } from './errors';
import type { ProcessOptions } from './job-runner';
import { reconcile } from './reconcile';
import type { RawSegment, Tracklist } from './types';
import { safeJsonParse } from './utils';

export const MAX_TRACKS = 100;

export interface ProcessRequest {
  tracklist: Tracklist;
  options: ProcessOptions;
}

type Fields = Record<string, unknown>;

function isObject(value: unknown): value is Fields {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(fields: Fields, key: string): string | undefined {
  const value = fields[key];
  if (value === undefined || value === null || value === '') {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new InvalidTracklistError(`${key} must be a string`);
  }
  return value;
}

function requiredString(fields: Fields, key: string, context: string): string {
  const value = optionalString(fields, key);
  if (value === undefined) {
    throw new InvalidTracklistError(`${context}: ${key} is required`);
  }
  return value;
}

function toSegment(value: unknown, index: number): RawSegment {
  if (!isObject(value)) {
    throw new InvalidTracklistError(`track ${index + 1} must be an object`);
  }
  return {
    artist: optionalString(value, 'artist') ?? '',
    title: optionalString(value, 'title') ?? '',
    startTime: requiredString(value, 'startTime', `track ${index + 1}`),
    endTime: optionalString(value, 'endTime'),
  };
}

/**
 * Validates a POST /api/process body and reconciles its tracklist. The
 * tracklist may arrive as an object or as a JSON string.
 */
export function parseProcessRequest(
  body: unknown,
  defaults: { fileExtension: string; maxConcurrentTasks: number }
): ProcessRequest {
  if (!isObject(body)) {
    throw new InvalidTracklistError('request body must be a JSON object');
  }

  const url = requiredString(body, 'url', 'invalid request');
  const rawTracklist = typeof body.tracklist === 'string' ? safeJsonParse(body.tracklist) : body.tracklist;
  if (!isObject(rawTracklist)) {
    throw new InvalidTracklistError('invalid tracklist: expected an object with name, artist and tracks');
  }

  const name = requiredString(rawTracklist, 'name', 'invalid tracklist');
  const artist = requiredString(rawTracklist, 'artist', 'invalid tracklist');
  const tracks = rawTracklist.tracks;
  if (!Array.isArray(tracks) || tracks.length === 0) {
    throw new InvalidTracklistError('invalid tracklist: at least one track is required');
  }
  if (tracks.length > MAX_TRACKS) {
    throw new InvalidTracklistError(`invalid tracklist: maximum ${MAX_TRACKS} tracks allowed`);
  }
  const segments = tracks.map(toSegment);

  const totalDuration = optionalString(body, 'totalDuration') ?? segments[segments.length - 1].endTime;
  if (!totalDuration) {
    throw new InvalidTracklistError('invalid request: totalDuration is required when the last track has no endTime');
  }

  const fileExtension = optionalString(body, 'fileExtension') ?? defaults.fileExtension;
  if (!isSupportedExtension(fileExtension)) {
    throw new InvalidTracklistError(`unsupported file extension: ${fileExtension}`);
  }

  const concurrency = body.maxConcurrentTasks;
  if (concurrency !== undefined && typeof concurrency !== 'number') {
    throw new InvalidTracklistError('maxConcurrentTasks must be a number');
  }

  return {
    tracklist: reconcile(segments, totalDuration, { name, artist }),
    options: {
      url,
      fileExtension,
      // Out-of-range values fall back to the default inside the pipeline
      maxConcurrentTasks: concurrency ?? defaults.maxConcurrentTasks,
    },
  };
}
