import os from 'node:os';
import path from 'node:path';
import { isSupportedExtension } from './audio/engine';
import { DEFAULT_CONCURRENCY } from './split-pipeline';

export interface AppConfig {
  outputDir: string;
  tempDir: string;
  fileExtension: string;
  maxConcurrentTasks: number;
  jobTimeoutMs: number;
  ffmpegPath: string;
}

const DEFAULT_JOB_TIMEOUT_MINUTES = 45;

function positiveInt(value: string | undefined, fallback: number): number {
  const parsed = Number.parseInt(value ?? '', 10);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const fileExtension = env.SET_SPLITTER_FILE_EXTENSION || 'mp3';
  if (!isSupportedExtension(fileExtension)) {
    throw new Error(`SET_SPLITTER_FILE_EXTENSION must be one of mp3, m4a, wav, flac (got "${fileExtension}")`);
  }

  return {
    outputDir: path.resolve(env.SET_SPLITTER_OUTPUT_DIR || 'output'),
    tempDir: path.resolve(env.SET_SPLITTER_TEMP_DIR || path.join(os.tmpdir(), 'set-splitter')),
    fileExtension,
    maxConcurrentTasks: positiveInt(env.SET_SPLITTER_MAX_CONCURRENT_TASKS, DEFAULT_CONCURRENCY),
    jobTimeoutMs: positiveInt(env.SET_SPLITTER_JOB_TIMEOUT_MINUTES, DEFAULT_JOB_TIMEOUT_MINUTES) * 60_000,
    ffmpegPath: env.FFMPEG_PATH || 'ffmpeg',
  };
}
