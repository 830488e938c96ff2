import { spawn } from 'node:child_process';
import { mkdir, rm, stat } from 'node:fs/promises';
import path from 'node:path';
import { AudioEngineError, CancelledError } from '../errors';
import { toSeconds } from '../timestamps';
import { type AudioEngine, type SplitParams, SUPPORTED_EXTENSIONS, isSupportedExtension } from './engine';

const AUDIO_BITRATE = '128k';
const ID3_VERSION = '3';
const MAX_COMMAND_LENGTH = 200;

export function buildCoverArtArgs(inputPath: string, outputPath: string): string[] {
  return ['-y', '-i', inputPath, '-map', '0:v:0', '-c:v', 'mjpeg', '-vframes', '1', outputPath];
}

/**
 * Arguments that cut [start, start+duration) out of the input and re-encode it.
 * A duration of 0 runs to the end of the input.
 */
export function buildExtractArgs(
  inputPath: string,
  startSeconds: number,
  durationSeconds: number,
  outputPath: string,
  extension: keyof typeof SUPPORTED_EXTENSIONS
): string[] {
  const { codec, format } = SUPPORTED_EXTENSIONS[extension];
  const args = ['-y', '-i', inputPath, '-ss', startSeconds.toFixed(3)];
  if (durationSeconds > 0) {
    args.push('-t', durationSeconds.toFixed(3));
  }
  args.push(
    '-map', '0:a',
    '-c:a', codec,
    '-f', format,
    '-b:a', AUDIO_BITRATE,
    '-af', 'aresample=async=1',
    '-movflags', '+faststart',
    '-id3v2_version', ID3_VERSION,
    outputPath
  );
  return args;
}

// Copies the audio stream and writes tags, plus the cover when there is one
export function buildTagArgs(inputPath: string, outputPath: string, params: SplitParams): string[] {
  if (!isSupportedExtension(params.fileExtension)) {
    throw new AudioEngineError(`unsupported file extension: ${params.fileExtension}`, '', '');
  }
  const { format } = SUPPORTED_EXTENSIONS[params.fileExtension];
  const args = ['-y', '-i', inputPath];

  if (params.coverArtPath) {
    args.push('-i', params.coverArtPath, '-map', '0:a', '-map', '1:v', '-c:a', 'copy', '-c:v', 'mjpeg',
      '-disposition:v:0', 'attached_pic');
  } else {
    args.push('-map', '0:a', '-c:a', 'copy');
  }
  args.push('-f', format, '-movflags', '+faststart', '-id3v2_version', ID3_VERSION);

  const tags: Array<[string, string]> = [
    ['album_artist', params.artist],
    ['artist', params.track.artist],
    ['title', params.track.title],
    ['track', `${params.track.trackNumber}/${params.trackCount}`],
    ['album', params.name],
    ['compilation', '1'],
  ];
  for (const [key, value] of tags) {
    args.push('-metadata', `${key}=${value}`);
  }
  if (params.coverArtPath) {
    args.push('-metadata:s:v', 'title=Album cover', '-metadata:s:v', 'comment=Cover (front)');
  }

  args.push(outputPath);
  return args;
}

export class FfmpegEngine implements AudioEngine {
  constructor(private readonly binary = 'ffmpeg') {}

  async extractCoverArt(inputPath: string, outputPath: string, signal?: AbortSignal): Promise<void> {
    await assertReadableFile(inputPath);
    await mkdir(path.dirname(outputPath), { recursive: true });
    await this.run(buildCoverArtArgs(inputPath, outputPath), signal);
  }

  async split(params: SplitParams): Promise<void> {
    if (!isSupportedExtension(params.fileExtension)) {
      throw new AudioEngineError(`unsupported file extension: ${params.fileExtension}`, '', '');
    }
    await assertReadableFile(params.inputPath);
    if (params.coverArtPath) {
      await assertReadableFile(params.coverArtPath);
    }

    const start = toSeconds(params.track.startTime);
    const duration = params.track.endTime ? toSeconds(params.track.endTime) - start : 0;

    const finalPath = `${params.outputPath}.${params.fileExtension}`;
    const segmentPath = `${params.outputPath}.untagged.${params.fileExtension}`;
    await mkdir(path.dirname(finalPath), { recursive: true });

    try {
      await this.run(buildExtractArgs(params.inputPath, start, duration, segmentPath, params.fileExtension), params.signal);
      await this.run(buildTagArgs(segmentPath, finalPath, params), params.signal);
    } finally {
      await rm(segmentPath, { force: true });
    }
  }

  private run(args: string[], signal?: AbortSignal): Promise<void> {
    const command = [this.binary, ...args].join(' ');
    const shown = command.length > MAX_COMMAND_LENGTH ? `${command.slice(0, MAX_COMMAND_LENGTH)}...` : command;

    return new Promise((resolve, reject) => {
      const child = spawn(this.binary, args, { signal, stdio: ['ignore', 'pipe', 'pipe'] });
      let output = '';
      child.stdout.on('data', (chunk: Buffer) => { output += chunk.toString(); });
      child.stderr.on('data', (chunk: Buffer) => { output += chunk.toString(); });

      child.on('error', error => {
        if (signal?.aborted) {
          reject(new CancelledError('ffmpeg was aborted'));
        } else {
          reject(new AudioEngineError(`ffmpeg error: ${error.message}`, shown, output));
        }
      });
      child.on('close', code => {
        if (code === 0) {
          resolve();
        } else if (!signal?.aborted) {
          reject(new AudioEngineError(`ffmpeg exited with code ${code}`, shown, output));
        }
      });
    });
  }
}

async function assertReadableFile(filePath: string): Promise<void> {
  const info = await stat(filePath).catch((error: unknown) => {
    throw new AudioEngineError(`file not found: ${filePath}`, '', error instanceof Error ? error.message : '');
  });
  if (info.isDirectory()) {
    throw new AudioEngineError(`invalid path: ${filePath} is a directory`, '', '');
  }
  if (info.size === 0) {
    throw new AudioEngineError(`file is empty: ${filePath}`, '', '');
  }
}
