import { createWriteStream } from 'node:fs';
import { mkdir, rm } from 'node:fs/promises';
import path from 'node:path';
import { Readable, Transform } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { CancelledError, DownloadError } from './errors';
import { sanitizeFilename } from './utils';

export interface DownloadOptions {
  signal?: AbortSignal;
  // percent is 0-100 of the download itself
  onProgress?: (percent: number, message: string) => void;
}

export interface Downloader {
  download(url: string, outputDir: string, options?: DownloadOptions): Promise<string>;
}

const USER_AGENT = 'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36';

export function filenameFromResponse(url: string, contentDisposition: string | null): string {
  let filename = 'audio_file';

  const match = contentDisposition?.match(/filename="?([^";]+)"?/);
  if (match) {
    filename = match[1];
  } else {
    try {
      const base = path.posix.basename(new URL(url).pathname);
      if (base && base !== '.' && base !== '/') {
        filename = decodeURIComponent(base);
      }
    } catch {
      // not a parseable URL; keep the default name
      filename = 'audio_file';
    }
  }

  filename = sanitizeFilename(filename) || 'audio_file';
  return filename.includes('.') ? filename : `${filename}.mp3`;
}

/**
 * Fetches a direct audio URL to disk. Progress is reported in whole percent
 * steps when the server sends a Content-Length.
 */
export class HttpDownloader implements Downloader {
  async download(url: string, outputDir: string, options: DownloadOptions = {}): Promise<string> {
    const { signal, onProgress } = options;

    let response: Response;
    try {
      response = await fetch(url, { signal, headers: { 'User-Agent': USER_AGENT } });
    } catch (error) {
      if (signal?.aborted) throw new CancelledError('download cancelled');
      throw new DownloadError(`failed to download: ${error instanceof Error ? error.message : error}`, { cause: error });
    }

    if (!response.ok || !response.body) {
      throw new DownloadError(`download failed with status: ${response.status}`);
    }
    const body = response.body;

    await mkdir(outputDir, { recursive: true });
    const outputPath = path.join(outputDir, filenameFromResponse(url, response.headers.get('content-disposition')));

    const total = Number(response.headers.get('content-length')) || 0;
    let received = 0;
    let lastPercent = -1;

    const counter = new Transform({
      transform(chunk: Buffer, _encoding, callback) {
        received += chunk.length;
        if (total > 0 && onProgress) {
          const percent = Math.floor((received / total) * 100);
          if (percent > lastPercent) {
            lastPercent = percent;
            onProgress(percent, `Downloading... ${percent}%`);
          }
        }
        callback(null, chunk);
      },
    });

    try {
      await pipeline(Readable.from(readChunks(body)), counter, createWriteStream(outputPath), { signal });
    } catch (error) {
      await rm(outputPath, { force: true });
      if (signal?.aborted) throw new CancelledError('download cancelled');
      throw new DownloadError(`failed to save file: ${error instanceof Error ? error.message : error}`, { cause: error });
    }

    if (received === 0) {
      await rm(outputPath, { force: true });
      throw new DownloadError('downloaded file is empty');
    }

    console.log(`[downloader] saved ${received} bytes to ${outputPath}`);
    return outputPath;
  }
}

async function* readChunks(body: NonNullable<Response['body']>): AsyncGenerator<Uint8Array, void, unknown> {
  const reader = body.getReader();
  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;
      yield value;
    }
  } finally {
    reader.releaseLock();
  }
}
