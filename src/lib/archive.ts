import { constants } from 'node:fs';
import { access, stat } from 'node:fs/promises';
import path from 'node:path';
import archiver from 'archiver';
import { ArchiveError, errorMessage } from './errors';
import type { Job } from './types';
import { sanitizeFilename } from './utils';

const MAX_ENTRY_NAME_LENGTH = 255;

export interface ArchiveEntry {
  sourcePath: string;
  // Name inside the zip, e.g. "03-Title.mp3"
  name: string;
}

export function archiveFilename(job: Job): string {
  return `${sanitizeFilename(job.tracklist.artist)} - ${sanitizeFilename(job.tracklist.name)}.zip`;
}

/**
 * Checks every result file of a job before the archive is streamed. Once the
 * response has started, a missing file could only truncate the zip.
 */
export async function prepareArchiveEntries(job: Job): Promise<ArchiveEntry[]> {
  if (job.results.length === 0) {
    throw new ArchiveError('job has no tracks');
  }

  const entries: ArchiveEntry[] = [];
  for (const [index, sourcePath] of job.results.entries()) {
    const number = index + 1;
    const track = job.tracklist.tracks[index];
    if (!track) {
      throw new ArchiveError(`track ${number} metadata not found`);
    }

    const info = await stat(sourcePath).catch(() => undefined);
    if (!info?.isFile()) {
      throw new ArchiveError(`track file ${number} not found: ${path.basename(sourcePath)}`);
    }
    await access(sourcePath, constants.R_OK).catch((error: unknown) => {
      throw new ArchiveError(`cannot read track file ${number}: ${errorMessage(error)}`, { cause: error });
    });

    const title = sanitizeFilename(track.title);
    if (!title) {
      throw new ArchiveError(`track ${number} has no usable file name`);
    }
    const name = `${String(number).padStart(2, '0')}-${title}${path.extname(sourcePath)}`;
    if (name.length > MAX_ENTRY_NAME_LENGTH) {
      throw new ArchiveError(`track ${number} file name is too long: ${name}`);
    }

    entries.push({ sourcePath, name });
  }
  return entries;
}

// Zips the entries on demand as the response body is read
export function createZipStream(entries: ArchiveEntry[]): ReadableStream<Uint8Array> {
  const archive = archiver('zip');
  for (const entry of entries) {
    archive.file(entry.sourcePath, { name: entry.name });
  }

  const chunks = archive[Symbol.asyncIterator]();
  archive.finalize().catch((error: unknown) => {
    console.error('[archive] failed to finalize zip:', error);
  });

  return new ReadableStream<Uint8Array>({
    async pull(controller) {
      const { done, value } = await chunks.next();
      if (done) {
        controller.close();
      } else if (value instanceof Uint8Array) {
        controller.enqueue(value);
      }
    },
    async cancel() {
      archive.abort();
      await chunks.return?.();
    },
  });
}
