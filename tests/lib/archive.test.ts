import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { archiveFilename, createZipStream, prepareArchiveEntries } from '@/lib/archive';
import { ArchiveError } from '@/lib/errors';
import { JobStore } from '@/lib/job-store';
import type { Job, Tracklist } from '@/lib/types';
import { makeTracklist } from '../support/fixtures';

let dir: string;
const file = (name: string) => path.join(dir, name);

beforeAll(async () => {
  dir = await mkdtemp(path.join(os.tmpdir(), 'set-splitter-archive-'));
  await writeFile(file('a.mp3'), 'first');
  await writeFile(file('b.flac'), 'second');
});

afterAll(async () => {
  await rm(dir, { recursive: true, force: true });
});

function completed(results: string[], tracklist: Tracklist = makeTracklist(2)): Job {
  const store = new JobStore();
  const { job } = store.createJob(tracklist);
  store.updateStatus(job.id, 'processing', [], 'Starting');
  store.updateStatus(job.id, 'completed', results, 'Done');
  return store.getJob(job.id);
}

describe('prepareArchiveEntries', () => {
  it('numbers entries and keeps each file extension', async () => {
    const entries = await prepareArchiveEntries(completed([file('a.mp3'), file('b.flac')]));

    expect(entries).toEqual([
      { sourcePath: file('a.mp3'), name: '01-Track 1.mp3' },
      { sourcePath: file('b.flac'), name: '02-Track 2.flac' },
    ]);
  });

  it('sanitizes titles', async () => {
    const tracklist = makeTracklist(1);
    tracklist.tracks[0].title = 'Intro/Outro';

    const [entry] = await prepareArchiveEntries(completed([file('a.mp3')], tracklist));

    expect(entry.name).toBe('01-Intro_Outro.mp3');
  });

  it('rejects a job without results', async () => {
    await expect(prepareArchiveEntries(completed([]))).rejects.toThrow(new ArchiveError('job has no tracks'));
  });

  it('rejects a result with no track metadata', async () => {
    const job = completed([file('a.mp3'), file('b.flac')], makeTracklist(1));

    await expect(prepareArchiveEntries(job)).rejects.toThrow('track 2 metadata not found');
  });

  it('rejects a directory in place of a track file', async () => {
    await expect(prepareArchiveEntries(completed([dir]))).rejects.toThrow(ArchiveError);
  });

  it('rejects a title that sanitizes to nothing', async () => {
    const tracklist = makeTracklist(1);
    tracklist.tracks[0].title = '   ';

    await expect(prepareArchiveEntries(completed([file('a.mp3')], tracklist))).rejects.toThrow(
      'track 1 has no usable file name'
    );
  });

  it('rejects entry names longer than 255 characters', async () => {
    const tracklist = makeTracklist(1);
    tracklist.tracks[0].title = 'x'.repeat(260);

    await expect(prepareArchiveEntries(completed([file('a.mp3')], tracklist))).rejects.toThrow(
      /^track 1 file name is too long/
    );
  });
});

describe('archiveFilename', () => {
  it('names the zip after the set', () => {
    const job = completed([file('a.mp3')], makeTracklist(1, 'Live: Club'));
    expect(archiveFilename(job)).toBe('Test Artist - Live_ Club.zip');
  });
});

describe('createZipStream', () => {
  it('produces a zip holding every entry', async () => {
    const stream = createZipStream([
      { sourcePath: file('a.mp3'), name: '01-One.mp3' },
      { sourcePath: file('b.flac'), name: '02-Two.flac' },
    ]);

    const body = Buffer.from(await new Response(stream).arrayBuffer());

    expect(body.subarray(0, 4).toString('latin1')).toBe('PK\x03\x04');
    expect(body.includes('01-One.mp3')).toBe(true);
    expect(body.includes('02-Two.flac')).toBe(true);
  });
});
