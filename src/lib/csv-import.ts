import { parse } from 'csv-parse/sync';
import { InvalidTracklistError } from './errors';
import { reconcile } from './reconcile';
import type { RawSegment, Tracklist } from './types';

// Column layout of the exported tracklist CSV
const COL_TOTAL_DURATION = 0;
const COL_SET_ARTIST = 1;
const COL_SET_NAME = 2;
const COL_START = 4;
const COL_END = 5;
const COL_ARTIST = 6;
const COL_TITLE = 7;
const MIN_FIELDS = 8;

/**
 * Reads a tracklist export: a header row, then a row carrying the mix
 * duration, set artist and set name along with the first track, then one row
 * per further track. The segments are reconciled before they are returned.
 */
export function importTracklistCsv(text: string): Tracklist {
  const rows = readRows(text);
  if (rows.length < 2) {
    throw new InvalidTracklistError('no tracks found in CSV file');
  }

  const [, metadata, ...rest] = rows;
  const segments: RawSegment[] = [];

  for (const [index, row] of [metadata, ...rest].entries()) {
    if (row.length < MIN_FIELDS) {
      throw new InvalidTracklistError(
        `invalid CSV record on line ${index + 2}: expected at least ${MIN_FIELDS} fields, got ${row.length}`
      );
    }
    segments.push({
      artist: row[COL_ARTIST],
      title: row[COL_TITLE],
      startTime: row[COL_START],
      endTime: row[COL_END] || undefined,
    });
  }

  return reconcile(segments, metadata[COL_TOTAL_DURATION], {
    artist: metadata[COL_SET_ARTIST],
    name: metadata[COL_SET_NAME],
  });
}

function readRows(text: string): string[][] {
  let parsed: unknown;
  try {
    parsed = parse(text, { relax_column_count: true, skip_empty_lines: true, trim: true });
  } catch (error) {
    throw new InvalidTracklistError(`failed to read CSV: ${error instanceof Error ? error.message : error}`, {
      cause: error,
    });
  }

  if (!Array.isArray(parsed)) {
    throw new InvalidTracklistError('failed to read CSV: unexpected parser output');
  }
  return parsed.map(row =>
    Array.isArray(row) ? row.map(field => (typeof field === 'string' ? field : String(field))) : []
  );
}
