import { EmptyInputError, InvalidDurationError, InvalidTimestampError } from './errors';
import { formatTimestamp, toSeconds } from './timestamps';
import { ID_TRACK, type RawSegment, type Tracklist } from './types';

// Gaps shorter than this are split between neighbours, longer ones become ID tracks
export const GAP_THRESHOLD_SECONDS = 60;

// A final gap this large means the duration was parsed wrong upstream
export const MAX_FINAL_GAP_SECONDS = 86400;

interface PendingTrack {
  artist: string;
  title: string;
  startTime: string;
  endTime: string;
}

export interface TracklistMeta {
  name: string;
  artist: string;
}

/**
 * Turns an ordered list of raw timing segments into a contiguous tracklist
 * covering [0, totalDuration]. Unidentified stretches become "ID" tracks,
 * short transitions are bridged, and the last track is left open-ended.
 */
export function reconcile(
  segments: RawSegment[],
  totalDuration: string,
  meta: TracklistMeta = { name: '', artist: '' }
): Tracklist {
  if (segments.length === 0) {
    throw new EmptyInputError();
  }

  const total = toSeconds(totalDuration);
  const tracks: PendingTrack[] = [];

  segments.forEach((segment, index) => {
    const current = toPendingTrack(segment);

    if (index === 0) {
      if (toSeconds(current.startTime) > 0) {
        tracks.push(idTrack(formatTimestamp(0), current.startTime));
      }
    } else {
      closeGap(tracks, current);
    }

    tracks.push(current);
  });

  closeFinalGap(tracks, totalDuration, total);

  const lastIndex = tracks.length - 1;
  return {
    name: meta.name,
    artist: meta.artist,
    tracks: tracks.map((track, index) => ({
      ...track,
      endTime: index === lastIndex ? '' : track.endTime,
      trackNumber: index + 1,
    })),
  };
}

function toPendingTrack(segment: RawSegment): PendingTrack {
  const unidentified = !segment.artist.trim() && !segment.title.trim();
  const endTime = segment.endTime?.trim() ?? '';

  if (endTime && toSeconds(endTime) <= toSeconds(segment.startTime)) {
    throw new InvalidTimestampError(
      `segment "${segment.title}" ends (${endTime}) before it starts (${segment.startTime})`
    );
  }

  return {
    artist: unidentified ? ID_TRACK : segment.artist,
    title: unidentified ? ID_TRACK : segment.title,
    startTime: segment.startTime.trim(),
    endTime,
  };
}

function idTrack(startTime: string, endTime: string): PendingTrack {
  return { artist: ID_TRACK, title: ID_TRACK, startTime, endTime };
}

function closeGap(tracks: PendingTrack[], next: PendingTrack): void {
  const prev = tracks[tracks.length - 1];
  const nextStart = toSeconds(next.startTime);

  if (!prev.endTime) {
    // Closing prev at next's start must leave it a positive length
    if (nextStart <= toSeconds(prev.startTime)) {
      throw new InvalidTimestampError(
        `segment "${next.title}" starts (${next.startTime}) no later than open-ended "${prev.title}" (${prev.startTime})`
      );
    }
    prev.endTime = next.startTime;
    return;
  }

  const prevEnd = toSeconds(prev.endTime);
  const gap = nextStart - prevEnd;

  if (gap <= 0) {
    if (gap < 0) {
      console.warn(`[reconcile] "${prev.title}" overlaps "${next.title}" by ${-gap}s, keeping both as written`);
    }
    return;
  }

  if (gap < GAP_THRESHOLD_SECONDS) {
    const midpoint = formatTimestamp(prevEnd + Math.floor(gap / 2));
    prev.endTime = midpoint;
    next.startTime = midpoint;
    return;
  }

  tracks.push(idTrack(prev.endTime, next.startTime));
}

function closeFinalGap(tracks: PendingTrack[], totalDuration: string, total: number): void {
  const last = tracks[tracks.length - 1];

  if (!last.endTime) {
    if (toSeconds(last.startTime) >= total) {
      throw new InvalidDurationError(
        `last track starts at ${last.startTime}, not before the end of the mix (${totalDuration})`
      );
    }
    last.endTime = totalDuration;
    return;
  }

  const finalGap = total - toSeconds(last.endTime);
  if (finalGap < 0 || finalGap >= MAX_FINAL_GAP_SECONDS) {
    throw new InvalidDurationError(`invalid final gap (${finalGap} seconds)`);
  }

  if (finalGap === 0) {
    return;
  }

  if (finalGap < GAP_THRESHOLD_SECONDS) {
    last.endTime = totalDuration;
  } else {
    tracks.push(idTrack(last.endTime, totalDuration));
  }
}
