import { formatTimestamp } from '@/lib/timestamps';
import type { Tracklist } from '@/lib/types';

// A reconciled tracklist of `count` one-minute tracks titled "Track 1".."Track n"
export function makeTracklist(count: number, name = 'Test Set'): Tracklist {
  return {
    name,
    artist: 'Test Artist',
    tracks: Array.from({ length: count }, (_, i) => ({
      artist: `Artist ${i + 1}`,
      title: `Track ${i + 1}`,
      startTime: formatTimestamp(i * 60),
      endTime: i === count - 1 ? '' : formatTimestamp((i + 1) * 60),
      trackNumber: i + 1,
    })),
  };
}

// Lets pending promise chains run a few steps
export async function ticks(count: number): Promise<void> {
  for (let i = 0; i < count; i++) {
    await Promise.resolve();
  }
}
