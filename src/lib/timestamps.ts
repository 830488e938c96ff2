import { InvalidTimestampError } from './errors';

const PART = /^\d+$/;

/**
 * Converts "H:MM:SS" or "MM:SS" to whole seconds.
 * Throws InvalidTimestampError on anything else.
 */
export function toSeconds(timestamp: string): number {
  const parts = timestamp.trim().split(':');
  if ((parts.length !== 2 && parts.length !== 3) || !parts.every(p => PART.test(p))) {
    throw new InvalidTimestampError(`invalid timestamp format: "${timestamp}"`);
  }

  const [seconds, minutes, hours = 0] = parts.map(Number).reverse();
  if (seconds >= 60 || (parts.length === 3 && minutes >= 60)) {
    throw new InvalidTimestampError(`invalid timestamp value: "${timestamp}"`);
  }
  return hours * 3600 + minutes * 60 + seconds;
}

// "MM:SS" below one hour, "H:MM:SS" from there on
export function formatTimestamp(totalSeconds: number): string {
  const whole = Math.max(0, Math.floor(totalSeconds));
  const hours = Math.floor(whole / 3600);
  const minutes = Math.floor((whole % 3600) / 60);
  const seconds = whole % 60;
  const mmss = `${String(minutes).padStart(2, '0')}:${String(seconds).padStart(2, '0')}`;
  return hours > 0 ? `${hours}:${mmss}` : mmss;
}
