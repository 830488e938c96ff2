import type { Track } from '../types';

export interface SplitParams {
  inputPath: string;
  // Without extension; the engine appends `.${fileExtension}`
  outputPath: string;
  fileExtension: string;
  track: Track;
  trackCount: number;
  artist: string;
  name: string;
  coverArtPath?: string;
  signal?: AbortSignal;
}

export interface AudioEngine {
  extractCoverArt(inputPath: string, outputPath: string, signal?: AbortSignal): Promise<void>;
  split(params: SplitParams): Promise<void>;
}

export const SUPPORTED_EXTENSIONS = {
  mp3: { codec: 'libmp3lame', format: 'mp3' },
  m4a: { codec: 'aac', format: 'mp4' },
  wav: { codec: 'pcm_s16le', format: 'wav' },
  flac: { codec: 'flac', format: 'flac' },
} as const;

export type FileExtension = keyof typeof SUPPORTED_EXTENSIONS;

export function isSupportedExtension(extension: string): extension is FileExtension {
  return Object.prototype.hasOwnProperty.call(SUPPORTED_EXTENSIONS, extension);
}
