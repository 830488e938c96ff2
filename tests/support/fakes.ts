import { vi } from 'vitest';
import type { AudioEngine, SplitParams } from '@/lib/audio/engine';
import type { DownloadOptions, Downloader } from '@/lib/downloader';

type SplitBehaviour = (params: SplitParams) => Promise<void>;

// Records every call and delegates to a per-test behaviour
export class FakeEngine implements AudioEngine {
  readonly calls: SplitParams[] = [];
  active = 0;
  maxActive = 0;

  extractCoverArt = vi.fn(async (_inputPath: string, _outputPath: string, _signal?: AbortSignal) => {});

  constructor(private readonly behaviour: SplitBehaviour = async () => {}) {}

  async split(params: SplitParams): Promise<void> {
    this.calls.push(params);
    this.active++;
    this.maxActive = Math.max(this.maxActive, this.active);
    try {
      await this.behaviour(params);
    } finally {
      this.active--;
    }
  }
}

type DownloadBehaviour = (url: string, outputDir: string, options: DownloadOptions) => Promise<string>;

export class FakeDownloader implements Downloader {
  readonly urls: string[] = [];

  constructor(private readonly behaviour: DownloadBehaviour) {}

  download(url: string, outputDir: string, options: DownloadOptions = {}): Promise<string> {
    this.urls.push(url);
    return this.behaviour(url, outputDir, options);
  }
}

// Never settles; stands in for work that hangs
export function hang(): Promise<never> {
  return new Promise(() => {});
}
