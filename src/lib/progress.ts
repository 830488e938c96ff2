import type { ProgressEvent, ProgressStage } from './types';

// Overall job progress scale: download fills [0,25), splitting [25,99],
// and 100 is only reported once the whole job has finished.
export const PROGRESS_DOWNLOAD_START = 0;
export const PROGRESS_DOWNLOAD_END = 25;
export const PROGRESS_PROCESSING_START = 25;
export const PROGRESS_PROCESSING_END = 99;
export const PROGRESS_COMPLETE = 100;

export interface ProgressObserver {
  emit(event: ProgressEvent): void;
}

export function progressEvent(
  stage: ProgressStage,
  progress: number,
  message: string,
  extra: Pick<ProgressEvent, 'data' | 'error'> = {}
): ProgressEvent {
  return {
    stage,
    progress,
    message,
    timestamp: new Date(),
    ...extra,
  };
}

// Maps a 0-100 download percentage into the download share of the job
export function downloadProgress(percent: number): number {
  const clamped = Math.min(100, Math.max(0, percent));
  const range = PROGRESS_DOWNLOAD_END - PROGRESS_DOWNLOAD_START;
  // 100% download still sits below the processing band
  return Math.min(PROGRESS_DOWNLOAD_START + (clamped * range) / 100, PROGRESS_DOWNLOAD_END - 0.01);
}

export function processingProgress(completed: number, total: number): number {
  if (total <= 0) {
    return PROGRESS_PROCESSING_START;
  }
  const range = PROGRESS_PROCESSING_END - PROGRESS_PROCESSING_START;
  return PROGRESS_PROCESSING_START + (completed / total) * range;
}
