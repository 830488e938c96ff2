export interface Track {
  artist: string;
  title: string;
  startTime: string;
  endTime: string;
  trackNumber: number;

  // Only set on copies returned to API callers
  downloadUrl?: string;
  sizeBytes?: number;
  available?: boolean;
}

export interface Tracklist {
  name: string;
  artist: string;
  tracks: Track[];
}

// A timing record as scraped or imported, before reconciliation
export interface RawSegment {
  artist: string;
  title: string;
  startTime: string;
  endTime?: string;
}

export type JobStatus = 'pending' | 'processing' | 'completed' | 'failed' | 'cancelled';

export type ProgressStage =
  | 'initializing'
  | 'importing'
  | 'downloading'
  | 'processing'
  | 'complete'
  | 'error';

export interface ProgressEvent {
  stage: ProgressStage;
  progress: number;
  message: string;
  timestamp: Date;
  data?: Uint8Array;
  error?: string;
}

export interface Job {
  id: string;
  status: JobStatus;
  progress: number;
  message: string;
  error?: string;
  results: string[];
  events: ProgressEvent[];
  startTime: Date;
  endTime?: Date;
  tracklist: Tracklist;
}

export interface JobPage {
  jobs: Job[];
  page: number;
  pageSize: number;
  totalJobs: number;
  totalPages: number;
}

export const ID_TRACK = 'ID';
