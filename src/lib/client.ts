import type { JobStatus } from './types';
import { decodeSSE } from './utils';

export interface StreamedEvent {
  stage: string;
  progress: number;
  message: string;
  timestamp: string;
  data?: string;
  error?: string;
}

export interface FinalStatus {
  status: JobStatus;
  progress: number;
  message: string;
  error?: string;
  results: string[];
}

type Frame = { type: 'event'; event: StreamedEvent } | ({ type: 'status' } & FinalStatus);

function isFrame(value: unknown): value is Frame {
  if (typeof value !== 'object' || value === null || !('type' in value)) {
    return false;
  }
  return (value.type === 'event' && 'event' in value) || (value.type === 'status' && 'status' in value);
}

/**
 * Follows a job's event stream until the server reports a terminal status.
 * Usage:  const final = await watchJob('http://localhost:3000', jobId, e => ...)
 */
export async function watchJob(
  baseUrl: string,
  jobId: string,
  onEvent: (event: StreamedEvent) => void = () => undefined,
  init: RequestInit = {}
): Promise<FinalStatus> {
  const resp = await fetch(`${baseUrl}/api/jobs/${encodeURIComponent(jobId)}/events`, {
    ...init,
    headers: { Accept: 'text/event-stream' },
  });
  if (!resp.ok) {
    throw new Error(`Failed to watch job ${jobId}: HTTP ${resp.status}`);
  }

  for await (const frame of decodeSSE(resp)) {
    if (!isFrame(frame)) {
      console.warn('Ignoring unexpected SSE frame:', frame);
      continue;
    }
    if (frame.type === 'event') {
      onEvent(frame.event);
    } else {
      const { type: _type, ...status } = frame;
      return status;
    }
  }
  throw new Error(`Event stream for job ${jobId} ended before the job finished`);
}
