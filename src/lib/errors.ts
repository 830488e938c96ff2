export class SetSplitterError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

// Reconciliation
export class EmptyInputError extends SetSplitterError {
  constructor(message = 'no segments to reconcile') {
    super(message);
  }
}

export class InvalidDurationError extends SetSplitterError {}

export class InvalidTimestampError extends SetSplitterError {}

export class InvalidTracklistError extends SetSplitterError {}

// Job store
export class NotFoundError extends SetSplitterError {
  constructor(readonly jobId: string) {
    super(`job not found: ${jobId}`);
  }
}

export class InvalidStateError extends SetSplitterError {
  constructor(readonly jobId: string, readonly status: string) {
    super(`invalid job state: ${jobId} is ${status}`);
  }
}

// Processing
export class SplitError extends SetSplitterError {
  constructor(
    readonly trackNumber: number,
    readonly title: string,
    cause: unknown
  ) {
    super(`track ${trackNumber} (${title}): ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
  }
}

export class CancelledError extends SetSplitterError {
  constructor(message = 'operation cancelled') {
    super(message);
  }
}

export class DeadlineExceededError extends SetSplitterError {
  constructor(readonly timeoutMs: number) {
    super(`job exceeded its deadline of ${timeoutMs} ms`);
  }
}

export class DownloadError extends SetSplitterError {}

// A job's results cannot be packed into a zip
export class ArchiveError extends SetSplitterError {}

export class AudioEngineError extends SetSplitterError {
  constructor(
    message: string,
    readonly command: string,
    readonly output: string
  ) {
    super(`${message}\nCommand: ${command}\nOutput: ${output}`);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'unknown error';
}
