export type PulseErrorCode = 'invalid-input' | 'not-found' | 'comments-unavailable' | 'api-error';

export class PulseError extends Error {
  constructor(message: string, readonly code: PulseErrorCode) {
    super(message);
    this.name = 'PulseError';
  }
}

export class InvalidVideoUrlError extends PulseError {
  constructor(readonly input: string) {
    super(`Could not find a video id in "${input}". Expected a ...?v=ID or youtu.be/ID link.`, 'invalid-input');
    this.name = 'InvalidVideoUrlError';
  }
}

export class VideoNotFoundError extends PulseError {
  constructor(readonly videoId: string) {
    super(`Video details unavailable for ${videoId}.`, 'not-found');
    this.name = 'VideoNotFoundError';
  }
}

export class CommentsUnavailableError extends PulseError {
  constructor(readonly videoId: string, readonly reason: string) {
    super(`Comments unavailable for ${videoId} (${reason}).`, 'comments-unavailable');
    this.name = 'CommentsUnavailableError';
  }
}

export class YouTubeApiError extends PulseError {
  constructor(message: string, readonly statusCode: number, readonly reason?: string) {
    super(message, 'api-error');
    this.name = 'YouTubeApiError';
  }
}

/**
 * Line printed for a failed run. Input and availability problems are shown as is;
 * API failures and anything unexpected get an `Unexpected error:` prefix.
 */
export function describeFailure(error: unknown): string {
  if (error instanceof PulseError && error.code !== 'api-error') {
    return error.message;
  }
  const message = error instanceof Error ? error.message : String(error);
  return `Unexpected error: ${message}`;
}
