export class HttpError extends Error {
  constructor(
    public status: 400 | 401 | 403 | 404 | 405 | 429,
    message: string,
    public details: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

/** Non-success answer (or no usable answer) from the generation or file backends. */
export class UpstreamError extends Error {
  constructor(
    message: string,
    public readonly httpStatus?: number,
    public readonly body?: string,
  ) {
    super(message);
    this.name = 'UpstreamError';
  }
}

export class StatusQueryError extends UpstreamError {
  constructor(httpStatus?: number, body?: string) {
    super(`File status query failed${httpStatus ? ` with ${httpStatus}` : ''}`, httpStatus, body);
    this.name = 'StatusQueryError';
  }
}

export class ProcessingFailedError extends Error {
  constructor(public readonly artifact: string) {
    super(`Processing failed for ${artifact}`);
    this.name = 'ProcessingFailedError';
  }
}

export class ProcessingTimedOutError extends Error {
  constructor(public readonly artifact: string, public readonly elapsedMs: number) {
    super(`Processing of ${artifact} did not finish within ${elapsedMs}ms`);
    this.name = 'ProcessingTimedOutError';
  }
}

export class ProcessingCancelledError extends Error {
  constructor(public readonly artifact: string) {
    super(`Waiting for ${artifact} was cancelled`);
    this.name = 'ProcessingCancelledError';
  }
}

/** Model output that is not decodable. Carries only the text length, never the text. */
export class MalformedResponseError extends Error {
  constructor(reason: string, public readonly length: number) {
    super(`Malformed model response: ${reason}`);
    this.name = 'MalformedResponseError';
  }
}

export class CleanupFailedError extends Error {
  constructor(public readonly artifact: string, public readonly httpStatus?: number) {
    super(`Failed to delete ${artifact}${httpStatus ? ` (${httpStatus})` : ''}`);
    this.name = 'CleanupFailedError';
  }
}
