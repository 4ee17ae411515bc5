import type { IssueSeverity } from './types.js';

/**
 * Aborts a probe with an intentionally graded issue. The dispatcher turns it
 * into exactly one Issue carrying this category and severity.
 */
export class ProbeError extends Error {
  constructor(
    readonly category: string,
    message: string,
    readonly severity: IssueSeverity = 'error'
  ) {
    super(message);
    this.name = 'ProbeError';
  }
}

/** An exchange ran past its deadline. The channel is already closed. */
export class RequestTimeoutError extends Error {
  constructor(readonly timeoutMs: number, what = 'Request') {
    super(`${what} timed out after ${timeoutMs}ms`);
    this.name = 'RequestTimeoutError';
  }
}

export class ConnectionClosedError extends Error {
  constructor(message = 'Connection closed before a reply arrived') {
    super(message);
    this.name = 'ConnectionClosedError';
  }
}

/** A request was refused before sending because the channel had already closed. */
export class ChannelNotOpenError extends ConnectionClosedError {
  constructor(message: string) {
    super(message);
    this.name = 'ChannelNotOpenError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
