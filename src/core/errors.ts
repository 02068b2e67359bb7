/**
 * Error taxonomy for P100 control.
 *
 * Every failure that reaches a caller is one of these classes, each with a
 * stable `code` so callers can branch without string matching.
 */

// ============================================================================
// Base Class
// ============================================================================

export type P100ErrorCode =
  | 'CONNECTION_LOST'
  | 'CONNECTION_FAILED'
  | 'TIMEOUT'
  | 'BUSY'
  | 'NOT_CONNECTED'
  | 'AMBIGUOUS'
  | 'NOT_FOUND'
  | 'MALFORMED_FRAME'
  | 'CANCELLED'
  | 'INVALID_ARGUMENT'
  | 'UNEXPECTED_RESPONSE';

export class P100Error extends Error {
  readonly code: P100ErrorCode;

  constructor(code: P100ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'P100Error';
    this.code = code;
    Error.captureStackTrace?.(this, new.target);
  }
}

// ============================================================================
// Connection Errors
// ============================================================================

/**
 * The transport failed or was torn down while work was outstanding.
 */
export class ConnectionLostError extends P100Error {
  constructor(message = 'Connection lost', options?: { cause?: unknown }) {
    super('CONNECTION_LOST', message, options);
    this.name = 'ConnectionLostError';
  }
}

/**
 * A connection attempt could not be completed.
 */
export class ConnectionError extends P100Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONNECTION_FAILED', message, options);
    this.name = 'ConnectionError';
  }
}

/**
 * A command was submitted while the session is not connected.
 */
export class NotConnectedError extends P100Error {
  constructor(message = 'Not connected to device') {
    super('NOT_CONNECTED', message);
    this.name = 'NotConnectedError';
  }
}

// ============================================================================
// Command Errors
// ============================================================================

export class TimeoutError extends P100Error {
  readonly command: string;
  readonly timeoutMs: number;

  constructor(command: string, timeoutMs: number) {
    super('TIMEOUT', `No response to ${command} within ${String(timeoutMs)}ms`);
    this.name = 'TimeoutError';
    this.command = command;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Submission while another command is awaiting its reply.
 * Only reachable when a caller bypasses the command queue.
 */
export class BusyError extends P100Error {
  constructor(pending: string) {
    super('BUSY', `Command ${pending} is still awaiting a response`);
    this.name = 'BusyError';
  }
}

export class CancelledError extends P100Error {
  constructor(command: string) {
    super('CANCELLED', `Command ${command} was cancelled`);
    this.name = 'CancelledError';
  }
}

export class InvalidArgumentError extends P100Error {
  constructor(message: string) {
    super('INVALID_ARGUMENT', message);
    this.name = 'InvalidArgumentError';
  }
}

export class UnexpectedResponseError extends P100Error {
  readonly payload: string;

  constructor(command: string, payload: string) {
    super('UNEXPECTED_RESPONSE', `Unreadable response to ${command}: ${payload}`);
    this.name = 'UnexpectedResponseError';
    this.payload = payload;
  }
}

// ============================================================================
// Name Resolution Errors
// ============================================================================

export class NotFoundError extends P100Error {
  readonly query: string;

  constructor(kind: string, query: string) {
    super('NOT_FOUND', `No ${kind} found matching '${query}'`);
    this.name = 'NotFoundError';
    this.query = query;
  }
}

export class AmbiguousError extends P100Error {
  readonly query: string;
  readonly candidates: string[];

  constructor(kind: string, query: string, candidates: string[]) {
    super('AMBIGUOUS', `Multiple ${kind}s match '${query}': ${candidates.join(', ')}`);
    this.name = 'AmbiguousError';
    this.query = query;
    this.candidates = candidates;
  }
}

// ============================================================================
// Protocol Errors
// ============================================================================

/**
 * A received line carried no known sentinel. Logged and discarded.
 */
export class MalformedFrameError extends P100Error {
  readonly raw: string;

  constructor(raw: string) {
    super('MALFORMED_FRAME', `Unrecognized frame: ${JSON.stringify(raw)}`);
    this.name = 'MalformedFrameError';
    this.raw = raw;
  }
}

/**
 * Type guard for errors raised by this library.
 */
export function isP100Error(error: unknown, code?: P100ErrorCode): error is P100Error {
  return error instanceof P100Error && (code === undefined || error.code === code);
}
