/**
 * SCPI Error Classes
 *
 * Every failure surfaced by a transport or an instrument session is one of three
 * kinds (connection, timeout, protocol), all catchable through the common root.
 */

/** Base error class for all scpi-link errors */
export class ScpiError extends Error {
  readonly code: string;
  readonly retryable: boolean;

  constructor(message: string, code: string, retryable = false, cause?: Error) {
    super(message, cause ? { cause } : undefined);
    this.name = 'ScpiError';
    this.code = code;
    this.retryable = retryable;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export type ConnectionErrorCode =
  | 'CONNECTION_FAILED'
  | 'CONNECTION_REFUSED'
  | 'CONNECTION_CLOSED'
  | 'NOT_CONNECTED'
  | 'WRITE_FAILED'
  | 'READ_IN_PROGRESS';

/** Connect refused/unreachable, I/O on a closed or reset link, unexpected peer close */
export class ConnectionError extends ScpiError {
  constructor(message: string, code: ConnectionErrorCode = 'CONNECTION_FAILED', cause?: Error) {
    super(message, code, true, cause);
    this.name = 'ConnectionError';
  }
}

export type TimeoutErrorCode = 'CONNECT_TIMEOUT' | 'WRITE_TIMEOUT' | 'READ_TIMEOUT';

/** An operation did not complete before its effective deadline */
export class TimeoutError extends ScpiError {
  readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number, code: TimeoutErrorCode = 'READ_TIMEOUT') {
    super(message, code, true);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export type ProtocolErrorCode =
  | 'INVALID_FLOAT'
  | 'INVALID_INT'
  | 'INVALID_BOOL'
  | 'MALFORMED_ERROR_RESPONSE'
  | 'MALFORMED_IDENTITY'
  | 'INVALID_ARGUMENT';

/**
 * A response arrived but could not be interpreted as the requested type, or a
 * caller-supplied argument would break the line framing.
 */
export class ProtocolError extends ScpiError {
  /** Raw response text exactly as received (undefined for argument errors) */
  readonly response?: string;
  /** Command or query that produced the response */
  readonly command?: string;

  constructor(
    message: string,
    code: ProtocolErrorCode,
    details: { response?: string; command?: string } = {}
  ) {
    super(message, code, false);
    this.name = 'ProtocolError';
    this.response = details.response;
    this.command = details.command;
  }
}

/** Node system error codes that mean the peer refused or could not be reached */
const REFUSED_CODES = new Set(['ECONNREFUSED', 'EHOSTUNREACH', 'ENETUNREACH', 'ENOTFOUND', 'EAI_AGAIN']);

/** Node system error codes that mean an established link went away */
const CLOSED_CODES = new Set(['ECONNRESET', 'EPIPE', 'ECONNABORTED', 'ERR_STREAM_DESTROYED']);

function systemCode(err: Error): string | undefined {
  const code: unknown = Reflect.get(err, 'code');
  return typeof code === 'string' ? code : undefined;
}

/** Where an I/O error surfaced: while opening the link, or on an open one */
export type IoPhase = { phase: 'connect'; timeoutMs: number } | { phase: 'open' };

/**
 * Maps a raw I/O error from a socket or serial port onto the error taxonomy.
 * ScpiError instances pass through unchanged. ETIMEDOUT is a connect timeout only
 * while connecting; on an open link it means the peer went away.
 */
export function classifyIoError(
  err: unknown,
  endpoint: string,
  context: IoPhase = { phase: 'open' }
): ScpiError {
  if (err instanceof ScpiError) return err;
  if (!(err instanceof Error)) {
    return new ConnectionError(`I/O failure on ${endpoint}: ${String(err)}`);
  }

  const code = systemCode(err);
  if (code === 'ETIMEDOUT' && context.phase === 'connect') {
    return new TimeoutError(
      `Timed out connecting to ${endpoint} after ${context.timeoutMs}ms`,
      context.timeoutMs,
      'CONNECT_TIMEOUT'
    );
  }
  if (code && REFUSED_CODES.has(code)) {
    return new ConnectionError(
      `Cannot connect to ${endpoint}: ${err.message}`,
      'CONNECTION_REFUSED',
      err
    );
  }
  if (code && (CLOSED_CODES.has(code) || code === 'ETIMEDOUT')) {
    return new ConnectionError(
      `Connection to ${endpoint} lost: ${err.message}`,
      'CONNECTION_CLOSED',
      err
    );
  }
  return new ConnectionError(`I/O failure on ${endpoint}: ${err.message}`, 'CONNECTION_FAILED', err);
}

/** All error types exported for instanceof checks */
export const Errors = {
  ScpiError,
  ConnectionError,
  TimeoutError,
  ProtocolError,
};
