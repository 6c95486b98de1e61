/**
 * Argument validation for commands, queries and transport settings.
 *
 * Violations raise ProtocolError with code INVALID_ARGUMENT, since each of them
 * would otherwise corrupt the request/response framing on the wire.
 */

import { ProtocolError } from './errors';

/**
 * Validates an outgoing command line.
 *
 * The text must be non-blank and may carry the terminator only as its final
 * characters; an embedded terminator would split it into two commands and
 * desynchronise every following query.
 *
 * @example
 * ```typescript
 * validateCommand(':MEAS:VOLT?', '\n');    // OK
 * validateCommand('*RST\n', '\n');         // OK, terminator already present
 * validateCommand('*RST\n*CLS', '\n');     // Throws: embedded terminator
 * ```
 */
export function validateCommand(text: string, terminator: string): void {
  if (typeof text !== 'string' || text.trim() === '') {
    throw new ProtocolError('Command text is required', 'INVALID_ARGUMENT', { command: text });
  }
  const body = text.endsWith(terminator) ? text.slice(0, -terminator.length) : text;
  if (body.includes(terminator)) {
    throw new ProtocolError(
      `Command ${JSON.stringify(text)} embeds the line terminator`,
      'INVALID_ARGUMENT',
      { command: text }
    );
  }
}

/** Validates a raw read length: a non-negative integer */
export function validateByteCount(count: number): void {
  if (!Number.isInteger(count) || count < 0) {
    throw new ProtocolError(
      `Invalid byte count: ${count}. Must be a non-negative integer`,
      'INVALID_ARGUMENT'
    );
  }
}

/** Validates a *SAV / *RCL register number */
export function validateSlot(slot: number): void {
  if (!Number.isInteger(slot) || slot < 0) {
    throw new ProtocolError(
      `Invalid state slot: ${slot}. Must be a non-negative integer`,
      'INVALID_ARGUMENT'
    );
  }
}

/** Validates a timeout in milliseconds */
export function validateTimeout(timeout: number): void {
  if (!Number.isFinite(timeout) || timeout < 0) {
    throw new ProtocolError(
      `Invalid timeout: ${timeout}ms. Must be a finite, non-negative number`,
      'INVALID_ARGUMENT'
    );
  }
}

/** Validates a line terminator */
export function validateTerminator(terminator: string): void {
  if (typeof terminator !== 'string' || terminator.length === 0) {
    throw new ProtocolError('Line terminator must be a non-empty string', 'INVALID_ARGUMENT');
  }
}
