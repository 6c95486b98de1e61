/**
 * Response parsers.
 *
 * Each parser takes the raw response line and the command that produced it, and
 * either returns a typed value or throws a ProtocolError that keeps the raw text.
 */

import { ProtocolError } from './errors';

/** Decimal numeric grammar including scientific notation: "2.00E+00", "-.5", "+10" */
const NUMERIC = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

/** Non-finite spellings accepted by standard float parsing */
const NON_FINITE = /^([+-]?)(?:inf|infinity|nan)$/i;

/** `<code>,<message>` with an optionally quoted message */
const ERROR_ENTRY = /^([+-]?\d+)\s*,\s*(.*)$/s;

/** One entry of the instrument's error queue */
export interface ErrorQueueEntry {
  code: number;
  message: string;
}

/** Fields of an IEEE 488.2 identification string */
export interface Identity {
  manufacturer: string;
  model: string;
  serialNumber: string;
  firmware: string;
}

export function parseFloatResponse(response: string, command?: string): number {
  const text = response.trim();
  if (NUMERIC.test(text)) return Number(text);

  const special = NON_FINITE.exec(text);
  if (special) {
    if (/nan/i.test(text)) return Number.NaN;
    return special[1] === '-' ? -Infinity : Infinity;
  }

  throw new ProtocolError(describe('float', response, command), 'INVALID_FLOAT', { response, command });
}

/**
 * Integers go through the same numeric grammar as floats. Integral values in
 * decimal or exponent form ("5.0", "+1.000E+03") are accepted, since instruments
 * commonly report counts that way; fractional values are not.
 */
export function parseIntResponse(response: string, command?: string): number {
  const text = response.trim();
  if (NUMERIC.test(text)) {
    const value = Number(text);
    if (Number.isSafeInteger(value)) return value;
  }
  throw new ProtocolError(describe('int', response, command), 'INVALID_INT', { response, command });
}

/** Accepts 0/1 and OFF/ON in any case */
export function parseBoolResponse(response: string, command?: string): boolean {
  switch (response.trim().toUpperCase()) {
    case '1':
    case 'ON':
      return true;
    case '0':
    case 'OFF':
      return false;
    default:
      throw new ProtocolError(describe('boolean', response, command), 'INVALID_BOOL', {
        response,
        command,
      });
  }
}

/**
 * Parses a `:SYST:ERR?` answer such as `113,"Undefined header"`.
 * Returns null for code 0 (including "+0").
 */
export function parseErrorResponse(response: string, command?: string): ErrorQueueEntry | null {
  const match = ERROR_ENTRY.exec(response.trim());
  if (!match) {
    throw new ProtocolError(
      `Malformed error-queue response ${JSON.stringify(response)}${command ? ` for ${command}` : ''}`,
      'MALFORMED_ERROR_RESPONSE',
      { response, command }
    );
  }

  const code = Number.parseInt(match[1], 10);
  if (code === 0) return null;

  let message = match[2].trim();
  if (message.length >= 2 && message.startsWith('"') && message.endsWith('"')) {
    message = message.slice(1, -1);
  }
  return { code, message };
}

/**
 * Splits a `*IDN?` answer into its four comma-separated fields. Missing trailing
 * fields are empty; surplus commas stay in the firmware field.
 */
export function parseIdentity(response: string, command?: string): Identity {
  const text = response.trim();
  if (text === '') {
    throw new ProtocolError(
      `Empty identification response${command ? ` for ${command}` : ''}`,
      'MALFORMED_IDENTITY',
      { response, command }
    );
  }

  const [manufacturer = '', model = '', serialNumber = '', ...rest] = text.split(',');
  return {
    manufacturer: manufacturer.trim(),
    model: model.trim(),
    serialNumber: serialNumber.trim(),
    firmware: rest.join(',').trim(),
  };
}

function describe(expected: string, response: string, command?: string): string {
  return `Expected ${expected}, got ${JSON.stringify(response)}${command ? ` for ${command}` : ''}`;
}
