/**
 * Validation Tests
 */
import { describe, test, expect } from 'vitest';
import {
  validateCommand,
  validateByteCount,
  validateSlot,
  validateTimeout,
  validateTerminator,
} from '../../src/validation';
import { ProtocolError } from '../../src/errors';

describe('validateCommand', () => {
  test('accepts ordinary commands', () => {
    expect(() => validateCommand(':MEAS:VOLT?', '\n')).not.toThrow();
    expect(() => validateCommand('*RST', '\r\n')).not.toThrow();
  });

  test('accepts a command that already ends with the terminator', () => {
    expect(() => validateCommand('*RST\n', '\n')).not.toThrow();
  });

  test('rejects blank commands', () => {
    expect(() => validateCommand('', '\n')).toThrow('Command text is required');
    expect(() => validateCommand('   ', '\n')).toThrow(ProtocolError);
  });

  test('rejects an embedded terminator', () => {
    expect(() => validateCommand('*RST\n*CLS', '\n')).toThrow(
      'Command "*RST\\n*CLS" embeds the line terminator'
    );
  });

  test('only the configured terminator counts as embedded', () => {
    expect(() => validateCommand('A\nB', '\r\n')).not.toThrow();
    expect(() => validateCommand('A\r\nB', '\r\n')).toThrow(ProtocolError);
  });

  test('reports INVALID_ARGUMENT', () => {
    let caught: unknown;
    try {
      validateCommand('', '\n');
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(ProtocolError);
    expect(caught).toMatchObject({ code: 'INVALID_ARGUMENT', retryable: false });
  });
});

describe('validateByteCount', () => {
  test('accepts zero and positive integers', () => {
    expect(() => validateByteCount(0)).not.toThrow();
    expect(() => validateByteCount(2048)).not.toThrow();
  });

  test('rejects negative or fractional counts', () => {
    expect(() => validateByteCount(-1)).toThrow('Invalid byte count: -1');
    expect(() => validateByteCount(1.5)).toThrow(ProtocolError);
    expect(() => validateByteCount(Number.NaN)).toThrow(ProtocolError);
  });
});

describe('validateSlot', () => {
  test('accepts register numbers', () => {
    expect(() => validateSlot(0)).not.toThrow();
    expect(() => validateSlot(9)).not.toThrow();
  });

  test('rejects negative or fractional slots', () => {
    expect(() => validateSlot(-2)).toThrow('Invalid state slot: -2');
    expect(() => validateSlot(0.5)).toThrow(ProtocolError);
  });
});

describe('validateTimeout', () => {
  test('accepts zero and positive values', () => {
    expect(() => validateTimeout(0)).not.toThrow();
    expect(() => validateTimeout(1500.5)).not.toThrow();
  });

  test('rejects negative and non-finite values', () => {
    expect(() => validateTimeout(-1)).toThrow('Invalid timeout: -1ms');
    expect(() => validateTimeout(Infinity)).toThrow(ProtocolError);
  });
});

describe('validateTerminator', () => {
  test('accepts non-empty terminators', () => {
    expect(() => validateTerminator('\n')).not.toThrow();
    expect(() => validateTerminator('\r\n')).not.toThrow();
  });

  test('rejects the empty string', () => {
    expect(() => validateTerminator('')).toThrow('Line terminator must be a non-empty string');
  });
});
