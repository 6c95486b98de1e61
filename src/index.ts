/**
 * scpi-link - SCPI / IEEE 488.2 instrument sessions over TCP and serial
 *
 * @example
 * ```typescript
 * import { Instrument, SerialTransport, withInstrument } from 'scpi-link';
 *
 * const transport = new SerialTransport({ path: '/dev/ttyACM0', baudRate: 115200 });
 * const idn = await withInstrument(transport, async (psu) => {
 *   await psu.clearStatus();
 *   return psu.idn();
 * });
 * ```
 *
 * @packageDocumentation
 */

// Session
export { Instrument, withInstrument } from './instrument';
export type { InstrumentOptions } from './instrument';

// Transports
export { StreamTransport, ResponseBuffer, TcpTransport, SerialTransport } from './transport';
export type {
  Transport,
  ConnectionState,
  StreamTransportOptions,
  TcpTransportOptions,
  SerialTransportOptions,
} from './transport';

// Parsing
export {
  parseFloatResponse,
  parseIntResponse,
  parseBoolResponse,
  parseErrorResponse,
  parseIdentity,
} from './parse';
export type { ErrorQueueEntry, Identity } from './parse';

// Errors
export { ScpiError, ConnectionError, TimeoutError, ProtocolError, classifyIoError, Errors } from './errors';
export type { ConnectionErrorCode, TimeoutErrorCode, ProtocolErrorCode, IoPhase } from './errors';

// Logger utilities
export { Logger } from './utils/logger';
export type { LogLevel, LoggerOptions, LogEntry, LogHandler } from './utils/logger';

// Hooks for observability (OpenTelemetry, etc.)
export { callHook, callErrorHook, createHookContext, getDuration } from './hooks';
export type {
  TransportHooks,
  InstrumentHooks,
  HookContext,
  CommandHookContext,
  QueryHookContext,
  ConnectionHookContext,
  Hook,
  ErrorHook,
} from './hooks';

// Constants
export { DEFAULT_TIMEOUT, DEFAULT_TERMINATOR, DEFAULT_TCP_PORT, DEFAULT_BAUD_RATE } from './constants';
