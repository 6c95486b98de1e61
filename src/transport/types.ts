/**
 * Transport contract for line-oriented instrument protocols.
 *
 * A transport is a connection-oriented byte stream with an explicit
 * connect/disconnect lifecycle and a timeout on every blocking operation.
 * Instances are not safe for concurrent use: callers must await each
 * operation before issuing the next one on the same transport.
 */

import type { TransportHooks } from '../hooks';
import type { Logger, LogLevel } from '../utils/logger';

/** Connection state machine states */
export type ConnectionState = 'disconnected' | 'connecting' | 'connected';

export interface Transport {
  /** Default per-operation timeout in ms, used when a call does not pass one */
  timeout: number;
  /** Line terminator appended on send and expected on receive */
  readonly terminator: string;

  /**
   * Opens the connection. Rejects with ConnectionError when the endpoint is
   * unreachable or refuses, TimeoutError when the attempt outlives the timeout.
   * No-op when already connected.
   */
  connect(): Promise<void>;

  /** Releases the connection. Idempotent; never rejects. */
  disconnect(): Promise<void>;

  /** Writes one line, appending the terminator unless already present */
  send(data: string, timeout?: number): Promise<void>;

  /** Writes bytes verbatim */
  sendRaw(data: Uint8Array, timeout?: number): Promise<void>;

  /** Resolves with the next complete line, terminator stripped */
  receive(timeout?: number): Promise<string>;

  /** Resolves with exactly `count` bytes */
  receiveRaw(count: number, timeout?: number): Promise<Buffer>;

  /** Discards buffered input that no read has consumed */
  flushInput(): void;

  isConnected(): boolean;

  getConnectionState(): ConnectionState;
}

/** Options common to every stream-backed transport */
export interface StreamTransportOptions {
  /** Default per-operation timeout in ms (default: 5000) */
  timeout?: number;
  /** Line terminator (default: '\n') */
  terminator?: string;
  /** Encoding for lines on the wire (default: 'ascii') */
  encoding?: BufferEncoding;
  /** Log level (default: 'silent', or 'debug' when debug is set) */
  logLevel?: LogLevel;
  /** Shorthand for logLevel 'debug' */
  debug?: boolean;
  /** Parent logger; the transport logs through a child of it */
  logger?: Logger;
  /** Connection observability hooks */
  hooks?: TransportHooks;
}
