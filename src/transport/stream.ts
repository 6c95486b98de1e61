/**
 * Stream-backed transport base.
 *
 * Implements the Transport contract for any duplex byte stream:
 * - connection state machine with idempotent disconnect
 * - terminator framing on send, line and fixed-count extraction on receive
 * - a single read slot whose timeout is a deadline armed once per call
 * - classification of medium errors into the ScpiError taxonomy
 *
 * Concrete media (TCP socket, serial port) only open, write to and close the
 * underlying handle, and feed incoming bytes and close/error events back through
 * handleData, handleClose and handleError.
 *
 * @module transport/stream
 */
import { EventEmitter } from 'events';
import {
  ConnectionError,
  ScpiError,
  TimeoutError,
  classifyIoError,
} from '../errors';
import { Logger, resolveLogLevel } from '../utils/logger';
import { callHook, createHookContext, type ConnectionHookContext, type TransportHooks } from '../hooks';
import { validateByteCount, validateCommand, validateTerminator, validateTimeout } from '../validation';
import { DEFAULT_ENCODING, DEFAULT_TERMINATOR, DEFAULT_TIMEOUT } from '../constants';
import { ResponseBuffer } from './buffer';
import type { ConnectionState, StreamTransportOptions, Transport } from './types';

/** What the pending read is waiting for */
type ReadRequest = { kind: 'line' } | { kind: 'bytes'; count: number };

/** The single outstanding read */
interface PendingRead {
  request: ReadRequest;
  resolve: (value: Buffer) => void;
  reject: (error: Error) => void;
  /** Deadline timer handle */
  timer: ReturnType<typeof setTimeout>;
}

export abstract class StreamTransport extends EventEmitter implements Transport {
  readonly terminator: string;
  protected readonly encoding: BufferEncoding;
  protected readonly logger: Logger;
  private readonly hooks?: TransportHooks;
  private readonly terminatorBytes: Buffer;
  private defaultTimeout: number;
  private state: ConnectionState = 'disconnected';
  private connecting: Promise<void> | null = null;
  private readonly buffer = new ResponseBuffer();
  private pendingRead: PendingRead | null = null;

  constructor(options: StreamTransportOptions, medium: string) {
    super();

    const terminator = options.terminator ?? DEFAULT_TERMINATOR;
    const timeout = options.timeout ?? DEFAULT_TIMEOUT;
    validateTerminator(terminator);
    validateTimeout(timeout);

    this.terminator = terminator;
    this.encoding = options.encoding ?? DEFAULT_ENCODING;
    this.terminatorBytes = Buffer.from(terminator, this.encoding);
    this.defaultTimeout = timeout;
    this.hooks = options.hooks;

    if (options.logger) {
      this.logger = options.logger.child(medium);
      if (options.logLevel) this.logger.setLevel(options.logLevel);
    } else {
      this.logger = new Logger({
        level: resolveLogLevel(options.logLevel, options.debug),
        prefix: `scpi:${medium}`,
      });
    }
  }

  /** Human-readable address of the instrument, used in logs and error messages */
  abstract get endpoint(): string;

  /**
   * Opens the underlying handle within `timeoutMs` and wires its events to
   * handleData / handleClose / handleError. Rejects with a TimeoutError on expiry
   * or with the raw medium error on failure.
   */
  protected abstract openStream(timeoutMs: number): Promise<void>;

  /** Resolves once `data` has been handed to the medium */
  protected abstract writeStream(data: Buffer): Promise<void>;

  /** Releases the underlying handle; must be safe to call on a dead handle */
  protected abstract closeStream(): Promise<void>;

  get timeout(): number {
    return this.defaultTimeout;
  }

  set timeout(value: number) {
    validateTimeout(value);
    this.defaultTimeout = value;
  }

  isConnected(): boolean {
    return this.state === 'connected';
  }

  getConnectionState(): ConnectionState {
    return this.state;
  }

  async connect(): Promise<void> {
    if (this.state === 'connected') return;
    if (this.connecting) return this.connecting;

    this.state = 'connecting';
    this.buffer.reset();
    this.logger.setEndpoint(this.endpoint);

    this.connecting = this.establish();
    try {
      await this.connecting;
    } finally {
      this.connecting = null;
    }
  }

  private async establish(): Promise<void> {
    const timeoutMs = this.defaultTimeout;
    this.logger.debug('Connecting', { timeout: timeoutMs });

    try {
      await this.openStream(timeoutMs);
    } catch (err) {
      this.state = 'disconnected';
      const error = classifyIoError(err, this.endpoint, { phase: 'connect', timeoutMs });
      this.logger.warn('Connect failed', { code: error.code, message: error.message });
      this.notifyConnection('error', error);
      throw error;
    }

    this.state = 'connected';
    this.logger.info('Connected');
    this.emit('connect');
    this.notifyConnection('connect');
  }

  async disconnect(): Promise<void> {
    if (this.connecting) {
      // A failed attempt is reported to the connect() caller
      await this.connecting.catch(() => undefined);
    }

    const wasConnected = this.state === 'connected';
    this.state = 'disconnected';
    this.failPendingRead(new ConnectionError(`Disconnected from ${this.endpoint}`, 'CONNECTION_CLOSED'));
    this.buffer.reset();

    try {
      await this.closeStream();
    } catch (err) {
      this.logger.warn('Error while closing', err);
    }

    if (wasConnected) {
      this.logger.info('Disconnected');
      this.emit('disconnect');
      this.notifyConnection('disconnect');
    }
  }

  async send(data: string, timeout?: number): Promise<void> {
    this.assertConnected();
    validateCommand(data, this.terminator);

    const line = data.endsWith(this.terminator) ? data : data + this.terminator;
    this.logger.debug('Sending', { command: data });
    await this.write(Buffer.from(line, this.encoding), timeout);
  }

  async sendRaw(data: Uint8Array, timeout?: number): Promise<void> {
    this.assertConnected();
    this.logger.debug('Sending raw bytes', { length: data.length });
    await this.write(Buffer.from(data), timeout);
  }

  async receive(timeout?: number): Promise<string> {
    const bytes = await this.read({ kind: 'line' }, timeout);
    let line = bytes.toString(this.encoding);
    if (this.terminator === '\n' && line.endsWith('\r')) line = line.slice(0, -1);
    this.logger.debug('Received', { response: line });
    return line;
  }

  async receiveRaw(count: number, timeout?: number): Promise<Buffer> {
    validateByteCount(count);
    const block = await this.read({ kind: 'bytes', count }, timeout);
    this.logger.debug('Received raw bytes', { length: block.length });
    return block;
  }

  flushInput(): void {
    const discarded = this.buffer.length;
    this.buffer.reset();
    if (discarded > 0) this.logger.debug('Discarded buffered input', { bytes: discarded });
  }

  /** Feed bytes that arrived from the medium */
  protected handleData(chunk: Buffer): void {
    if (this.logger.isLevelEnabled('trace')) {
      this.logger.trace('Chunk received', { length: chunk.length, hex: chunk.toString('hex') });
    }
    this.buffer.append(chunk);
    this.settlePendingRead();
  }

  /** The medium closed; `cause` is set when it closed because of a failure */
  protected handleClose(cause?: Error): void {
    const detail = cause ? `: ${cause.message}` : '';
    this.lose(
      new ConnectionError(`Connection closed by ${this.endpoint}${detail}`, 'CONNECTION_CLOSED', cause)
    );
  }

  /** The medium reported an error on an established link */
  protected handleError(err: Error): void {
    if (this.state !== 'connected') return;
    this.logger.error('Medium error', { message: err.message });
    this.notifyConnection('error', err);
    this.lose(classifyIoError(err, this.endpoint, { phase: 'open' }));
  }

  /**
   * Connected -> Disconnected on an unrecoverable failure. Fails the pending read
   * and releases the handle; there is no reconnect.
   */
  private lose(error: ScpiError): void {
    if (this.state !== 'connected') return;

    this.state = 'disconnected';
    this.logger.warn('Connection lost', { code: error.code, message: error.message });
    this.failPendingRead(error);
    this.emit('disconnect', error);
    this.notifyConnection('disconnect', error);
    void this.closeStream().catch((err: unknown) => this.logger.warn('Error while closing', err));
  }

  private async write(payload: Buffer, timeout?: number): Promise<void> {
    const timeoutMs = this.effectiveTimeout(timeout);
    let timer: ReturnType<typeof setTimeout> | undefined;
    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(
          new TimeoutError(
            `Write to ${this.endpoint} did not complete within ${timeoutMs}ms`,
            timeoutMs,
            'WRITE_TIMEOUT'
          )
        );
      }, timeoutMs);
    });

    try {
      await Promise.race([this.writeStream(payload), deadline]);
      this.logger.trace('Write complete', { length: payload.length });
    } catch (err) {
      if (err instanceof TimeoutError) {
        this.logger.warn('Write timeout', { timeout: timeoutMs });
        throw err;
      }
      const error =
        err instanceof ScpiError
          ? err
          : new ConnectionError(
              `Write to ${this.endpoint} failed: ${err instanceof Error ? err.message : String(err)}`,
              'WRITE_FAILED',
              err instanceof Error ? err : undefined
            );
      this.lose(error);
      throw error;
    } finally {
      clearTimeout(timer);
    }
  }

  private async read(request: ReadRequest, timeout?: number): Promise<Buffer> {
    this.assertConnected();
    if (this.pendingRead) {
      throw new ConnectionError(
        `A read from ${this.endpoint} is already in progress`,
        'READ_IN_PROGRESS'
      );
    }
    const timeoutMs = this.effectiveTimeout(timeout);

    const ready = this.extract(request);
    if (ready) return ready;

    return new Promise<Buffer>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pendingRead = null;
        this.logger.warn('Read timeout', { timeout: timeoutMs, buffered: this.buffer.length });
        reject(this.readTimeoutError(request, timeoutMs));
      }, timeoutMs);
      this.pendingRead = { request, resolve, reject, timer };
    });
  }

  private readTimeoutError(request: ReadRequest, timeoutMs: number): TimeoutError {
    const message =
      request.kind === 'line'
        ? `No complete response line from ${this.endpoint} within ${timeoutMs}ms`
        : `Expected ${request.count} bytes from ${this.endpoint} within ${timeoutMs}ms, got ${this.buffer.length}`;
    return new TimeoutError(message, timeoutMs, 'READ_TIMEOUT');
  }

  private extract(request: ReadRequest): Buffer | null {
    return request.kind === 'line'
      ? this.buffer.takeLine(this.terminatorBytes)
      : this.buffer.takeBytes(request.count);
  }

  private settlePendingRead(): void {
    const pending = this.pendingRead;
    if (!pending) return;
    const data = this.extract(pending.request);
    if (!data) return;
    clearTimeout(pending.timer);
    this.pendingRead = null;
    pending.resolve(data);
  }

  private failPendingRead(error: Error): void {
    const pending = this.pendingRead;
    if (!pending) return;
    clearTimeout(pending.timer);
    this.pendingRead = null;
    pending.reject(error);
  }

  private effectiveTimeout(timeout?: number): number {
    if (timeout === undefined) return this.defaultTimeout;
    validateTimeout(timeout);
    return timeout;
  }

  private assertConnected(): void {
    if (this.state !== 'connected') {
      throw new ConnectionError(`Not connected to ${this.endpoint}`, 'NOT_CONNECTED');
    }
  }

  private notifyConnection(event: ConnectionHookContext['event'], error?: Error): void {
    void callHook(
      this.hooks?.onConnection,
      createHookContext<ConnectionHookContext>({ endpoint: this.endpoint, event, error }),
      this.logger
    );
  }
}
