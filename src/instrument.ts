/**
 * Instrument session.
 *
 * Wraps one Transport (shared, not owned) and provides command/query framing,
 * typed response parsing and the IEEE 488.2 common commands. The session keeps no
 * protocol state between calls and never retries or reconnects: every failure
 * reaches the caller as a ConnectionError, TimeoutError or ProtocolError.
 *
 * The protocol is strictly request/response. Await each call before issuing the
 * next one; a session must not be shared by concurrent callers without external
 * mutual exclusion.
 *
 * @example
 * ```typescript
 * import { Instrument, TcpTransport } from 'scpi-link';
 *
 * const scope = new Instrument(new TcpTransport({ host: '192.168.1.40' }));
 * const volts = await scope.use(async (dev) => {
 *   await dev.reset();
 *   return dev.queryFloat(':CHAN1:SCAL?');
 * });
 * ```
 *
 * @module instrument
 */
import type { Transport } from './transport/types';
import { Logger, resolveLogLevel, type LogLevel } from './utils/logger';
import {
  callErrorHook,
  callHook,
  createHookContext,
  type CommandHookContext,
  type InstrumentHooks,
  type QueryHookContext,
} from './hooks';
import {
  parseBoolResponse,
  parseErrorResponse,
  parseFloatResponse,
  parseIdentity,
  parseIntResponse,
  type ErrorQueueEntry,
  type Identity,
} from './parse';
import { validateByteCount, validateSlot } from './validation';
import {
  CLEAR_STATUS_COMMAND,
  DEFAULT_MAX_ERROR_DRAIN,
  ERROR_QUERY,
  IDN_QUERY,
  OPC_QUERY,
  RECALL_COMMAND,
  RESET_COMMAND,
  SAVE_COMMAND,
  SELF_TEST_QUERY,
  WAIT_COMMAND,
} from './constants';

export interface InstrumentOptions {
  /** Log level (default: 'silent', or 'debug' when debug is set) */
  logLevel?: LogLevel;
  /** Shorthand for logLevel 'debug' */
  debug?: boolean;
  /** Parent logger; the session logs through a child of it */
  logger?: Logger;
  /** Command/query observability hooks */
  hooks?: InstrumentHooks;
}

export class Instrument {
  protected readonly logger: Logger;
  private readonly _transport: Transport;
  private readonly hooks?: InstrumentHooks;

  constructor(transport: Transport, options: InstrumentOptions = {}) {
    this._transport = transport;
    this.hooks = options.hooks;

    if (options.logger) {
      this.logger = options.logger.child('session');
      if (options.logLevel) this.logger.setLevel(options.logLevel);
    } else {
      this.logger = new Logger({
        level: resolveLogLevel(options.logLevel, options.debug),
        prefix: 'scpi',
      });
    }
  }

  /** Builds a session and connects the transport unless it already is */
  static async open(transport: Transport, options: InstrumentOptions = {}): Promise<Instrument> {
    const instrument = new Instrument(transport, options);
    if (!transport.isConnected()) await transport.connect();
    return instrument;
  }

  get transport(): Transport {
    return this._transport;
  }

  // ============== Lifecycle ==============

  connect(): Promise<void> {
    return this._transport.connect();
  }

  disconnect(): Promise<void> {
    return this._transport.disconnect();
  }

  isConnected(): boolean {
    return this._transport.isConnected();
  }

  /**
   * Scoped acquisition: connects if needed, runs `fn`, and disconnects exactly
   * once on the way out, whether `fn` resolves or throws.
   */
  async use<T>(fn: (instrument: this) => T | Promise<T>): Promise<T> {
    if (!this._transport.isConnected()) await this._transport.connect();
    try {
      return await fn(this);
    } finally {
      await this._transport.disconnect();
    }
  }

  // ============== Commands and queries ==============

  /** Sends a command that produces no response */
  async command(text: string): Promise<void> {
    const ctx = createHookContext<CommandHookContext>({ command: text });
    await callHook(this.hooks?.onCommand, ctx, this.logger);
    this.logger.debug('Command', { command: text });
    await this._transport.send(text);
  }

  /** Sends a query and returns the response line, terminator stripped */
  query(text: string, timeout?: number): Promise<string> {
    return this.exchange(text, (response) => response, timeout);
  }

  queryFloat(text: string, timeout?: number): Promise<number> {
    return this.exchange(text, (response) => parseFloatResponse(response, text), timeout);
  }

  queryInt(text: string, timeout?: number): Promise<number> {
    return this.exchange(text, (response) => parseIntResponse(response, text), timeout);
  }

  queryBool(text: string, timeout?: number): Promise<boolean> {
    return this.exchange(text, (response) => parseBoolResponse(response, text), timeout);
  }

  /**
   * Sends a query and reads exactly `count` bytes (no terminator framing).
   * Block-data headers are not interpreted; any header bytes are part of `count`.
   */
  async queryRaw(text: string, count: number, timeout?: number): Promise<Buffer> {
    validateByteCount(count);
    const ctx = createHookContext<QueryHookContext>({ command: text, count });
    await callHook(this.hooks?.onQuery, ctx, this.logger);
    try {
      await this._transport.send(text);
      const block = await this._transport.receiveRaw(count, timeout);
      ctx.response = block;
      await callHook(this.hooks?.onQueryComplete, ctx, this.logger);
      return block;
    } catch (err) {
      await this.reportQueryError(ctx, err);
      throw err;
    }
  }

  /** Writes bytes verbatim, e.g. a binary block the caller framed itself */
  async write(data: Uint8Array): Promise<void> {
    this.logger.debug('Raw write', { length: data.length });
    await this._transport.sendRaw(data);
  }

  // ============== IEEE 488.2 common commands ==============

  /** *IDN? */
  idn(): Promise<string> {
    return this.query(IDN_QUERY);
  }

  /** *IDN?, split into manufacturer, model, serial number and firmware */
  identify(): Promise<Identity> {
    return this.exchange(IDN_QUERY, (response) => parseIdentity(response, IDN_QUERY));
  }

  /** *RST */
  reset(): Promise<void> {
    return this.command(RESET_COMMAND);
  }

  /** *CLS */
  clearStatus(): Promise<void> {
    return this.command(CLEAR_STATUS_COMMAND);
  }

  /** *WAI */
  wait(): Promise<void> {
    return this.command(WAIT_COMMAND);
  }

  /** *OPC? - true once the instrument answers "1" within the timeout */
  opc(timeout?: number): Promise<boolean> {
    return this.exchange(OPC_QUERY, (response) => response.trim() === '1', timeout);
  }

  /** *SAV <slot> */
  async saveState(slot: number): Promise<void> {
    validateSlot(slot);
    await this.command(`${SAVE_COMMAND} ${slot}`);
  }

  /** *RCL <slot> */
  async recallState(slot: number): Promise<void> {
    validateSlot(slot);
    await this.command(`${RECALL_COMMAND} ${slot}`);
  }

  /** *TST? - the result code is returned as-is; 0 conventionally means pass */
  selfTest(timeout?: number): Promise<number> {
    return this.queryInt(SELF_TEST_QUERY, timeout);
  }

  /** :SYST:ERR? - null when the queue reports code 0 */
  checkError(): Promise<ErrorQueueEntry | null> {
    return this.exchange(ERROR_QUERY, (response) => parseErrorResponse(response, ERROR_QUERY));
  }

  /** Reads the error queue until it reports no error, at most `max` entries */
  async drainErrors(max = DEFAULT_MAX_ERROR_DRAIN): Promise<ErrorQueueEntry[]> {
    const entries: ErrorQueueEntry[] = [];
    while (entries.length < max) {
      const entry = await this.checkError();
      if (!entry) return entries;
      entries.push(entry);
    }
    this.logger.warn('Error queue not empty after drain limit', { max });
    return entries;
  }

  // ============== Internals ==============

  private async exchange<T>(
    command: string,
    parse: (response: string) => T,
    timeout?: number
  ): Promise<T> {
    const ctx = createHookContext<QueryHookContext>({ command });
    await callHook(this.hooks?.onQuery, ctx, this.logger);
    try {
      await this._transport.send(command);
      const response = await this._transport.receive(timeout);
      ctx.response = response;
      const value = parse(response);
      this.logger.debug('Query', { command, response });
      await callHook(this.hooks?.onQueryComplete, ctx, this.logger);
      return value;
    } catch (err) {
      await this.reportQueryError(ctx, err);
      throw err;
    }
  }

  private async reportQueryError(ctx: QueryHookContext, err: unknown): Promise<void> {
    const error = err instanceof Error ? err : new Error(String(err));
    this.logger.debug('Query failed', { command: ctx.command, error: error.message });
    await callErrorHook(this.hooks?.onQueryError, ctx, error, this.logger);
  }
}

/**
 * Runs `fn` against a session on `transport`, connecting first and always
 * disconnecting afterwards.
 */
export function withInstrument<T>(
  transport: Transport,
  fn: (instrument: Instrument) => T | Promise<T>,
  options?: InstrumentOptions
): Promise<T> {
  return new Instrument(transport, options).use(fn);
}
