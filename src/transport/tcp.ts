/**
 * Socket-backed transport for LAN / LXI instruments.
 *
 * @module transport/tcp
 */
import * as net from 'net';
import { ConnectionError, TimeoutError } from '../errors';
import { DEFAULT_HOST, DEFAULT_TCP_PORT } from '../constants';
import { StreamTransport } from './stream';
import type { StreamTransportOptions } from './types';

export interface TcpTransportOptions extends StreamTransportOptions {
  /** Instrument host name or address (default: 'localhost') */
  host?: string;
  /** Instrument port (default: 5555) */
  port?: number;
  /** Disable Nagle's algorithm so short commands leave immediately (default: true) */
  noDelay?: boolean;
}

/**
 * @example
 * ```typescript
 * const transport = new TcpTransport({ host: '192.168.1.40', port: 5025, timeout: 2000 });
 * await transport.connect();
 * await transport.send('*IDN?');
 * console.log(await transport.receive());
 * await transport.disconnect();
 * ```
 */
export class TcpTransport extends StreamTransport {
  readonly host: string;
  readonly port: number;
  private readonly noDelay: boolean;
  private socket: net.Socket | null = null;

  constructor(options: TcpTransportOptions = {}) {
    super(options, 'tcp');
    this.host = options.host ?? DEFAULT_HOST;
    this.port = options.port ?? DEFAULT_TCP_PORT;
    this.noDelay = options.noDelay ?? true;
  }

  get endpoint(): string {
    return `${this.host}:${this.port}`;
  }

  protected openStream(timeoutMs: number): Promise<void> {
    return new Promise((resolve, reject) => {
      const socket = net.createConnection({ host: this.host, port: this.port });

      const cleanup = () => {
        clearTimeout(timer);
        socket.removeListener('connect', onConnect);
        socket.removeListener('error', onError);
      };

      const timer = setTimeout(() => {
        cleanup();
        socket.destroy();
        reject(
          new TimeoutError(
            `Timed out connecting to ${this.endpoint} after ${timeoutMs}ms`,
            timeoutMs,
            'CONNECT_TIMEOUT'
          )
        );
      }, timeoutMs);

      const onError = (err: Error) => {
        cleanup();
        socket.destroy();
        reject(err);
      };

      const onConnect = () => {
        cleanup();
        socket.setNoDelay(this.noDelay);
        socket.on('data', (chunk: Buffer) => this.handleData(chunk));
        socket.on('error', (err: Error) => this.handleError(err));
        socket.on('close', () => this.handleClose());
        this.socket = socket;
        resolve();
      };

      socket.once('connect', onConnect);
      socket.once('error', onError);
    });
  }

  protected writeStream(data: Buffer): Promise<void> {
    return new Promise((resolve, reject) => {
      const socket = this.socket;
      if (!socket || socket.destroyed) {
        reject(new ConnectionError(`Socket to ${this.endpoint} is closed`, 'NOT_CONNECTED'));
        return;
      }
      socket.write(data, (err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  protected async closeStream(): Promise<void> {
    const socket = this.socket;
    this.socket = null;
    if (!socket || socket.destroyed) return;

    await new Promise<void>((resolve) => {
      socket.once('close', () => resolve());
      socket.destroy();
    });
  }
}
