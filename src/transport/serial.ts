/**
 * Serial-backed transport for USB-CDC, RS-232 and virtual COM port instruments.
 *
 * Framing, deadlines and error classification are inherited unchanged from
 * StreamTransport, so a serial instrument is interchangeable with a LAN one.
 *
 * @module transport/serial
 */
import { SerialPort } from 'serialport';
import { ConnectionError, TimeoutError } from '../errors';
import { DEFAULT_BAUD_RATE } from '../constants';
import { StreamTransport } from './stream';
import type { StreamTransportOptions } from './types';

type PortOptions = ConstructorParameters<typeof SerialPort>[0];

/** Line settings passed through to the port when set */
type LineSettings = Partial<Pick<PortOptions, 'dataBits' | 'parity' | 'stopBits' | 'rtscts'>>;

export interface SerialTransportOptions extends StreamTransportOptions, LineSettings {
  /** Port identifier, e.g. '/dev/ttyACM0' or 'COM3' */
  path: string;
  /** Baud rate (default: 115200) */
  baudRate?: number;
}

export class SerialTransport extends StreamTransport {
  readonly path: string;
  readonly baudRate: number;
  private readonly lineSettings: LineSettings = {};
  private port: SerialPort | null = null;

  constructor(options: SerialTransportOptions) {
    super(options, 'serial');
    this.path = options.path;
    this.baudRate = options.baudRate ?? DEFAULT_BAUD_RATE;

    // Unset keys must stay absent: the port treats an explicit undefined as invalid
    if (options.dataBits !== undefined) this.lineSettings.dataBits = options.dataBits;
    if (options.parity !== undefined) this.lineSettings.parity = options.parity;
    if (options.stopBits !== undefined) this.lineSettings.stopBits = options.stopBits;
    if (options.rtscts !== undefined) this.lineSettings.rtscts = options.rtscts;
  }

  get endpoint(): string {
    return this.path;
  }

  protected openStream(timeoutMs: number): Promise<void> {
    return new Promise((resolve, reject) => {
      const port = new SerialPort({
        path: this.path,
        baudRate: this.baudRate,
        autoOpen: false,
        ...this.lineSettings,
      });
      let settled = false;

      const timer = setTimeout(() => {
        settled = true;
        reject(
          new TimeoutError(
            `Timed out opening ${this.path} after ${timeoutMs}ms`,
            timeoutMs,
            'CONNECT_TIMEOUT'
          )
        );
      }, timeoutMs);

      port.open((err) => {
        if (settled) {
          // The caller already got a timeout; release a port that opened late
          if (!err) {
            port.close((closeErr) => {
              if (closeErr) this.logger.warn('Late close failed', { message: closeErr.message });
            });
          }
          return;
        }
        settled = true;
        clearTimeout(timer);
        if (err) {
          reject(err);
          return;
        }

        this.logger.debug('Port open', { baudRate: this.baudRate, ...this.lineSettings });
        port.on('data', (chunk: Buffer) => this.handleData(chunk));
        port.on('error', (portErr: Error) => this.handleError(portErr));
        port.on('close', (closeErr?: Error) => this.handleClose(closeErr));
        this.port = port;
        resolve();
      });
    });
  }

  protected writeStream(data: Buffer): Promise<void> {
    return new Promise((resolve, reject) => {
      const port = this.port;
      if (!port || !port.isOpen) {
        reject(new ConnectionError(`Serial port ${this.path} is not open`, 'NOT_CONNECTED'));
        return;
      }
      port.write(data, (err) => {
        if (err) {
          reject(err);
          return;
        }
        port.drain((drainErr) => {
          if (drainErr) reject(drainErr);
          else resolve();
        });
      });
    });
  }

  protected async closeStream(): Promise<void> {
    const port = this.port;
    this.port = null;
    if (!port || !port.isOpen) return;

    await new Promise<void>((resolve) => {
      port.close((err) => {
        if (err) this.logger.warn('Error closing serial port', { message: err.message });
        resolve();
      });
    });
  }
}
