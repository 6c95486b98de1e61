/**
 * Transport module exports.
 */
export type { Transport, ConnectionState, StreamTransportOptions } from './types';
export { StreamTransport } from './stream';
export { ResponseBuffer } from './buffer';
export { TcpTransport } from './tcp';
export type { TcpTransportOptions } from './tcp';
export { SerialTransport } from './serial';
export type { SerialTransportOptions } from './serial';
