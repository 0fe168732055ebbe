/**
 * Core type definitions for the serial transport.
 */

import type { SerialTransport } from './transports/SerialTransport.ts';

/**
 * Result of a single device read. `done` signals end-of-stream.
 */
export interface ReadResult {
  done: boolean;
  value?: Uint8Array;
}

/**
 * Exclusive reader acquired from a device's readable stream.
 */
export interface ByteReader {
  read(): Promise<ReadResult>;
  releaseLock(): void;
}

/**
 * Exclusive writer acquired from a device's writable stream.
 */
export interface ByteWriter {
  write(chunk: Uint8Array): Promise<void>;
  releaseLock(): void;
}

/**
 * Options handed to `SerialDevice.open`.
 */
export interface SerialOpenOptions {
  baudRate: number;
  flowControl?: 'hardware';
}

/**
 * A stream-oriented byte device, shaped after the Web Serial `SerialPort`.
 *
 * `readable` and `writable` are `null` until the device has been opened.
 * Web streams (`ReadableStream<Uint8Array>` / `WritableStream<Uint8Array>`)
 * satisfy these shapes directly.
 */
export interface SerialDevice {
  readonly readable: { getReader(): ByteReader } | null;
  readonly writable: { getWriter(): ByteWriter } | null;
  open(options: SerialOpenOptions): Promise<void>;
  close(): Promise<void>;
}

/**
 * Higher-level protocol driven by a transport.
 */
export interface SerialProtocol {
  connectionMade(transport: SerialTransport): void;
  dataReceived(data: Uint8Array): void;
  connectionLost(error: Error | undefined): void;
}

/**
 * Counters exposed by `SerialTransport.stats()`.
 */
export interface TransportStats {
  bytesReceived: number;
  bytesSent: number;
  chunksReceived: number;
  chunksSent: number;
  pendingBytes: number;
  closing: boolean;
}

/**
 * Options accepted by `ConnectionManager.createConnection`.
 *
 * Only `baudRate` and `rtscts` reach the device. The remaining fields are
 * accepted so that callers written against a full serial API keep working.
 */
export interface SerialConnectionOptions {
  baudRate: number;
  /** Hardware (RTS/CTS) flow control. Defaults to false */
  rtscts?: boolean;
  /** Software flow control. Accepted and ignored */
  xonxoff?: boolean;
  /** Accepted and ignored */
  parity?: 'none' | 'even' | 'odd' | 'mark' | 'space';
  /** Accepted and ignored */
  stopBits?: 1 | 1.5 | 2;
  /** Accepted and ignored; the manager's active device is used instead */
  url?: string;
}
