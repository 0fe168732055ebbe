/**
 * Transport bridging a stream-oriented serial device to a push-based protocol.
 *
 * The device's reader and writer are owned by the transport for its whole
 * lifetime. Two pumps run in the background: inbound (device -> consumer) and
 * outbound (write queue -> device). Shutdown runs once, whichever of
 * `close()`, a write failure, end-of-stream or `dispose()` comes first.
 */

import createDebug from 'debug';
import { DeviceError, InvariantError, TransportNotClosedError, toError } from '../errors.ts';
import type {
  ByteReader,
  ByteWriter,
  SerialDevice,
  SerialProtocol,
  TransportStats,
} from '../types.ts';
import { WriteQueue } from './WriteQueue.ts';
import { runInboundPump, runOutboundPump } from './pumps.ts';

const debug = createDebug('serial-stream-transport:transport');

/**
 * Takes over the device close detached by a shutting-down transport.
 *
 * `onReleased` must run only after `device.close()` has settled.
 */
export interface DeviceReleaser {
  release(device: SerialDevice, onReleased: () => void): void;
}

export class SerialTransport {
  private _consumer: SerialProtocol | null;
  private _device: SerialDevice | null;
  private _releaser: DeviceReleaser;

  private _reader: ByteReader | null;
  private _writer: ByteWriter | null;

  private _queue = new WriteQueue();
  private _abort = new AbortController();
  private _closing = false;
  private _lostDelivered = false;

  private _inboundTask: Promise<void>;
  private _outboundTask: Promise<void>;

  private _bytesReceived = 0;
  private _bytesSent = 0;
  private _chunksReceived = 0;
  private _chunksSent = 0;

  /**
   * @param device - An already opened device; its streams are locked here
   * @param consumer - Protocol notified of data and lifecycle events
   * @param releaser - Owns the device close once shutdown starts
   */
  constructor(device: SerialDevice, consumer: SerialProtocol, releaser: DeviceReleaser) {
    const readable = device.readable;
    const writable = device.writable;
    if (!readable || !writable) {
      throw new DeviceError('Device streams are not available; was the device opened?');
    }

    this._device = device;
    this._consumer = consumer;
    this._releaser = releaser;

    const reader = readable.getReader();
    let writer: ByteWriter;
    try {
      writer = writable.getWriter();
    } catch (err) {
      reader.releaseLock();
      throw err;
    }
    this._reader = reader;
    this._writer = writer;

    // Queued before the pumps start so no data reaches the consumer first.
    queueMicrotask(() => {
      if (this._lostDelivered) return;
      try {
        consumer.connectionMade(this);
      } catch (err) {
        this._shutdown(toError(err));
      }
    });

    const signal = this._abort.signal;
    this._inboundTask = runInboundPump(
      reader,
      signal,
      (chunk) => this._deliver(chunk),
      (error) => this._shutdown(error)
    ).catch((err) => this._shutdown(toError(err)));

    this._outboundTask = runOutboundPump(
      this._queue,
      writer,
      signal,
      (chunk) => {
        this._bytesSent += chunk.byteLength;
        this._chunksSent += 1;
      },
      (error) => this._shutdown(error)
    ).catch((err) => this._shutdown(toError(err)));

    debug('Transport opened');
  }

  /**
   * Queue bytes for the device. Never blocks; chunks are written in call order.
   *
   * The bytes are copied, so the caller may reuse `chunk` once this returns.
   */
  write(chunk: Uint8Array): void {
    if (this._closing) {
      debug('Dropping %d bytes written after close', chunk.byteLength);
      return;
    }
    this._queue.push(new Uint8Array(chunk));
  }

  setConsumer(consumer: SerialProtocol): void {
    this._consumer = consumer;
  }

  /**
   * @throws InvariantError once shutdown has released the consumer
   */
  getConsumer(): SerialProtocol {
    if (!this._consumer) {
      throw new InvariantError('Consumer accessed after the transport was closed');
    }
    return this._consumer;
  }

  isClosing(): boolean {
    return this._closing;
  }

  /**
   * Bytes queued but not yet handed to the device.
   */
  getWriteBufferSize(): number {
    return this._queue.bufferedBytes;
  }

  stats(): TransportStats {
    return {
      bytesReceived: this._bytesReceived,
      bytesSent: this._bytesSent,
      chunksReceived: this._chunksReceived,
      chunksSent: this._chunksSent,
      pendingBytes: this._queue.bufferedBytes,
      closing: this._closing,
    };
  }

  /**
   * Close the transport. Safe to call any number of times.
   */
  close(): void {
    this._shutdown(undefined);
  }

  /**
   * Release a transport its owner failed to close.
   *
   * The consumer sees `TransportNotClosedError`. Reaching this path is a
   * bug in the owner; `close()` is the supported way out.
   */
  dispose(): void {
    if (this._closing) return;
    console.warn('[serial-stream-transport] Transport was not closed! Call close() when done with it.');
    this._shutdown(new TransportNotClosedError());
  }

  /**
   * Settles once both pumps have exited.
   */
  async drained(): Promise<void> {
    await Promise.all([this._inboundTask, this._outboundTask]);
  }

  private _deliver(chunk: Uint8Array): void {
    this._bytesReceived += chunk.byteLength;
    this._chunksReceived += 1;
    this._consumer?.dataReceived(chunk);
  }

  private _shutdown(error: Error | undefined): void {
    if (this._closing) return;
    this._closing = true;

    debug('Shutting down%s', error ? `: ${error.message}` : '');

    this._abort.abort();
    this._queue.clear();
    this._releaseReader();
    this._releaseWriter();

    const device = this._device;
    this._device = null;

    const consumer = this._consumer;
    this._consumer = null;

    if (!device) {
      if (consumer) this._notifyLost(consumer, error);
      return;
    }

    this._releaser.release(device, () => {
      if (consumer) this._notifyLost(consumer, error);
    });
  }

  private _releaseReader(): void {
    const reader = this._reader;
    if (!reader) return;
    this._reader = null;
    try {
      reader.releaseLock();
    } catch (err) {
      debug('Failed to release reader: %o', err);
    }
  }

  private _releaseWriter(): void {
    const writer = this._writer;
    if (!writer) return;
    this._writer = null;
    try {
      writer.releaseLock();
    } catch (err) {
      debug('Failed to release writer: %o', err);
    }
  }

  private _notifyLost(consumer: SerialProtocol, error: Error | undefined): void {
    this._lostDelivered = true;
    try {
      consumer.connectionLost(error);
    } catch (err) {
      debug('connectionLost handler threw: %o', err);
    }
  }
}
