/**
 * ConnectionManager - serializes device opens against in-flight closes.
 *
 * Owns the active device slot and the registry of device closes that
 * shutting-down transports have handed over. A new connection waits until
 * that registry is empty, so at most one device is ever opening or open.
 */

import createDebug from 'debug';
import { NoDeviceError } from './errors.ts';
import { toOpenOptions, validateConnectionOptions } from './validation.ts';
import { SerialTransport } from './transports/SerialTransport.ts';
import type { DeviceReleaser } from './transports/SerialTransport.ts';
import type { SerialConnectionOptions, SerialDevice, SerialProtocol } from './types.ts';

const debug = createDebug('serial-stream-transport:connection-manager');

/**
 * Options for `ConnectionManager`.
 */
export interface ConnectionManagerOptions {
  /** Device used for new connections. Can be set later with `setDevice()`. */
  device?: SerialDevice;
}

async function closeDevice(device: SerialDevice): Promise<void> {
  debug('Closing serial device');
  try {
    await device.close();
    debug('Closed serial device');
  } catch (err) {
    debug('Failed to close serial device: %o', err);
  }
}

export class ConnectionManager implements DeviceReleaser {
  private _device: SerialDevice | null;

  // One entry per device close in flight; each entry removes itself.
  private _closing = new Map<object, Promise<void>>();

  // Transports handed out and not yet closing.
  private _transports = new Set<SerialTransport>();

  constructor(options: ConnectionManagerOptions = {}) {
    this._device = options.device ?? null;
  }

  /**
   * The device used for new connections.
   */
  get device(): SerialDevice | null {
    return this._device;
  }

  setDevice(device: SerialDevice | null): void {
    this._device = device;
  }

  /**
   * Number of transports handed out that have not started closing.
   */
  get openCount(): number {
    return this._transports.size;
  }

  /**
   * Number of device closes still in flight.
   */
  get closingCount(): number {
    return this._closing.size;
  }

  /**
   * Take over closing `device`. `onReleased` runs once the close has settled,
   * successfully or not; the registry entry is removed after it.
   */
  release(device: SerialDevice, onReleased: () => void): void {
    this._prune();

    const ticket = {};
    const task = closeDevice(device)
      .then(() => {
        try {
          onReleased();
        } catch (err) {
          debug('Release callback threw: %o', err);
        }
      })
      .finally(() => {
        this._closing.delete(ticket);
      });
    this._closing.set(ticket, task);
  }

  /**
   * Wait until no device close is in flight.
   *
   * Reaching this with closes pending means the previous connection was not
   * closed before a new one was requested; that is reported, then awaited.
   */
  async awaitDrain(): Promise<void> {
    while (this._closing.size > 0) {
      console.warn(
        '[serial-stream-transport] Serial connection was not closed before a new one was opened! Waiting before opening a new one.'
      );
      await this._nextClose();
    }
  }

  /**
   * Resolves once every in-flight device close has completed.
   *
   * Unlike `awaitDrain()`, pending closes are expected here and not reported.
   */
  async settled(): Promise<void> {
    while (this._closing.size > 0) {
      await this._nextClose();
    }
  }

  /**
   * Wait for pending closes, then open the active device.
   *
   * @throws ValidationError if `options` are malformed (nothing is opened)
   * @throws NoDeviceError if no device is configured
   */
  async acquire(options: SerialConnectionOptions): Promise<SerialDevice> {
    const validated = validateConnectionOptions(options);

    await this.awaitDrain();

    const device = this._device;
    if (!device) {
      throw new NoDeviceError();
    }

    const openOptions = toOpenOptions(validated);
    debug('Opening serial device at %d baud%s', openOptions.baudRate, openOptions.flowControl ? ' (hardware flow control)' : '');
    await device.open(openOptions);
    return device;
  }

  /**
   * Open the active device and wrap it in a transport.
   *
   * The consumer's `connectionMade` runs on a microtask after this resolves
   * the transport, never synchronously inside it.
   */
  async createConnection<TConsumer extends SerialProtocol>(
    consumerFactory: () => TConsumer,
    options: SerialConnectionOptions
  ): Promise<[SerialTransport, TConsumer]> {
    const device = await this.acquire(options);

    let consumer: TConsumer;
    let transport: SerialTransport;
    try {
      consumer = consumerFactory();
      transport = new SerialTransport(device, consumer, this);
    } catch (err) {
      debug('Connection setup failed after open: %o', err);
      this.release(device, () => {});
      throw err;
    }

    this._transports.add(transport);

    return [transport, consumer];
  }

  /**
   * Run `body` with a fresh connection, closing it on every exit path.
   * Resolves only after the device close has completed.
   */
  async withConnection<TConsumer extends SerialProtocol, R>(
    consumerFactory: () => TConsumer,
    options: SerialConnectionOptions,
    body: (transport: SerialTransport, consumer: TConsumer) => Promise<R> | R
  ): Promise<R> {
    const [transport, consumer] = await this.createConnection(consumerFactory, options);
    try {
      return await body(transport, consumer);
    } finally {
      transport.close();
      await this.settled();
    }
  }

  /**
   * Dispose every transport still open and wait for their devices to close.
   *
   * Consumers of those transports see `TransportNotClosedError`.
   */
  async dispose(): Promise<void> {
    for (const transport of this._transports) {
      transport.dispose();
    }
    this._transports.clear();
    await this.settled();
  }

  private _nextClose(): Promise<void> {
    const next = this._closing.values().next();
    return next.done ? Promise.resolve() : next.value;
  }

  private _prune(): void {
    for (const transport of this._transports) {
      if (transport.isClosing()) this._transports.delete(transport);
    }
  }
}
