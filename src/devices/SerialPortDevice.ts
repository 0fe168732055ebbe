/**
 * `SerialDevice` backed by the `serialport` package.
 *
 * The port is created on `open()` (baud rate and flow control are only known
 * then) and exposed through web streams, so a transport drives it exactly as
 * it would drive a Web Serial port.
 */

import { Duplex } from 'node:stream';
import createDebug from 'debug';
import { SerialPort } from 'serialport';
import { DeviceError } from '../errors.ts';
import type { ByteReader, ByteWriter, SerialDevice, SerialOpenOptions } from '../types.ts';

const debug = createDebug('serial-stream-transport:serialport-device');

/**
 * Subset of `SerialPortStream` used by the device.
 */
export interface SerialPortLike extends Duplex {
  readonly isOpen: boolean;
  open(callback?: (err: Error | null) => void): void;
  close(callback?: (err: Error | null) => void): void;
}

/**
 * Options handed to `createPort`.
 */
export interface SerialPortCreateOptions {
  path: string;
  baudRate: number;
  rtscts: boolean;
  dataBits?: 5 | 6 | 7 | 8;
  stopBits?: 1 | 1.5 | 2;
  parity?: 'none' | 'even' | 'odd';
  lock?: boolean;
  hupcl?: boolean;
  autoOpen: false;
}

export interface SerialPortDeviceOptions {
  /** The system path of the serial port, e.g. `/dev/ttyUSB0` on Linux or `COM1` on Windows */
  path: string;
  /** Must be one of these: 5, 6, 7, or 8. Defaults to 8 */
  dataBits?: 5 | 6 | 7 | 8;
  /** Must be 1, 1.5 or 2. Defaults to 1 */
  stopBits?: 1 | 1.5 | 2;
  parity?: 'none' | 'even' | 'odd';
  /** Prevent other processes from opening the port. Windows does not currently support `false`. Defaults to true */
  lock?: boolean;
  /** Drop DTR on close. Defaults to true */
  hupcl?: boolean;
  /** Port constructor. Defaults to `serialport`'s platform binding. */
  createPort?: (options: SerialPortCreateOptions) => SerialPortLike;
}

interface PortStreams {
  readable: { getReader(): ByteReader };
  writable: { getWriter(): ByteWriter };
}

export class SerialPortDevice implements SerialDevice {
  private _options: SerialPortDeviceOptions;
  private _createPort: (options: SerialPortCreateOptions) => SerialPortLike;
  private _port: SerialPortLike | null = null;
  private _streams: PortStreams | null = null;

  constructor(options: SerialPortDeviceOptions) {
    this._options = options;
    this._createPort = options.createPort ?? ((portOptions) => new SerialPort(portOptions));
  }

  get path(): string {
    return this._options.path;
  }

  get isOpen(): boolean {
    return this._port?.isOpen ?? false;
  }

  get readable(): PortStreams['readable'] | null {
    return this._streams?.readable ?? null;
  }

  get writable(): PortStreams['writable'] | null {
    return this._streams?.writable ?? null;
  }

  async open(options: SerialOpenOptions): Promise<void> {
    if (this._port) {
      throw new DeviceError(`Port ${this._options.path} is already open`);
    }

    const port = this._createPort({
      path: this._options.path,
      baudRate: options.baudRate,
      rtscts: options.flowControl === 'hardware',
      dataBits: this._options.dataBits,
      stopBits: this._options.stopBits,
      parity: this._options.parity,
      lock: this._options.lock,
      hupcl: this._options.hupcl,
      autoOpen: false,
    });

    await new Promise<void>((resolve, reject) => {
      port.open((err) => {
        if (err) {
          reject(err);
        } else {
          resolve();
        }
      });
    });

    debug('Opened %s at %d baud', this._options.path, options.baudRate);
    this._port = port;
    this._streams = Duplex.toWeb(port);
  }

  async close(): Promise<void> {
    const port = this._port;
    this._port = null;
    this._streams = null;
    if (!port || !port.isOpen) return;

    await new Promise<void>((resolve, reject) => {
      port.close((err) => {
        if (err) {
          reject(err);
        } else {
          resolve();
        }
      });
    });
    debug('Closed %s', this._options.path);
  }
}
