/**
 * serial-stream-transport: push-based transport over a stream-oriented serial device.
 *
 * A `SerialTransport` owns an open device's reader and writer, pumps received
 * chunks into a `SerialProtocol` and flushes queued writes to the device in
 * order. A `ConnectionManager` opens devices one at a time, waiting for any
 * previous device to finish closing first.
 *
 * ## Example
 * ```ts
 * import { ConnectionManager, SerialPortDevice } from 'serial-stream-transport';
 * import type { SerialProtocol, SerialTransport } from 'serial-stream-transport';
 *
 * class Logger implements SerialProtocol {
 *   connectionMade(transport: SerialTransport) {
 *     transport.write(new TextEncoder().encode('AT\r'));
 *   }
 *   dataReceived(data: Uint8Array) {
 *     console.log('rx', data);
 *   }
 *   connectionLost(error: Error | undefined) {
 *     console.log('lost', error);
 *   }
 * }
 *
 * const manager = new ConnectionManager({ device: new SerialPortDevice({ path: '/dev/ttyUSB0' }) });
 * const [transport] = await manager.createConnection(() => new Logger(), { baudRate: 115200 });
 * // ...
 * transport.close();
 * ```
 *
 * @packageDocumentation
 */

export { SerialTransport } from './transports/SerialTransport.ts';
export { WriteQueue } from './transports/WriteQueue.ts';
export { ConnectionManager } from './ConnectionManager.ts';
export { SerialPortDevice } from './devices/SerialPortDevice.ts';
export { defaultConnectionManager, setSerialDevice, createSerialConnection } from './defaults.ts';
export { validateConnectionOptions, toOpenOptions, SerialConnectionOptionsSchema } from './validation.ts';
export {
  ErrorCode,
  ValidationError,
  PeerClosedError,
  TransportNotClosedError,
  InvariantError,
  NoDeviceError,
  DeviceError,
  hasErrorCode,
  getErrorCode,
} from './errors.ts';

export type {
  ReadResult,
  ByteReader,
  ByteWriter,
  SerialOpenOptions,
  SerialDevice,
  SerialProtocol,
  TransportStats,
  SerialConnectionOptions,
} from './types.ts';
export type { ErrorCodeType } from './errors.ts';
export type { DeviceReleaser } from './transports/SerialTransport.ts';
export type { ConnectionManagerOptions } from './ConnectionManager.ts';
export type {
  SerialPortDeviceOptions,
  SerialPortCreateOptions,
  SerialPortLike,
} from './devices/SerialPortDevice.ts';
