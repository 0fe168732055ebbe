/**
 * Process-wide connection API backed by a shared `ConnectionManager`.
 *
 * Prefer creating a `ConnectionManager` and passing it around; these helpers
 * exist for callers that expect a single configured serial port per process.
 */

import { ConnectionManager } from './ConnectionManager.ts';
import type { SerialTransport } from './transports/SerialTransport.ts';
import type { SerialConnectionOptions, SerialDevice, SerialProtocol } from './types.ts';

export const defaultConnectionManager = new ConnectionManager();

/**
 * Set the device used by `createSerialConnection`.
 */
export function setSerialDevice(device: SerialDevice | null): void {
  defaultConnectionManager.setDevice(device);
}

/**
 * Open the configured device and wrap it in a transport.
 *
 * @example
 * ```ts
 * setSerialDevice(new SerialPortDevice({ path: '/dev/ttyUSB0' }));
 * const [transport, protocol] = await createSerialConnection(() => new MyProtocol(), {
 *   baudRate: 115200,
 *   rtscts: true,
 * });
 * transport.write(new Uint8Array([0x7e]));
 * ```
 */
export function createSerialConnection<TConsumer extends SerialProtocol>(
  consumerFactory: () => TConsumer,
  options: SerialConnectionOptions
): Promise<[SerialTransport, TConsumer]> {
  return defaultConnectionManager.createConnection(consumerFactory, options);
}
