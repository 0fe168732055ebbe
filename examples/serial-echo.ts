/**
 * Serial Echo Example
 *
 * Opens a serial port, sends a line and prints whatever comes back.
 * Runs against serialport's mock binding unless a port path is given.
 *
 * Run with: npx tsx examples/serial-echo.ts [path] [baudRate]
 */

import { SerialPortMock } from 'serialport';
import { ConnectionManager, SerialPortDevice } from '../src/index.ts';
import type { SerialProtocol, SerialTransport } from '../src/index.ts';

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

class PrintingProtocol implements SerialProtocol {
  connectionMade(transport: SerialTransport): void {
    console.log('[Protocol] Connected');
    transport.write(Buffer.from('hello serial\r\n'));
  }

  dataReceived(data: Uint8Array): void {
    console.log('[Protocol] Received:', JSON.stringify(Buffer.from(data).toString()));
  }

  connectionLost(error: Error | undefined): void {
    console.log('[Protocol] Connection lost:', error ? error.message : 'closed cleanly');
  }
}

async function main() {
  const path = process.argv[2];
  const baudRate = Number(process.argv[3] ?? 115200);

  // 1. Pick a device: a real port, or an echoing mock port
  let device: SerialPortDevice;
  if (path) {
    device = new SerialPortDevice({ path });
  } else {
    SerialPortMock.binding.createPort('/dev/ttyECHO', { echo: true });
    device = new SerialPortDevice({
      path: '/dev/ttyECHO',
      createPort: (options) => new SerialPortMock(options),
    });
  }

  // 2. The manager opens one device at a time
  const manager = new ConnectionManager({ device });

  // 3. Run a scoped connection; the device is closed when the body returns
  await manager.withConnection(() => new PrintingProtocol(), { baudRate }, async (transport) => {
    await delay(200);
    console.log('[Transport] Stats:', transport.stats());
  });

  console.log('Done!');
}

main().catch(console.error);
