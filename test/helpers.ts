/**
 * Test utilities: in-process device stand-ins and a recording consumer.
 */

import type {
  ByteReader,
  ByteWriter,
  ReadResult,
  SerialDevice,
  SerialOpenOptions,
  SerialProtocol,
} from '../src/types.ts';
import type { SerialTransport } from '../src/transports/SerialTransport.ts';

/**
 * Promise-based delay.
 */
export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Wait until a condition becomes true, with polling and timeout.
 */
export async function waitUntil(
  condition: () => boolean,
  timeout = 2000,
  pollInterval = 5
): Promise<void> {
  const start = Date.now();
  while (!condition()) {
    if (Date.now() - start > timeout) {
      throw new Error(`Timeout waiting for condition after ${timeout}ms`);
    }
    await delay(pollInterval);
  }
}

export interface Deferred {
  promise: Promise<void>;
  resolve: () => void;
}

export function deferred(): Deferred {
  let resolve!: () => void;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

export function bytes(...values: number[]): Uint8Array {
  return new Uint8Array(values);
}

/**
 * Collect `console.warn` lines emitted while `run` executes.
 */
export async function captureWarnings(run: () => Promise<void> | void): Promise<string[]> {
  const originalWarn = console.warn;
  const warnings: string[] = [];

  console.warn = (...args: unknown[]) => {
    warnings.push(args.map((a) => String(a)).join(' '));
  };

  try {
    await run();
  } finally {
    console.warn = originalWarn;
  }
  return warnings;
}

/**
 * Reader fed by the test through `push`, `end` and `fail`.
 */
export class MockReader implements ByteReader {
  reads = 0;
  releases = 0;
  throwOnRelease = false;
  /** Leave a pending read unsettled on release, as a slow device would. */
  keepReadOnRelease = false;

  private _queue: (ReadResult | Error)[] = [];
  private _pending: { resolve: (result: ReadResult) => void; reject: (err: Error) => void } | null = null;

  push(chunk: Uint8Array): void {
    this._settle({ done: false, value: chunk });
  }

  end(): void {
    this._settle({ done: true });
  }

  fail(err: Error): void {
    this._settle(err);
  }

  read(): Promise<ReadResult> {
    this.reads++;
    const next = this._queue.shift();
    if (next) {
      return next instanceof Error ? Promise.reject(next) : Promise.resolve(next);
    }
    return new Promise((resolve, reject) => {
      this._pending = { resolve, reject };
    });
  }

  releaseLock(): void {
    this.releases++;
    if (this.throwOnRelease) {
      throw new Error('release failed');
    }
    if (this.keepReadOnRelease) return;
    const pending = this._pending;
    this._pending = null;
    pending?.reject(new TypeError('Reader was released'));
  }

  private _settle(item: ReadResult | Error): void {
    const pending = this._pending;
    if (!pending) {
      this._queue.push(item);
      return;
    }
    this._pending = null;
    if (item instanceof Error) {
      pending.reject(item);
    } else {
      pending.resolve(item);
    }
  }
}

/**
 * Writer recording every chunk it is handed.
 */
export class MockWriter implements ByteWriter {
  attempts: Uint8Array[] = [];
  written: Uint8Array[] = [];
  releases = 0;
  inFlight = 0;
  maxInFlight = 0;
  latencyMs = 0;
  failOn: ((chunk: Uint8Array) => Error | undefined) | null = null;

  private _gate: Deferred | null = null;

  /** Hold every write until `resume()`. */
  hold(): void {
    this._gate = deferred();
  }

  resume(): void {
    const gate = this._gate;
    this._gate = null;
    gate?.resolve();
  }

  async write(chunk: Uint8Array): Promise<void> {
    this.attempts.push(chunk);
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      if (this._gate) await this._gate.promise;
      if (this.latencyMs > 0) await delay(this.latencyMs);
      const err = this.failOn?.(chunk);
      if (err) throw err;
      this.written.push(chunk);
    } finally {
      this.inFlight--;
    }
  }

  releaseLock(): void {
    this.releases++;
  }
}

/**
 * Counts devices open at the same time across several mocks.
 */
export class OpenTracker {
  open = 0;
  maxOpen = 0;
}

export class MockDevice implements SerialDevice {
  reader = new MockReader();
  writer = new MockWriter();

  opened = false;
  closed = false;
  openCalls: SerialOpenOptions[] = [];
  closeCalls = 0;
  openError: Error | null = null;
  closeError: Error | null = null;

  private _tracker: OpenTracker;
  private _closeGate: Deferred | null = null;

  constructor(tracker: OpenTracker = new OpenTracker()) {
    this._tracker = tracker;
  }

  get readable(): { getReader(): ByteReader } | null {
    return this.opened ? { getReader: () => this.reader } : null;
  }

  get writable(): { getWriter(): ByteWriter } | null {
    return this.opened ? { getWriter: () => this.writer } : null;
  }

  async open(options: SerialOpenOptions): Promise<void> {
    this.openCalls.push(options);
    if (this.openError) throw this.openError;
    this.opened = true;
    this.closed = false;
    this._tracker.open++;
    this._tracker.maxOpen = Math.max(this._tracker.maxOpen, this._tracker.open);
  }

  /** Keep `close()` pending until `releaseClose()`. */
  holdClose(): void {
    this._closeGate = deferred();
  }

  releaseClose(): void {
    const gate = this._closeGate;
    this._closeGate = null;
    gate?.resolve();
  }

  async close(): Promise<void> {
    this.closeCalls++;
    if (this._closeGate) await this._closeGate.promise;
    if (this.opened) {
      this.opened = false;
      this._tracker.open--;
    }
    this.closed = true;
    if (this.closeError) throw this.closeError;
  }
}

/**
 * Consumer recording every callback in order.
 */
export class RecordingConsumer implements SerialProtocol {
  events: ('made' | 'data' | 'lost')[] = [];
  transports: SerialTransport[] = [];
  data: Uint8Array[] = [];
  lost: (Error | undefined)[] = [];

  onData: ((chunk: Uint8Array) => void) | null = null;
  onLost: ((error: Error | undefined) => void) | null = null;

  connectionMade(transport: SerialTransport): void {
    this.events.push('made');
    this.transports.push(transport);
  }

  dataReceived(data: Uint8Array): void {
    this.events.push('data');
    this.data.push(data);
    this.onData?.(data);
  }

  connectionLost(error: Error | undefined): void {
    this.events.push('lost');
    this.lost.push(error);
    this.onLost?.(error);
  }
}
