/**
 * Background loops moving bytes between a device and a transport.
 *
 * Neither pump rejects: a failure is reported once through `fail` and the
 * loop ends. An aborted `signal` ends the loop silently.
 */

import { PeerClosedError, toError } from '../errors.ts';
import type { ByteReader, ByteWriter, ReadResult } from '../types.ts';
import type { WriteQueue } from './WriteQueue.ts';

type FailHandler = (error: Error) => void;

/**
 * Read chunks from the device and hand each non-empty one to `deliver`.
 */
export async function runInboundPump(
  reader: ByteReader,
  signal: AbortSignal,
  deliver: (chunk: Uint8Array) => void,
  fail: FailHandler
): Promise<void> {
  while (!signal.aborted) {
    let result: ReadResult;
    try {
      result = await reader.read();
    } catch (err) {
      // Releasing the reader during shutdown rejects the pending read.
      if (!signal.aborted) fail(toError(err));
      return;
    }

    if (signal.aborted) return;

    if (result.done) {
      fail(new PeerClosedError());
      return;
    }

    if (!result.value || result.value.byteLength === 0) continue;

    try {
      deliver(result.value);
    } catch (err) {
      fail(toError(err));
      return;
    }
  }
}

/**
 * Write queued chunks to the device one at a time, in queue order.
 */
export async function runOutboundPump(
  queue: WriteQueue,
  writer: ByteWriter,
  signal: AbortSignal,
  written: (chunk: Uint8Array) => void,
  fail: FailHandler
): Promise<void> {
  for (;;) {
    const chunk = await queue.take(signal);
    if (chunk === undefined) return;

    try {
      await writer.write(chunk);
    } catch (err) {
      if (!signal.aborted) fail(toError(err));
      return;
    }

    written(chunk);
    if (signal.aborted) return;
  }
}
