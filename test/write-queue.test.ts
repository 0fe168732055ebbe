/**
 * WriteQueue tests.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { WriteQueue } from '../src/transports/WriteQueue.ts';
import { bytes } from './helpers.ts';

describe('WriteQueue', () => {
  it('should hand out chunks in push order', async () => {
    const queue = new WriteQueue();
    const signal = new AbortController().signal;
    const a = bytes(1);
    const b = bytes(2, 3);

    queue.push(a);
    queue.push(b);

    assert.strictEqual(queue.length, 2);
    assert.strictEqual(queue.bufferedBytes, 3);
    assert.strictEqual(await queue.take(signal), a);
    assert.strictEqual(await queue.take(signal), b);
    assert.strictEqual(queue.bufferedBytes, 0);
  });

  it('should resolve a waiting take on the next push', async () => {
    const queue = new WriteQueue();
    const signal = new AbortController().signal;
    const chunk = bytes(7);

    const pending = queue.take(signal);
    queue.push(chunk);

    assert.strictEqual(await pending, chunk);
    assert.strictEqual(queue.length, 0);
    assert.strictEqual(queue.bufferedBytes, 0);
  });

  it('should resolve undefined when the signal aborts while waiting', async () => {
    const queue = new WriteQueue();
    const controller = new AbortController();

    const pending = queue.take(controller.signal);
    controller.abort();

    assert.strictEqual(await pending, undefined);

    // The aborted waiter no longer claims pushes.
    queue.push(bytes(1));
    assert.strictEqual(queue.length, 1);
  });

  it('should resolve undefined for an already aborted signal even with chunks queued', async () => {
    const queue = new WriteQueue();
    const controller = new AbortController();
    controller.abort();
    queue.push(bytes(1));

    assert.strictEqual(await queue.take(controller.signal), undefined);
    assert.strictEqual(queue.length, 1);
  });

  it('should reject a second concurrent consumer', async () => {
    const queue = new WriteQueue();
    const signal = new AbortController().signal;

    const first = queue.take(signal);
    await assert.rejects(queue.take(signal), /single consumer/);

    queue.push(bytes(1));
    assert.deepStrictEqual(await first, bytes(1));
  });

  it('should drop queued chunks on clear', () => {
    const queue = new WriteQueue();
    queue.push(bytes(1, 2));
    queue.push(bytes(3));

    queue.clear();

    assert.strictEqual(queue.length, 0);
    assert.strictEqual(queue.bufferedBytes, 0);
  });
});
