/**
 * Unbounded FIFO of outbound byte chunks.
 *
 * Producers push synchronously; the single consumer awaits `take()`.
 */

export class WriteQueue {
  private _chunks: Uint8Array[] = [];
  private _bufferedBytes = 0;
  private _waiter: ((chunk: Uint8Array | undefined) => void) | null = null;

  get length(): number {
    return this._chunks.length;
  }

  /**
   * Bytes pushed but not yet taken.
   */
  get bufferedBytes(): number {
    return this._bufferedBytes;
  }

  push(chunk: Uint8Array): void {
    if (this._waiter) {
      const waiter = this._waiter;
      this._waiter = null;
      waiter(chunk);
      return;
    }
    this._chunks.push(chunk);
    this._bufferedBytes += chunk.byteLength;
  }

  /**
   * Resolve with the oldest chunk, waiting for one if the queue is empty.
   * Resolves `undefined` once `signal` aborts.
   */
  take(signal: AbortSignal): Promise<Uint8Array | undefined> {
    if (signal.aborted) return Promise.resolve(undefined);

    const chunk = this._chunks.shift();
    if (chunk) {
      this._bufferedBytes -= chunk.byteLength;
      return Promise.resolve(chunk);
    }

    if (this._waiter) {
      return Promise.reject(new Error('WriteQueue supports a single consumer'));
    }

    return new Promise((resolve) => {
      const onAbort = () => {
        this._waiter = null;
        resolve(undefined);
      };
      this._waiter = (next) => {
        signal.removeEventListener('abort', onAbort);
        resolve(next);
      };
      signal.addEventListener('abort', onAbort, { once: true });
    });
  }

  /**
   * Drop everything still queued.
   */
  clear(): void {
    this._chunks = [];
    this._bufferedBytes = 0;
  }
}
