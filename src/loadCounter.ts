/**
 * Count of requests currently being forwarded.
 *
 * Backed by a SharedArrayBuffer so the same counter can be handed to worker
 * threads; every mutation goes through Atomics.
 */
export class LoadCounter {
  private readonly cell: Int32Array;

  constructor(readonly buffer: SharedArrayBuffer = new SharedArrayBuffer(Int32Array.BYTES_PER_ELEMENT)) {
    this.cell = new Int32Array(buffer, 0, 1);
  }

  increment(): number {
    return Atomics.add(this.cell, 0, 1) + 1;
  }

  /** Never goes below zero; an unmatched decrement is a no-op. */
  decrement(): number {
    for (;;) {
      const current = Atomics.load(this.cell, 0);
      if (current <= 0) return 0;
      if (Atomics.compareExchange(this.cell, 0, current, current - 1) === current) {
        return current - 1;
      }
    }
  }

  get(): number {
    return Atomics.load(this.cell, 0);
  }
}
