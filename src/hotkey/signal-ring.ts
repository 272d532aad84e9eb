// Int32 header: write position, read position, overflow count. Slots follow.
export const RING_WRITE_INDEX = 0;
export const RING_READ_INDEX = 1;
export const RING_OVERFLOW_INDEX = 2;
export const RING_HEADER_LENGTH = 3;

/**
 * Single-producer/single-consumer ring of int32 values over a SharedArrayBuffer. The producer
 * may live on another thread (a worker holding the same buffer); only the producer moves the
 * write position and only the consumer moves the read position. One slot stays empty to tell
 * full from empty, so a ring of capacity N holds N values.
 */
export class SignalRing {
  readonly buffer: SharedArrayBuffer;
  private readonly view: Int32Array;
  private readonly slotCount: number;

  constructor(capacityOrBuffer: number | SharedArrayBuffer) {
    if (typeof capacityOrBuffer === 'number') {
      if (!Number.isInteger(capacityOrBuffer) || capacityOrBuffer < 1) {
        throw new Error(`signal ring capacity must be a positive integer, got ${String(capacityOrBuffer)}`);
      }
      const length = RING_HEADER_LENGTH + capacityOrBuffer + 1;
      this.buffer = new SharedArrayBuffer(length * Int32Array.BYTES_PER_ELEMENT);
    } else {
      this.buffer = capacityOrBuffer;
    }
    this.view = new Int32Array(this.buffer);
    this.slotCount = this.view.length - RING_HEADER_LENGTH;
    if (this.slotCount < 2) {
      throw new Error('signal ring buffer is too small');
    }
  }

  capacity(): number {
    return this.slotCount - 1;
  }

  /** Producer side. Returns false, and counts the loss, only when the ring is full. */
  push(value: number): boolean {
    const write = Atomics.load(this.view, RING_WRITE_INDEX);
    const read = Atomics.load(this.view, RING_READ_INDEX);
    const next = (write + 1) % this.slotCount;
    if (next === read) {
      Atomics.add(this.view, RING_OVERFLOW_INDEX, 1);
      return false;
    }
    Atomics.store(this.view, RING_HEADER_LENGTH + write, value);
    Atomics.store(this.view, RING_WRITE_INDEX, next);
    return true;
  }

  /** Consumer side. Returns everything pushed since the last drain, oldest first. */
  drain(): number[] {
    const values: number[] = [];
    let read = Atomics.load(this.view, RING_READ_INDEX);
    const write = Atomics.load(this.view, RING_WRITE_INDEX);
    while (read !== write) {
      values.push(Atomics.load(this.view, RING_HEADER_LENGTH + read));
      read = (read + 1) % this.slotCount;
    }
    Atomics.store(this.view, RING_READ_INDEX, read);
    return values;
  }

  size(): number {
    const write = Atomics.load(this.view, RING_WRITE_INDEX);
    const read = Atomics.load(this.view, RING_READ_INDEX);
    return (write - read + this.slotCount) % this.slotCount;
  }

  overflowCount(): number {
    return Atomics.load(this.view, RING_OVERFLOW_INDEX);
  }

  /** Reads and resets the overflow counter. */
  takeOverflow(): number {
    return Atomics.exchange(this.view, RING_OVERFLOW_INDEX, 0);
  }
}
