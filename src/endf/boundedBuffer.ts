/**
 * Fixed-capacity character buffer.
 *
 * Storage is allocated once at construction; `push` past capacity throws
 * instead of growing, so a caller's worst-case bound is checked on every
 * write rather than trusted.
 */
export class BoundedCharBuffer {
  private readonly codes: Uint16Array;
  private size = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 0) {
      throw new RangeError(`BoundedCharBuffer capacity must be a non-negative integer, got ${capacity}`);
    }
    this.codes = new Uint16Array(capacity);
  }

  get length(): number {
    return this.size;
  }

  get remaining(): number {
    return this.capacity - this.size;
  }

  /** Append one UTF-16 code unit (the first of `ch`). */
  push(ch: string): void {
    if (this.size >= this.capacity) {
      throw new RangeError(`BoundedCharBuffer overflow: capacity ${this.capacity} exceeded`);
    }
    this.codes[this.size] = ch.charCodeAt(0);
    this.size += 1;
  }

  toString(): string {
    return String.fromCharCode(...this.codes.subarray(0, this.size));
  }
}
