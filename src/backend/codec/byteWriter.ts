import { CodecError } from "./errors";

// Growable output with an optional hard capacity. Exceeding the capacity throws
// CapacityExceeded before anything past it is written.
export class ByteWriter {
  private readonly out: number[] = [];

  constructor(private readonly capacity: number = Infinity) {
    if (capacity < 0 || Number.isNaN(capacity)) {
      throw new RangeError(`invalid capacity: ${capacity}`);
    }
  }

  get length(): number {
    return this.out.length;
  }

  private reserve(count: number): void {
    if (this.out.length + count > this.capacity) {
      throw new CodecError(
        "CapacityExceeded",
        `output needs ${this.out.length + count} bytes but capacity is ${this.capacity}`,
      );
    }
  }

  writeByte(value: number): void {
    this.reserve(1);
    this.out.push(value & 0xff);
  }

  writeBytes(bytes: ArrayLike<number>): void {
    this.reserve(bytes.length);
    for (let i = 0; i < bytes.length; i += 1) {
      this.out.push(bytes[i] & 0xff);
    }
  }

  fill(value: number, count: number): void {
    this.reserve(count);
    for (let i = 0; i < count; i += 1) {
      this.out.push(value & 0xff);
    }
  }

  toUint8Array(): Uint8Array {
    return Uint8Array.from(this.out);
  }
}
