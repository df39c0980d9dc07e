import { NbtError } from './errors.ts';

/**
 * NbtReader is a forward-only cursor over an NBT document.
 *
 * NBT is big-endian. Every read is bounds-checked and every byte range it
 * hands out is a `subarray` of the input, so decoded spans alias the
 * original buffer instead of copying it.
 */
export class NbtReader {
  readonly bytes: Uint8Array;
  readonly view: DataView;
  position: number;

  constructor(buffer: ArrayBufferLike | Uint8Array) {
    this.bytes = buffer instanceof Uint8Array ? buffer : new Uint8Array(buffer);
    this.view = new DataView(this.bytes.buffer, this.bytes.byteOffset, this.bytes.byteLength);
    this.position = 0;
  }

  get pos(): number {
    return this.position;
  }

  get remaining(): number {
    return this.bytes.byteLength - this.position;
  }

  private ensure(length: number): void {
    if (length > this.remaining) {
      throw new NbtError(
        'UnexpectedEndOfInput',
        `Unexpected end of input: needed ${length} bytes, ${this.remaining} left`,
        this.position,
      );
    }
  }

  /**
   * Consume `length` bytes and return them as a view into the input.
   */
  take(length: number): Uint8Array {
    this.ensure(length);
    const start = this.position;
    this.position += length;
    return this.bytes.subarray(start, this.position);
  }

  skip(length: number): void {
    this.ensure(length);
    this.position += length;
  }

  // === Primitive Type Readers (Big Endian) ===

  readU8(): number {
    this.ensure(1);
    return this.view.getUint8(this.position++);
  }

  readU16(): number {
    this.ensure(2);
    const value = this.view.getUint16(this.position, false);
    this.position += 2;
    return value;
  }

  readU32(): number {
    this.ensure(4);
    const value = this.view.getUint32(this.position, false);
    this.position += 4;
    return value;
  }
}
