import { DirectoryDecodeError } from './errors';

const MAX_UINT32 = 0xffffffff;

export interface BufferPosition {
  buf: Uint8Array;
  pos: number;
}

/**
 * Destination for encoded directory bytes. Errors thrown by `write` propagate to the caller of the encoder.
 */
export interface ByteSink {
  write(bytes: Uint8Array): void;
}

export class ByteBuffer implements ByteSink {
  private buf: Uint8Array;
  private pos = 0;

  constructor(initialCapacity = 64) {
    this.buf = new Uint8Array(Math.max(initialCapacity, 1));
  }

  get length(): number {
    return this.pos;
  }

  writeByte(byte: number): void {
    this.ensureCapacity(1);
    this.buf[this.pos++] = byte;
  }

  write(bytes: Uint8Array): void {
    this.ensureCapacity(bytes.length);
    this.buf.set(bytes, this.pos);
    this.pos += bytes.length;
  }

  toUint8Array(): Uint8Array {
    return this.buf.slice(0, this.pos);
  }

  private ensureCapacity(extra: number): void {
    const required = this.pos + extra;
    if (required <= this.buf.length) {
      return;
    }
    let capacity = this.buf.length * 2;
    while (capacity < required) {
      capacity *= 2;
    }
    const grown = new Uint8Array(capacity);
    grown.set(this.buf.subarray(0, this.pos));
    this.buf = grown;
  }
}

function readByte(bufferPosition: BufferPosition): number {
  if (bufferPosition.pos >= bufferPosition.buf.length) {
    throw new DirectoryDecodeError('truncated', `Unexpected end of directory data at byte ${bufferPosition.pos}`);
  }
  return bufferPosition.buf[bufferPosition.pos++];
}

function peekByte(bufferPosition: BufferPosition): number {
  if (bufferPosition.pos >= bufferPosition.buf.length) {
    throw new DirectoryDecodeError('truncated', `Unexpected end of directory data at byte ${bufferPosition.pos}`);
  }
  return bufferPosition.buf[bufferPosition.pos];
}

function toNum(low: number, high: number): number {
  const value = (high >>> 0) * 0x100000000 + (low >>> 0);
  if (!Number.isSafeInteger(value)) {
    throw new DirectoryDecodeError('overflow', 'Varint exceeds the safe integer range');
  }
  return value;
}

function readVarintRemainder(lowBits: number, bufferPosition: BufferPosition): number {
  let byte = readByte(bufferPosition);
  let highBits = (byte & 0x70) >> 4;
  if (byte < 0x80) {
    return toNum(lowBits, highBits);
  }
  byte = readByte(bufferPosition);
  highBits |= (byte & 0x7f) << 3;
  if (byte < 0x80) {
    return toNum(lowBits, highBits);
  }
  byte = readByte(bufferPosition);
  highBits |= (byte & 0x7f) << 10;
  if (byte < 0x80) {
    return toNum(lowBits, highBits);
  }
  byte = readByte(bufferPosition);
  highBits |= (byte & 0x7f) << 17;
  if (byte < 0x80) {
    return toNum(lowBits, highBits);
  }
  byte = readByte(bufferPosition);
  highBits |= (byte & 0x7f) << 24;
  if (byte < 0x80) {
    return toNum(lowBits, highBits);
  }
  byte = readByte(bufferPosition);
  highBits |= (byte & 0x01) << 31;
  if (byte < 0x80) {
    return toNum(lowBits, highBits);
  }
  throw new DirectoryDecodeError('overflow', 'Expected varint not more than 10 bytes');
}

/**
 * Read an unsigned LEB128 varint and advance the position past it.
 */
export function readVarint(bufferPosition: BufferPosition): number {
  let byte = readByte(bufferPosition);
  let val = byte & 0x7f;
  if (byte < 0x80) {
    return val;
  }
  byte = readByte(bufferPosition);
  val |= (byte & 0x7f) << 7;
  if (byte < 0x80) {
    return val;
  }
  byte = readByte(bufferPosition);
  val |= (byte & 0x7f) << 14;
  if (byte < 0x80) {
    return val;
  }
  byte = readByte(bufferPosition);
  val |= (byte & 0x7f) << 21;
  if (byte < 0x80) {
    return val;
  }
  // the fifth byte straddles the 32-bit boundary, the remainder reads it again for its high bits
  byte = peekByte(bufferPosition);
  val |= (byte & 0x0f) << 28;

  return readVarintRemainder(val, bufferPosition);
}

export function readUint32Varint(bufferPosition: BufferPosition): number {
  const value = readVarint(bufferPosition);
  if (value > MAX_UINT32) {
    throw new DirectoryDecodeError('overflow', `Value ${value} does not fit in 32 bits`);
  }
  return value;
}

export function writeVarint(buffer: ByteBuffer, value: number): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new RangeError(`Cannot encode ${value} as an unsigned varint`);
  }
  while (value >= 0x80) {
    buffer.writeByte((value % 0x80) | 0x80);
    value = Math.floor(value / 0x80);
  }
  buffer.writeByte(value);
}

export function writeUint32Varint(buffer: ByteBuffer, value: number): void {
  if (value > MAX_UINT32) {
    throw new RangeError(`Value ${value} does not fit in 32 bits`);
  }
  writeVarint(buffer, value);
}
