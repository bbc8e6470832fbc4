/**
 * XDR primitives: a big-endian writer and reader over Buffers, and the
 * `XdrType` descriptor that every encoded structure implements.
 *
 * @packageDocumentation
 */

import {
  DEFAULT_MAX_DEPTH,
  MAX_OPS_PER_TX,
  SCVAL_LIMIT,
} from "../constants";
import { LimitExceededError, MalformedInputError } from "../errors";

// ============================================================================
// Limits
// ============================================================================

/**
 * Sequence and nesting bounds applied while encoding and decoding.
 */
export interface CodecLimits {
  /** Bound on InvokeHostFunctionOp.functions */
  maxOpsPerTx: number;
  /** Bound on SCVec, SCMap, SCBytes, SCString and Wasm code */
  scValLimit: number;
  /** Bound on recursion through ScVal and AuthorizedInvocation */
  maxDepth: number;
}

export const DEFAULT_CODEC_LIMITS: Readonly<CodecLimits> = Object.freeze({
  maxOpsPerTx: MAX_OPS_PER_TX,
  scValLimit: SCVAL_LIMIT,
  maxDepth: DEFAULT_MAX_DEPTH,
});

export function resolveLimits(limits?: Partial<CodecLimits>): CodecLimits {
  return {
    maxOpsPerTx: limits?.maxOpsPerTx ?? DEFAULT_CODEC_LIMITS.maxOpsPerTx,
    scValLimit: limits?.scValLimit ?? DEFAULT_CODEC_LIMITS.scValLimit,
    maxDepth: limits?.maxDepth ?? DEFAULT_CODEC_LIMITS.maxDepth,
  };
}

const UINT32_MAX = 0xffffffff;
const INT32_MIN = -0x80000000;
const INT32_MAX = 0x7fffffff;
const UINT64_MAX = (1n << 64n) - 1n;
const INT64_MIN = -(1n << 63n);
const INT64_MAX = (1n << 63n) - 1n;

function padding(length: number): number {
  return (4 - (length % 4)) % 4;
}

// ============================================================================
// Writer
// ============================================================================

export class XdrWriter {
  readonly limits: CodecLimits;
  private chunks: Buffer[] = [];
  private depth = 0;

  constructor(limits?: Partial<CodecLimits>) {
    this.limits = resolveLimits(limits);
  }

  writeUint32(value: number): void {
    if (!Number.isInteger(value) || value < 0 || value > UINT32_MAX) {
      throw new MalformedInputError(`Value ${value} is not a uint32`);
    }
    const buf = Buffer.alloc(4);
    buf.writeUInt32BE(value);
    this.chunks.push(buf);
  }

  writeInt32(value: number): void {
    if (!Number.isInteger(value) || value < INT32_MIN || value > INT32_MAX) {
      throw new MalformedInputError(`Value ${value} is not an int32`);
    }
    const buf = Buffer.alloc(4);
    buf.writeInt32BE(value);
    this.chunks.push(buf);
  }

  writeUint64(value: bigint): void {
    if (value < 0n || value > UINT64_MAX) {
      throw new MalformedInputError(`Value ${value} is not a uint64`);
    }
    const buf = Buffer.alloc(8);
    buf.writeBigUInt64BE(value);
    this.chunks.push(buf);
  }

  writeInt64(value: bigint): void {
    if (value < INT64_MIN || value > INT64_MAX) {
      throw new MalformedInputError(`Value ${value} is not an int64`);
    }
    const buf = Buffer.alloc(8);
    buf.writeBigInt64BE(value);
    this.chunks.push(buf);
  }

  writeBool(value: boolean): void {
    this.writeUint32(value ? 1 : 0);
  }

  /** opaque[length] */
  writeFixedOpaque(value: Buffer, length: number, what = "opaque"): void {
    if (value.length !== length) {
      throw new MalformedInputError(
        `${what} must be ${length} bytes, got ${value.length}`
      );
    }
    this.pushPadded(value);
  }

  /** opaque<max> */
  writeVarOpaque(value: Buffer, max: number, what = "opaque"): void {
    if (value.length > max) {
      throw new LimitExceededError(what, max, value.length);
    }
    this.writeUint32(value.length);
    this.pushPadded(value);
  }

  /** string<max>, UTF-8 encoded */
  writeString(value: string, max: number, what = "string"): void {
    this.writeVarOpaque(Buffer.from(value, "utf8"), max, what);
  }

  /** T<max> */
  writeArray<T>(values: readonly T[], max: number, what: string, item: XdrType<T>): void {
    if (values.length > max) {
      throw new LimitExceededError(what, max, values.length);
    }
    this.writeUint32(values.length);
    for (const value of values) {
      item.write(value, this);
    }
  }

  /** T* */
  writeOptional<T>(value: T | null, item: XdrType<T>): void {
    if (value === null) {
      this.writeBool(false);
      return;
    }
    this.writeBool(true);
    item.write(value, this);
  }

  /**
   * Run `fn` one recursion level deeper, failing past `limits.maxDepth`.
   */
  nested(what: string, fn: () => void): void {
    this.depth += 1;
    if (this.depth > this.limits.maxDepth) {
      throw new LimitExceededError(`${what} nesting`, this.limits.maxDepth, this.depth);
    }
    try {
      fn();
    } finally {
      this.depth -= 1;
    }
  }

  toBuffer(): Buffer {
    return Buffer.concat(this.chunks);
  }

  private pushPadded(value: Buffer): void {
    this.chunks.push(Buffer.from(value));
    const pad = padding(value.length);
    if (pad > 0) {
      this.chunks.push(Buffer.alloc(pad));
    }
  }
}

// ============================================================================
// Reader
// ============================================================================

export class XdrReader {
  readonly limits: CodecLimits;
  private offset = 0;
  private depth = 0;

  constructor(private readonly input: Buffer, limits?: Partial<CodecLimits>) {
    this.limits = resolveLimits(limits);
  }

  get remaining(): number {
    return this.input.length - this.offset;
  }

  readUint32(): number {
    const value = this.take(4).readUInt32BE(0);
    return value;
  }

  readInt32(): number {
    return this.take(4).readInt32BE(0);
  }

  readUint64(): bigint {
    return this.take(8).readBigUInt64BE(0);
  }

  readInt64(): bigint {
    return this.take(8).readBigInt64BE(0);
  }

  readBool(): boolean {
    const value = this.readUint32();
    if (value > 1) {
      throw new MalformedInputError(`Invalid boolean value ${value}`, { offset: this.offset - 4 });
    }
    return value === 1;
  }

  readFixedOpaque(length: number): Buffer {
    const value = Buffer.from(this.take(length));
    this.skipPadding(length);
    return value;
  }

  readVarOpaque(max: number, what = "opaque"): Buffer {
    const length = this.readUint32();
    if (length > max) {
      throw new LimitExceededError(what, max, length);
    }
    return this.readFixedOpaque(length);
  }

  readString(max: number, what = "string"): string {
    return this.readVarOpaque(max, what).toString("utf8");
  }

  readArray<T>(max: number, what: string, item: XdrType<T>): T[] {
    const length = this.readUint32();
    if (length > max) {
      throw new LimitExceededError(what, max, length);
    }
    // Every element occupies at least four bytes
    if (length * 4 > this.remaining) {
      throw new MalformedInputError(`${what} length ${length} exceeds remaining input`);
    }
    const values: T[] = [];
    for (let i = 0; i < length; i++) {
      values.push(item.read(this));
    }
    return values;
  }

  readOptional<T>(item: XdrType<T>): T | null {
    return this.readBool() ? item.read(this) : null;
  }

  nested<T>(what: string, fn: () => T): T {
    this.depth += 1;
    if (this.depth > this.limits.maxDepth) {
      throw new LimitExceededError(`${what} nesting`, this.limits.maxDepth, this.depth);
    }
    try {
      return fn();
    } finally {
      this.depth -= 1;
    }
  }

  ensureInputConsumed(): void {
    if (this.remaining !== 0) {
      throw new MalformedInputError(`Unexpected ${this.remaining} trailing bytes`, {
        offset: this.offset,
      });
    }
  }

  private take(length: number): Buffer {
    if (length > this.remaining) {
      throw new MalformedInputError(
        `Unexpected end of input: need ${length} bytes, have ${this.remaining}`,
        { offset: this.offset }
      );
    }
    const slice = this.input.subarray(this.offset, this.offset + length);
    this.offset += length;
    return slice;
  }

  private skipPadding(length: number): void {
    const pad = this.take(padding(length));
    if (pad.some((byte) => byte !== 0)) {
      throw new MalformedInputError("Non-zero padding bytes", { offset: this.offset - pad.length });
    }
  }
}

// ============================================================================
// Type Descriptors
// ============================================================================

/**
 * Encoder/decoder pair for one wire structure.
 */
export interface XdrType<T> {
  readonly name: string;
  write(value: T, writer: XdrWriter): void;
  read(reader: XdrReader): T;
}

export type XdrFormat = "raw" | "hex" | "base64";

export interface CodecOptions {
  limits?: Partial<CodecLimits>;
}

/**
 * Encode a value as XDR.
 *
 * @example
 * ```typescript
 * const bytes = toXDR(ContractAuthXdr, auth);
 * const b64 = toXDR(ContractAuthXdr, auth, "base64");
 * ```
 */
export function toXDR<T>(type: XdrType<T>, value: T, format?: "raw", options?: CodecOptions): Buffer;
export function toXDR<T>(type: XdrType<T>, value: T, format: "hex" | "base64", options?: CodecOptions): string;
export function toXDR<T>(
  type: XdrType<T>,
  value: T,
  format: XdrFormat = "raw",
  options?: CodecOptions
): Buffer | string {
  const writer = new XdrWriter(options?.limits);
  type.write(value, writer);
  const bytes = writer.toBuffer();
  return format === "raw" ? bytes : bytes.toString(format);
}

/**
 * Decode XDR into a value of the expected shape. The whole input must be
 * consumed.
 */
export function fromXDR<T>(
  type: XdrType<T>,
  input: Buffer | string,
  format: XdrFormat = "raw",
  options?: CodecOptions
): T {
  let bytes: Buffer;
  if (typeof input === "string") {
    if (format === "raw") {
      throw new MalformedInputError(`String input to ${type.name} requires hex or base64 format`);
    }
    bytes = Buffer.from(input, format);
  } else {
    bytes = input;
  }
  const reader = new XdrReader(bytes, options?.limits);
  const value = type.read(reader);
  reader.ensureInputConsumed();
  return value;
}

/**
 * Compare two values by their encoded bytes.
 */
export function xdrEquals<T>(type: XdrType<T>, a: T, b: T): boolean {
  return toXDR(type, a).equals(toXDR(type, b));
}
