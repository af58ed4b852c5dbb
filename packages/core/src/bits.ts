/**
 * Fixed-width unsigned bit vectors.
 *
 * The width is carried both at runtime (`width`) and, where the caller
 * uses a literal, in the type parameter: `BitVector<8>` does not accept a
 * `BitVector<4>` argument.  Widths that have been widened to `number` are
 * still checked at runtime and fail with `WidthMismatchError`.
 */

import type { BitSymbol } from "./types.js";
import { WidthMismatchError } from "./types.js";

function assertWidth(width: number): void {
  if (!Number.isInteger(width) || width < 1) {
    throw new RangeError(`Bit width must be a positive integer, got ${width}`);
  }
}

function toBigInt(value: number | bigint): bigint {
  if (typeof value === "bigint") return value;
  if (!Number.isInteger(value)) {
    throw new RangeError(`Bit vector magnitude must be an integer, got ${value}`);
  }
  return BigInt(value);
}

function maskFor(width: number): bigint {
  return (1n << BigInt(width)) - 1n;
}

export class BitVector<W extends number = number> {
  readonly width: W;
  private readonly _value: bigint;

  private constructor(width: W, value: bigint) {
    this.width = width;
    this._value = value;
    Object.freeze(this);
  }

  /**
   * Build a vector from an unsigned magnitude.
   *
   * @throws RangeError when `width` is not a positive integer or `value`
   *         is outside `[0, 2^width)`.
   */
  static from<W extends number>(width: W, value: number | bigint): BitVector<W> {
    assertWidth(width);
    const v = toBigInt(value);
    if (v < 0n || v > maskFor(width)) {
      throw new RangeError(
        `Value ${v} does not fit in ${width} bits (max ${maskFor(width)})`,
      );
    }
    return new BitVector(width, v);
  }

  /** The all-zero vector of the given width. */
  static reset<W extends number>(width: W): BitVector<W> {
    return BitVector.from(width, 0n);
  }

  /** The unsigned magnitude. */
  get value(): bigint {
    return this._value;
  }

  toBigInt(): bigint {
    return this._value;
  }

  toNumber(): number {
    if (this._value > BigInt(Number.MAX_SAFE_INTEGER)) {
      throw new RangeError(`${this.toString()} exceeds Number.MAX_SAFE_INTEGER`);
    }
    return Number(this._value);
  }

  /** Bit symbols, most significant first. */
  bits(): BitSymbol[] {
    const out: BitSymbol[] = [];
    for (let i = this.width - 1; i >= 0; i--) {
      out.push(this.bit(i) ? 1 : 0);
    }
    return out;
  }

  /** Bit `i`, counting from the least significant bit. */
  bit(i: number): boolean {
    if (!Number.isInteger(i) || i < 0 || i >= this.width) {
      throw new RangeError(`Bit index ${i} out of range for width ${this.width}`);
    }
    return ((this._value >> BigInt(i)) & 1n) === 1n;
  }

  msb(): boolean {
    return this.bit(this.width - 1);
  }

  any(): boolean {
    return this._value !== 0n;
  }

  all(): boolean {
    return this._value === maskFor(this.width);
  }

  // -----------------------------------------------------------------------
  // Equal-width combinators
  // -----------------------------------------------------------------------

  and(other: BitVector<W>): BitVector<W> {
    this.sameWidth("and", other);
    return new BitVector(this.width, this._value & other._value);
  }

  or(other: BitVector<W>): BitVector<W> {
    this.sameWidth("or", other);
    return new BitVector(this.width, this._value | other._value);
  }

  xor(other: BitVector<W>): BitVector<W> {
    this.sameWidth("xor", other);
    return new BitVector(this.width, this._value ^ other._value);
  }

  /** Wrapping addition, modulo 2^W. */
  add(other: BitVector<W>): BitVector<W> {
    this.sameWidth("add", other);
    return new BitVector(this.width, (this._value + other._value) & maskFor(this.width));
  }

  /** Wrapping subtraction, modulo 2^W. */
  sub(other: BitVector<W>): BitVector<W> {
    this.sameWidth("sub", other);
    return new BitVector(this.width, (this._value - other._value) & maskFor(this.width));
  }

  equals(other: BitVector<W>): boolean {
    this.sameWidth("equals", other);
    return this._value === other._value;
  }

  lt(other: BitVector<W>): boolean {
    this.sameWidth("lt", other);
    return this._value < other._value;
  }

  gt(other: BitVector<W>): boolean {
    this.sameWidth("gt", other);
    return this._value > other._value;
  }

  not(): BitVector<W> {
    return new BitVector(this.width, ~this._value & maskFor(this.width));
  }

  // -----------------------------------------------------------------------
  // Shifts (an amount >= width gives zero)
  // -----------------------------------------------------------------------

  shl(amount: number | BitVector): BitVector<W> {
    const n = shiftAmount(amount);
    if (n >= BigInt(this.width)) return BitVector.reset(this.width);
    return new BitVector(this.width, (this._value << n) & maskFor(this.width));
  }

  shr(amount: number | BitVector): BitVector<W> {
    const n = shiftAmount(amount);
    if (n >= BigInt(this.width)) return BitVector.reset(this.width);
    return new BitVector(this.width, this._value >> n);
  }

  toString(): string {
    return `${this._value}_b${this.width}`;
  }

  private sameWidth(operation: string, other: BitVector): void {
    if (other.width !== this.width) {
      throw new WidthMismatchError(operation, this.width, other.width);
    }
  }
}

function shiftAmount(amount: number | BitVector): bigint {
  if (amount instanceof BitVector) return amount.value;
  if (!Number.isInteger(amount) || amount < 0) {
    throw new RangeError(`Shift amount must be a non-negative integer, got ${amount}`);
  }
  return BigInt(amount);
}

/** Shorthand for `BitVector.from`. */
export function bv<W extends number>(width: W, value: number | bigint): BitVector<W> {
  return BitVector.from(width, value);
}

// ---------------------------------------------------------------------------
// Width-changing combinators; the output width is always declared
// ---------------------------------------------------------------------------

/**
 * Concatenate `hi` above `lo`.  `outWidth` must equal the sum of both
 * input widths.
 */
export function concat<A extends number, B extends number, O extends number>(
  hi: BitVector<A>,
  lo: BitVector<B>,
  outWidth: O,
): BitVector<O> {
  if (outWidth !== hi.width + lo.width) {
    throw new WidthMismatchError("concat", hi.width + lo.width, outWidth);
  }
  return BitVector.from(outWidth, (hi.value << BigInt(lo.width)) | lo.value);
}

/** Take `outWidth` bits of `v` starting at bit `lsb`. */
export function slice<W extends number, O extends number>(
  v: BitVector<W>,
  lsb: number,
  outWidth: O,
): BitVector<O> {
  if (!Number.isInteger(lsb) || lsb < 0) {
    throw new RangeError(`Slice offset must be a non-negative integer, got ${lsb}`);
  }
  if (lsb + outWidth > v.width) {
    throw new WidthMismatchError("slice", v.width, lsb + outWidth);
  }
  return BitVector.from(outWidth, (v.value >> BigInt(lsb)) & maskFor(outWidth));
}

/** Widen `v` to `outWidth` bits, filling with zeros. */
export function zeroExtend<W extends number, O extends number>(
  v: BitVector<W>,
  outWidth: O,
): BitVector<O> {
  if (outWidth < v.width) {
    throw new WidthMismatchError("zeroExtend", v.width, outWidth);
  }
  return BitVector.from(outWidth, v.value);
}

// ---------------------------------------------------------------------------
// Fixed-width aliases
// ---------------------------------------------------------------------------

export type B1 = BitVector<1>;
export type B4 = BitVector<4>;
export type B8 = BitVector<8>;
export type B16 = BitVector<16>;
export type B32 = BitVector<32>;
export type B64 = BitVector<64>;
