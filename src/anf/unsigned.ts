// Unsigned integer types: fixed-width bit arithmetic for packed truth tables
//
// Widths up to 32 bits are carried in a JS number, wider ones in a bigint.
// Every operation truncates its result to the type's width.

export interface UnsignedType<T> {
  readonly name: string;
  readonly bits: number;
  readonly zero: T;
  readonly one: T;

  /** Shift left by `count` bits; zero once `count >= bits`. */
  shl(value: T, count: number): T;

  /** Shift right by `count` bits; zero once `count >= bits`. */
  shr(value: T, count: number): T;

  and(a: T, b: T): T;
  or(a: T, b: T): T;
  not(value: T): T;
  isZero(value: T): boolean;

  /** True if `value` is an integer in [0, 2^bits). */
  isValid(value: T): boolean;

  format(value: T): string;
}

/**
 * Create an unsigned type of 1 to 32 bits backed by a JS number.
 */
export function unsignedNumber(bits: number): UnsignedType<number> {
  if (!Number.isInteger(bits) || bits < 1 || bits > 32) {
    throw new RangeError(`Number-backed unsigned width must be 1..32, got ${bits}`);
  }

  // 2^bits - 1; `1 << bits` would overflow to a negative number at 31 bits
  const mask = 2 ** bits - 1;

  return {
    name: `u${bits}`,
    bits,
    zero: 0,
    one: 1,
    shl: (value, count) => (count >= bits ? 0 : ((value << count) & mask) >>> 0),
    shr: (value, count) => (count >= bits ? 0 : value >>> count),
    and: (a, b) => (a & b) >>> 0,
    or: (a, b) => (a | b) >>> 0,
    not: (value) => (~value & mask) >>> 0,
    isZero: (value) => value === 0,
    isValid: (value) => Number.isInteger(value) && value >= 0 && value <= mask,
    format: (value) => value.toString(),
  };
}

/**
 * Create an unsigned type of any width backed by a bigint.
 */
export function unsignedBigInt(bits: number): UnsignedType<bigint> {
  if (!Number.isSafeInteger(bits) || bits < 1) {
    throw new RangeError(`BigInt-backed unsigned width must be a positive integer, got ${bits}`);
  }

  const mask = (1n << BigInt(bits)) - 1n;

  return {
    name: `u${bits}`,
    bits,
    zero: 0n,
    one: 1n,
    shl: (value, count) => (count >= bits ? 0n : (value << BigInt(count)) & mask),
    shr: (value, count) => (count >= bits ? 0n : value >> BigInt(count)),
    and: (a, b) => a & b,
    or: (a, b) => a | b,
    not: (value) => ~value & mask,
    isZero: (value) => value === 0n,
    isValid: (value) => value >= 0n && value <= mask,
    format: (value) => value.toString(),
  };
}

export const U8 = unsignedNumber(8);
export const U16 = unsignedNumber(16);
export const U32 = unsignedNumber(32);
export const U64 = unsignedBigInt(64);
export const U128 = unsignedBigInt(128);
export const U256 = unsignedBigInt(256);
