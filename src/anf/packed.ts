// Packed ANF Transform: truth table held in the bits of an unsigned integer
//
// Bit i of the input is the function's output on assignment i. After n
// butterfly passes bit i holds the XOR of all outputs on assignments that
// are subsets of i, which is the ANF coefficient of monomial i.

import { TransformResult } from './errors.js';
import { TransformOptions, resolveOptions, logPass } from './options.js';
import { UnsignedType } from './unsigned.js';
import { checkPacked } from './validate.js';

/**
 * Transform a packed truth table into its ANF coefficient table.
 * Throws AnfError if the value, width or variable count is invalid.
 */
export function transformPacked<T>(
  value: T,
  numVariables: number,
  type: UnsignedType<T>,
  options: Partial<TransformOptions> = {}
): T {
  const error = checkPacked(value, numVariables, type);
  if (error) {
    throw error;
  }
  return butterfly(value, numVariables, type, resolveOptions(options));
}

/**
 * Same as transformPacked, but reports failure in the result instead of throwing.
 */
export function tryTransformPacked<T>(
  value: T,
  numVariables: number,
  type: UnsignedType<T>,
  options: Partial<TransformOptions> = {}
): TransformResult<T> {
  const error = checkPacked(value, numVariables, type);
  if (error) {
    return { ok: false, error };
  }
  return { ok: true, value: butterfly(value, numVariables, type, resolveOptions(options)) };
}

/**
 * Transform without validating anything. The result is unspecified when
 * `value` has bits at or above 2^n, or the type is narrower than 2^n bits.
 */
export function transformPackedUnchecked<T>(
  value: T,
  numVariables: number,
  type: UnsignedType<T>,
  options: Partial<TransformOptions> = {}
): T {
  return butterfly(value, numVariables, type, resolveOptions(options));
}

function butterfly<T>(value: T, numVariables: number, type: UnsignedType<T>, opts: TransformOptions): T {
  const size = 2 ** numVariables;
  let f = value;
  let blockSize = 1;

  for (let pass = 0; pass < numVariables; pass++) {
    logPass(opts, pass, numVariables, blockSize);

    for (let source = 0; source < size; source += blockSize * 2) {
      const target = source + blockSize;

      for (let i = 0; i < blockSize; i++) {
        // bit[target + i] ^= bit[source + i]
        if (!type.isZero(type.and(type.shr(f, source + i), type.one))) {
          const targetBit = type.shl(type.one, target + i);
          f = type.isZero(type.and(f, targetBit))
            ? type.or(f, targetBit)
            : type.and(f, type.not(targetBit));
        }
      }
    }

    blockSize *= 2;
  }

  return f;
}
