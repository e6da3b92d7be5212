// Array ANF Transform: truth table held as an explicit boolean array
//
// table[i] is the function's output on assignment i. The transform runs in
// place; the checked entry points validate the length before the first write.

import { TransformResult } from './errors.js';
import { TransformOptions, resolveOptions, logPass } from './options.js';
import { checkTableLength } from './validate.js';

/**
 * Transform a truth table into its ANF coefficient table, in place.
 * Throws AnfError (leaving `table` untouched) if its length is not a power of two.
 */
export function transformArray(table: boolean[], options: Partial<TransformOptions> = {}): void {
  const error = checkTableLength(table.length);
  if (error) {
    throw error;
  }
  butterfly(table, resolveOptions(options));
}

/**
 * Same as transformArray, but reports failure in the result instead of throwing.
 * On success the result holds the same (now transformed) array.
 */
export function tryTransformArray(
  table: boolean[],
  options: Partial<TransformOptions> = {}
): TransformResult<boolean[]> {
  const error = checkTableLength(table.length);
  if (error) {
    return { ok: false, error };
  }
  butterfly(table, resolveOptions(options));
  return { ok: true, value: table };
}

/**
 * Transform in place without validating the length. For a length that is
 * not a power of two the contents afterwards are unspecified.
 */
export function transformArrayUnchecked(table: boolean[], options: Partial<TransformOptions> = {}): void {
  butterfly(table, resolveOptions(options));
}

/**
 * Count trailing zero bits of a non-zero length (0 for length 0).
 */
function trailingZeros(length: number): number {
  if (length === 0) return 0;
  let n = 0;
  while (length % 2 === 0) {
    length /= 2;
    n++;
  }
  return n;
}

function butterfly(table: boolean[], opts: TransformOptions): void {
  const numVariables = trailingZeros(table.length);
  const size = 2 ** numVariables;
  let blockSize = 1;

  for (let pass = 0; pass < numVariables; pass++) {
    logPass(opts, pass, numVariables, blockSize);

    for (let source = 0; source < size; source += blockSize * 2) {
      const target = source + blockSize;

      for (let i = 0; i < blockSize; i++) {
        table[target + i] = table[target + i] !== table[source + i];
      }
    }

    blockSize *= 2;
  }
}
