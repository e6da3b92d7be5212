// Precondition checks for the checked transforms
//
// Each check returns the error to report, or undefined when the input is
// acceptable, so callers can either throw or wrap it in a result.

import { AnfError, AnfErrorType } from './errors.js';
import { UnsignedType } from './unsigned.js';

/**
 * Number of variables for a table of `length` entries, or undefined if
 * `length` is not an exact power of two.
 */
export function numVariablesOf(length: number): number | undefined {
  if (!Number.isSafeInteger(length) || length < 1) {
    return undefined;
  }

  let n = 0;
  let size = 1;
  while (size < length) {
    size *= 2;
    n++;
  }
  return size === length ? n : undefined;
}

export function checkVariableCount(numVariables: number): AnfError | undefined {
  if (!Number.isSafeInteger(numVariables) || numVariables < 0) {
    return new AnfError(
      AnfErrorType.INVALID_VARIABLE_COUNT,
      `Number of variables must be a non-negative integer, got ${numVariables}`
    );
  }
  return undefined;
}

export function checkCapacity<T>(type: UnsignedType<T>, numVariables: number): AnfError | undefined {
  // 2^n computed in floating point: exact for every n that could ever fit
  if (type.bits < 2 ** numVariables) {
    return new AnfError(
      AnfErrorType.INSUFFICIENT_CAPACITY,
      `Type ${type.name} holds ${type.bits} bits, but ${numVariables} variables need 2^${numVariables} bits`
    );
  }
  return undefined;
}

export function checkDomain<T>(value: T, numVariables: number, type: UnsignedType<T>): AnfError | undefined {
  if (!type.isValid(value)) {
    return new AnfError(
      AnfErrorType.OUT_OF_DOMAIN,
      `Value ${String(value)} is not a valid ${type.name}`
    );
  }

  // value < 2^(2^n) <=> no bit at or above position 2^n is set
  if (!type.isZero(type.shr(value, 2 ** numVariables))) {
    return new AnfError(
      AnfErrorType.OUT_OF_DOMAIN,
      `Value ${type.format(value)} must be less than 2^(2^${numVariables})`
    );
  }
  return undefined;
}

/**
 * Run all packed-value checks in order: variable count, capacity, domain.
 */
export function checkPacked<T>(value: T, numVariables: number, type: UnsignedType<T>): AnfError | undefined {
  return (
    checkVariableCount(numVariables) ??
    checkCapacity(type, numVariables) ??
    checkDomain(value, numVariables, type)
  );
}

export function checkTableLength(length: number): AnfError | undefined {
  if (numVariablesOf(length) === undefined) {
    return new AnfError(
      AnfErrorType.INVALID_LENGTH,
      `Truth table length must be a power of two, got ${length}`
    );
  }
  return undefined;
}
