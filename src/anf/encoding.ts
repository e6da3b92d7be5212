// Encoding: convert truth tables between packed and array representations

import { UnsignedType } from './unsigned.js';
import { checkCapacity, checkPacked, checkTableLength, numVariablesOf } from './validate.js';

/**
 * Decode the low 2^n bits of a packed value into a boolean array (index 0 first).
 */
export function packedToTable<T>(value: T, numVariables: number, type: UnsignedType<T>): boolean[] {
  const error = checkPacked(value, numVariables, type);
  if (error) {
    throw error;
  }

  const size = 2 ** numVariables;
  const table: boolean[] = new Array<boolean>(size);
  for (let i = 0; i < size; i++) {
    table[i] = !type.isZero(type.and(type.shr(value, i), type.one));
  }
  return table;
}

/**
 * Encode a boolean array as a packed value of the given type.
 */
export function tableToPacked<T>(table: readonly boolean[], type: UnsignedType<T>): T {
  const lengthError = checkTableLength(table.length);
  if (lengthError) {
    throw lengthError;
  }

  const numVariables = numVariablesOf(table.length) ?? 0;
  const capacityError = checkCapacity(type, numVariables);
  if (capacityError) {
    throw capacityError;
  }

  let value = type.zero;
  for (let i = 0; i < table.length; i++) {
    if (table[i]) {
      value = type.or(value, type.shl(type.one, i));
    }
  }
  return value;
}

/**
 * Render a table as a string of 0/1 characters, index 0 first.
 */
export function formatTable(table: readonly boolean[]): string {
  return table.map(bit => (bit ? '1' : '0')).join('');
}

/**
 * Parse a string of 0/1 characters (index 0 first) into a table.
 * Returns null if the string contains any other character.
 */
export function parseTable(bits: string): boolean[] | null {
  if (!/^[01]*$/.test(bits)) {
    return null;
  }
  return [...bits].map(ch => ch === '1');
}
