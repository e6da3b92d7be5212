import { describe, it, expect } from 'vitest';
import {
  transformPacked,
  transformArray,
  packedToTable,
  tableToPacked,
  formatTable,
  parseTable,
  numVariablesOf,
  AnfError,
  AnfErrorType,
  U8,
  U16,
  U64,
} from '../src/index.js';

describe('Truth table encoding', () => {
  describe('packedToTable', () => {
    it('should decode bits with index 0 first', () => {
      expect(packedToTable(2, 2, U8)).toEqual([false, true, false, false]);
      expect(packedToTable(30, 3, U8)).toEqual([false, true, true, true, true, false, false, false]);
    });

    it('should decode bigint values', () => {
      expect(packedToTable(0b1001n, 2, U64)).toEqual([true, false, false, true]);
    });

    it('should reject a value out of domain', () => {
      expect(() => packedToTable(16, 2, U8)).toThrowError(AnfError);
    });
  });

  describe('tableToPacked', () => {
    it('should encode bits with index 0 first', () => {
      expect(tableToPacked([false, true, false, false], U8)).toBe(2);
      expect(tableToPacked([true, false, false, true], U64)).toBe(9n);
    });

    it('should invert packedToTable', () => {
      for (let rule = 0; rule < 256; rule++) {
        expect(tableToPacked(packedToTable(rule, 3, U8), U8)).toBe(rule);
      }
    });

    it('should reject a length that is not a power of two', () => {
      try {
        tableToPacked([true, false, true], U8);
        expect.unreachable();
      } catch (e) {
        expect(e instanceof AnfError ? e.type : undefined).toBe(AnfErrorType.INVALID_LENGTH);
      }
    });

    it('should reject a table wider than the type', () => {
      try {
        tableToPacked(new Array<boolean>(16).fill(true), U8);
        expect.unreachable();
      } catch (e) {
        expect(e instanceof AnfError ? e.type : undefined).toBe(AnfErrorType.INSUFFICIENT_CAPACITY);
      }
    });
  });

  describe('formatTable and parseTable', () => {
    it('should render and parse 0/1 strings', () => {
      expect(formatTable([false, true, true, false])).toBe('0110');
      expect(parseTable('0110')).toEqual([false, true, true, false]);
    });

    it('should refuse other characters', () => {
      expect(parseTable('01a0')).toBeNull();
      expect(parseTable('0 1')).toBeNull();
    });
  });

  describe('numVariablesOf', () => {
    it('should return log2 of a power of two', () => {
      expect(numVariablesOf(1)).toBe(0);
      expect(numVariablesOf(2)).toBe(1);
      expect(numVariablesOf(8)).toBe(3);
      expect(numVariablesOf(65536)).toBe(16);
    });

    it('should return undefined for other lengths', () => {
      expect(numVariablesOf(0)).toBeUndefined();
      expect(numVariablesOf(7)).toBeUndefined();
      expect(numVariablesOf(12)).toBeUndefined();
      expect(numVariablesOf(-4)).toBeUndefined();
    });
  });

  describe('representation equivalence', () => {
    it('should agree on every 3-variable rule', () => {
      for (let rule = 0; rule < 256; rule++) {
        const table = packedToTable(rule, 3, U8);
        transformArray(table);
        expect(table).toEqual(packedToTable(transformPacked(rule, 3, U8), 3, U8));
      }
    });

    it('should agree on a sample of 4-variable rules', () => {
      for (let rule = 1; rule < 65536; rule += 4099) {
        const table = packedToTable(rule, 4, U16);
        transformArray(table);
        expect(tableToPacked(table, U16)).toBe(transformPacked(rule, 4, U16));
      }
    });

    it('should agree between number and bigint carriers', () => {
      for (let rule = 0; rule < 256; rule += 7) {
        expect(BigInt(transformPacked(rule, 3, U8))).toBe(transformPacked(BigInt(rule), 3, U64));
      }
    });
  });
});
