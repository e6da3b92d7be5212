import { describe, it, expect } from 'vitest';
import { U8, U32, U64, U256, unsignedNumber, unsignedBigInt, transformPacked } from '../src/index.js';

describe('Unsigned types', () => {
  describe('number-backed', () => {
    it('should truncate shifts to the width', () => {
      expect(U8.shl(0xff, 4)).toBe(0xf0);
      expect(U8.shl(1, 8)).toBe(0);
      expect(U32.shl(1, 31)).toBe(0x80000000);
      expect(U32.shl(1, 32)).toBe(0);
    });

    it('should shift right without sign extension', () => {
      expect(U32.shr(0x80000000, 31)).toBe(1);
      expect(U32.shr(0xffffffff, 32)).toBe(0);
    });

    it('should keep bitwise results unsigned', () => {
      expect(U32.not(0)).toBe(0xffffffff);
      expect(U32.and(0xffffffff, 0x80000000)).toBe(0x80000000);
      expect(U32.or(0x80000000, 1)).toBe(0x80000001);
      expect(U8.not(0x0f)).toBe(0xf0);
    });

    it('should validate the range', () => {
      expect(U8.isValid(255)).toBe(true);
      expect(U8.isValid(256)).toBe(false);
      expect(U8.isValid(-1)).toBe(false);
      expect(U32.isValid(0xffffffff)).toBe(true);
      expect(U32.isValid(2 ** 32)).toBe(false);
    });

    it('should support a 31-bit width', () => {
      const u31 = unsignedNumber(31);
      expect(u31.isValid(2 ** 31 - 1)).toBe(true);
      expect(u31.isValid(2 ** 31)).toBe(false);
      expect(u31.shl(1, 30)).toBe(0x40000000);
      expect(u31.shl(1, 31)).toBe(0);
      expect(u31.not(0)).toBe(0x7fffffff);
      expect(transformPacked(3, 2, u31)).toBe(5);
      expect(transformPacked(1, 4, u31)).toBe(0xffff);
    });

    it('should reject widths outside 1..32', () => {
      expect(() => unsignedNumber(0)).toThrowError(RangeError);
      expect(() => unsignedNumber(33)).toThrowError(RangeError);
      expect(unsignedNumber(4).name).toBe('u4');
    });
  });

  describe('bigint-backed', () => {
    it('should truncate shifts to the width', () => {
      expect(U64.shl(1n, 63)).toBe(0x8000000000000000n);
      expect(U64.shl(1n, 64)).toBe(0n);
      expect(U64.shl(0xffn, 60)).toBe(0xf000000000000000n);
    });

    it('should complement within the width', () => {
      expect(U64.not(0n)).toBe(0xffffffffffffffffn);
      expect(U256.not(U256.not(12345n))).toBe(12345n);
    });

    it('should validate the range', () => {
      expect(U64.isValid(0xffffffffffffffffn)).toBe(true);
      expect(U64.isValid(1n << 64n)).toBe(false);
      expect(U64.isValid(-1n)).toBe(false);
    });

    it('should support arbitrary widths', () => {
      const u1024 = unsignedBigInt(1024);
      expect(u1024.bits).toBe(1024);
      expect(u1024.shr(u1024.shl(1n, 1023), 1023)).toBe(1n);
      expect(() => unsignedBigInt(0)).toThrowError(RangeError);
    });
  });
});
