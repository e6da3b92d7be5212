/**
 * ANF transform errors
 *
 * Every error is a precondition violation reported before the transform
 * reads or writes anything.
 */

export enum AnfErrorType {
  /** Packed value has bits set at or beyond position 2^n, or is not a value of its type */
  OUT_OF_DOMAIN = 'OUT_OF_DOMAIN',
  /** Integer type is narrower than 2^n bits */
  INSUFFICIENT_CAPACITY = 'INSUFFICIENT_CAPACITY',
  /** Table length is not an exact power of two */
  INVALID_LENGTH = 'INVALID_LENGTH',
  /** Variable count is negative or not an integer */
  INVALID_VARIABLE_COUNT = 'INVALID_VARIABLE_COUNT',
}

export class AnfError extends Error {
  constructor(
    public readonly type: AnfErrorType,
    message: string
  ) {
    super(message);
    this.name = 'AnfError';
  }
}

export type TransformResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: AnfError };
