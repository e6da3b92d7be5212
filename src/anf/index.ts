export { transformPacked, tryTransformPacked, transformPackedUnchecked } from './packed.js';
export { transformArray, tryTransformArray, transformArrayUnchecked } from './array.js';
export { packedToTable, tableToPacked, formatTable, parseTable } from './encoding.js';
export { numVariablesOf } from './validate.js';
export { AnfError, AnfErrorType, type TransformResult } from './errors.js';
export { DEFAULT_TRANSFORM_OPTIONS, type TransformOptions } from './options.js';
export {
  U8,
  U16,
  U32,
  U64,
  U128,
  U256,
  unsignedNumber,
  unsignedBigInt,
  type UnsignedType,
} from './unsigned.js';
