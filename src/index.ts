// boolean-anf - Algebraic Normal Form of Boolean functions
// Butterfly (Moebius) transform over packed and array truth tables

// Transforms
export {
  transformPacked,
  tryTransformPacked,
  transformPackedUnchecked,
  transformArray,
  tryTransformArray,
  transformArrayUnchecked,
} from './anf/index.js';

// Truth table encoding
export {
  packedToTable,
  tableToPacked,
  formatTable,
  parseTable,
  numVariablesOf,
} from './anf/index.js';

// Errors and options
export {
  AnfError,
  AnfErrorType,
  DEFAULT_TRANSFORM_OPTIONS,
  type TransformResult,
  type TransformOptions,
} from './anf/index.js';

// Unsigned integer types
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
} from './anf/index.js';
