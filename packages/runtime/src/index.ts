// @idlgen/runtime entry point
//
// Imported by every generated test-data module and by the core interpreter.
// Keep exports stable: generated code in consumer repositories refers to
// these names directly.

export {
  DEFAULT_CONTEXT,
  REQUIRED_DEPTH_ALLOWANCE,
  RecursionLimitError,
  assertWithinDepth,
  atDepthLimit,
  createContext,
  descend,
  type StringStyle,
  type TestDataContext,
} from './context.js';

export {
  binary,
  bool,
  byte,
  double,
  i16,
  i32,
  i64,
  listOf,
  mapOf,
  member,
  optional,
  point,
  setOf,
  string,
} from './arbitraries.js';

export {
  defaultList,
  defaultMap,
  defaultSet,
  identity,
  isAbsent,
  mapPresent,
  orDefault,
  type Maybe,
} from './defaults.js';
