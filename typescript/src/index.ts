/**
 * structwalk - format-agnostic serialization core for TypeScript
 *
 * Walks typed values into structural events and builds typed values back
 * from them. Format backends implement the Sink and Source interfaces.
 *
 * @example
 * ```typescript
 * import { t, toEvents, fromEvents } from 'structwalk';
 *
 * class Person {
 *   name = "";
 *   age = 0;
 * }
 *
 * const PersonType = t.class(Person, { name: t.string, age: t.int32 });
 *
 * const event = toEvents(PersonType, Object.assign(new Person(), { name: "Ann", age: 30 }));
 * const person = fromEvents(PersonType, event); // Person { name: "Ann", age: 30 }
 * ```
 */

// Event protocol
export { formatPath } from "./types";
export type {
  EventKind,
  Sink,
  FieldSink,
  FragmentSink,
  Source,
  ValueReader,
  ArrayReader,
  ObjectReader,
  FragmentReader,
  PathSegment,
} from "./types";

// Errors
export {
  StructwalkError,
  PathError,
  SerializeError,
  DeserializeError,
  InvalidValueError,
  TypeMismatchError,
  ConversionError,
  UnknownFieldError,
  MissingValueError,
  ValueAlreadyResolvedError,
  UnsupportedTypeError,
  TypeNotRegisteredError,
  ConfigurationError,
} from "./errors";

// Type descriptors
export {
  t,
  Type,
  NullableType,
  BooleanType,
  IntegerType,
  BigIntegerType,
  FloatType,
  StringType,
  ArrayType,
  MapType,
  DictType,
  RecordType,
  RefType,
} from "./schema";
export type { Infer, TypeKind, TypeVisitor, DataKeys, FieldTypes } from "./schema";

// Numeric text
export {
  MinInt64,
  MaxInt64,
  MaxUint64,
  formatInteger,
  formatFloat,
  parseInteger,
  parseBigInteger,
  parseFloating,
} from "./numeric";

// Compilation
export { Dispatcher } from "./dispatcher";
export { BaseStrategy } from "./strategies";
export type { Strategy } from "./strategies";
export { SerdeContext } from "./context";

// Walker and builder
export { walkValue } from "./walker";
export { Binding, FragmentBuffer, buildValue } from "./builder";
export type { BindingState } from "./builder";
export { ArraySink, MapFieldSink, DictFieldSink, RecordFieldSink } from "./adapters";

// Event trees
export { EventRecorder, EventSource, replay, isEvent, parseEvent } from "./events";
export type { Event, EventField } from "./events";

// Registry
export { Registry, defaultRegistry, register } from "./registry";

// Configuration and logging
export { resolveOptions, loadOptionsFromEnv } from "./config";
export type { SerdeOptions, ResolvedOptions } from "./config";
export { createLogger, logLevels } from "./logger";
export type { Logger, LogLevelName } from "./logger";

// Headers
export { HeaderMap, normalizeHeaderName } from "./headers";
export type { HeaderMapInit } from "./headers";

export { Serde, serialize, deserialize, toEvents, fromEvents, clone } from "./serde";

/**
 * Library version.
 */
export const VERSION = "0.1.0";
