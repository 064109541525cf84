import type { EventKind } from "./types";

/**
 * Base error class for structwalk errors.
 */
export class StructwalkError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "StructwalkError";
  }
}

/**
 * Error raised while a value flows through a call, tagged with the path of
 * the node being visited.
 */
export class PathError extends StructwalkError {
  /** Location of the failing node, `$` for the root. */
  readonly path: string;

  constructor(message: string, path: string = "$") {
    super(withPath(message, path));
    this.name = "PathError";
    this.path = path;
  }
}

function withPath(message: string, path: string): string {
  return path === "$" ? message : `${message} at ${path}`;
}

/**
 * Error thrown when serialization fails.
 */
export class SerializeError extends PathError {
  constructor(message: string, path?: string) {
    super(message, path);
    this.name = "SerializeError";
  }
}

/**
 * Error thrown when deserialization fails.
 */
export class DeserializeError extends PathError {
  constructor(message: string, path?: string) {
    super(message, path);
    this.name = "DeserializeError";
  }
}

/**
 * Error thrown when a value does not fit the descriptor it is walked with.
 */
export class InvalidValueError extends SerializeError {
  constructor(
    readonly typeName: string,
    value: unknown,
    path?: string
  ) {
    super(`Cannot serialize ${describe(value)} as ${typeName}`, path);
    this.name = "InvalidValueError";
  }
}

/**
 * Error thrown when the destination type cannot represent the delivered event.
 */
export class TypeMismatchError extends DeserializeError {
  constructor(
    readonly typeName: string,
    readonly eventKind: EventKind,
    detail?: string,
    path?: string
  ) {
    super(`Cannot parse ${typeName} from ${eventKind}${detail ? ` ${detail}` : ""}`, path);
    this.name = "TypeMismatchError";
  }
}

/**
 * Error thrown when numeric text cannot be converted to the destination type.
 */
export class ConversionError extends TypeMismatchError {
  constructor(
    typeName: string,
    readonly text: string,
    path?: string
  ) {
    super(typeName, "numeric", JSON.stringify(text), path);
    this.name = "ConversionError";
  }
}

/**
 * Error thrown when a record receives a field it does not declare.
 */
export class UnknownFieldError extends DeserializeError {
  constructor(
    readonly typeName: string,
    readonly field: string,
    path?: string
  ) {
    super(`Unknown field ${JSON.stringify(field)} in ${typeName}`, path);
    this.name = "UnknownFieldError";
  }
}

/**
 * Error thrown when a source finishes without delivering a value.
 */
export class MissingValueError extends DeserializeError {
  constructor(typeName: string, path?: string) {
    super(`No value was read for ${typeName}`, path);
    this.name = "MissingValueError";
  }
}

/**
 * Error thrown when a second event arrives for an already resolved destination.
 */
export class ValueAlreadyResolvedError extends DeserializeError {
  constructor(typeName: string, path?: string) {
    super(`Value of type ${typeName} was already resolved`, path);
    this.name = "ValueAlreadyResolvedError";
  }
}

/**
 * Error thrown when a descriptor has no serialization strategy.
 */
export class UnsupportedTypeError extends StructwalkError {
  constructor(readonly typeName: string) {
    super(`No serialization strategy for type ${typeName}`);
    this.name = "UnsupportedTypeError";
  }
}

/**
 * Error thrown when a referenced type is not registered.
 */
export class TypeNotRegisteredError extends UnsupportedTypeError {
  constructor(typeName: string) {
    super(typeName);
    this.message = `Type not registered: ${typeName}`;
    this.name = "TypeNotRegisteredError";
  }
}

/**
 * Error thrown when options fail validation.
 */
export class ConfigurationError extends StructwalkError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

function describe(value: unknown): string {
  if (typeof value === "string") {
    return JSON.stringify(value);
  }
  if (typeof value === "bigint") {
    return `${value}n`;
  }
  if (value === null || typeof value !== "object") {
    return String(value);
  }
  return Array.isArray(value) ? "array" : "object";
}
