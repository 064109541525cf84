/**
 * Structural event kinds exchanged between a value and a format backend.
 *
 * Fragmented strings are reported as "string": they build exactly like a
 * single string event.
 */
export type EventKind = "null" | "boolean" | "numeric" | "string" | "array" | "object";

/**
 * Receives the structural events describing one value.
 *
 * The walker drives a sink when serializing; a source drives the builder's
 * sinks when deserializing. Exactly one handler fires per value.
 */
export interface Sink {
  handleNull(): void;
  handleBoolean(value: boolean): void;
  /** Receives a locale-free decimal representation. */
  handleNumeric(text: string): void;
  handleString(text: string): void;
  /** Receives a string delivered in chunks, concatenated in order. */
  handleStringFragments(reader: FragmentReader): void;
  /** The reader pushes each element into the sink it is given. */
  handleArray(reader: ArrayReader): void;
  /** The reader pushes each name/value pair into the field sink it is given. */
  handleObject(reader: ObjectReader): void;
}

/**
 * Receives one name/value pair of an object.
 *
 * Each reader produces exactly one value into the sink it is called with.
 */
export interface FieldSink {
  handleField(nameReader: ValueReader, valueReader: ValueReader): void;
}

/**
 * Receives the chunks of a fragmented string.
 */
export interface FragmentSink {
  handleStringFragment(chunk: string): void;
}

/** Produces a single value into a sink. */
export type ValueReader = (sink: Sink) => void;

/** Produces every element of an array into a sink, one value per element. */
export type ArrayReader = (sink: Sink) => void;

/** Produces every name/value pair of an object. */
export type ObjectReader = (sink: FieldSink) => void;

/** Produces the chunks of a string. */
export type FragmentReader = (sink: FragmentSink) => void;

/**
 * Format reader: parses its input and fires exactly one handler on the
 * target sink it is given.
 */
export interface Source {
  read(sink: Sink): void;
}

/**
 * One step of the location of a node: a field name, mapping key or array
 * index.
 */
export type PathSegment = string | number;

/**
 * Renders a path the way errors report it: `$`, `.name`, `[0]`, `["a b"]`.
 */
export function formatPath(segments: readonly PathSegment[]): string {
  let out = "$";
  for (const segment of segments) {
    if (typeof segment === "number") {
      out += `[${segment}]`;
    } else if (/^[A-Za-z_$][\w$]*$/.test(segment)) {
      out += `.${segment}`;
    } else {
      out += `[${JSON.stringify(segment)}]`;
    }
  }
  return out;
}
