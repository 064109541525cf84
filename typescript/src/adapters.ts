/**
 * Accumulator sinks that turn one-event-at-a-time delivery into a finished
 * sequence, mapping or record.
 */

import { Binding, buildValue } from "./builder";
import type { SerdeContext } from "./context";
import { UnknownFieldError } from "./errors";
import { nameStrategy, type Strategy } from "./strategies";
import type {
  ArrayReader,
  FieldSink,
  FragmentReader,
  ObjectReader,
  Sink,
  ValueReader,
} from "./types";

/**
 * Collects the elements of an array. Every event is routed to a fresh
 * binding of the element type, so nested arrays and records compose.
 */
export class ArraySink<T> implements Sink {
  readonly values: T[] = [];

  constructor(
    private readonly element: Strategy<T>,
    private readonly ctx: SerdeContext
  ) {}

  append(value: T): void {
    this.values.push(value);
  }

  handleNull(): void {
    this.next((binding) => binding.handleNull());
  }

  handleBoolean(value: boolean): void {
    this.next((binding) => binding.handleBoolean(value));
  }

  handleNumeric(text: string): void {
    this.next((binding) => binding.handleNumeric(text));
  }

  handleString(text: string): void {
    this.next((binding) => binding.handleString(text));
  }

  handleStringFragments(reader: FragmentReader): void {
    this.next((binding) => binding.handleStringFragments(reader));
  }

  handleArray(reader: ArrayReader): void {
    this.next((binding) => binding.handleArray(reader));
  }

  handleObject(reader: ObjectReader): void {
    this.next((binding) => binding.handleObject(reader));
  }

  private next(deliver: (binding: Binding<T>) => void): void {
    this.ctx.within(this.values.length, () => {
      deliver(new Binding(this.element, this.ctx, (value) => this.append(value)));
    });
  }
}

/**
 * Builds the name/value pairs of an object into a Map. Keys go through
 * their own strategy; a repeated key overwrites the earlier value.
 */
export class MapFieldSink<K, V> implements FieldSink {
  readonly map = new Map<K, V>();

  constructor(
    private readonly key: Strategy<K>,
    private readonly value: Strategy<V>,
    private readonly ctx: SerdeContext
  ) {}

  handleField(nameReader: ValueReader, valueReader: ValueReader): void {
    const key = buildValue(this.key, nameReader, this.ctx);
    const value = this.ctx.within(String(key), () => buildValue(this.value, valueReader, this.ctx));
    this.map.set(key, value);
  }
}

/**
 * Builds the name/value pairs of an object into a plain object.
 */
export class DictFieldSink<V> implements FieldSink {
  readonly dict: Record<string, V> = {};

  constructor(
    private readonly value: Strategy<V>,
    private readonly ctx: SerdeContext
  ) {}

  handleField(nameReader: ValueReader, valueReader: ValueReader): void {
    const key = buildValue(nameStrategy, nameReader, this.ctx);
    const value = this.ctx.within(key, () => buildValue(this.value, valueReader, this.ctx));
    // defineProperty keeps "__proto__" an own key
    Object.defineProperty(this.dict, key, {
      value,
      writable: true,
      enumerable: true,
      configurable: true,
    });
  }
}

/**
 * Walk and build handling of one declared record field.
 */
export interface CompiledField<T> {
  readonly name: string;
  walk(record: T, sink: FieldSink, ctx: SerdeContext): void;
  read(record: T, reader: ValueReader, ctx: SerdeContext): void;
}

/**
 * Binds a field key to the strategy of its declared type.
 */
export function compileField<T, K extends keyof T & string>(
  key: K,
  strategy: Strategy<T[K]>
): CompiledField<T> {
  return {
    name: key,
    walk(record, sink, ctx) {
      sink.handleField(
        (nameSink) => nameSink.handleString(key),
        (valueSink) => ctx.within(key, () => strategy.walk(record[key], valueSink, ctx))
      );
    },
    read(record, reader, ctx) {
      record[key] = ctx.within(key, () => buildValue(strategy, reader, ctx));
    },
  };
}

/**
 * Builds the fields of a record into an instance from the record's factory.
 * Fields missing from the input keep their defaults; a field the record does
 * not declare aborts the build.
 */
export class RecordFieldSink<T> implements FieldSink {
  constructor(
    private readonly typeName: string,
    private readonly fields: readonly CompiledField<T>[],
    readonly record: T,
    private readonly ctx: SerdeContext
  ) {}

  handleField(nameReader: ValueReader, valueReader: ValueReader): void {
    const name = buildValue(nameStrategy, nameReader, this.ctx);
    const field = this.fields.find((candidate) => candidate.name === name);
    if (!field) {
      throw new UnknownFieldError(this.typeName, name, this.ctx.path());
    }
    field.read(this.record, valueReader, this.ctx);
  }
}
