import {
  ArraySink,
  DictFieldSink,
  MapFieldSink,
  RecordFieldSink,
  type CompiledField,
} from "./adapters";
import type { SerdeContext } from "./context";
import { ConversionError, InvalidValueError, TypeMismatchError } from "./errors";
import {
  formatFloat,
  formatInteger,
  parseBigInteger,
  parseFloating,
  parseInteger,
} from "./numeric";
import type { ArrayReader, EventKind, ObjectReader, Sink } from "./types";
import { arrayReader, mapReader, recordReader } from "./walker";

/**
 * Compiled handling of one descriptor, in both directions.
 *
 * `walk` emits the events describing a value; each `from*` handler builds a
 * value from one event or throws.
 */
export interface Strategy<T> {
  readonly typeName: string;
  walk(value: T, sink: Sink, ctx: SerdeContext): void;
  fromNull(ctx: SerdeContext): T;
  fromBoolean(value: boolean, ctx: SerdeContext): T;
  fromNumeric(text: string, ctx: SerdeContext): T;
  fromString(text: string, ctx: SerdeContext): T;
  fromArray(reader: ArrayReader, ctx: SerdeContext): T;
  fromObject(reader: ObjectReader, ctx: SerdeContext): T;
}

/**
 * Strategy that rejects every event; subclasses override what they accept.
 */
export abstract class BaseStrategy<T> implements Strategy<T> {
  constructor(readonly typeName: string) {}

  abstract walk(value: T, sink: Sink, ctx: SerdeContext): void;

  fromNull(ctx: SerdeContext): T {
    throw this.mismatch("null", ctx);
  }

  fromBoolean(_value: boolean, ctx: SerdeContext): T {
    throw this.mismatch("boolean", ctx);
  }

  fromNumeric(_text: string, ctx: SerdeContext): T {
    throw this.mismatch("numeric", ctx);
  }

  fromString(_text: string, ctx: SerdeContext): T {
    throw this.mismatch("string", ctx);
  }

  fromArray(_reader: ArrayReader, ctx: SerdeContext): T {
    throw this.mismatch("array", ctx);
  }

  fromObject(_reader: ObjectReader, ctx: SerdeContext): T {
    throw this.mismatch("object", ctx);
  }

  protected mismatch(kind: EventKind, ctx: SerdeContext): TypeMismatchError {
    return new TypeMismatchError(this.typeName, kind, undefined, ctx.path());
  }
}

export class NullableStrategy<T> extends BaseStrategy<T | null> {
  constructor(
    typeName: string,
    private readonly inner: Strategy<T>
  ) {
    super(typeName);
  }

  walk(value: T | null, sink: Sink, ctx: SerdeContext): void {
    if (value === null) {
      sink.handleNull();
    } else {
      this.inner.walk(value, sink, ctx);
    }
  }

  fromNull(): null {
    return null;
  }

  fromBoolean(value: boolean, ctx: SerdeContext): T {
    return this.forward(ctx, () => this.inner.fromBoolean(value, ctx));
  }

  fromNumeric(text: string, ctx: SerdeContext): T {
    return this.forward(ctx, () => this.inner.fromNumeric(text, ctx));
  }

  fromString(text: string, ctx: SerdeContext): T {
    return this.forward(ctx, () => this.inner.fromString(text, ctx));
  }

  fromArray(reader: ArrayReader, ctx: SerdeContext): T {
    return this.forward(ctx, () => this.inner.fromArray(reader, ctx));
  }

  fromObject(reader: ObjectReader, ctx: SerdeContext): T {
    return this.forward(ctx, () => this.inner.fromObject(reader, ctx));
  }

  /**
   * Builds through the inner strategy, reporting a rejection of this very
   * node under the null-able name.
   */
  private forward(ctx: SerdeContext, build: () => T): T {
    try {
      return build();
    } catch (err) {
      if (
        !(err instanceof TypeMismatchError) ||
        err.typeName !== this.inner.typeName ||
        err.path !== ctx.path()
      ) {
        throw err;
      }
      if (err instanceof ConversionError) {
        throw new ConversionError(this.typeName, err.text, err.path);
      }
      throw new TypeMismatchError(this.typeName, err.eventKind, undefined, err.path);
    }
  }
}

export class IntegerStrategy extends BaseStrategy<number> {
  constructor(
    typeName: string,
    private readonly min: number,
    private readonly max: number
  ) {
    super(typeName);
  }

  walk(value: number, sink: Sink, ctx: SerdeContext): void {
    if (!Number.isInteger(value) || value < this.min || value > this.max) {
      throw new InvalidValueError(this.typeName, value, ctx.path());
    }
    sink.handleNumeric(formatInteger(value));
  }

  fromNumeric(text: string, ctx: SerdeContext): number {
    const value = parseInteger(text, this.min, this.max);
    if (value === undefined) {
      throw new ConversionError(this.typeName, text, ctx.path());
    }
    return value;
  }
}

export class BigIntegerStrategy extends BaseStrategy<bigint> {
  constructor(
    typeName: string,
    private readonly min: bigint,
    private readonly max: bigint
  ) {
    super(typeName);
  }

  walk(value: bigint, sink: Sink, ctx: SerdeContext): void {
    if (typeof value !== "bigint" || value < this.min || value > this.max) {
      throw new InvalidValueError(this.typeName, value, ctx.path());
    }
    sink.handleNumeric(formatInteger(value));
  }

  fromNumeric(text: string, ctx: SerdeContext): bigint {
    const value = parseBigInteger(text, this.min, this.max);
    if (value === undefined) {
      throw new ConversionError(this.typeName, text, ctx.path());
    }
    return value;
  }
}

export class FloatStrategy extends BaseStrategy<number> {
  constructor(
    typeName: string,
    private readonly precision: 32 | 64
  ) {
    super(typeName);
  }

  walk(value: number, sink: Sink, ctx: SerdeContext): void {
    if (typeof value !== "number") {
      throw new InvalidValueError(this.typeName, value, ctx.path());
    }
    const rounded = this.precision === 32 ? Math.fround(value) : value;
    if (Number.isFinite(value) && !Number.isFinite(rounded)) {
      throw new InvalidValueError(this.typeName, value, ctx.path());
    }
    sink.handleNumeric(formatFloat(rounded, this.precision));
  }

  fromNumeric(text: string, ctx: SerdeContext): number {
    const value = parseFloating(text, this.precision);
    if (value === undefined) {
      throw new ConversionError(this.typeName, text, ctx.path());
    }
    return value;
  }
}

export class StringStrategy extends BaseStrategy<string> {
  walk(value: string, sink: Sink, ctx: SerdeContext): void {
    if (typeof value !== "string") {
      throw new InvalidValueError(this.typeName, value, ctx.path());
    }
    sink.handleString(value);
  }

  fromString(text: string): string {
    return text;
  }

  /** Numeric text converts to text unchanged. */
  fromNumeric(text: string): string {
    return text;
  }
}

/** Builds record field names and dict keys. */
export const nameStrategy = new StringStrategy("string");

export class BooleanStrategy extends BaseStrategy<boolean> {
  walk(value: boolean, sink: Sink, ctx: SerdeContext): void {
    if (typeof value !== "boolean") {
      throw new InvalidValueError(this.typeName, value, ctx.path());
    }
    sink.handleBoolean(value);
  }

  fromBoolean(value: boolean): boolean {
    return value;
  }
}

export class ArrayStrategy<E> extends BaseStrategy<E[]> {
  constructor(
    typeName: string,
    private readonly element: Strategy<E>
  ) {
    super(typeName);
  }

  walk(value: E[], sink: Sink, ctx: SerdeContext): void {
    if (!Array.isArray(value)) {
      throw new InvalidValueError(this.typeName, value, ctx.path());
    }
    sink.handleArray(arrayReader(value, this.element, ctx));
  }

  fromArray(reader: ArrayReader, ctx: SerdeContext): E[] {
    const sink = new ArraySink(this.element, ctx);
    reader(sink);
    return sink.values;
  }
}

export class MapStrategy<K, V> extends BaseStrategy<Map<K, V>> {
  constructor(
    typeName: string,
    private readonly key: Strategy<K>,
    private readonly value: Strategy<V>
  ) {
    super(typeName);
  }

  walk(value: Map<K, V>, sink: Sink, ctx: SerdeContext): void {
    if (!(value instanceof Map)) {
      throw new InvalidValueError(this.typeName, value, ctx.path());
    }
    sink.handleObject(mapReader(value, this.key, this.value, ctx));
  }

  fromObject(reader: ObjectReader, ctx: SerdeContext): Map<K, V> {
    const sink = new MapFieldSink(this.key, this.value, ctx);
    reader(sink);
    return sink.map;
  }
}

export class DictStrategy<V> extends BaseStrategy<Record<string, V>> {
  constructor(
    typeName: string,
    private readonly value: Strategy<V>
  ) {
    super(typeName);
  }

  walk(value: Record<string, V>, sink: Sink, ctx: SerdeContext): void {
    if (
      typeof value !== "object" ||
      value === null ||
      Array.isArray(value) ||
      value instanceof Map
    ) {
      throw new InvalidValueError(this.typeName, value, ctx.path());
    }
    sink.handleObject(mapReader(Object.entries(value), nameStrategy, this.value, ctx));
  }

  fromObject(reader: ObjectReader, ctx: SerdeContext): Record<string, V> {
    const sink = new DictFieldSink(this.value, ctx);
    reader(sink);
    return sink.dict;
  }
}

export class RecordStrategy<T extends object> extends BaseStrategy<T> {
  constructor(
    typeName: string,
    private readonly create: () => T,
    private readonly fields: readonly CompiledField<T>[]
  ) {
    super(typeName);
  }

  walk(value: T, sink: Sink, ctx: SerdeContext): void {
    if (typeof value !== "object" || value === null) {
      throw new InvalidValueError(this.typeName, value, ctx.path());
    }
    sink.handleObject(recordReader(value, this.fields, ctx));
  }

  fromObject(reader: ObjectReader, ctx: SerdeContext): T {
    const sink = new RecordFieldSink(this.typeName, this.fields, this.create(), ctx);
    reader(sink);
    return sink.record;
  }
}

/**
 * Forwards to the strategy of a registered type, looked up on first use so
 * recursive types can refer to themselves.
 */
export class RefStrategy<T> implements Strategy<T> {
  private target?: Strategy<T>;

  constructor(
    readonly typeName: string,
    private readonly resolve: () => Strategy<T>
  ) {}

  private get strategy(): Strategy<T> {
    this.target ??= this.resolve();
    return this.target;
  }

  walk(value: T, sink: Sink, ctx: SerdeContext): void {
    this.strategy.walk(value, sink, ctx);
  }

  fromNull(ctx: SerdeContext): T {
    return this.strategy.fromNull(ctx);
  }

  fromBoolean(value: boolean, ctx: SerdeContext): T {
    return this.strategy.fromBoolean(value, ctx);
  }

  fromNumeric(text: string, ctx: SerdeContext): T {
    return this.strategy.fromNumeric(text, ctx);
  }

  fromString(text: string, ctx: SerdeContext): T {
    return this.strategy.fromString(text, ctx);
  }

  fromArray(reader: ArrayReader, ctx: SerdeContext): T {
    return this.strategy.fromArray(reader, ctx);
  }

  fromObject(reader: ObjectReader, ctx: SerdeContext): T {
    return this.strategy.fromObject(reader, ctx);
  }
}
