/**
 * Type descriptors: the run-time stand-in for a value's static type.
 *
 * A descriptor is built once with the `t` constructors and compiled once per
 * dispatcher into a strategy; values never carry type tags.
 *
 * @example
 * ```typescript
 * class Person {
 *   name = "";
 *   age = 0;
 *   nickname: string | null = null;
 * }
 *
 * const PersonType = t.class(Person, {
 *   name: t.string,
 *   age: t.int32,
 *   nickname: t.nullable(t.string),
 * });
 * ```
 */

import { MaxInt64, MaxUint64, MinInt64 } from "./numeric";
import type { Strategy } from "./strategies";

/**
 * Category a descriptor belongs to.
 */
export type TypeKind =
  | "nullable"
  | "boolean"
  | "integer"
  | "float"
  | "string"
  | "array"
  | "map"
  | "dict"
  | "record"
  | "ref";

/**
 * Selects the strategy for each category. Implemented by the dispatcher.
 */
export interface TypeVisitor {
  visitNullable<T>(type: NullableType<T>): Strategy<T | null>;
  visitInteger(type: IntegerType): Strategy<number>;
  visitBigInteger(type: BigIntegerType): Strategy<bigint>;
  visitFloat(type: FloatType): Strategy<number>;
  visitRecord<T extends object>(type: RecordType<T>): Strategy<T>;
  visitString(type: StringType): Strategy<string>;
  visitArray<E>(type: ArrayType<E>): Strategy<E[]>;
  visitMap<K, V>(type: MapType<K, V>): Strategy<Map<K, V>>;
  visitDict<V>(type: DictType<V>): Strategy<Record<string, V>>;
  visitBoolean(type: BooleanType): Strategy<boolean>;
  visitRef<T>(type: RefType<T>): Strategy<T>;
  /** Rejects a descriptor no rule applies to. */
  unsupported(type: Type<unknown>): never;
}

/**
 * Describes how values of T are walked and built.
 */
export abstract class Type<T> {
  abstract readonly kind: string;
  abstract readonly name: string;

  private readonly compiled = new WeakMap<TypeVisitor, Strategy<T>>();

  /**
   * Hands this descriptor to the visitor method for its category.
   */
  abstract accept(visitor: TypeVisitor): Strategy<T>;

  /**
   * Returns the strategy compiled for a visitor, building it on first use.
   */
  compileWith(visitor: TypeVisitor, build: () => Strategy<T>): Strategy<T> {
    let strategy = this.compiled.get(visitor);
    if (!strategy) {
      strategy = build();
      this.compiled.set(visitor, strategy);
    }
    return strategy;
  }

  toString(): string {
    return this.name;
  }
}

/**
 * Value type described by a descriptor.
 */
export type Infer<D> = D extends Type<infer T> ? T : never;

function wrapName(name: string): string {
  return name.includes(" ") ? `(${name})` : name;
}

export class NullableType<T> extends Type<T | null> {
  readonly kind = "nullable";
  readonly name: string;

  constructor(readonly inner: Type<T>) {
    super();
    this.name = `${inner.name} | null`;
  }

  accept(visitor: TypeVisitor): Strategy<T | null> {
    return visitor.visitNullable(this);
  }
}

export class BooleanType extends Type<boolean> {
  readonly kind = "boolean";
  readonly name = "boolean";

  accept(visitor: TypeVisitor): Strategy<boolean> {
    return visitor.visitBoolean(this);
  }
}

/**
 * Integral type held in a number; bounds must be safe integers.
 */
export class IntegerType extends Type<number> {
  readonly kind = "integer";

  constructor(
    readonly name: string,
    readonly min: number,
    readonly max: number
  ) {
    super();
  }

  accept(visitor: TypeVisitor): Strategy<number> {
    return visitor.visitInteger(this);
  }
}

/**
 * Integral type held in a bigint.
 */
export class BigIntegerType extends Type<bigint> {
  readonly kind = "integer";

  constructor(
    readonly name: string,
    readonly min: bigint,
    readonly max: bigint
  ) {
    super();
  }

  accept(visitor: TypeVisitor): Strategy<bigint> {
    return visitor.visitBigInteger(this);
  }
}

export class FloatType extends Type<number> {
  readonly kind = "float";

  constructor(
    readonly name: string,
    readonly precision: 32 | 64
  ) {
    super();
  }

  accept(visitor: TypeVisitor): Strategy<number> {
    return visitor.visitFloat(this);
  }
}

export class StringType extends Type<string> {
  readonly kind = "string";
  readonly name = "string";

  accept(visitor: TypeVisitor): Strategy<string> {
    return visitor.visitString(this);
  }
}

export class ArrayType<E> extends Type<E[]> {
  readonly kind = "array";
  readonly name: string;

  constructor(readonly element: Type<E>) {
    super();
    this.name = `${wrapName(element.name)}[]`;
  }

  accept(visitor: TypeVisitor): Strategy<E[]> {
    return visitor.visitArray(this);
  }
}

/**
 * Mapping held in a Map; keys may be of any descriptor.
 */
export class MapType<K, V> extends Type<Map<K, V>> {
  readonly kind = "map";
  readonly name: string;

  constructor(
    readonly key: Type<K>,
    readonly value: Type<V>
  ) {
    super();
    this.name = `Map<${key.name}, ${value.name}>`;
  }

  accept(visitor: TypeVisitor): Strategy<Map<K, V>> {
    return visitor.visitMap(this);
  }
}

/**
 * Mapping held in a plain object with string keys.
 */
export class DictType<V> extends Type<Record<string, V>> {
  readonly kind = "dict";
  readonly name: string;

  constructor(readonly value: Type<V>) {
    super();
    this.name = `Record<string, ${value.name}>`;
  }

  accept(visitor: TypeVisitor): Strategy<Record<string, V>> {
    return visitor.visitDict(this);
  }
}

type AnyFunction = (...args: never[]) => unknown;

/**
 * Keys of T that hold data rather than methods.
 */
export type DataKeys<T> = {
  [K in keyof T]-?: T[K] extends AnyFunction ? never : K;
}[keyof T] &
  keyof T;

/**
 * One descriptor per data field of a record.
 */
export type FieldTypes<T> = { [K in DataKeys<T>]: Type<T[K]> };

/**
 * Fixed-shape record. Fields are emitted in the key order of `fields`;
 * `create` supplies the defaults kept by fields absent from the input.
 */
export class RecordType<T extends object> extends Type<T> {
  readonly kind = "record";

  constructor(
    readonly name: string,
    readonly create: () => T,
    readonly fields: FieldTypes<T>
  ) {
    super();
  }

  accept(visitor: TypeVisitor): Strategy<T> {
    return visitor.visitRecord(this);
  }
}

/**
 * Named reference resolved against a registry when compiled, used for
 * recursive types.
 */
export class RefType<T> extends Type<T> {
  readonly kind = "ref";

  constructor(readonly name: string) {
    super();
  }

  accept(visitor: TypeVisitor): Strategy<T> {
    return visitor.visitRef(this);
  }
}

/**
 * Descriptor constructors.
 */
export const t = {
  boolean: new BooleanType(),
  int8: new IntegerType("int8", -0x80, 0x7f),
  int16: new IntegerType("int16", -0x8000, 0x7fff),
  int32: new IntegerType("int32", -0x80000000, 0x7fffffff),
  uint8: new IntegerType("uint8", 0, 0xff),
  uint16: new IntegerType("uint16", 0, 0xffff),
  uint32: new IntegerType("uint32", 0, 0xffffffff),
  /** Any safe integer. */
  int: new IntegerType("int", Number.MIN_SAFE_INTEGER, Number.MAX_SAFE_INTEGER),
  int64: new BigIntegerType("int64", MinInt64, MaxInt64),
  uint64: new BigIntegerType("uint64", 0n, MaxUint64),
  float32: new FloatType("float32", 32),
  float64: new FloatType("float64", 64),
  string: new StringType(),

  nullable<T>(inner: Type<T>): NullableType<T> {
    return new NullableType(inner);
  },

  array<E>(element: Type<E>): ArrayType<E> {
    return new ArrayType(element);
  },

  map<K, V>(key: Type<K>, value: Type<V>): MapType<K, V> {
    return new MapType(key, value);
  },

  dict<V>(value: Type<V>): DictType<V> {
    return new DictType(value);
  },

  /**
   * Record whose instances come from a factory.
   */
  record<T extends object>(name: string, create: () => T, fields: FieldTypes<T>): RecordType<T> {
    return new RecordType(name, create, fields);
  },

  /**
   * Record backed by a class; field initializers give the defaults.
   */
  class<T extends object>(ctor: new () => T, fields: FieldTypes<T>): RecordType<T> {
    return new RecordType(ctor.name, () => new ctor(), fields);
  },

  ref<T>(name: string): RefType<T> {
    return new RefType<T>(name);
  },
};
