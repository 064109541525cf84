import { compileField, type CompiledField } from "./adapters";
import { UnsupportedTypeError } from "./errors";
import type { Logger } from "./logger";
import type { Registry } from "./registry";
import {
  ArrayType,
  BigIntegerType,
  BooleanType,
  DictType,
  type DataKeys,
  type FieldTypes,
  FloatType,
  IntegerType,
  MapType,
  NullableType,
  RecordType,
  RefType,
  StringType,
  Type,
  type TypeVisitor,
} from "./schema";
import {
  ArrayStrategy,
  BigIntegerStrategy,
  BooleanStrategy,
  DictStrategy,
  FloatStrategy,
  IntegerStrategy,
  MapStrategy,
  NullableStrategy,
  RecordStrategy,
  RefStrategy,
  StringStrategy,
  type Strategy,
} from "./strategies";

/**
 * Selects and caches one strategy per descriptor.
 *
 * Categories, in the order rules apply to a value: null-able, integral,
 * floating, record, textual, sequence, mapping, boolean. A descriptor that
 * fits none is rejected here, before any value flows.
 */
export class Dispatcher implements TypeVisitor {
  private readonly compiling = new Set<Type<unknown>>();

  constructor(
    private readonly registry: Registry,
    private readonly logger: Logger
  ) {}

  /**
   * Returns the strategy for a descriptor, compiling it and everything it
   * refers to on first use.
   * @throws UnsupportedTypeError if no rule applies
   */
  compile<T>(type: Type<T>): Strategy<T> {
    if (!(type instanceof Type)) {
      throw new UnsupportedTypeError(describeNonType(type));
    }
    return type.compileWith(this, () => {
      this.compiling.add(type);
      try {
        const strategy = type.accept(this);
        this.logger.trace({ type: type.name, kind: type.kind }, "compiled type");
        return strategy;
      } finally {
        this.compiling.delete(type);
      }
    });
  }

  visitNullable<T>(type: NullableType<T>): Strategy<T | null> {
    return new NullableStrategy(type.name, this.compile(type.inner));
  }

  visitInteger(type: IntegerType): Strategy<number> {
    return new IntegerStrategy(type.name, type.min, type.max);
  }

  visitBigInteger(type: BigIntegerType): Strategy<bigint> {
    return new BigIntegerStrategy(type.name, type.min, type.max);
  }

  visitFloat(type: FloatType): Strategy<number> {
    return new FloatStrategy(type.name, type.precision);
  }

  visitRecord<T extends object>(type: RecordType<T>): Strategy<T> {
    const fields: CompiledField<T>[] = [];
    for (const key of Object.keys(type.fields)) {
      if (isFieldKey<T>(type.fields, key)) {
        fields.push(this.bindField(type, key));
      }
    }
    return new RecordStrategy(type.name, type.create, fields);
  }

  private bindField<T extends object, K extends DataKeys<T> & string>(
    type: RecordType<T>,
    key: K
  ): CompiledField<T> {
    const fieldType: Type<T[K]> = type.fields[key];
    return compileField<T, K>(key, this.compile(fieldType));
  }

  visitString(type: StringType): Strategy<string> {
    return new StringStrategy(type.name);
  }

  visitArray<E>(type: ArrayType<E>): Strategy<E[]> {
    return new ArrayStrategy(type.name, this.compile(type.element));
  }

  visitMap<K, V>(type: MapType<K, V>): Strategy<Map<K, V>> {
    // Map compares object keys by identity, so only scalar keys can repeat
    if (!isScalarKey(type.key)) {
      throw new UnsupportedTypeError(type.name);
    }
    return new MapStrategy(type.name, this.compile(type.key), this.compile(type.value));
  }

  visitDict<V>(type: DictType<V>): Strategy<Record<string, V>> {
    return new DictStrategy(type.name, this.compile(type.value));
  }

  visitBoolean(type: BooleanType): Strategy<boolean> {
    return new BooleanStrategy(type.name);
  }

  visitRef<T>(type: RefType<T>): Strategy<T> {
    // The registry is untyped; t.ref<T>() vouches for T
    const target = this.registry.resolve(type.name) as Type<T>;
    if (this.compiling.has(target)) {
      return new RefStrategy(type.name, () => this.compile(target));
    }
    const strategy = this.compile(target);
    return new RefStrategy(type.name, () => strategy);
  }

  unsupported(type: Type<unknown>): never {
    throw new UnsupportedTypeError(type.name);
  }
}

function isFieldKey<T>(fields: FieldTypes<T>, key: string): key is DataKeys<T> & string {
  return Object.prototype.hasOwnProperty.call(fields, key);
}

function isScalarKey(type: Type<unknown>): boolean {
  if (type instanceof NullableType) {
    return isScalarKey(type.inner);
  }
  return (
    type instanceof StringType ||
    type instanceof IntegerType ||
    type instanceof BigIntegerType ||
    type instanceof FloatType ||
    type instanceof BooleanType
  );
}

function describeNonType(value: unknown): string {
  if (typeof value === "object" && value !== null && "name" in value && typeof value.name === "string") {
    return value.name;
  }
  return typeof value;
}
