/**
 * Serialize direction: depth-first traversal of a value, one event per node.
 *
 * The emission rules themselves live in each strategy's `walk`; this module
 * holds the element and field iterators handed to `Sink.handleArray` and
 * `Sink.handleObject`.
 */

import type { CompiledField } from "./adapters";
import type { SerdeContext } from "./context";
import type { Strategy } from "./strategies";
import type { ArrayReader, ObjectReader, Sink } from "./types";

/**
 * Walks a value into a sink with an already compiled strategy.
 */
export function walkValue<T>(strategy: Strategy<T>, value: T, sink: Sink, ctx: SerdeContext): void {
  strategy.walk(value, sink, ctx);
}

/**
 * Element iterator yielding every element in order.
 */
export function arrayReader<E>(
  values: readonly E[],
  element: Strategy<E>,
  ctx: SerdeContext
): ArrayReader {
  return (sink) => {
    for (let i = 0; i < values.length; i++) {
      const value = values[i];
      ctx.within(i, () => element.walk(value, sink, ctx));
    }
  };
}

/**
 * Field iterator over key/value pairs in iteration order. Keys walk through
 * their own strategy as the field name.
 */
export function mapReader<K, V>(
  entries: Iterable<readonly [K, V]>,
  key: Strategy<K>,
  value: Strategy<V>,
  ctx: SerdeContext
): ObjectReader {
  return (sink) => {
    for (const [k, v] of entries) {
      const segment = String(k);
      sink.handleField(
        (nameSink) => ctx.within(segment, () => key.walk(k, nameSink, ctx)),
        (valueSink) => ctx.within(segment, () => value.walk(v, valueSink, ctx))
      );
    }
  };
}

/**
 * Field iterator over the declared fields of a record, in declaration order.
 */
export function recordReader<T>(
  record: T,
  fields: readonly CompiledField<T>[],
  ctx: SerdeContext
): ObjectReader {
  return (sink) => {
    for (const field of fields) {
      field.walk(record, sink, ctx);
    }
  };
}
