import { buildValue } from "./builder";
import { resolveOptions, type SerdeOptions } from "./config";
import { SerdeContext } from "./context";
import { EventRecorder, EventSource, type Event } from "./events";
import type { Logger } from "./logger";
import type { Registry } from "./registry";
import type { Type } from "./schema";
import type { Strategy } from "./strategies";
import type { Sink, Source } from "./types";
import { walkValue } from "./walker";

/**
 * Serializes and deserializes typed values through the Sink/Source protocol.
 *
 * @example
 * ```typescript
 * const serde = new Serde({ logLevel: "debug" });
 * const event = serde.toEvents(t.dict(t.int32), { a: 1 });
 * serde.fromEvents(t.dict(t.int32), event); // { a: 1 }
 * ```
 */
export class Serde {
  readonly logger: Logger;
  readonly registry: Registry;

  constructor(options: SerdeOptions = {}) {
    const resolved = resolveOptions(options);
    this.logger = resolved.logger;
    this.registry = resolved.registry;
  }

  /**
   * Compiles a descriptor ahead of use.
   * @throws UnsupportedTypeError if the descriptor, or one it refers to, has no strategy
   */
  compile<T>(type: Type<T>): Strategy<T> {
    return this.registry.dispatcher.compile(type);
  }

  /**
   * Walks a value, emitting its events to the sink.
   */
  serialize<T>(type: Type<T>, value: T, sink: Sink): void {
    const strategy = this.compile(type);
    const ctx = new SerdeContext(this.logger);
    try {
      walkValue(strategy, value, sink, ctx);
    } catch (err) {
      this.logger.debug({ err, type: type.name }, "serialize failed");
      throw err;
    }
  }

  /**
   * Builds a value from the events a source fires. Nothing is returned
   * unless the whole value was built.
   */
  deserialize<T>(type: Type<T>, source: Source): T {
    const strategy = this.compile(type);
    const ctx = new SerdeContext(this.logger);
    try {
      return buildValue(strategy, (sink) => source.read(sink), ctx);
    } catch (err) {
      this.logger.debug({ err, type: type.name }, "deserialize failed");
      throw err;
    }
  }

  /**
   * Records the events describing a value.
   */
  toEvents<T>(type: Type<T>, value: T): Event {
    const recorder = new EventRecorder();
    this.serialize(type, value, recorder);
    return recorder.event;
  }

  /**
   * Builds a value from recorded events.
   */
  fromEvents<T>(type: Type<T>, event: Event): T {
    return this.deserialize(type, new EventSource(event));
  }

  /**
   * Deep-copies a value by walking it straight into a builder.
   */
  clone<T>(type: Type<T>, value: T): T {
    const strategy = this.compile(type);
    return this.deserialize(type, {
      read: (sink) => walkValue(strategy, value, sink, new SerdeContext(this.logger)),
    });
  }
}

let defaultSerde: Serde | undefined;

function serdeFor(options?: SerdeOptions): Serde {
  if (options) {
    return new Serde(options);
  }
  defaultSerde ??= new Serde();
  return defaultSerde;
}

/**
 * Walks a value, emitting its events to the sink.
 */
export function serialize<T>(type: Type<T>, value: T, sink: Sink, options?: SerdeOptions): void {
  serdeFor(options).serialize(type, value, sink);
}

/**
 * Builds a value from the events a source fires.
 */
export function deserialize<T>(type: Type<T>, source: Source, options?: SerdeOptions): T {
  return serdeFor(options).deserialize(type, source);
}

/**
 * Records the events describing a value.
 */
export function toEvents<T>(type: Type<T>, value: T, options?: SerdeOptions): Event {
  return serdeFor(options).toEvents(type, value);
}

/**
 * Builds a value from recorded events.
 */
export function fromEvents<T>(type: Type<T>, event: Event, options?: SerdeOptions): T {
  return serdeFor(options).fromEvents(type, event);
}

/**
 * Deep-copies a value through its descriptor.
 */
export function clone<T>(type: Type<T>, value: T, options?: SerdeOptions): T {
  return serdeFor(options).clone(type, value);
}
