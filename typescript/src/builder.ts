/**
 * Deserialize direction: builds typed values from the events a source fires.
 */

import type { SerdeContext } from "./context";
import { MissingValueError, ValueAlreadyResolvedError } from "./errors";
import type { Strategy } from "./strategies";
import type {
  ArrayReader,
  FragmentReader,
  FragmentSink,
  ObjectReader,
  Sink,
  ValueReader,
} from "./types";

export type BindingState = "awaiting" | "resolved";

/**
 * Single-shot sink for one destination: the first event resolves it, any
 * later event is an error.
 */
export class Binding<T> implements Sink {
  private current: BindingState = "awaiting";
  private result?: { value: T };

  constructor(
    private readonly strategy: Strategy<T>,
    private readonly ctx: SerdeContext,
    private readonly onResolve?: (value: T) => void
  ) {}

  get state(): BindingState {
    return this.current;
  }

  /**
   * Returns the built value.
   * @throws MissingValueError if no event arrived
   */
  get value(): T {
    if (!this.result) {
      throw new MissingValueError(this.strategy.typeName, this.ctx.path());
    }
    return this.result.value;
  }

  handleNull(): void {
    this.resolve(() => this.strategy.fromNull(this.ctx));
  }

  handleBoolean(value: boolean): void {
    this.resolve(() => this.strategy.fromBoolean(value, this.ctx));
  }

  handleNumeric(text: string): void {
    this.resolve(() => this.strategy.fromNumeric(text, this.ctx));
  }

  handleString(text: string): void {
    this.resolve(() => this.strategy.fromString(text, this.ctx));
  }

  handleStringFragments(reader: FragmentReader): void {
    this.resolve(() => {
      const buffer = new FragmentBuffer();
      reader(buffer);
      return this.strategy.fromString(buffer.text, this.ctx);
    });
  }

  handleArray(reader: ArrayReader): void {
    this.resolve(() => this.strategy.fromArray(reader, this.ctx));
  }

  handleObject(reader: ObjectReader): void {
    this.resolve(() => this.strategy.fromObject(reader, this.ctx));
  }

  private resolve(build: () => T): void {
    if (this.current === "resolved") {
      throw new ValueAlreadyResolvedError(this.strategy.typeName, this.ctx.path());
    }
    this.current = "resolved";
    const value = build();
    this.result = { value };
    this.onResolve?.(value);
  }
}

/**
 * Concatenates string fragments in delivery order.
 */
export class FragmentBuffer implements FragmentSink {
  private readonly chunks: string[] = [];

  handleStringFragment(chunk: string): void {
    this.chunks.push(chunk);
  }

  get text(): string {
    return this.chunks.join("");
  }
}

/**
 * Builds one value from a reader, reusing the dispatch of the enclosing call.
 */
export function buildValue<T>(strategy: Strategy<T>, reader: ValueReader, ctx: SerdeContext): T {
  const binding = new Binding(strategy, ctx);
  reader(binding);
  return binding.value;
}
