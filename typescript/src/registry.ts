import { Dispatcher } from "./dispatcher";
import { TypeNotRegisteredError } from "./errors";
import { createLogger, type Logger } from "./logger";
import type { Type } from "./schema";

/**
 * Registry manages named descriptors, resolved by t.ref() when compiled.
 */
export class Registry {
  private byName: Map<string, Type<unknown>> = new Map();
  private compiled?: Dispatcher;

  constructor(private readonly logger: Logger = createLogger()) {}

  /**
   * Registers a descriptor under its own name or the one given.
   * Replaces an earlier registration of the same name.
   */
  register<T>(type: Type<T>, name: string = type.name): string {
    if (this.byName.has(name)) {
      this.logger.warn({ type: name }, "replacing registered type");
    }
    this.byName.set(name, type);
    this.invalidate();
    return name;
  }

  /**
   * Gets a registered descriptor, or undefined.
   */
  get(name: string): Type<unknown> | undefined {
    return this.byName.get(name);
  }

  /**
   * Gets a registered descriptor.
   * @throws TypeNotRegisteredError if the name is unknown
   */
  resolve(name: string): Type<unknown> {
    const type = this.byName.get(name);
    if (!type) {
      throw new TypeNotRegisteredError(name);
    }
    return type;
  }

  /**
   * Checks if a name is registered.
   */
  has(name: string): boolean {
    return this.byName.has(name);
  }

  /**
   * Lists registered names in registration order.
   */
  names(): string[] {
    return [...this.byName.keys()];
  }

  /**
   * Removes a registration.
   */
  unregister(name: string): boolean {
    const removed = this.byName.delete(name);
    if (removed) {
      this.invalidate();
    }
    return removed;
  }

  /**
   * Clears all registrations.
   */
  clear(): void {
    this.byName.clear();
    this.invalidate();
  }

  /**
   * Dispatcher resolving references against this registry. Replaced
   * whenever the registrations change, so stale strategies are never reused.
   */
  get dispatcher(): Dispatcher {
    this.compiled ??= new Dispatcher(this, this.logger);
    return this.compiled;
  }

  private invalidate(): void {
    this.compiled = undefined;
  }
}

/**
 * Global default registry instance.
 */
export const defaultRegistry = new Registry();

/**
 * Registers a descriptor with the default registry.
 */
export function register<T>(type: Type<T>, name?: string): string {
  return defaultRegistry.register(type, name);
}
