/**
 * Protocol-style header lists (HTTP, mail, etc.).
 */

interface Header {
  name: string;
  value: string;
}

export type HeaderMapInit =
  | HeaderMap
  | Iterable<readonly [string, string]>
  | Record<string, string | readonly string[]>;

/**
 * Case-insensitive multi-map from header name to one or more values.
 *
 * Names keep the spelling they were added with; iteration follows the
 * order names were first added, then the order of their values.
 */
export class HeaderMap implements Iterable<[string, string]> {
  // Keyed by upper-cased name
  private readonly headers = new Map<string, Header[]>();

  constructor(init?: HeaderMapInit) {
    if (init === undefined) {
      return;
    }
    if (isPairIterable(init)) {
      for (const [name, value] of init) {
        this.add(name, value);
      }
      return;
    }
    for (const [name, value] of Object.entries(init)) {
      if (typeof value === "string") {
        this.add(name, value);
      } else {
        for (const item of value) {
          this.add(name, item);
        }
      }
    }
  }

  /**
   * Number of values across all names.
   */
  get size(): number {
    let size = 0;
    for (const values of this.headers.values()) {
      size += values.length;
    }
    return size;
  }

  /**
   * Replaces every value of a name with a single value.
   */
  set(name: string, value: string): this {
    this.headers.set(name.toUpperCase(), [{ name, value }]);
    return this;
  }

  /**
   * Appends a value, keeping existing values of the same name.
   */
  add(name: string, value: string): this {
    const key = name.toUpperCase();
    const values = this.headers.get(key);
    if (values) {
      values.push({ name, value });
    } else {
      this.headers.set(key, [{ name, value }]);
    }
    return this;
  }

  /**
   * Returns the first value of a name.
   */
  get(name: string): string | undefined;
  get(name: string, fallback: string): string;
  get(name: string, fallback?: string): string | undefined {
    const [first] = this.headers.get(name.toUpperCase()) ?? [];
    return first ? first.value : fallback;
  }

  getAll(name: string): string[] {
    return (this.headers.get(name.toUpperCase()) ?? []).map((header) => header.value);
  }

  has(name: string): boolean {
    return this.headers.has(name.toUpperCase());
  }

  delete(name: string): boolean {
    return this.headers.delete(name.toUpperCase());
  }

  *entries(): IterableIterator<[string, string]> {
    for (const values of this.headers.values()) {
      for (const header of values) {
        yield [header.name, header.value];
      }
    }
  }

  [Symbol.iterator](): IterableIterator<[string, string]> {
    return this.entries();
  }

  /**
   * Flattens to one value per spelled name; repeated headers keep the last
   * value.
   */
  toRecord(): Record<string, string> {
    const result: Record<string, string> = {};
    for (const [name, value] of this) {
      result[name] = value;
    }
    return result;
  }

  /**
   * Collects every value per spelled name.
   */
  toMultiRecord(): Record<string, string[]> {
    const result: Record<string, string[]> = {};
    for (const [name, value] of this) {
      (result[name] ??= []).push(value);
    }
    return result;
  }
}

function isPairIterable(
  init: HeaderMapInit
): init is HeaderMap | Iterable<readonly [string, string]> {
  return Symbol.iterator in init;
}

// Segments kept upper-case by normalizeHeaderName
const UPPERCASE_SEGMENTS = new Set(["ID", "IP", "NNTP", "TE", "WWW"]);

/**
 * Normalizes the capitalization of a header name: `content-type` becomes
 * `Content-Type`, `x-originating-ip` becomes `X-Originating-IP`.
 */
export function normalizeHeaderName(name: string): string {
  return name
    .split("-")
    .map((segment) => {
      const upper = segment.toUpperCase();
      if (UPPERCASE_SEGMENTS.has(upper)) {
        return upper;
      }
      if (upper === "ETAG") {
        return "ETag";
      }
      return upper.slice(0, 1) + upper.slice(1).toLowerCase();
    })
    .join("-");
}
