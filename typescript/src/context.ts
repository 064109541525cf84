import type { Logger } from "./logger";
import { formatPath, type PathSegment } from "./types";

/**
 * State of one serialize or deserialize call, passed explicitly through
 * every recursive step.
 */
export class SerdeContext {
  private readonly segments: PathSegment[] = [];

  constructor(readonly logger: Logger) {}

  /**
   * Returns the location of the node being visited.
   */
  path(): string {
    return formatPath(this.segments);
  }

  /**
   * Runs fn one level deeper in the path.
   */
  within<R>(segment: PathSegment, fn: () => R): R {
    this.segments.push(segment);
    try {
      return fn();
    } finally {
      this.segments.pop();
    }
  }
}
