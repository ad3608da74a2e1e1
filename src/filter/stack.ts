import { StackEmptyError } from "../errors.js";
import { joinFilter, type Filter } from "./filter.js";

/**
 * FilterStack - the pipeline a session is building
 *
 * Insertion order is pipeline order; the last element is the most recently
 * pushed filter. The stack is itself a Filter so it can be joined and handed
 * to jq directly.
 */
export class FilterStack implements Filter {
  private pipe: Filter[] = [];

  /** Number of filters on the stack (not fragments). */
  get depth(): number {
    return this.pipe.length;
  }

  push(filter: Filter): void {
    this.pipe.push(filter);
  }

  /**
   * Remove up to n of the most recently pushed filters, newest first.
   * Only an already empty stack is an error.
   */
  pop(n: number = 1): Filter[] {
    if (this.pipe.length === 0) {
      throw new StackEmptyError();
    }
    const count = Math.min(Math.max(n, 0), this.pipe.length);
    return this.pipe.splice(this.pipe.length - count, count).reverse();
  }

  popAll(): void {
    this.pipe = [];
  }

  fragments(): string[] {
    return this.pipe.flatMap((filter) => filter.fragments());
  }

  joined(): string {
    return joinFilter(this);
  }
}
