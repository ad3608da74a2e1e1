/**
 * A filter contributes one or more fragments to a jq pipeline.
 */
export interface Filter {
  fragments(): string[];
}

export const FILTER_JOIN = " | ";

/**
 * Join the fragments of a filter into a single jq program. A filter with no
 * fragments is the identity program ".".
 */
export function joinFilter(filter: Filter): string {
  const fragments = filter.fragments();
  if (fragments.length === 0) {
    return ".";
  }
  return fragments.join(FILTER_JOIN);
}

/**
 * A single literal fragment of jq syntax.
 */
export class FilterString implements Filter {
  constructor(readonly text: string) {}

  fragments(): string[] {
    return [this.text];
  }

  toString(): string {
    return this.text;
  }
}
