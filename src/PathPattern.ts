// file: src/PathPattern.ts
import { Minimatch, MinimatchOptions } from 'minimatch';

const MATCH_OPTIONS: MinimatchOptions = {
  dot: true,
  // Negation and comments are handled here, not by minimatch
  nonegate: true,
  nocomment: true
};

/**
 * A single compiled pattern of a {@link PathPatternSet}.
 */
export interface PathPattern {
  /** The pattern as given, minus a leading `!`. */
  pattern: string;
  /** True for `!` patterns, which exclude what they match. */
  negated: boolean;
  /** Tests a root-relative path against the pattern. */
  test(path: string): boolean;
}

function compile(source: string): PathPattern {
  const negated = source.startsWith('!');
  const pattern = negated ? source.slice(1) : source;
  // Patterns are always relative to the root, so a leading '/' only anchors
  let body = pattern.replace(/^\/+/, '').replace(/\/+$/, '');
  if (body.startsWith('./')) {
    body = body.slice(2);
  }
  if (body === '' || body === '.') {
    return { pattern, negated, test: () => true };
  }
  const self = new Minimatch(body, MATCH_OPTIONS);
  // A pattern naming a directory covers everything below it
  const below = new Minimatch(`${body}/**`, MATCH_OPTIONS);
  return {
    pattern,
    negated,
    test: (path: string) => self.match(path) || below.match(path)
  };
}

/**
 * Ordered glob patterns with ignore-file precedence: the last pattern that
 * matches a path decides, and `!` patterns exclude it again.
 */
export class PathPatternSet {
  readonly patterns: readonly PathPattern[];

  constructor(sources: readonly string[]) {
    this.patterns = sources.map(compile);
  }

  /**
   * True when the set includes the path: scanning from the last pattern, the
   * first one that matches decides.
   */
  matches(path: string): boolean {
    for (let i = this.patterns.length - 1; i >= 0; i--) {
      const p = this.patterns[i];
      if (p.test(path)) {
        return !p.negated;
      }
    }
    return false;
  }
}
