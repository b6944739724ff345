// file: src/BlockPrimitives.ts
/**
 * Inclusive, 1-based range of line numbers in a file.
 */
export interface LineRange {
  /** First line number of the range. */
  startLine: number;
  /** Last line number of the range. */
  endLine: number;
}

/**
 * A file or named block that must also change when the owning block changes.
 */
export interface Obligation {
  /**
   * Pattern relative to the directory of the declaring file. Empty means the
   * declaring file itself.
   */
  pattern: string;
  /** Name of an `if-changed(name)` block inside the matched file. */
  name?: string;
  /** Line of the `then-change` marker that declared this obligation. */
  line: number;
}

/**
 * A region opened by `if-changed` and closed by `then-change`.
 */
export interface AnnotationBlock {
  /** Optional name given as `if-changed(name)`. */
  name?: string;
  /** Lines from the `if-changed` marker to the `then-change` marker. */
  range: LineRange;
  /** Targets listed by the closing `then-change`, in declaration order. */
  obligations: Obligation[];
}

/**
 * One step of parsing a file: a complete block, or the errors that stopped parsing.
 */
export type ParseResult =
  | { ok: true; block: AnnotationBlock }
  | { ok: false; errors: string[] };

/**
 * Outcome of checking one file: success, or every violation found in it.
 */
export type CheckResult =
  | { ok: true }
  | { ok: false; errors: string[] };

/**
 * Formats a path the way every message of this tool quotes it.
 */
export function quote(value: string): string {
  return JSON.stringify(value);
}
