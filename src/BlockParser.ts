// file: src/BlockParser.ts
import * as fs from 'fs/promises';
import { AnnotationBlock, Obligation, ParseResult, quote } from './BlockPrimitives';

// Characters that open a line comment in the languages we care about:
// //, #, --, ', ;, REM, !, *, and <!--
const COMMENT_START_CHARS = new Set(['/', '#', '-', "'", ';', 'R', 'E', 'M', '!', '*', '<']);

const IF_CHANGED = 'if-changed';
const THEN_CHANGE = 'then-change';

interface OpenBlock {
  name?: string;
  startLine: number;
}

type Parsed<T> = { ok: true; value: T } | { ok: false; errors: string[] };

/**
 * Lazily extracts `if-changed` / `then-change` blocks from the text of one file.
 *
 * The parser is an iterator over {@link ParseResult}s. It only moves forward:
 * iterating it a second time continues where the previous loop stopped, and
 * once a structural error has been yielded nothing follows it.
 */
export class BlockParser implements Iterable<ParseResult> {
  private readonly lines: string[];
  private lineNumber = 0;
  // Unconsumed remainder of the current line
  private rest = '';
  private readonly openBlocks: OpenBlock[] = [];
  private readonly results: Generator<ParseResult, void, undefined>;

  /**
   * @param path - Path used in error messages, usually relative to the repository root.
   * @param text - File contents.
   */
  constructor(readonly path: string, text: string) {
    this.lines = text.split(/\r?\n/);
    // A trailing newline does not start another line
    if (this.lines.length > 0 && this.lines[this.lines.length - 1] === '') {
      this.lines.pop();
    }
    this.results = this.parse();
  }

  /**
   * Reads a file and returns a parser over its contents. The file handle is
   * closed before this resolves or rejects.
   * @param path - Path used in error messages.
   * @param absolutePath - Where to read the file from.
   */
  static async open(path: string, absolutePath: string): Promise<BlockParser> {
    const handle = await fs.open(absolutePath, 'r');
    try {
      return new BlockParser(path, await handle.readFile('utf-8'));
    } finally {
      await handle.close();
    }
  }

  [Symbol.iterator](): Iterator<ParseResult> {
    return this.results;
  }

  private *parse(): Generator<ParseResult, void, undefined> {
    while (this.nextLine()) {
      const opened = this.parseIfChanged();
      if (!opened.ok) {
        yield opened;
        return;
      }
      if (opened.value) {
        this.openBlocks.push({ name: opened.value.name, startLine: this.lineNumber });
      }

      if (!this.findAndEat(THEN_CHANGE)) {
        continue;
      }
      // Blame the marker line, not the lines the pattern list spills onto, so
      // appending a pattern never moves the line reported for existing ones.
      const thenChangeLine = this.lineNumber;
      const args = this.parseThenChangeArguments(thenChangeLine);
      const block = this.openBlocks.pop();
      if (!args.ok) {
        const errors = block ? [] : [this.missingIfChanged(thenChangeLine)];
        yield { ok: false, errors: [...errors, ...args.errors] };
        return;
      }
      if (!block) {
        yield { ok: false, errors: [this.missingIfChanged(thenChangeLine)] };
        return;
      }
      const result: AnnotationBlock = {
        name: block.name,
        range: { startLine: block.startLine, endLine: thenChangeLine },
        obligations: args.value
      };
      yield { ok: true, block: result };
    }

    if (this.openBlocks.length > 0) {
      const unclosed = this.openBlocks.splice(0);
      yield {
        ok: false,
        errors: unclosed.map(
          b => `Missing "${THEN_CHANGE}" for "${IF_CHANGED}" at line ${b.startLine} for ${quote(this.path)}.`
        )
      };
    }
  }

  private missingIfChanged(line: number): string {
    return `Missing "${IF_CHANGED}" for "${THEN_CHANGE}" at line ${line} for ${quote(this.path)}.`;
  }

  private nextLine(): boolean {
    if (this.lineNumber >= this.lines.length) {
      return false;
    }
    this.rest = this.lines[this.lineNumber];
    this.lineNumber++;
    return true;
  }

  private skipWhitespace(): void {
    this.rest = this.rest.trimStart();
  }

  private skipComments(): void {
    this.skipWhitespace();
    let i = 0;
    while (i < this.rest.length && COMMENT_START_CHARS.has(this.rest[i])) {
      i++;
    }
    this.rest = this.rest.slice(i);
  }

  private skipWhitespaceAndEat(token: string): boolean {
    this.skipWhitespace();
    if (!this.rest.startsWith(token)) {
      return false;
    }
    this.rest = this.rest.slice(token.length);
    return true;
  }

  private findAndEat(token: string): boolean {
    const index = this.rest.indexOf(token);
    if (index === -1) {
      return false;
    }
    this.rest = this.rest.slice(index + token.length);
    return true;
  }

  /**
   * Recognizes `if-changed` or `if-changed(name)` at the start of a comment.
   */
  private parseIfChanged(): Parsed<{ name?: string } | undefined> {
    this.skipComments();
    if (!this.skipWhitespaceAndEat(IF_CHANGED)) {
      return { ok: true, value: undefined };
    }
    if (!this.skipWhitespaceAndEat('(')) {
      return { ok: true, value: {} };
    }
    const end = this.rest.indexOf(')');
    if (end === -1) {
      return {
        ok: false,
        errors: [`Could not find ')' for "${IF_CHANGED}" at line ${this.lineNumber} for ${quote(this.path)}.`]
      };
    }
    const name = this.rest.slice(0, end).trim();
    this.rest = this.rest.slice(end + 1);
    return { ok: true, value: { name } };
  }

  /**
   * Parses `(pattern[:name], ...)`, possibly spread over several comment lines.
   */
  private parseThenChangeArguments(thenChangeLine: number): Parsed<Obligation[]> {
    const unterminated = (): Parsed<Obligation[]> => ({
      ok: false,
      errors: [`Could not find ')' for "${THEN_CHANGE}" at line ${thenChangeLine} for ${quote(this.path)}.`]
    });
    if (!this.skipWhitespaceAndEat('(')) {
      return {
        ok: false,
        errors: [`Could not find '(' for "${THEN_CHANGE}" at line ${thenChangeLine} for ${quote(this.path)}.`]
      };
    }

    const obligations: Obligation[] = [];
    let buffer = '';
    let patternLine = 0;
    for (;;) {
      // Blank lines and bare comment leaders between entries are skipped
      this.skipWhitespace();
      while (this.rest.length === 0) {
        if (!this.nextLine()) {
          return unterminated();
        }
        this.skipComments();
        this.skipWhitespace();
      }
      if (patternLine === 0) {
        patternLine = this.lineNumber;
      }

      const delimiter = firstDelimiter(this.rest);
      const escape = this.rest.indexOf('\\');
      if (escape !== -1 && (delimiter === -1 || escape < delimiter)) {
        // The escaped character is taken literally, even if it is a delimiter
        buffer += this.rest.slice(0, escape).trim() + this.rest.charAt(escape + 1);
        this.rest = this.rest.slice(escape + 2);
        continue;
      }

      let closed = false;
      if (delimiter === -1) {
        buffer += this.rest.trim();
        this.rest = '';
      } else {
        closed = this.rest[delimiter] === ')';
        buffer += this.rest.slice(0, delimiter).trim();
        this.rest = this.rest.slice(delimiter + 1);
      }

      const colon = buffer.indexOf(':');
      if (colon === -1 && buffer.length === 0) {
        // Trailing comma, or an empty list
        if (closed) {
          break;
        }
        return {
          ok: false,
          errors: [
            `Unexpected empty path at line ${patternLine} for "${THEN_CHANGE}" at line ${thenChangeLine} for ${quote(this.path)}.`
          ]
        };
      }
      obligations.push(
        colon === -1
          ? { pattern: buffer, line: thenChangeLine }
          : { pattern: buffer.slice(0, colon).trim(), name: buffer.slice(colon + 1).trim(), line: thenChangeLine }
      );
      if (closed) {
        break;
      }
      buffer = '';
      patternLine = 0;
    }
    return { ok: true, value: obligations };
  }
}

function firstDelimiter(text: string): number {
  const comma = text.indexOf(',');
  const paren = text.indexOf(')');
  if (comma === -1) return paren;
  if (paren === -1) return comma;
  return Math.min(comma, paren);
}
