// file: src/Checker.ts
import * as path from 'path';
import { BlockParser } from './BlockParser';
import { AnnotationBlock, CheckResult, Obligation, quote } from './BlockPrimitives';
import { ChangeOracle } from './ChangeOracle';

/** An obligation with its pattern made relative to the repository root. */
interface ResolvedObligation extends Obligation {
  resolved: string;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Verifies the `then-change` obligations of one changed file.
 */
export class Checker {
  constructor(
    private readonly oracle: ChangeOracle,
    /** Path of the file to check, relative to the repository root. */
    private readonly file: string
  ) {}

  /**
   * Checks every modified block of the file. Violations are collected across
   * all blocks; a malformed block aborts the check with the parser's errors.
   */
  async check(): Promise<CheckResult> {
    const absolute = this.oracle.resolve(this.file);
    let parser: BlockParser;
    try {
      parser = await BlockParser.open(this.file, absolute);
    } catch (err: unknown) {
      return { ok: false, errors: [`Failed to read ${quote(this.file)}: ${errorMessage(err)}.`] };
    }

    const errors: string[] = [];
    for (const result of parser) {
      if (!result.ok) {
        return result;
      }
      if (!(await this.oracle.isRangeModified(this.file, result.block.range))) {
        continue;
      }
      errors.push(...(await this.checkBlock(result.block)));
    }
    return errors.length === 0 ? { ok: true } : { ok: false, errors };
  }

  private async checkBlock(block: AnnotationBlock): Promise<string[]> {
    const unnamed: ResolvedObligation[] = [];
    const named: ResolvedObligation[] = [];
    for (const obligation of block.obligations) {
      const resolved = { ...obligation, resolved: this.resolvePattern(obligation.pattern) };
      (obligation.name === undefined ? unnamed : named).push(resolved);
    }

    const errors = await this.checkUnnamed(unnamed);
    for (const obligation of named) {
      errors.push(...(await this.checkNamed(obligation)));
    }
    return errors;
  }

  /**
   * Makes a pattern relative to the root: empty means this file, a leading '/'
   * is already root-relative, anything else is relative to this file's directory.
   */
  private resolvePattern(pattern: string): string {
    const negated = pattern.startsWith('!');
    const body = negated ? pattern.slice(1) : pattern;
    let resolved: string;
    if (body === '') {
      resolved = this.file;
    } else if (body.startsWith('/')) {
      resolved = body.replace(/^\/+/, '');
    } else {
      resolved = path.posix.join(path.posix.dirname(this.file), body);
    }
    return negated ? `!${resolved}` : resolved;
  }

  private async checkUnnamed(obligations: ResolvedObligation[]): Promise<string[]> {
    // An empty list would select every changed file
    if (obligations.length === 0) {
      return [];
    }
    const errors: string[] = [];
    const reported = new Set<string>();
    for await (const result of this.oracle.match(obligations.map(o => o.resolved))) {
      // Exclusions never select anything and are not obligations of their own
      if (result.ok || result.pattern.startsWith('!') || reported.has(result.pattern)) continue;
      reported.add(result.pattern);
      for (const obligation of obligations) {
        if (obligation.resolved === result.pattern) {
          errors.push(await this.unmatched(obligation));
        }
      }
    }
    return errors;
  }

  private async checkNamed(obligation: ResolvedObligation): Promise<string[]> {
    const targets: string[] = [];
    for await (const result of this.oracle.match([obligation.resolved])) {
      if (result.ok) targets.push(result.path);
    }
    if (targets.length === 0) {
      return obligation.resolved.startsWith('!') ? [] : [await this.unmatched(obligation)];
    }

    const errors: string[] = [];
    const context = `for "then-change" in ${quote(this.file)} at line ${obligation.line}`;
    for (const target of targets) {
      let parser: BlockParser;
      try {
        parser = await BlockParser.open(target, this.oracle.resolve(target));
      } catch (err: unknown) {
        errors.push(`Could not open ${quote(target)} ${context}: ${errorMessage(err)}.`);
        continue;
      }

      let found: AnnotationBlock | undefined;
      let failure: string[] | undefined;
      for (const result of parser) {
        if (!result.ok) {
          failure = result.errors;
          break;
        }
        if (result.block.name === obligation.name) {
          found = result.block;
          break;
        }
      }
      if (failure) {
        errors.push(...failure);
      } else if (!found) {
        errors.push(
          `Could not find "if-changed" with name ${quote(obligation.name ?? '')} in ${quote(target)} ${context}.`
        );
      } else if (!(await this.oracle.isRangeModified(target, found.range))) {
        errors.push(this.expected(target, obligation));
      }
    }
    return errors;
  }

  /**
   * Explains why a pattern selected no changed file: either nothing in the
   * tree matches it at all, or what matches was left untouched.
   */
  private async unmatched(obligation: ResolvedObligation): Promise<string> {
    const existing = await this.oracle.paths([obligation.resolved]);
    if (existing.length === 0) {
      return `Could not find any file matching ${quote(obligation.resolved)} for "then-change" in ${quote(this.file)} at line ${obligation.line}.`;
    }
    return this.expected(obligation.resolved, obligation);
  }

  private expected(target: string, obligation: Obligation): string {
    return `Expected ${quote(target)} to be modified because of "then-change" in ${quote(this.file)} at line ${obligation.line}.`;
  }
}
