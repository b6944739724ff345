// file: src/ChangeOracle.ts
import * as path from 'path';
import { LineRange } from './BlockPrimitives';
import { ChangeSource } from './ChangeSource';
import { ChangedFile, FilePatch } from './DiffParser';
import { PathPatternSet } from './PathPattern';

/**
 * A changed path selected by a pattern set, or a pattern that selected nothing.
 */
export type MatchResult =
  | { ok: true; path: string }
  | { ok: false; pattern: string };

/**
 * Answers questions about one change (a pair of snapshots) for a whole run.
 *
 * Everything derived from the source is computed on first use and kept;
 * nothing is ever invalidated since the snapshots do not move during a run.
 */
export class ChangeOracle {
  private readonly exempt: PathPatternSet;
  private changed?: Promise<Map<string, ChangedFile>>;
  private tree?: Promise<string[]>;
  private readonly patches = new Map<string, Promise<FilePatch | undefined>>();

  constructor(private readonly source: ChangeSource) {
    this.exempt = new PathPatternSet(source.exemptPatterns);
  }

  private changedFiles(): Promise<Map<string, ChangedFile>> {
    this.changed ??= this.source.changedFiles().then(files => new Map(files.map(f => [f.path, f])));
    return this.changed;
  }

  private treeFiles(): Promise<string[]> {
    this.tree ??= this.source.treeFiles();
    return this.tree;
  }

  private patch(file: string): Promise<FilePatch | undefined> {
    let patch = this.patches.get(file);
    if (!patch) {
      patch = this.source.filePatch(file);
      this.patches.set(file, patch);
    }
    return patch;
  }

  /**
   * Selects changed paths with ignore-file semantics: later patterns override
   * earlier ones and `!` patterns exclude again. A leading `/` anchors a
   * pattern to the root, which is where every pattern is matched from anyway.
   *
   * With no patterns every changed path is yielded. Otherwise the selected
   * paths come first, in diff order, followed by every pattern, as given,
   * that selected none of them. A `!` pattern never selects anything, so it is
   * always among those.
   */
  async *match(patterns: readonly string[]): AsyncGenerator<MatchResult, void, undefined> {
    const changed = await this.changedFiles();
    if (patterns.length === 0) {
      for (const file of changed.keys()) {
        yield { ok: true, path: file };
      }
      return;
    }
    const set = new PathPatternSet(patterns);
    const used = new Set<number>();
    for (const file of changed.keys()) {
      if (!set.matches(file)) continue;
      set.patterns.forEach((p, i) => {
        if (!p.negated && p.test(file)) used.add(i);
      });
      yield { ok: true, path: file };
    }
    for (const [i, p] of set.patterns.entries()) {
      if (!used.has(i)) {
        yield { ok: false, pattern: p.negated ? `!${p.pattern}` : p.pattern };
      }
    }
  }

  /**
   * Files of the target snapshot selected by the patterns, changed or not.
   * An empty pattern list selects every file.
   */
  async paths(patterns: readonly string[]): Promise<string[]> {
    const files = await this.treeFiles();
    if (patterns.length === 0) {
      return files;
    }
    const set = new PathPatternSet(patterns);
    return files.filter(f => set.matches(f));
  }

  /**
   * Whether any added or removed line of `file` falls inside `range`. Added
   * lines are compared by their new line number, removed lines by their old one.
   */
  async isRangeModified(file: string, range: LineRange): Promise<boolean> {
    const changed = (await this.changedFiles()).get(file);
    if (!changed) {
      return false;
    }
    if (changed.status === 'added') {
      return true;
    }
    const patch = await this.patch(file);
    if (!patch) {
      return false;
    }
    for (const hunk of patch.hunks) {
      // Hunks are sorted, nothing further down can touch the range
      if (hunk.newStart > range.endLine) {
        break;
      }
      if (hunk.newStart + hunk.newLines < range.startLine && hunk.oldStart + hunk.oldLines < range.startLine) {
        continue;
      }
      if (hunk.added.some(line => line >= range.startLine && line <= range.endLine)) {
        return true;
      }
      if (hunk.removed.some(line => line >= range.startLine && line <= range.endLine)) {
        return true;
      }
    }
    return false;
  }

  /** Whether the change deleted `file`. */
  async isDeleted(file: string): Promise<boolean> {
    return (await this.changedFiles()).get(file)?.status === 'deleted';
  }

  /** Whether the change exempts `file` from checking. */
  isExempt(file: string): boolean {
    return this.exempt.matches(file);
  }

  /**
   * Absolute location of a root-relative path.
   * @throws When the repository has no working root.
   */
  resolve(file: string): string {
    if (this.source.root === undefined) {
      throw new Error('Bare repositories are not supported.');
    }
    return path.join(this.source.root, file);
  }
}
