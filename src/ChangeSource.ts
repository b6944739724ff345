// file: src/ChangeSource.ts
import { ChangedFile, FilePatch } from './DiffParser';

/**
 * A pair of tree snapshots as seen by the {@link ChangeOracle}.
 *
 * Implementations may recompute on every call; the oracle caches results for
 * the duration of a run.
 */
export interface ChangeSource {
  /** Absolute working root, or undefined for a repository without one. */
  readonly root?: string;
  /** Patterns of paths exempted from checking for this change. */
  readonly exemptPatterns: readonly string[];
  /** Every changed path, sorted by path. */
  changedFiles(): Promise<ChangedFile[]>;
  /** Line-level changes of one path, if it has any. */
  filePatch(path: string): Promise<FilePatch | undefined>;
  /** Every file of the target snapshot. */
  treeFiles(): Promise<string[]>;
}
