// file: src/GitChangeSource.ts
import { ChangeSource } from './ChangeSource';
import { ChangedFile, ChangeStatus, FilePatch, parsePatches } from './DiffParser';
import { git, runGit, splitNul } from './git';
import { quote } from './BlockPrimitives';

const EXEMPTION_TRAILER = 'ignore-if-changed';

// Options shared by every diff we ask git for
const DIFF_OPTIONS = ['--no-color', '--no-ext-diff', '--no-textconv', '--no-renames'];

/**
 * Revisions to compare. Both are optional: the base defaults to HEAD and the
 * target to the working copy (staged changes included).
 */
export interface RevisionRange {
  fromRef?: string;
  toRef?: string;
}

/**
 * Extracts exempted patterns from `ignore-if-changed` trailers.
 *
 * The value is a comma-separated pattern list, optionally followed by `--`
 * and a free-text justification, e.g. `ignore-if-changed: a.ts, b/ -- generated`.
 * @param trailers - Trailer lines as printed by `git log --format=%(trailers)`.
 */
export function parseExemptionTrailers(trailers: string): string[] {
  const patterns: string[] = [];
  for (const line of trailers.split(/\r?\n/)) {
    const colon = line.indexOf(':');
    if (colon === -1 || line.slice(0, colon).trim().toLowerCase() !== EXEMPTION_TRAILER) {
      continue;
    }
    let value = line.slice(colon + 1);
    const reason = value.indexOf('--');
    if (reason !== -1) {
      value = value.slice(0, reason);
    }
    patterns.push(...value.split(',').map(s => s.trim()).filter(s => s.length > 0));
  }
  return patterns;
}

function toStatus(letter: string): ChangeStatus {
  switch (letter.charAt(0)) {
    case 'A':
      return 'added';
    case 'D':
      return 'deleted';
    default:
      return 'modified';
  }
}

async function resolveTree(cwd: string, ref: string): Promise<string | undefined> {
  const { code, stdout } = await runGit(['rev-parse', '--verify', '--quiet', `${ref}^{tree}`], cwd);
  return code === 0 ? stdout.trim() : undefined;
}

/**
 * Change source backed by a git repository, driven through the git executable.
 */
export class GitChangeSource implements ChangeSource {
  private constructor(
    /** Directory git commands run in. */
    private readonly cwd: string,
    readonly root: string | undefined,
    private readonly fromTree: string,
    private readonly toTree: string | undefined,
    readonly exemptPatterns: readonly string[]
  ) {}

  /**
   * Opens the repository containing `cwd` and resolves the revisions to compare.
   * Rejects when the repository cannot be opened or a revision is invalid.
   */
  static async open(cwd: string, range: RevisionRange = {}): Promise<GitChangeSource> {
    const bare = await runGit(['rev-parse', '--is-bare-repository'], cwd);
    if (bare.code !== 0) {
      throw new Error(`Could not open the repository at ${quote(cwd)}: ${bare.stderr.trim()}`);
    }
    const isBare = bare.stdout.trim() === 'true';
    if (isBare && range.toRef === undefined) {
      throw new Error('Bare repositories are not supported.');
    }
    const root = isBare ? undefined : (await git(['rev-parse', '--show-toplevel'], cwd)).trim();
    const workDir = root ?? cwd;

    let fromTree = await resolveTree(workDir, range.fromRef ?? 'HEAD');
    if (fromTree === undefined && range.fromRef === undefined) {
      // No commit yet: everything in the working copy is new
      fromTree = (await git(['hash-object', '-t', 'tree', '--stdin'], workDir, '')).trim();
    }
    if (fromTree === undefined) {
      throw new Error(`${quote(range.fromRef ?? 'HEAD')} is not a valid revision.`);
    }

    let toTree: string | undefined;
    let exemptPatterns: string[] = [];
    if (range.toRef !== undefined) {
      toTree = await resolveTree(workDir, range.toRef);
      if (toTree === undefined) {
        throw new Error(`${quote(range.toRef)} is not a valid revision.`);
      }
      exemptPatterns = await readExemptions(workDir, range.toRef);
    }
    return new GitChangeSource(workDir, root, fromTree, toTree, exemptPatterns);
  }

  private revisions(): string[] {
    return this.toTree === undefined ? [this.fromTree] : [this.fromTree, this.toTree];
  }

  async changedFiles(): Promise<ChangedFile[]> {
    const fields = splitNul(
      await git(['diff', ...DIFF_OPTIONS, '--name-status', '-z', ...this.revisions(), '--'], this.cwd)
    );
    const files: ChangedFile[] = [];
    for (let i = 0; i + 1 < fields.length; i += 2) {
      files.push({ path: fields[i + 1], status: toStatus(fields[i]) });
    }
    if (this.toTree === undefined) {
      const untracked = splitNul(await git(['ls-files', '--others', '--exclude-standard', '-z'], this.cwd));
      for (const path of untracked) {
        files.push({ path, status: 'added' });
      }
    }
    return files.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
  }

  async filePatch(path: string): Promise<FilePatch | undefined> {
    const diff = await git(
      [
        '--literal-pathspecs',
        'diff',
        ...DIFF_OPTIONS,
        '-U0',
        '--src-prefix=a/',
        '--dst-prefix=b/',
        ...this.revisions(),
        '--',
        path
      ],
      this.cwd
    );
    // The diff is restricted to this one path, whatever name git printed for it
    const [patch] = parsePatches(diff).values();
    return patch === undefined ? undefined : { ...patch, path };
  }

  async treeFiles(): Promise<string[]> {
    let files: string[];
    if (this.toTree === undefined) {
      const listed = splitNul(await git(['ls-files', '--cached', '--others', '--exclude-standard', '-z'], this.cwd));
      // Still in the index but gone from the working copy
      const deleted = new Set(splitNul(await git(['ls-files', '--deleted', '-z'], this.cwd)));
      files = listed.filter(file => !deleted.has(file));
    } else {
      files = splitNul(await git(['ls-tree', '-r', '--name-only', '-z', this.toTree], this.cwd));
    }
    return Array.from(new Set(files)).sort();
  }
}

async function readExemptions(cwd: string, toRef: string): Promise<string[]> {
  const commit = await runGit(['rev-parse', '--verify', '--quiet', `${toRef}^{commit}`], cwd);
  // A tree has no message to carry trailers
  if (commit.code !== 0) {
    return [];
  }
  const trailers = await git(['log', '-1', '--format=%(trailers:only,unfold)', commit.stdout.trim()], cwd);
  return parseExemptionTrailers(trailers);
}
