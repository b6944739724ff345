// file: src/DiffParser.ts
// Parses unified diffs via the external parse-diff library (with hunk-aware sanitization)
import parseDiff from 'parse-diff';

/**
 * How a file was affected by a change.
 */
export type ChangeStatus = 'added' | 'deleted' | 'modified';

/**
 * A path touched by a change.
 */
export interface ChangedFile {
  path: string;
  status: ChangeStatus;
}

/**
 * One hunk of a file patch, with its changed line numbers resolved.
 */
export interface Hunk {
  oldStart: number;
  oldLines: number;
  newStart: number;
  newLines: number;
  /** Line numbers in the new file of every added line, ascending. */
  added: number[];
  /** Line numbers in the old file of every removed line, ascending. */
  removed: number[];
}

/**
 * The line-level changes of a single file.
 */
export interface FilePatch extends ChangedFile {
  /** Hunks in ascending order. */
  hunks: Hunk[];
}

const HUNK_HEADER = /^@@ -(\d+)(?:,(\d+))? \+(\d+)(?:,(\d+))? @@/;
const DEV_NULL = '/dev/null';

/**
 * Rewrites diff text so parse-diff only ever sees structure it can handle.
 *
 * Hunk bodies are tracked with the line counts of their `@@` header, so a
 * removed line such as `-- comment` (rendered `--- comment`) is never taken
 * for a file header. Content is reduced to the change marker since only line
 * numbers matter here, and "\ No newline at end of file" markers are dropped.
 */
function sanitize(diffText: string): string {
  const out: string[] = [];
  let oldRemaining = 0;
  let newRemaining = 0;
  for (const line of diffText.split(/\r?\n/)) {
    if (oldRemaining > 0 || newRemaining > 0) {
      const marker = line.charAt(0);
      if (marker === '\\') continue;
      if (marker === '-') {
        oldRemaining--;
        out.push('-');
      } else if (marker === '+') {
        newRemaining--;
        out.push('+');
      } else {
        oldRemaining--;
        newRemaining--;
        out.push(' ');
      }
      continue;
    }
    // drop main diff header lines; parse-diff starts a file on '--- ' anyway
    if (line.startsWith('diff ') || line.startsWith('\\')) continue;
    const header = HUNK_HEADER.exec(line);
    if (header) {
      oldRemaining = header[2] === undefined ? 1 : Number(header[2]);
      newRemaining = header[4] === undefined ? 1 : Number(header[4]);
    }
    out.push(line);
  }
  return out.join('\n');
}

/**
 * Normalizes a path as printed in a `---`/`+++` header: strips quotes, decodes
 * C-style octal escapes (e.g., \360) to UTF-8 and drops a single-character
 * prefix (e.g., 'a/', 'b/', 'c/', 'w/').
 */
export function decodeDiffPath(header: string): string {
  let raw = header.trim();
  if (raw === DEV_NULL) {
    return raw;
  }
  // Strip surrounding quotes if present
  if ((raw.startsWith('"') && raw.endsWith('"')) || (raw.startsWith("'") && raw.endsWith("'"))) {
    raw = raw.slice(1, -1);
  }
  const bytes: number[] = [];
  let i = 0;
  while (i < raw.length) {
    if (raw[i] === '\\') {
      let j = i + 1;
      let oct = '';
      // collect up to 3 octal digits
      while (j < raw.length && oct.length < 3 && /[0-7]/.test(raw[j])) {
        oct += raw[j];
        j++;
      }
      if (oct.length > 0) {
        bytes.push(parseInt(oct, 8));
        i = j;
        continue;
      }
      // \" and \\ stand for the character itself
      if (j < raw.length && (raw[j] === '"' || raw[j] === '\\')) {
        bytes.push(raw.charCodeAt(j));
        i = j + 1;
        continue;
      }
      bytes.push(raw.charCodeAt(i));
      i++;
    } else {
      const codePoint = raw.codePointAt(i) ?? 0;
      const char = String.fromCodePoint(codePoint);
      for (const b of Buffer.from(char, 'utf-8')) bytes.push(b);
      i += char.length;
    }
  }
  const decoded = Buffer.from(bytes).toString('utf-8');
  return decoded.length > 1 && decoded[1] === '/' ? decoded.slice(2) : decoded;
}

/**
 * Parses a unified diff and returns every file patch keyed by path, in diff order.
 * Deleted files are keyed by their old path.
 * @param diffText - The unified diff text to parse.
 */
export function parsePatches(diffText: string): Map<string, FilePatch> {
  const result = new Map<string, FilePatch>();
  for (const file of parseDiff(sanitize(diffText))) {
    const from = file.from ? decodeDiffPath(file.from) : undefined;
    const to = file.to ? decodeDiffPath(file.to) : undefined;
    let status: ChangeStatus = 'modified';
    let filePath = to;
    if (from === DEV_NULL) {
      status = 'added';
    } else if (to === DEV_NULL) {
      status = 'deleted';
      filePath = from;
    }
    // Skip entries without a usable path
    if (!filePath || filePath === DEV_NULL) {
      continue;
    }

    const hunks: Hunk[] = [];
    for (const chunk of file.chunks) {
      let oldLine = chunk.oldStart;
      let newLine = chunk.newStart;
      const hunk: Hunk = {
        oldStart: chunk.oldStart,
        oldLines: 0,
        newStart: chunk.newStart,
        newLines: 0,
        added: [],
        removed: []
      };
      for (const change of chunk.changes) {
        if (change.type === 'add') {
          hunk.added.push(newLine++);
          hunk.newLines++;
        } else if (change.type === 'del') {
          hunk.removed.push(oldLine++);
          hunk.oldLines++;
        } else {
          oldLine++;
          newLine++;
          hunk.oldLines++;
          hunk.newLines++;
        }
      }
      hunks.push(hunk);
    }
    result.set(filePath, { path: filePath, status, hunks });
  }
  return result;
}
