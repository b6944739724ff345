// Utility to generate a temp directory with many files containing if-changed blocks
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';

// Supported file extensions and which use hash-style comments
export const langs = [
  'ts', 'js', 'py', 'bzl', 'java', 'c', 'cpp', 'go', 'rs', 'rb', 'php', 'swift', 'kt', 'scala', 'sh'
];
export const hashLangs = new Set(['py', 'bzl', 'rb', 'sh']);

/** Lines of filler inside each block. */
export const FILLER_LINES = 100;

/**
 * Generates a temporary directory filled with files holding a pair of named
 * blocks that refer to each other, so changing both keeps the file valid.
 * @param options.prefix Prefix for mkdtemp (defaults to 'perf-').
 * @param options.totalFiles Number of files to create (defaults to 5000).
 * @returns Object with tmpDir and the created file names, relative to it.
 */
export async function generatePerfFiles(
  options?: { prefix?: string; totalFiles?: number }
): Promise<{ tmpDir: string; files: string[] }> {
  const prefix = options?.prefix ?? 'perf-';
  const totalFiles = options?.totalFiles ?? 5000;
  const tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), prefix));
  const files: string[] = [];
  for (let i = 0; i < totalFiles; i++) {
    const ext = langs[i % langs.length];
    const file = `file${i}.${ext}`;
    await fs.writeFile(path.join(tmpDir, file), blockText(ext, ['changed', 'changed']), 'utf-8');
    files.push(file);
  }
  return { tmpDir, files };
}

/**
 * Text of a generated file. `firstLines` are the first filler line of each block.
 */
export function blockText(ext: string, firstLines: [string, string]): string {
  const c = hashLangs.has(ext) ? '#' : '//';
  const lines: string[] = [];
  for (const [name, other, first] of [['one', 'two', firstLines[0]], ['two', 'one', firstLines[1]]]) {
    lines.push(`${c} if-changed(${name})`, first);
    for (let j = 1; j < FILLER_LINES; j++) {
      lines.push(c);
    }
    lines.push(`${c} then-change(:${other})`);
  }
  return lines.join('\n') + '\n';
}

/**
 * Unified diff changing the first filler line of both blocks of every file.
 */
export function perfDiff(files: string[]): string {
  const diffLines: string[] = [];
  // First filler line of each block
  const second = FILLER_LINES + 4;
  for (const file of files) {
    diffLines.push(`--- a/${file}`, `+++ b/${file}`);
    diffLines.push('@@ -2 +2 @@', '-original', '+changed');
    diffLines.push(`@@ -${second} +${second} @@`, '-original', '+changed');
  }
  return diffLines.join('\n');
}
