// file: src/CheckEngine.ts
import * as fs from 'fs/promises';
import { BlockParser } from './BlockParser';
import { AnnotationBlock } from './BlockPrimitives';
import { validateBlockNames } from './BlockValidator';
import { ChangeOracle } from './ChangeOracle';
import { Checker } from './Checker';
import { progressLog } from './logger';

/**
 * Options shared by the check and scan drivers.
 */
export interface EngineOptions {
  /** Log every file as it is processed. */
  verbose?: boolean;
}

function hasCode(err: unknown, ...codes: string[]): boolean {
  return (
    typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string' && codes.includes(err.code)
  );
}

async function isDirectory(absolutePath: string): Promise<boolean> {
  try {
    return (await fs.stat(absolutePath)).isDirectory();
  } catch (err: unknown) {
    // Missing files are left to the Checker, which reports them
    if (hasCode(err, 'ENOENT', 'ENOTDIR')) {
      return false;
    }
    throw err;
  }
}

/**
 * Checks every changed file selected by `patterns` and yields each violation
 * as it is found. Exempt files, deleted files and directories are skipped.
 *
 * @param oracle - The change under test.
 * @param patterns - Ignore-file style selection of changed files; empty selects all of them.
 */
export async function* checkChanges(
  oracle: ChangeOracle,
  patterns: readonly string[],
  options: EngineOptions = {}
): AsyncGenerator<string, void, undefined> {
  const log = progressLog(options.verbose ?? false);
  for await (const result of oracle.match(patterns)) {
    if (!result.ok) {
      log(`No changed file matches ${JSON.stringify(result.pattern)}`);
      continue;
    }
    const file = result.path;
    if (oracle.isExempt(file)) {
      log(`Skipping exempt file: ${file}`);
      continue;
    }
    if (await oracle.isDeleted(file)) {
      log(`Skipping deleted file: ${file}`);
      continue;
    }
    if (await isDirectory(oracle.resolve(file))) {
      // A submodule whose recorded commit moved
      log(`Skipping directory: ${file}`);
      continue;
    }
    log(`Checking changed file: ${file}`);
    const outcome = await new Checker(oracle, file).check();
    if (!outcome.ok) {
      yield* outcome.errors;
    }
  }
}

/**
 * Validates annotation syntax in every file of the target tree selected by
 * `patterns`, changed or not: malformed blocks and duplicate block names.
 */
export async function* scanBlocks(
  oracle: ChangeOracle,
  patterns: readonly string[],
  options: EngineOptions = {}
): AsyncGenerator<string, void, undefined> {
  const log = progressLog(options.verbose ?? false);
  const files = await oracle.paths(patterns);
  for (const file of files) {
    let text: string;
    try {
      text = await fs.readFile(oracle.resolve(file), 'utf-8');
    } catch (err: unknown) {
      // Listed in the index but gone from disk, or a directory (submodule)
      if (hasCode(err, 'ENOENT', 'EISDIR')) {
        log(`Skipping unreadable file: ${file}`);
        continue;
      }
      throw err;
    }
    if (!text.includes('if-changed') && !text.includes('then-change')) {
      continue;
    }
    log(`Validating file: ${file}`);
    const blocks: AnnotationBlock[] = [];
    for (const result of new BlockParser(file, text)) {
      if (!result.ok) {
        yield* result.errors;
        break;
      }
      blocks.push(result.block);
    }
    const duplicates: string[] = [];
    validateBlockNames(blocks, file, msg => duplicates.push(msg));
    yield* duplicates;
  }
}
