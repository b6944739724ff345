#!/usr/bin/env node
// file: src/main.ts
import { Command, Option } from 'commander';
import { ChangeOracle } from './ChangeOracle';
import { checkChanges, scanBlocks } from './CheckEngine';
import { GitChangeSource } from './GitChangeSource';
import { verboseLog } from './logger';

/**
 * Options of a single run, as parsed from the command line.
 */
export interface CliOptions {
  warnMode: boolean;
  showHelp: boolean;
  verbose: boolean;
  scan: boolean;
  /** Base revision; HEAD when absent. */
  fromRef?: string;
  /** Target revision; the working copy when absent. */
  toRef?: string;
  /** Ignore-file style patterns selecting the files to check. */
  patterns: string[];
  error?: string;
}

/**
 * Options for {@link runCheck}.
 */
export interface RunOptions {
  /** Directory inside the repository to check. */
  cwd: string;
  fromRef?: string;
  toRef?: string;
  patterns?: string[];
  verbose?: boolean;
  /** Validate annotation syntax of every selected file instead of checking the change. */
  scan?: boolean;
  /** Receives every violation; defaults to console.error. */
  report?: (violation: string) => void;
}

/**
 * Checks a change of the repository around `cwd` and returns an exit code.
 *
 * @returns Promise resolving to 0 when no violation was found, or 1 otherwise.
 *   Fatal problems (no repository, invalid revision) reject.
 */
export async function runCheck(options: RunOptions): Promise<number> {
  const report = options.report ?? ((violation: string) => console.error(violation));
  const source = await GitChangeSource.open(options.cwd, { fromRef: options.fromRef, toRef: options.toRef });
  const oracle = new ChangeOracle(source);
  if (options.verbose) {
    verboseLog(`Comparing ${options.fromRef ?? 'HEAD'} with ${options.toRef ?? 'the working copy'}`);
  }
  const patterns = options.patterns ?? [];
  const violations = options.scan
    ? scanBlocks(oracle, patterns, { verbose: options.verbose })
    : checkChanges(oracle, patterns, { verbose: options.verbose });
  let failed = false;
  for await (const violation of violations) {
    failed = true;
    report(violation);
  }
  return failed ? 1 : 0;
}

/**
 * Parses CLI arguments for the tool.
 * @param rawArgs - Array of arguments (excluding node and script path)
 * @returns Parsed options and any error message.
 */
export function parseCliArgs(rawArgs: string[]): CliOptions {
  const defaults: CliOptions = { warnMode: false, showHelp: false, verbose: false, scan: false, patterns: [] };

  // Report missing values ourselves so the message names the option
  for (let i = 0; i < rawArgs.length; i++) {
    const arg = rawArgs[i];
    if ((arg === '--from-ref' || arg === '--to-ref') && rawArgs[i + 1] === undefined) {
      return { ...defaults, error: `Missing value for ${arg}` };
    }
  }

  const program = new Command();
  program
    .helpOption(false)
    .exitOverride()
    .configureOutput({ writeErr: () => undefined });

  program
    .addOption(
      new Option('--from-ref <ref>', 'The revision to compare against (default: HEAD)').env('PRE_COMMIT_FROM_REF')
    )
    .addOption(
      new Option('--to-ref <ref>', 'The revision to compare with (default: the working copy)').env('PRE_COMMIT_TO_REF')
    )
    .option('-s, --scan', 'Validate if-changed/then-change syntax in every matching file')
    .option('-w, --warn', 'Report violations but exit with code 0')
    .option('-v, --verbose', 'Show verbose logging (files being processed)')
    .option('-h, --help', 'Show this help message and exit')
    .argument('[patterns...]', 'Files to check, in .gitignore syntax (default: all changed files)');

  try {
    program.parse(rawArgs, { from: 'user' });
  } catch (err: unknown) {
    return { ...defaults, error: err instanceof Error ? err.message : String(err) };
  }
  const opts = program.opts<{
    fromRef?: string;
    toRef?: string;
    scan?: boolean;
    warn?: boolean;
    verbose?: boolean;
    help?: boolean;
  }>();

  return {
    warnMode: !!opts.warn,
    showHelp: !!opts.help,
    verbose: !!opts.verbose,
    scan: !!opts.scan,
    fromRef: opts.fromRef,
    toRef: opts.toRef,
    patterns: [...program.args]
  };
}

const usage = [
  'Usage: if-changed [options] [patterns...]',
  '',
  'Checks that files named by "then-change" were modified whenever the',
  '"if-changed" block declaring them was.',
  '',
  'Options:',
  '  --from-ref <ref>  Revision to compare against (default: HEAD) [env: PRE_COMMIT_FROM_REF]',
  '  --to-ref <ref>    Revision to compare with (default: working copy) [env: PRE_COMMIT_TO_REF]',
  '  -s, --scan        Validate annotation syntax in every matching file',
  '  -w, --warn        Report violations but exit with code 0',
  '  -v, --verbose     Show verbose logging (files being processed)',
  '  -h, --help        Show this help message and exit',
  '',
  'Patterns follow .gitignore rules, matched from the repository root;',
  'a leading "!" re-includes what an earlier pattern excluded.'
].join('\n');

// Execute when run as a CLI script
if (require.main === module) {
  const { warnMode, showHelp, verbose, scan, fromRef, toRef, patterns, error } = parseCliArgs(process.argv.slice(2));
  if (showHelp) {
    console.log(usage);
    process.exit(0);
  }
  if (error) {
    console.error(error);
    console.log(usage);
    process.exit(2);
  }
  runCheck({ cwd: process.cwd(), fromRef, toRef, patterns, verbose, scan })
    .then(code => {
      if (warnMode && code === 1) {
        process.exit(0);
      }
      process.exit(code);
    })
    .catch((err: unknown) => {
      console.error(err instanceof Error ? err.stack ?? err.message : err);
      process.exit(2);
    });
}
