// file: src/BlockValidator.ts
import { AnnotationBlock, quote } from './BlockPrimitives';

/**
 * Validates that within a single file every `if-changed(name)` is unique, so a
 * named `then-change` can only ever refer to one block.
 * @param blocks Blocks parsed from the file, in order.
 * @param filePath Path to the file (used for error messages).
 * @param report Function to call for each validation error message.
 * @returns Number of validation errors found.
 */
export function validateBlockNames(
  blocks: AnnotationBlock[],
  filePath: string,
  report: (msg: string) => void
): number {
  const seen = new Set<string>();
  let errors = 0;
  for (const block of blocks) {
    if (block.name === undefined) {
      continue;
    }
    if (seen.has(block.name)) {
      report(
        `Duplicate "if-changed" name ${quote(block.name)} at line ${block.range.startLine} for ${quote(filePath)}.`
      );
      errors++;
    } else {
      seen.add(block.name);
    }
  }
  return errors;
}
