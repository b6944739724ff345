import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';

/**
 * Creates a temporary directory holding the given files (paths relative to it).
 */
export async function writeTree(files: Record<string, string>, prefix = 'if-changed-'): Promise<string> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), prefix));
  for (const [file, content] of Object.entries(files)) {
    const target = path.join(dir, file);
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, content, 'utf-8');
  }
  return dir;
}

/**
 * Joins lines and terminates the last one, like a file saved by an editor.
 */
export function lines(...content: string[]): string {
  return content.join('\n') + '\n';
}
