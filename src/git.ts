// file: src/git.ts
import { ChildProcessByStdio, spawn } from 'child_process';
import { Readable, Writable } from 'stream';

/**
 * Captured outcome of one git invocation.
 */
export interface GitOutput {
  code: number;
  stdout: string;
  stderr: string;
}

/**
 * Runs the git executable and collects its output. Only a failure to start
 * git rejects; a non-zero exit code is reported in the result.
 * @param args - Arguments passed to git.
 * @param cwd - Working directory for the command.
 * @param input - Text written to git's stdin.
 */
export async function runGit(args: string[], cwd: string, input?: string): Promise<GitOutput> {
  // stdin is only opened for commands that read it
  const git: ChildProcessByStdio<Writable | null, Readable, Readable> = input === undefined
    ? spawn('git', args, { cwd, stdio: ['ignore', 'pipe', 'pipe'] })
    : spawn('git', args, { cwd, stdio: ['pipe', 'pipe', 'pipe'] });
  let stdout = '';
  let stderr = '';
  git.stdout.setEncoding('utf-8');
  git.stderr.setEncoding('utf-8');
  git.stdout.on('data', (data: string) => { stdout += data; });
  git.stderr.on('data', (data: string) => { stderr += data; });
  const done = new Promise<GitOutput>((resolve, reject) => {
    git.on('error', err => reject(err));
    // git may exit before reading its input; the exit code still tells the outcome
    git.stdin?.on('error', err => {
      if (!('code' in err) || err.code !== 'EPIPE') reject(err);
    });
    git.on('close', code => resolve({ code: code ?? 1, stdout, stderr }));
  });
  git.stdin?.end(input);
  return await done;
}

/**
 * Runs git and returns its stdout, rejecting when it exits with a non-zero code.
 */
export async function git(args: string[], cwd: string, input?: string): Promise<string> {
  const { code, stdout, stderr } = await runGit(args, cwd, input);
  if (code !== 0) {
    throw new Error(`git ${args[0]} failed with code ${code}: ${stderr.trim()}`);
  }
  return stdout;
}

/**
 * Splits NUL-terminated output (`-z`) into its fields.
 */
export function splitNul(output: string): string[] {
  const fields = output.split('\0');
  if (fields.length > 0 && fields[fields.length - 1] === '') {
    fields.pop();
  }
  return fields;
}
