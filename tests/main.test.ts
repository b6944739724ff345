import { parseCliArgs, runCheck } from '../src/main';
import { lines } from './support/fixtures';
import { TestRepo } from './support/gitRepo';

describe('parseCliArgs', () => {
  const saved = { from: process.env.PRE_COMMIT_FROM_REF, to: process.env.PRE_COMMIT_TO_REF };

  beforeEach(() => {
    delete process.env.PRE_COMMIT_FROM_REF;
    delete process.env.PRE_COMMIT_TO_REF;
  });

  afterAll(() => {
    if (saved.from !== undefined) process.env.PRE_COMMIT_FROM_REF = saved.from;
    if (saved.to !== undefined) process.env.PRE_COMMIT_TO_REF = saved.to;
  });

  it('defaults with no args', () => {
    expect(parseCliArgs([])).toEqual({
      warnMode: false,
      showHelp: false,
      verbose: false,
      scan: false,
      fromRef: undefined,
      toRef: undefined,
      patterns: []
    });
  });
  it('parses help flag', () => {
    expect(parseCliArgs(['--help']).showHelp).toBe(true);
    expect(parseCliArgs(['-h']).showHelp).toBe(true);
  });
  it('parses warn, verbose and scan flags', () => {
    const opts = parseCliArgs(['-w', '-v', '-s']);
    expect([opts.warnMode, opts.verbose, opts.scan]).toEqual([true, true, true]);
  });
  it('parses revisions', () => {
    const opts = parseCliArgs(['--from-ref', 'HEAD~2', '--to-ref=HEAD']);
    expect(opts.fromRef).toBe('HEAD~2');
    expect(opts.toRef).toBe('HEAD');
  });
  it('reads revisions from the environment', () => {
    process.env.PRE_COMMIT_FROM_REF = 'origin/main';
    process.env.PRE_COMMIT_TO_REF = 'topic';
    const opts = parseCliArgs([]);
    expect(opts.fromRef).toBe('origin/main');
    expect(opts.toRef).toBe('topic');
  });
  it('prefers revisions given on the command line', () => {
    process.env.PRE_COMMIT_FROM_REF = 'origin/main';
    expect(parseCliArgs(['--from-ref', 'HEAD~1']).fromRef).toBe('HEAD~1');
  });
  it('collects patterns in order', () => {
    expect(parseCliArgs(['src', '!src/gen', '-w', 'docs/*.md']).patterns).toEqual(['src', '!src/gen', 'docs/*.md']);
  });
  it('rejects missing revision values', () => {
    expect(parseCliArgs(['--from-ref']).error).toBe('Missing value for --from-ref');
    expect(parseCliArgs(['-v', '--to-ref']).error).toBe('Missing value for --to-ref');
  });
  it('rejects unknown options', () => {
    expect(parseCliArgs(['--bogus']).error).toMatch(/unknown option '--bogus'/);
  });
});

describe('runCheck', () => {
  jest.setTimeout(30000);
  let repo: TestRepo;
  let reported: string[];
  const report = (violation: string) => {
    reported.push(violation);
  };

  const before = lines('export const LEVELS = [', '  // if-changed', "  'info',", '  // then-change(b.ts)', '];');
  const after = lines('export const LEVELS = [', '  // if-changed', "  'info',", "  'warn',", '  // then-change(b.ts)', '];');

  beforeEach(async () => {
    reported = [];
    repo = await TestRepo.create();
    await repo.commit('initial', { 'a.ts': before, 'b.ts': 'export {};\n' });
  });

  afterEach(async () => {
    await repo.dispose();
  });

  it('passes a clean working copy', async () => {
    expect(await runCheck({ cwd: repo.dir, report })).toBe(0);
    expect(reported).toEqual([]);
  });

  it('reports a change of the working copy', async () => {
    await repo.write({ 'a.ts': after });
    expect(await runCheck({ cwd: repo.dir, report })).toBe(1);
    expect(reported).toEqual(['Expected "b.ts" to be modified because of "then-change" in "a.ts" at line 5.']);
  });

  it('reports a committed change', async () => {
    await repo.commit('second', { 'a.ts': after });
    expect(await runCheck({ cwd: repo.dir, fromRef: 'HEAD~1', toRef: 'HEAD', report })).toBe(1);
    expect(reported).toEqual(['Expected "b.ts" to be modified because of "then-change" in "a.ts" at line 5.']);
  });

  it('passes when both files changed', async () => {
    await repo.commit('second', { 'a.ts': after, 'b.ts': 'export const b = 1;\n' });
    expect(await runCheck({ cwd: repo.dir, fromRef: 'HEAD~1', toRef: 'HEAD', report })).toBe(0);
  });

  it('honors exemption trailers', async () => {
    await repo.commit(lines('second', '', 'ignore-if-changed: a.ts -- reordered'), { 'a.ts': after });
    expect(await runCheck({ cwd: repo.dir, fromRef: 'HEAD~1', toRef: 'HEAD', report })).toBe(0);
  });

  it('checks only the selected files', async () => {
    await repo.write({ 'a.ts': after });
    expect(await runCheck({ cwd: repo.dir, patterns: ['*.md'], report })).toBe(0);
  });

  it('scans every file for malformed blocks', async () => {
    await repo.commit('second', { 'c.ts': lines('// if-changed(x)', '// then-change(a.ts)', '// if-changed(x)') });
    expect(await runCheck({ cwd: repo.dir, scan: true, report })).toBe(1);
    expect(reported).toEqual(['Missing "then-change" for "if-changed" at line 3 for "c.ts".']);
  });

  it('rejects invalid revisions', async () => {
    await expect(runCheck({ cwd: repo.dir, fromRef: 'nope', report })).rejects.toThrow(
      '"nope" is not a valid revision.'
    );
  });
});
