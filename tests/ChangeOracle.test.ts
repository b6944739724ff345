import { ChangeOracle, MatchResult } from '../src/ChangeOracle';
import { DiffChangeSource } from './support/DiffChangeSource';

function modify(file: string, ...hunk: string[]): string[] {
  return [`--- a/${file}`, `+++ b/${file}`, ...hunk];
}

const DIFF = [
  ...modify('src/b.ts', '@@ -1 +1 @@', '-old', '+new'),
  ...modify('src/a.ts', '@@ -1 +1 @@', '-old', '+new'),
  ...modify('range.txt', '@@ -9,0 +10,3 @@', '+one', '+two', '+three'),
  ...modify('cut.txt', '@@ -10 +9,0 @@', '-gone'),
  '--- a/gone.ts',
  '+++ /dev/null',
  '@@ -1 +0,0 @@',
  '-bye',
  '--- /dev/null',
  '+++ b/fresh.ts',
  '@@ -0,0 +1 @@',
  '+hi'
].join('\n');

async function collect(results: AsyncIterable<MatchResult>): Promise<MatchResult[]> {
  const all: MatchResult[] = [];
  for await (const result of results) {
    all.push(result);
  }
  return all;
}

describe('ChangeOracle', () => {
  const source = (options: ConstructorParameters<typeof DiffChangeSource>[2] = {}) =>
    new DiffChangeSource('/repo', DIFF, options);

  describe('match', () => {
    it('yields every changed path in order with no patterns', async () => {
      const oracle = new ChangeOracle(source({ untracked: ['notes.md'] }));
      expect(await collect(oracle.match([]))).toEqual([
        { ok: true, path: 'cut.txt' },
        { ok: true, path: 'fresh.ts' },
        { ok: true, path: 'gone.ts' },
        { ok: true, path: 'notes.md' },
        { ok: true, path: 'range.txt' },
        { ok: true, path: 'src/a.ts' },
        { ok: true, path: 'src/b.ts' }
      ]);
    });

    it('reports a negated pattern, as given, as selecting nothing', async () => {
      const oracle = new ChangeOracle(source());
      expect(await collect(oracle.match(['src/*', '!src/b.ts']))).toEqual([
        { ok: true, path: 'src/a.ts' },
        { ok: false, pattern: '!src/b.ts' }
      ]);
    });

    it('lets a later pattern include a path again', async () => {
      const oracle = new ChangeOracle(source());
      expect(await collect(oracle.match(['src', '!src/b.ts', 'src/b.ts']))).toEqual([
        { ok: true, path: 'src/a.ts' },
        { ok: true, path: 'src/b.ts' },
        { ok: false, pattern: '!src/b.ts' }
      ]);
    });

    it('reports patterns that select no changed path', async () => {
      const oracle = new ChangeOracle(source());
      expect(await collect(oracle.match(['docs/*.md', 'fresh.ts']))).toEqual([
        { ok: true, path: 'fresh.ts' },
        { ok: false, pattern: 'docs/*.md' }
      ]);
    });

    it('keeps * within one directory', async () => {
      const oracle = new ChangeOracle(source());
      expect(await collect(oracle.match(['*.ts']))).toEqual([
        { ok: true, path: 'fresh.ts' },
        { ok: true, path: 'gone.ts' }
      ]);
    });
  });

  describe('paths', () => {
    it('lists the target tree, changed or not', async () => {
      const oracle = new ChangeOracle(source({ treeFiles: ['README.md', 'src/a.ts', 'src/c.ts'] }));
      expect(await oracle.paths([])).toEqual(['README.md', 'src/a.ts', 'src/c.ts']);
      expect(await oracle.paths(['src', '!src/a.ts'])).toEqual(['src/c.ts']);
    });

    it('defaults to the surviving paths of the diff', async () => {
      const oracle = new ChangeOracle(source());
      expect(await oracle.paths(['*.ts'])).toEqual(['fresh.ts']);
    });
  });

  describe('isRangeModified', () => {
    it('compares added lines against the new line numbers', async () => {
      const oracle = new ChangeOracle(source());
      expect(await oracle.isRangeModified('range.txt', { startLine: 12, endLine: 20 })).toBe(true);
      expect(await oracle.isRangeModified('range.txt', { startLine: 1, endLine: 9 })).toBe(false);
      expect(await oracle.isRangeModified('range.txt', { startLine: 13, endLine: 20 })).toBe(false);
    });

    it('compares removed lines against the old line numbers', async () => {
      const oracle = new ChangeOracle(source());
      expect(await oracle.isRangeModified('cut.txt', { startLine: 10, endLine: 20 })).toBe(true);
      expect(await oracle.isRangeModified('cut.txt', { startLine: 1, endLine: 9 })).toBe(false);
    });

    it('considers every range of an added file modified', async () => {
      const oracle = new ChangeOracle(source({ untracked: ['notes.md'] }));
      expect(await oracle.isRangeModified('fresh.ts', { startLine: 40, endLine: 50 })).toBe(true);
      expect(await oracle.isRangeModified('notes.md', { startLine: 1, endLine: 1 })).toBe(true);
    });

    it('considers unchanged files unmodified', async () => {
      const oracle = new ChangeOracle(source());
      expect(await oracle.isRangeModified('README.md', { startLine: 1, endLine: 100 })).toBe(false);
    });

    it('asks the source for each patch once', async () => {
      const changes = source();
      const spy = jest.spyOn(changes, 'filePatch');
      const oracle = new ChangeOracle(changes);
      await oracle.isRangeModified('src/a.ts', { startLine: 1, endLine: 1 });
      await oracle.isRangeModified('src/a.ts', { startLine: 5, endLine: 6 });
      expect(spy).toHaveBeenCalledTimes(1);
    });
  });

  it('knows deleted files', async () => {
    const oracle = new ChangeOracle(source());
    expect(await oracle.isDeleted('gone.ts')).toBe(true);
    expect(await oracle.isDeleted('src/a.ts')).toBe(false);
    expect(await oracle.isDeleted('README.md')).toBe(false);
  });

  it('matches exemptions like any other pattern', () => {
    const oracle = new ChangeOracle(source({ exemptPatterns: ['c/a'] }));
    expect(oracle.isExempt('c/a')).toBe(true);
    expect(oracle.isExempt('c/a/b')).toBe(true);
    expect(oracle.isExempt('a')).toBe(false);
  });

  describe('resolve', () => {
    it('joins paths to the root', () => {
      expect(new ChangeOracle(source()).resolve('src/a.ts')).toBe('/repo/src/a.ts');
    });

    it('throws without a working root', () => {
      const oracle = new ChangeOracle(new DiffChangeSource(undefined, DIFF));
      expect(() => oracle.resolve('src/a.ts')).toThrow('Bare repositories are not supported.');
    });
  });
});
