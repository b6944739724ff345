import { git, GitOutput, runGit, splitNul } from '../src/git';
import { TestRepo } from './support/gitRepo';

jest.setTimeout(60000);

describe('runGit', () => {
  let repo: TestRepo;

  beforeAll(async () => {
    repo = await TestRepo.create();
  });

  afterAll(async () => {
    await repo.dispose();
  });

  it('succeeds on every call of a command that never reads stdin', async () => {
    const outputs: GitOutput[] = [];
    for (let i = 0; i < 300; i++) {
      outputs.push(await runGit(['rev-parse', '--is-bare-repository'], repo.dir));
    }
    expect(outputs.filter(o => o.code !== 0 || o.stdout !== 'false\n')).toEqual([]);
  });

  it('writes input to commands that read stdin', async () => {
    // Object id of the empty tree
    expect(await git(['hash-object', '-t', 'tree', '--stdin'], repo.dir, '')).toBe(
      '4b825dc642cb6eb9a060e54bf8d69288fbee4904\n'
    );
  });

  it('reports a failing command by its exit code', async () => {
    const { code, stderr } = await runGit(['rev-parse', '--verify', '--quiet', 'nope'], repo.dir);
    expect(code).toBe(1);
    expect(stderr).toBe('');
  });

  it('rejects through git() with the command and its stderr', async () => {
    await expect(git(['cat-file', '-p', 'nope'], repo.dir)).rejects.toThrow(/^git cat-file failed with code 128: /);
  });
});

describe('splitNul', () => {
  it('drops the terminator after the last field', () => {
    expect(splitNul('a\0b c\0')).toEqual(['a', 'b c']);
    expect(splitNul('')).toEqual([]);
  });
});
