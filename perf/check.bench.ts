import * as fs from 'fs/promises';
import { ChangeOracle } from '../src/ChangeOracle';
import { checkChanges, scanBlocks } from '../src/CheckEngine';
import { DiffChangeSource } from '../tests/support/DiffChangeSource';
import { generatePerfFiles, perfDiff } from './utils';

/**
 * Performance benchmarks: check and scan many files with if-changed blocks
 * and measure runtime and CPU usage.
 */
// Increase timeout for performance benchmarks
jest.setTimeout(120000);

async function measure(label: string, violations: () => AsyncIterable<string>): Promise<void> {
  const hrStart = process.hrtime();
  const cpuStart = process.cpuUsage();
  let count = 0;
  for await (const violation of violations()) {
    console.error(violation);
    count++;
  }
  const hrDiff = process.hrtime(hrStart);
  const cpuDiff = process.cpuUsage(cpuStart);
  const elapsedSec = hrDiff[0] + hrDiff[1] / 1e9;
  console.log(
    `${label} in ${elapsedSec.toFixed(3)}s; ` +
    `CPU user ${(cpuDiff.user / 1000).toFixed(1)}ms sys ${(cpuDiff.system / 1000).toFixed(1)}ms`
  );
  expect(count).toBe(0);
}

describe('benchmarks', () => {
  let tmpDir: string;
  let files: string[];

  beforeAll(async () => {
    ({ tmpDir, files } = await generatePerfFiles());
  });

  afterAll(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  test('checking a change to every file', async () => {
    const source = new DiffChangeSource(tmpDir, perfDiff(files));
    await measure(`Checked ${files.length} files`, () => checkChanges(new ChangeOracle(source), []));
  });

  test('scanning every file', async () => {
    const source = new DiffChangeSource(tmpDir, '', { treeFiles: files });
    await measure(`Scanned ${files.length} files`, () => scanBlocks(new ChangeOracle(source), []));
  });
});
