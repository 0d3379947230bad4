// tests/smoke.test.ts
// Verifies the ESM import chain works end-to-end.
// If any import fails with ERR_MODULE_NOT_FOUND, the ESM config is broken.
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, describe, it, expect, vi } from 'vitest';

const tempPaths: string[] = [];

afterEach(async () => {
  vi.restoreAllMocks();
  for (const path of tempPaths.splice(0, tempPaths.length)) {
    await rm(path, { recursive: true, force: true });
  }
});

describe('build smoke test', () => {
  it('can import src/index.ts without resolution errors', async () => {
    const mod = await import('../src/index.js');
    expect(typeof mod.main).toBe('function');
    expect(typeof mod.run).toBe('function');
  });

  it('run() fails fast on missing config path', async () => {
    const { run } = await import('../src/index.js');
    await expect(run(['node', 'kube-capacity-advisor', '--config', './missing-config.yaml'])).rejects.toThrow(
      /Config file not found/,
    );
  });

  it('run() rejects an unknown environment', async () => {
    const { run } = await import('../src/index.js');
    await expect(run(['node', 'kube-capacity-advisor', '--snapshot', 'x.json', '--env', 'qa'])).rejects.toThrow(
      'Invalid --env value: qa',
    );
  });

  it('run() analyzes a snapshot file without a config', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'kube-capacity-advisor-'));
    tempPaths.push(dir);
    const snapshotPath = join(dir, 'snapshot.json');
    const outputPath = join(dir, 'report.json');
    await writeFile(snapshotPath, JSON.stringify({ cluster: 'smoke', env: 'prod' }), 'utf8');
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    const { run } = await import('../src/index.js');
    await run(['node', 'kube-capacity-advisor', '--snapshot', snapshotPath, '--output', outputPath]);

    const report: unknown = JSON.parse(await readFile(outputPath, 'utf8'));
    expect(report).toMatchObject({ cluster: 'smoke', env: 'prod', recommendations: [] });
    expect(log).toHaveBeenCalledWith('Recommendations generated: 0');
    expect(log).toHaveBeenCalledWith(`JSON report written to: ${outputPath}`);
  });
});
