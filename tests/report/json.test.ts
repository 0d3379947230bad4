import { mkdtemp, readFile, readdir, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, describe, expect, it } from 'vitest';
import { analyzeCluster } from '../../src/domain/engine.js';
import { parseSnapshot } from '../../src/domain/snapshot.js';
import { serializeReport, writeJsonReport } from '../../src/report/json.js';

const tempPaths: string[] = [];

afterEach(async () => {
  for (const path of tempPaths.splice(0, tempPaths.length)) {
    await rm(path, { recursive: true, force: true });
  }
});

const report = analyzeCluster(parseSnapshot({ cluster: 'staging', env: 'prod' }));

describe('serializeReport', () => {
  it('writes non-finite numbers as null', () => {
    const text = serializeReport({ ...report, summary: { ...report.summary, fragmentedNodes: Number.POSITIVE_INFINITY } });
    expect(text).toContain('"fragmentedNodes": null');
    expect(text.endsWith('}\n')).toBe(true);
  });
});

describe('writeJsonReport', () => {
  it('creates parent directories and leaves no temp file behind', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'kube-capacity-advisor-'));
    tempPaths.push(dir);
    const target = join(dir, 'out', 'nested', 'report.json');

    const written = await writeJsonReport(target, report);

    expect(written).toBe(target);
    expect(await readdir(join(dir, 'out', 'nested'))).toEqual(['report.json']);
    const parsed: unknown = JSON.parse(await readFile(target, 'utf8'));
    expect(parsed).toEqual(JSON.parse(serializeReport(report)));
  });
});
