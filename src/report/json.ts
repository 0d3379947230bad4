import { mkdir, rename, rm, writeFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { debug } from '../debug.js';
import type { AnalysisReport } from '../domain/types.js';

// JSON has no Infinity or NaN; the report contract writes them as null.
const finiteReplacer = (_key: string, value: unknown): unknown =>
  typeof value === 'number' && !Number.isFinite(value) ? null : value;

export const serializeReport = (report: AnalysisReport): string => `${JSON.stringify(report, finiteReplacer, 2)}\n`;

/** Writes beside the target and renames, so readers never see a partial document. */
export const writeJsonReport = async (outputPath: string, report: AnalysisReport): Promise<string> => {
  const abs = resolve(outputPath);
  debug('writeJsonReport start', { abs, recommendations: report.recommendations.length });
  await mkdir(dirname(abs), { recursive: true });
  const tmp = `${abs}.${process.pid}.tmp`;
  try {
    await writeFile(tmp, serializeReport(report), 'utf8');
    await rename(tmp, abs);
  } catch (error) {
    await rm(tmp, { force: true });
    throw error;
  }
  debug('writeJsonReport end', { abs });
  return abs;
};
