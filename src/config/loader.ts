import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { env } from 'node:process';
import yaml from 'js-yaml';
import { debug } from '../debug.js';
import { AppConfigSchema, resolveEngineConfig, type AppConfig, type ConfigOverrides, type EngineConfig } from './types.js';

const parseByExtension = (raw: string, path: string): unknown => {
  debug('parseByExtension start', { path });
  if (path.endsWith('.json')) {
    const parsed: unknown = JSON.parse(raw);
    debug('parseByExtension end', { format: 'json' });
    return parsed;
  }
  const parsed = yaml.load(raw);
  debug('parseByExtension end', { format: 'yaml' });
  return parsed;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export const loadConfig = async (configPath: string, overrides?: ConfigOverrides): Promise<AppConfig> => {
  debug('loadConfig start', { configPath, overrides });
  const absPath = resolve(configPath);

  let raw: string;
  try {
    raw = await readFile(absPath, 'utf8');
  } catch (error) {
    debug('loadConfig readFile failed', { absPath, error });
    throw new Error(`Config file not found: ${absPath}`);
  }

  let parsed: unknown;
  try {
    parsed = parseByExtension(raw, absPath);
  } catch (error) {
    debug('loadConfig parse failed', { absPath, error });
    throw new Error(`Invalid config format in ${absPath}`);
  }

  if (!isRecord(parsed)) {
    debug('loadConfig invalid parsed type', { parsedType: typeof parsed });
    throw new Error(`Invalid config format in ${absPath}`);
  }

  const configInput: Record<string, unknown> = { ...parsed };

  if (overrides?.window) {
    debug('loadConfig applying window override', { window: overrides.window });
    configInput.timeWindow = overrides.window;
  }

  if (overrides?.outputPath) {
    debug('loadConfig applying outputPath override', { outputPath: overrides.outputPath });
    configInput.outputPath = overrides.outputPath;
  }

  if (overrides?.htmlOutputPath) {
    debug('loadConfig applying htmlOutputPath override', { htmlOutputPath: overrides.htmlOutputPath });
    configInput.htmlOutputPath = overrides.htmlOutputPath;
  }

  if (overrides?.env) {
    debug('loadConfig applying env override', { env: overrides.env });
    configInput.env = overrides.env;
  }

  const token = env.PROMETHEUS_TOKEN?.trim();
  if (token) {
    const prometheus = isRecord(configInput.prometheus) ? configInput.prometheus : {};
    configInput.prometheus = { ...prometheus, token };
    debug('PROMETHEUS_TOKEN env override applied');
  }

  let config: AppConfig;
  try {
    config = AppConfigSchema.parse(configInput);
  } catch (error) {
    debug('loadConfig schema validation failed', { error });
    throw error;
  }

  debug('loadConfig end', {
    cluster: config.cluster,
    env: config.env,
    endpoint: config.prometheus.endpoint,
    timeWindow: config.timeWindow,
  });
  return config;
};

export const engineConfigFrom = (config: AppConfig): EngineConfig => resolveEngineConfig(config.thresholds);
