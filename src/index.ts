#!/usr/bin/env node
import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { Command } from 'commander';
import { engineConfigFrom, loadConfig } from './config/loader.js';
import { DEFAULT_ENGINE_CONFIG, EnvironmentSchema } from './config/types.js';
import type { AppConfig, EngineConfig } from './config/types.js';
import { debug, setDebugEnabled } from './debug.js';
import { analyzeCluster } from './domain/engine.js';
import { parseSnapshot } from './domain/snapshot.js';
import type { ClusterSnapshot } from './domain/snapshot.js';
import { PrometheusClient } from './prometheus/client.js';
import { collectSnapshot } from './prometheus/collector.js';
import { writeHtmlReport } from './report/html.js';
import { writeJsonReport } from './report/json.js';

const VERSION = '0.1.0';
const DEFAULT_CONFIG_PATH = 'config.yaml';
const DEFAULT_OUTPUT_PATH = './output/analysis.json';

interface CliOptions {
  config?: string;
  window?: string;
  output?: string;
  html?: string;
  env?: string;
  snapshot?: string;
  debug?: boolean;
}

const readSnapshot = async (path: string): Promise<ClusterSnapshot> => {
  const abs = resolve(path);
  let raw: string;
  try {
    raw = await readFile(abs, 'utf8');
  } catch (error) {
    debug('readSnapshot readFile failed', { abs, error });
    throw new Error(`Snapshot file not found: ${abs}`);
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    debug('readSnapshot parse failed', { abs, error });
    throw new Error(`Invalid snapshot JSON in ${abs}`);
  }
  return parseSnapshot(parsed);
};

export const run = async (argv: string[]): Promise<void> => {
  if (argv.includes('--debug') || argv.includes('-d')) {
    setDebugEnabled(true);
  }
  debug('run start', { argv });
  const program = new Command();

  program
    .name('kube-capacity-advisor')
    .description('Deterministic pod, node and HPA capacity recommendations from Prometheus telemetry')
    .version(VERSION)
    .option('-c, --config <path>', `config file path (default: ${DEFAULT_CONFIG_PATH})`)
    .option('-w, --window <window>', 'override time window, e.g. 7d or 24h')
    .option('-o, --output <path>', 'override JSON report path')
    .option('--html <path>', 'also write an HTML report')
    .option('-e, --env <env>', 'override environment: prod | nonprod')
    .option('--snapshot <path>', 'analyze a JSON cluster snapshot instead of querying Prometheus')
    .option('-d, --debug', 'enable debug logging');

  program.parse(argv);
  const opts = program.opts<CliOptions>();
  if (opts.debug) {
    setDebugEnabled(true);
  }
  debug('cli options parsed', opts);

  const envOverride = opts.env === undefined ? undefined : EnvironmentSchema.safeParse(opts.env);
  if (envOverride && !envOverride.success) {
    throw new Error(`Invalid --env value: ${opts.env}`);
  }

  // a snapshot run needs no config file unless one is named
  let config: AppConfig | undefined;
  if (!opts.snapshot || opts.config) {
    config = await loadConfig(opts.config ?? DEFAULT_CONFIG_PATH, {
      window: opts.window,
      outputPath: opts.output,
      htmlOutputPath: opts.html,
      env: opts.env,
    });
    debug('config loaded', {
      cluster: config.cluster,
      endpoint: config.prometheus.endpoint,
      timeWindow: config.timeWindow,
      outputPath: config.outputPath,
    });
  }
  const engineConfig: EngineConfig = config ? engineConfigFrom(config) : DEFAULT_ENGINE_CONFIG;

  let snapshot: ClusterSnapshot;
  if (opts.snapshot) {
    snapshot = await readSnapshot(opts.snapshot);
    if (envOverride?.success) snapshot = { ...snapshot, env: envOverride.data };
  } else if (config) {
    const client = new PrometheusClient(config.prometheus.endpoint, {
      token: config.prometheus.token,
      timeoutMs: config.prometheus.timeoutMs,
      retry: config.prometheus.retry,
    });
    snapshot = await collectSnapshot(client, {
      cluster: config.cluster,
      env: config.env,
      window: config.timeWindow,
      step: config.step,
      excludeNamespaces: config.excludeNamespaces,
    });
  } else {
    throw new Error('A config file or --snapshot is required');
  }

  const report = analyzeCluster(snapshot, engineConfig);
  const jsonPath = await writeJsonReport(opts.output ?? config?.outputPath ?? DEFAULT_OUTPUT_PATH, report);
  const htmlTarget = opts.html ?? config?.htmlOutputPath;
  const htmlPath = htmlTarget ? await writeHtmlReport(htmlTarget, report) : undefined;

  console.log(`Recommendations generated: ${report.summary.totalRecommendations}`);
  console.log(`Pods: ${report.summary.pods.text}`);
  console.log(`Nodes: ${report.summary.nodes.text}`);
  console.log(`HPA: ${report.summary.hpa.text}`);
  console.log(`Potential savings: ${report.summary.potentialSavings.text}`);
  console.log(`JSON report written to: ${jsonPath}`);
  if (htmlPath) console.log(`HTML report written to: ${htmlPath}`);
  debug('run end', { recommendations: report.recommendations.length, jsonPath, htmlPath });
};

export const main = async (): Promise<void> => {
  debug('main start');
  try {
    await run(process.argv);
    debug('main end success');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    debug('main end failure', { message });
    console.error(`Error: ${message}`);
    process.exitCode = 1;
  }
};

const isMain = import.meta.url === `file://${process.argv[1]}`;
if (isMain) {
  void main();
}
