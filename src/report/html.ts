import { mkdir, writeFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { debug } from '../debug.js';
import type {
  AnalysisReport,
  HpaMisalignmentRecommendation,
  NodeFacts,
  NodeRightsizeRecommendation,
  PodResizeRecommendation,
} from '../domain/types.js';

const MIB = 1024 * 1024;

const f = (value: number | null | undefined, digits = 2): string =>
  typeof value === 'number' && Number.isFinite(value) ? value.toFixed(digits) : 'N/A';

const mib = (bytes: number | null | undefined): string =>
  typeof bytes === 'number' && Number.isFinite(bytes) ? `${(bytes / MIB).toFixed(0)}Mi` : 'N/A';

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export const esc = (value: string): string => value.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);

const safeLabel = (safe: boolean | 'partial_only'): string => (safe === 'partial_only' ? 'partial' : safe ? 'yes' : 'no');

const podRow = (rec: PodResizeRecommendation): string => `<tr data-risk="${esc(rec.safety.riskLevel)}">
<td>${esc(rec.namespace)}</td>
<td>${esc(rec.pod)}</td>
<td>${f(rec.current.cpuRequest, 3)}</td>
<td>${f(rec.recommended.cpuRequest, 3)}</td>
<td>${mib(rec.current.memoryRequest)}</td>
<td>${mib(rec.recommended.memoryRequest)}</td>
<td>${esc(rec.safety.riskLevel)}</td>
<td>${esc(rec.safety.confidenceLevel)}</td>
<td>${safeLabel(rec.safety.safeToResize)}</td>
<td>${esc(rec.explanation)}</td>
</tr>`;

const nodeSection = (rec: NodeRightsizeRecommendation | undefined): string => {
  if (!rec) return '<p>No node rightsizing recommendation.</p>';
  const m = rec.metrics;
  return `<div class="meta">
<div>Direction: <b>${esc(rec.direction)}</b> (${esc(rec.strategy)}, confidence ${esc(rec.confidence)})</div>
<div>Nodes: ${m.currentNodeCount} current, ${m.requiredNodes} required | Efficiency ${f(m.nodeEfficiency, 3)} (${esc(m.efficiencyState)})</div>
<div>Pressure: CPU ${f(m.cpuPressure, 3)}, memory ${f(m.memoryPressure, 3)} | Shape: ${esc(m.shape)}</div>
<div>${esc(rec.reason)}</div>
${rec.example ? `<div>Example: ${esc(rec.example)}</div>` : ''}
</div>`;
};

const hpaRow = (rec: HpaMisalignmentRecommendation): string => `<tr>
<td>${esc(rec.namespace)}</td>
<td>${esc(rec.hpa)}</td>
<td>${esc(rec.target.name)}</td>
<td>${rec.metrics.matchedPodCount}</td>
<td>${esc(rec.reasons.map((reason) => reason.code).join(', '))}</td>
<td>${esc(rec.flags.join(', '))}</td>
<td>${esc(rec.explanation)}</td>
</tr>`;

const fragmentationRow = (node: NodeFacts): string => {
  const attribution = node.fragmentationAttribution;
  if (!attribution) return '';
  return `<tr>
<td>${esc(node.node)}</td>
<td>${f(attribution.cpuFragmentation, 3)}</td>
<td>${f(attribution.memoryFragmentation, 3)}</td>
<td>${attribution.largeRequestPods.length}</td>
<td>${attribution.scaleDownBlockers.length}</td>
<td>${f(attribution.daemonsetOverhead.cpuPercent, 1)}% / ${f(attribution.daemonsetOverhead.memoryPercent, 1)}%</td>
</tr>`;
};

export const renderHtmlReport = (report: AnalysisReport): string => {
  const pods: PodResizeRecommendation[] = [];
  const hpas: HpaMisalignmentRecommendation[] = [];
  let node: NodeRightsizeRecommendation | undefined;
  for (const rec of report.recommendations) {
    if (rec.type === 'POD_RESIZE') pods.push(rec);
    else if (rec.type === 'HPA_MISALIGNMENT') hpas.push(rec);
    else node = rec;
  }

  const limitations = report.limitations.map((item) => `<li>${esc(item)}</li>`).join('\n');
  const { summary } = report;

  return `<!doctype html>
<html lang="en">
<head>
<meta charset="UTF-8" />
<meta name="viewport" content="width=device-width, initial-scale=1.0" />
<title>Capacity Report: ${esc(report.cluster)}</title>
<style>
:root{--bg:#f5f7fb;--card:#fff;--line:#d7dfeb;--text:#12243b;--muted:#4b607b;--accent:#0d6efd}
*{box-sizing:border-box}body{margin:0;background:var(--bg);font-family:system-ui,-apple-system,Segoe UI,sans-serif;color:var(--text)}
main{max-width:1300px;margin:24px auto;padding:0 16px}.card{background:var(--card);border:1px solid var(--line);border-radius:12px;padding:16px;margin-bottom:14px}
h1,h2{margin:0 0 10px 0}.meta{color:var(--muted);font-size:.9rem;display:grid;gap:3px}
table{width:100%;border-collapse:collapse;font-size:.88rem}th,td{padding:8px;border-bottom:1px solid var(--line);text-align:left;vertical-align:top}
th{background:#eff4fd;position:sticky;top:0}.table-wrap{overflow:auto;border:1px solid var(--line);border-radius:10px}
tr[data-risk="High"] td{background:#fff4f4}
</style>
</head>
<body>
<main>
<section class="card">
<h1>Capacity Recommendations</h1>
<div class="meta">
<div>Cluster: ${esc(report.cluster)} (${esc(report.env)})</div>
<div>Collected at: ${esc(report.generatedAt ?? 'N/A')}</div>
<div>Time window: ${esc(report.window ?? 'N/A')}</div>
<div>${esc(summary.pods.text)} | ${esc(summary.nodes.text)} | ${esc(summary.hpa.text)}</div>
<div>Potential savings: ${esc(summary.potentialSavings.text)}</div>
</div>
</section>
<section class="card">
<h2>Pod Resize (${pods.length})</h2>
<div class="table-wrap">
<table id="pods"><thead><tr><th>Namespace</th><th>Pod</th><th>CPU Req</th><th>CPU Reco</th><th>Mem Req</th><th>Mem Reco</th><th>Risk</th><th>Confidence</th><th>Safe</th><th>Explanation</th></tr></thead>
<tbody>${pods.map(podRow).join('\n')}</tbody></table>
</div>
</section>
<section class="card">
<h2>Node Rightsizing</h2>
${nodeSection(node)}
</section>
<section class="card">
<h2>HPA Misalignment (${hpas.length})</h2>
<div class="table-wrap">
<table id="hpas"><thead><tr><th>Namespace</th><th>HPA</th><th>Target</th><th>Pods</th><th>Reasons</th><th>Flags</th><th>Explanation</th></tr></thead>
<tbody>${hpas.map(hpaRow).join('\n')}</tbody></table>
</div>
</section>
<section class="card">
<h2>Fragmented Nodes (${summary.fragmentedNodes})</h2>
<div class="table-wrap">
<table id="fragmentation"><thead><tr><th>Node</th><th>CPU Frag</th><th>Mem Frag</th><th>Large Pods</th><th>Scale-down Blockers</th><th>DaemonSet Overhead</th></tr></thead>
<tbody>${report.nodes.map(fragmentationRow).join('')}</tbody></table>
</div>
</section>
<section class="card">
<h2>Limitations</h2>
<ul>${limitations}</ul>
</section>
</main>
</body>
</html>
`;
};

export const writeHtmlReport = async (outputPath: string, report: AnalysisReport): Promise<string> => {
  debug('writeHtmlReport start', { outputPath, recommendations: report.recommendations.length });
  const abs = resolve(outputPath);
  await mkdir(dirname(abs), { recursive: true });
  await writeFile(abs, renderHtmlReport(report), 'utf8');
  debug('writeHtmlReport end', { abs });
  return abs;
};
