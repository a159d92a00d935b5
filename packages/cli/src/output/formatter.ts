import type {
  AutoHealResult,
  CollectionHealthReport,
  CollectionInfo,
  MemoryHealthReport,
  MemoryLayerMapping,
  MemorySnapshot,
  NeuroSymbolicStats,
  Thought,
} from '@synaptic/shared';

export function truncate(str: string, max: number): string {
  if (str.length <= max) return str;
  return str.slice(0, max - 3) + '...';
}

export function formatCount(count: number): string {
  if (count < 1000) return String(count);
  if (count < 1_000_000) return `${(count / 1000).toFixed(1)}k`;
  return `${(count / 1_000_000).toFixed(2)}M`;
}

function pad(value: string, width: number): string {
  return value.padEnd(width);
}

export function formatCollectionTable(collections: CollectionInfo[]): string {
  if (collections.length === 0) return 'No collections.';
  const width = Math.max(4, ...collections.map((c) => c.name.length));
  const lines = [`${pad('NAME', width)}  ${pad('DIM', 5)}  ${pad('POINTS', 7)}  ${pad('DISTANCE', 9)}  STATUS`];
  for (const c of collections) {
    lines.push(
      `${pad(c.name, width)}  ${pad(String(c.vectorSize), 5)}  ${pad(formatCount(c.pointsCount), 7)}  ${pad(c.distanceMetric, 9)}  ${c.status}`,
    );
  }
  return lines.join('\n');
}

export function formatHealthReports(reports: CollectionHealthReport[]): string {
  if (reports.length === 0) return 'No collections.';
  const lines: string[] = [];
  for (const r of reports) {
    if (r.isHealthy) {
      lines.push(`[OK]   ${r.collectionName} (${r.actualDimension}d)`);
      continue;
    }
    lines.push(`[FAIL] ${r.collectionName}: ${r.issue ?? 'collection status is not green'}`);
    if (r.recommendation) lines.push(`       -> ${r.recommendation}`);
  }
  const unhealthy = reports.filter((r) => !r.isHealthy).length;
  lines.push('');
  lines.push(`${reports.length - unhealthy} healthy, ${unhealthy} unhealthy`);
  return lines.join('\n');
}

export function formatAutoHeal(result: AutoHealResult): string {
  if (result.healed.length === 0 && result.failed.length === 0) return 'Nothing to heal.';
  const lines = result.healed.map((name) => `[HEALED] ${name}`);
  for (const f of result.failed) lines.push(`[FAIL]   ${f.collection}: ${f.error}`);
  return lines.join('\n');
}

export function formatMemoryHealth(report: MemoryHealthReport): string {
  const lines = [
    '--- Memory Health ---',
    `Healthy:    ${report.healthyCollections}`,
    `Unhealthy:  ${report.unhealthyCollections}`,
    `Vectors:    ${formatCount(report.statistics.totalVectors)}`,
  ];
  if (report.healedCollections.length > 0) {
    lines.push(`Healed:     ${report.healedCollections.join(', ')}`);
  }
  return lines.join('\n');
}

export function formatLayers(mappings: MemoryLayerMapping[], counts: Record<string, number>): string {
  const lines: string[] = [];
  for (const m of mappings) {
    lines.push(`${m.layer} (priority ${m.retentionPriority.toFixed(2)}, ${formatCount(counts[m.layer] ?? 0)} vectors)`);
    lines.push(`  ${m.description}`);
    lines.push(`  ${m.collections.join(', ')}`);
  }
  return lines.join('\n');
}

export function formatSnapshot(snapshot: MemorySnapshot): string {
  const s = snapshot.statistics;
  const lines = [
    `--- Memory Snapshot (${snapshot.createdAt}) ---`,
    `Collections: ${s.totalCollections} (${s.healthyCollections} healthy)`,
    `Vectors:     ${formatCount(s.totalVectors)}`,
    `Links:       ${snapshot.links.length}`,
    '',
    'Vectors per layer:',
  ];
  for (const [layer, count] of Object.entries(snapshot.layerVectorCounts)) {
    lines.push(`  ${pad(layer, 16)} ${formatCount(count)}`);
  }
  return lines.join('\n');
}

export function formatThoughtLine(thought: Thought): string {
  const topic = thought.topic ? ` #${thought.topic}` : '';
  return `${thought.timestamp} [${thought.type}] ${truncate(thought.content, 80)}${topic} (${thought.id})`;
}

export function formatChain(chain: Thought[]): string {
  return chain.map((t) => `[${t.type}] ${truncate(t.content, 40)}`).join(' -> ');
}

export function formatNeuroStats(stats: NeuroSymbolicStats): string {
  const lines = [
    '--- Session Statistics ---',
    `Thoughts:   ${stats.totalThoughts}`,
    `Relations:  ${stats.totalRelations}`,
    `Results:    ${stats.totalResults}`,
    `Chains:     ${stats.causalChainCount} starts, avg length ${stats.averageChainLength.toFixed(2)} (sampled ${stats.sampledChainStarts})`,
  ];
  const byType = Object.entries(stats.thoughtsByType)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([type, n]) => `${type}=${n}`);
  if (byType.length > 0) lines.push(`By type:    ${byType.join(', ')}`);
  if (stats.oldest && stats.newest) lines.push(`Span:       ${stats.oldest} .. ${stats.newest}`);
  return lines.join('\n');
}
