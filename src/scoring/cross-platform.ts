import type { Platform, WorkflowRecord } from '../records/types.js';

export interface CrossPlatformScore {
  workflow: string;
  platforms: Platform[];
  total_views: number;      // YouTube + Discourse views, all markets
  total_search_volume: number;
  score: number;            // platforms × log10(1 + views + search volume)
}

function numeric(value: number | string | undefined): number {
  return typeof value === 'number' && Number.isFinite(value) ? value : 0;
}

/**
 * Group stored records by workflow name (case-insensitive) and score how
 * broadly each one shows up. Breadth across platforms dominates; raw reach
 * only separates workflows with the same breadth.
 */
export function computeCrossPlatformScores(records: WorkflowRecord[]): CrossPlatformScore[] {
  const groups = new Map<string, { name: string; platforms: Set<Platform>; views: number; searches: number }>();

  for (const record of records) {
    const key = record.workflow_name.trim().toLowerCase();
    const group = groups.get(key) ?? { name: record.workflow_name.trim(), platforms: new Set<Platform>(), views: 0, searches: 0 };
    group.platforms.add(record.platform);
    group.views += numeric(record.popularity_metrics.views);
    group.searches += numeric(record.popularity_metrics.search_volume);
    groups.set(key, group);
  }

  const scores: CrossPlatformScore[] = [];
  for (const group of groups.values()) {
    const platforms = [...group.platforms].sort();
    const reach = Math.log10(1 + group.views + group.searches);
    scores.push({
      workflow: group.name,
      platforms,
      total_views: group.views,
      total_search_volume: group.searches,
      score: Math.round(platforms.length * reach * 100) / 100,
    });
  }

  // Sort by score descending, name as tie-breaker
  scores.sort((a, b) => b.score - a.score || a.workflow.localeCompare(b.workflow));

  return scores;
}

/**
 * Render workflows that appear on at least two platforms.
 */
export function formatCrossPlatform(scores: CrossPlatformScore[], top = 10): string {
  const broad = scores.filter((s) => s.platforms.length >= 2);
  if (broad.length === 0) return '';

  const lines = broad
    .slice(0, top)
    .map((s) => `- "${s.workflow}" score ${s.score} on ${s.platforms.join('+')} (${s.total_views} views, ${s.total_search_volume} searches/mo)`);

  return `### Cross-platform workflows\n${lines.join('\n')}\n`;
}
