/**
 * CSV export of a crawl: one row per visited node, one row per edge.
 */
import { existsSync, mkdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import type { VideoNode } from '../youtube/types.js';

export const NODES_FILE = 'videos.csv';
export const EDGES_FILE = 'edges.csv';

const NODE_COLUMNS = [
  'depth',
  'rank',
  'videoId',
  'title',
  'channelId',
  'channelTitle',
  'publishedAt',
  'description',
  'relatedVideos',
] as const;

const EDGE_COLUMNS = ['source', 'target', 'rank'] as const;

/** Quote a field when it holds a delimiter, quote or line break. */
export function escapeCsvField(value: string | number): string {
  const text = String(value);
  if (/[",\r\n]/.test(text)) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}

function toCsv(header: readonly string[], rows: (string | number)[][]): string {
  const lines = [header, ...rows].map((row) => row.map(escapeCsvField).join(','));
  return lines.join('\n') + '\n';
}

export function nodesToCsv(nodes: readonly VideoNode[]): string {
  return toCsv(
    NODE_COLUMNS,
    nodes.map((node) => [
      node.depth,
      node.rank,
      node.id,
      node.title,
      node.channelId,
      node.channelTitle,
      node.publishedAt,
      node.description,
      node.relatedIds.join('|'),
    ])
  );
}

/** Parent -> child edges, ranked by the child's position under that parent. */
export function edgesToCsv(nodes: readonly VideoNode[]): string {
  const rows: (string | number)[][] = [];
  for (const node of nodes) {
    node.relatedIds.forEach((target, rank) => rows.push([node.id, target, rank]));
  }
  return toCsv(EDGE_COLUMNS, rows);
}

/**
 * Write the crawl into `outputDir`, creating it if needed.
 * Returns the paths written.
 */
export function exportToCsv(nodes: readonly VideoNode[], outputDir: string): string[] {
  if (!existsSync(outputDir)) {
    mkdirSync(outputDir, { recursive: true });
  }

  const nodesPath = join(outputDir, NODES_FILE);
  const edgesPath = join(outputDir, EDGES_FILE);
  writeFileSync(nodesPath, nodesToCsv(nodes), 'utf-8');
  writeFileSync(edgesPath, edgesToCsv(nodes), 'utf-8');
  return [nodesPath, edgesPath];
}
