/**
 * Plain-text tree rendering of a crawl for terminal output
 */
import type { VideoNode } from '../youtube/types.js';

const INDENT = '    ';

function renderNode(node: VideoNode): string[] {
  const pad = INDENT.repeat(node.depth);
  const related = node.relatedIds.length > 0 ? node.relatedIds.join(', ') : '-';
  return [
    `${pad}Depth: ${node.depth}, Rank: ${node.rank}, ID: ${node.id}`,
    `${pad}    Title: ${node.title}`,
    `${pad}    Related Videos: ${related}`,
  ];
}

/** Nodes in traversal order, each indented by its depth. */
export function renderTree(nodes: readonly VideoNode[]): string {
  return nodes.flatMap(renderNode).join('\n');
}
