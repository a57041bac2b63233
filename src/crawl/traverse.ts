/**
 * Breadth-first traversal of a related-items relation
 */
import { branchCountAt } from './branching.js';
import { NodeFrontier } from './frontier.js';
import type {
  CrawlNode,
  CrawlRecord,
  FetchRelated,
  PlacedRecord,
  TraversalConfig,
} from './types.js';
import type { RunContext } from '../logger.js';

/** Assign seed ranks in input order at depth 0. */
export function placeSeeds<R extends CrawlRecord>(records: readonly R[]): PlacedRecord<R>[] {
  return records.map((record, rank) => ({ ...record, rank, depth: 0 }));
}

/**
 * Walk the relation level by level starting from `seeds`.
 *
 * Yields every visited node in BFS visitation order once its `relatedIds`
 * are known. Nodes at `maxDepth` are yielded with no related ids and
 * `fetchRelated` is never called for them. One call per expanded node,
 * strictly sequential. A failing call ends the generator with that error;
 * whatever was yielded before it is the caller's to keep or drop.
 */
export async function* walk<R extends CrawlRecord>(
  seeds: readonly PlacedRecord<R>[],
  config: TraversalConfig,
  fetchRelated: FetchRelated<R>,
  ctx: RunContext
): AsyncGenerator<CrawlNode<R>> {
  const frontier = new NodeFrontier<R>(seeds);

  let entry = frontier.next();
  while (entry) {
    ctx.logger.debug(
      { id: entry.id, depth: entry.depth, rank: entry.rank, pending: frontier.pendingCount },
      'Processing node'
    );

    if (entry.depth >= config.maxDepth) {
      yield { ...entry, relatedIds: [] };
    } else {
      const count = branchCountAt(config.branchCounts, entry.depth);
      const children = await fetchRelated(entry.id, count);
      const depth = entry.depth + 1;

      frontier.addAll(children.map((child, rank) => ({ ...child, rank, depth })));
      yield { ...entry, relatedIds: children.map((child) => child.id) };
    }

    entry = frontier.next();
  }

  ctx.logger.debug({ visited: frontier.processedCount }, 'Traversal complete');
}

/** Run a full traversal and return the visited nodes in BFS order. */
export async function traverse<R extends CrawlRecord>(
  seeds: readonly PlacedRecord<R>[],
  config: TraversalConfig,
  fetchRelated: FetchRelated<R>,
  ctx: RunContext
): Promise<CrawlNode<R>[]> {
  const nodes: CrawlNode<R>[] = [];
  for await (const node of walk(seeds, config, fetchRelated, ctx)) {
    nodes.push(node);
  }
  return nodes;
}
