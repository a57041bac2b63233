/**
 * Types for the crawl module
 */

/** Anything the related-items relation can return. */
export interface CrawlRecord {
  id: string;
}

/** Position of a record in the traversal: rank among its siblings, BFS level. */
export interface Placement {
  rank: number;
  depth: number;
}

export type PlacedRecord<R extends CrawlRecord> = R & Placement;

/** A visited record, terminal once emitted. */
export type CrawlNode<R extends CrawlRecord> = PlacedRecord<R> & {
  relatedIds: string[];
};

export interface TraversalConfig {
  maxDepth: number;
  /** Branching factor per depth; the last entry applies to every deeper level. */
  branchCounts: readonly number[];
}

/** Configuration as it arrives from the config file or the command line. */
export interface RawTraversalConfig {
  maxDepth: number | string;
  branchCounts: number | string | readonly (number | string)[];
}

/**
 * Fetches at most `count` records related to `id`, in rank order.
 * Failures propagate out of the traversal unchanged.
 */
export type FetchRelated<R extends CrawlRecord> = (id: string, count: number) => Promise<R[]>;
