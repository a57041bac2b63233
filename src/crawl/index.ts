/**
 * Crawl module barrel exports
 */
export { branchCountAt } from './branching.js';
export { normalizeTraversalConfig } from './traversal-config.js';
export { NodeFrontier } from './frontier.js';
export { placeSeeds, traverse, walk } from './traverse.js';
export { runSearch, parseSearchMode, parseSeedSpec, extractVideoId } from './crawler.js';
export type { SearchMode, SearchRequest, SearchOutcome, SearchDeps, SeedSpec } from './crawler.js';
export type {
  CrawlNode,
  CrawlRecord,
  FetchRelated,
  Placement,
  PlacedRecord,
  RawTraversalConfig,
  TraversalConfig,
} from './types.js';
