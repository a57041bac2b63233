/**
 * tube-trail - breadth-first crawler for YouTube's related-videos graph.
 *
 * @module tube-trail
 */
export {
  branchCountAt,
  normalizeTraversalConfig,
  placeSeeds,
  traverse,
  walk,
  runSearch,
  parseSeedSpec,
  extractVideoId,
} from './crawl/index.js';
export { authenticate, YouTubeClient } from './youtube/api.js';
export { closeAllSessions } from './youtube/http-client.js';
export { loadConfig, writeConfig, resolveConfigPath } from './config/config-file.js';
export { DEFAULT_OPTIONS, mergeOptions, parseOptionValue } from './config/options.js';
export { exportToCsv, filterText, normalizeNodeText, renderTree } from './export/index.js';
export { createRunContext } from './logger.js';
export { TubeTrailError, ConfigError, InputError, AuthError, CollaboratorError } from './errors.js';
export type {
  CrawlNode,
  CrawlRecord,
  FetchRelated,
  TraversalConfig,
  RawTraversalConfig,
  SearchMode,
  SearchRequest,
  SearchOutcome,
} from './crawl/index.js';
export type { VideoRecord, VideoNode, VideoSource, SearchFilters } from './youtube/types.js';
export type { SearchOptions, StoredConfig, TextEncoding } from './config/options.js';
export type { RunContext, CrawlLogger } from './logger.js';
