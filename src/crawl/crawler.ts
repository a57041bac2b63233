/**
 * Search orchestrator: resolve seeds, walk the related-videos graph,
 * re-encode text, then export or render.
 */
import { branchCountAt } from './branching.js';
import { normalizeTraversalConfig } from './traversal-config.js';
import { placeSeeds, traverse } from './traverse.js';
import type { TraversalConfig } from './types.js';
import { authenticate } from '../youtube/api.js';
import type {
  ClientOptions,
  SearchFilters,
  VideoNode,
  VideoRecord,
  VideoSource,
} from '../youtube/types.js';
import type { SearchOptions } from '../config/options.js';
import { exportToCsv } from '../export/csv-export.js';
import { normalizeNodeText } from '../export/text-encoding.js';
import { renderTree } from '../export/render.js';
import { InputError } from '../errors.js';
import type { RunContext } from '../logger.js';

export const SEARCH_MODES = ['term', 'url', 'id'] as const;
export type SearchMode = (typeof SEARCH_MODES)[number];

/** Where the crawl starts: a search query or one known video. */
export type SeedSpec = { kind: 'term'; query: string } | { kind: 'id'; id: string };

export interface SearchRequest {
  mode: SearchMode;
  query: string;
  options: SearchOptions;
  client?: ClientOptions;
}

export interface SearchOutcome {
  nodes: VideoNode[];
  /** Files written by the exporter; empty when nothing was exported. */
  exportedFiles: string[];
  /** Indented tree for the terminal, or null when output went to files only. */
  report: string | null;
}

export interface SearchDeps {
  connect: (apiKey: string, options?: ClientOptions) => VideoSource;
  exportNodes: (nodes: readonly VideoNode[], outputDir: string) => string[];
}

const defaultDeps: SearchDeps = {
  connect: authenticate,
  exportNodes: exportToCsv,
};

export function parseSearchMode(value: string): SearchMode {
  const mode = SEARCH_MODES.find((m) => m === value);
  if (!mode) {
    throw new InputError(
      `Wrong search type '${value}'. Expected one of: ${SEARCH_MODES.join(', ')}`
    );
  }
  return mode;
}

/** Resolves watch URLs given without a scheme, e.g. `www.youtube.com/watch?v=...`. */
const SCHEMELESS_BASE = 'https://www.youtube.com';

/** Pull the video id out of a watch URL's `v` query parameter. */
export function extractVideoId(url: string): string {
  let parsed: URL;
  try {
    parsed = new URL(url, SCHEMELESS_BASE);
  } catch {
    throw new InputError(`Invalid URL: ${url}`);
  }

  const id = parsed.searchParams.get('v');
  if (!id) {
    throw new InputError(`URL has no 'v' parameter identifying a video: ${url}`);
  }
  return id;
}

export function parseSeedSpec(mode: SearchMode, query: string): SeedSpec {
  switch (mode) {
    case 'term':
      return { kind: 'term', query };
    case 'id':
      return { kind: 'id', id: query };
    case 'url':
      return { kind: 'id', id: extractVideoId(query) };
  }
}

/** Map option names onto the API's filter parameters, skipping unset ones. */
export function toSearchFilters(options: SearchOptions): SearchFilters {
  const filters: SearchFilters = {};
  if (options.region_code) filters.regionCode = options.region_code;
  if (options.lang_code) filters.relevanceLanguage = options.lang_code;
  if (options.safe_search) filters.safeSearch = options.safe_search;
  return filters;
}

export async function resolveSeeds(
  spec: SeedSpec,
  source: VideoSource,
  config: TraversalConfig,
  filters: SearchFilters,
  ctx: RunContext
): Promise<VideoRecord[]> {
  if (spec.kind === 'term') {
    const count = branchCountAt(config.branchCounts, 0);
    ctx.logger.debug({ query: spec.query, count }, 'Searching seed videos');
    return source.search(spec.query, count, filters);
  }
  ctx.logger.debug({ id: spec.id }, 'Fetching seed video');
  return source.videoInfo(spec.id);
}

/**
 * Run one search end to end. Configuration and input problems are raised
 * before the API is touched; an API failure mid-crawl aborts the whole run.
 */
export async function runSearch(
  request: SearchRequest,
  ctx: RunContext,
  deps: SearchDeps = defaultDeps
): Promise<SearchOutcome> {
  const { options } = request;
  const config = normalizeTraversalConfig({
    maxDepth: options.max_depth,
    branchCounts: options.number,
  });
  const spec = parseSeedSpec(request.mode, request.query);

  ctx.logger.debug({ config, mode: request.mode }, 'Starting search');
  const source = deps.connect(options.api_key, request.client);
  const filters = toSearchFilters(options);

  const seeds = await resolveSeeds(spec, source, config, filters, ctx);
  if (seeds.length === 0) {
    ctx.logger.warn({ mode: request.mode, query: request.query }, 'No seed videos found');
  }

  const crawled = await traverse(
    placeSeeds(seeds),
    config,
    (id, count) => source.related(id, count, filters),
    ctx
  );
  const nodes = normalizeNodeText(crawled, options.encoding);
  ctx.logger.info({ nodes: nodes.length }, 'Search finished');

  let exportedFiles: string[] = [];
  if (options.output_dir && options.output_format === 'csv') {
    exportedFiles = deps.exportNodes(nodes, options.output_dir);
    ctx.logger.info({ files: exportedFiles }, 'Exported results');
  }

  const report = !options.output_dir || ctx.verbose ? renderTree(nodes) : null;
  return { nodes, exportedFiles, report };
}
