/**
 * Shared types for the YouTube module
 */
import type { CrawlNode } from '../crawl/types.js';

/** A video as returned by the Data API, flattened from its snippet. */
export interface VideoRecord {
  id: string;
  title: string;
  description: string;
  channelId: string;
  channelTitle: string;
  publishedAt: string;
}

export type VideoNode = CrawlNode<VideoRecord>;

export type SafeSearch = 'none' | 'moderate' | 'strict';

/** Result filters understood by the search endpoint. */
export interface SearchFilters {
  regionCode?: string;
  relevanceLanguage?: string;
  safeSearch?: SafeSearch;
}

/** The remote operations the crawler needs. */
export interface VideoSource {
  /** At most `count` videos matching `query`, in relevance order. */
  search(query: string, count: number, filters?: SearchFilters): Promise<VideoRecord[]>;
  /** The video with `id`: zero or one record. */
  videoInfo(id: string): Promise<VideoRecord[]>;
  /** At most `count` videos related to `id`, in relevance order. */
  related(id: string, count: number, filters?: SearchFilters): Promise<VideoRecord[]>;
}

export interface ClientOptions {
  preset?: string;
  timeoutMs?: number;
  proxy?: string;
  baseUrl?: string;
}
