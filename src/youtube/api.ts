/**
 * YouTube Data API v3 client.
 *
 * Wraps the `search` and `videos` endpoints behind VideoSource. Every failure
 * surfaces as AuthError (key missing or rejected) or CollaboratorError; nothing
 * is retried.
 */
import { z } from 'zod';
import { httpRequest, redactUrl } from './http-client.js';
import type { ClientOptions, SearchFilters, VideoRecord, VideoSource } from './types.js';
import { AuthError, CollaboratorError } from '../errors.js';
import { logger } from '../logger.js';

export const DEFAULT_API_BASE_URL = 'https://www.googleapis.com/youtube/v3';

/** Error reasons that mean the key itself was refused. */
const AUTH_REASONS = new Set(['keyInvalid', 'keyExpired', 'ipRefererBlocked']);

const SnippetSchema = z.object({
  title: z.string().optional(),
  description: z.string().optional(),
  channelId: z.string().optional(),
  channelTitle: z.string().optional(),
  publishedAt: z.string().optional(),
});

const SearchResponseSchema = z.object({
  items: z
    .array(
      z.object({
        id: z.object({ videoId: z.string().optional() }),
        snippet: SnippetSchema.optional(),
      })
    )
    .default([]),
});

const VideosResponseSchema = z.object({
  items: z
    .array(
      z.object({
        id: z.string(),
        snippet: SnippetSchema.optional(),
      })
    )
    .default([]),
});

const ErrorResponseSchema = z.object({
  error: z.object({
    code: z.number().optional(),
    message: z.string().optional(),
    errors: z.array(z.object({ reason: z.string().optional() })).optional(),
  }),
});

type Snippet = z.infer<typeof SnippetSchema>;

function toRecord(id: string, snippet: Snippet | undefined): VideoRecord {
  return {
    id,
    title: snippet?.title ?? '',
    description: snippet?.description ?? '',
    channelId: snippet?.channelId ?? '',
    channelTitle: snippet?.channelTitle ?? '',
    publishedAt: snippet?.publishedAt ?? '',
  };
}

function parseJson(body: string): unknown {
  try {
    return JSON.parse(body);
  } catch {
    return undefined;
  }
}

/** Turn a failed response into the matching error. */
export function toApiError(
  endpoint: string,
  statusCode: number,
  body?: string,
  transportError?: string
): Error {
  if (statusCode === 0) {
    return new CollaboratorError(
      `YouTube API request to ${endpoint} failed: ${transportError ?? 'network error'}`
    );
  }

  const parsed = ErrorResponseSchema.safeParse(body ? parseJson(body) : undefined);
  const reason = parsed.success ? parsed.data.error.errors?.[0]?.reason : undefined;
  const message =
    parsed.success && parsed.data.error.message ? parsed.data.error.message : `HTTP ${statusCode}`;

  if (statusCode === 401 || (reason !== undefined && AUTH_REASONS.has(reason))) {
    return new AuthError(`YouTube API rejected the API key: ${message}`);
  }
  return new CollaboratorError(
    `YouTube API request to ${endpoint} failed: ${message}`,
    statusCode,
    reason
  );
}

export class YouTubeClient implements VideoSource {
  private readonly baseUrl: string;

  constructor(
    private readonly apiKey: string,
    private readonly options: ClientOptions = {}
  ) {
    this.baseUrl = options.baseUrl ?? DEFAULT_API_BASE_URL;
  }

  async search(query: string, count: number, filters: SearchFilters = {}): Promise<VideoRecord[]> {
    return this.searchVideos({ q: query }, count, filters);
  }

  async related(id: string, count: number, filters: SearchFilters = {}): Promise<VideoRecord[]> {
    return this.searchVideos({ relatedToVideoId: id }, count, filters);
  }

  async videoInfo(id: string): Promise<VideoRecord[]> {
    const body = await this.get('videos', { part: 'snippet', id });
    const parsed = VideosResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new CollaboratorError(`Unexpected response from videos: ${parsed.error.message}`);
    }
    return parsed.data.items.map((item) => toRecord(item.id, item.snippet));
  }

  private async searchVideos(
    selector: Record<string, string>,
    count: number,
    filters: SearchFilters
  ): Promise<VideoRecord[]> {
    const body = await this.get('search', {
      part: 'snippet',
      type: 'video',
      maxResults: String(count),
      ...selector,
      ...filterParams(filters),
    });
    const parsed = SearchResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new CollaboratorError(`Unexpected response from search: ${parsed.error.message}`);
    }

    const records: VideoRecord[] = [];
    for (const item of parsed.data.items) {
      if (item.id.videoId) records.push(toRecord(item.id.videoId, item.snippet));
    }
    return records.slice(0, count);
  }

  private async get(endpoint: string, params: Record<string, string>): Promise<unknown> {
    const url = new URL(`${this.baseUrl}/${endpoint}`);
    for (const [name, value] of Object.entries(params)) {
      url.searchParams.set(name, value);
    }
    url.searchParams.set('key', this.apiKey);

    const response = await httpRequest(url.toString(), {
      preset: this.options.preset,
      timeoutMs: this.options.timeoutMs,
      proxy: this.options.proxy,
      headers: { Accept: 'application/json' },
    });

    if (!response.success) {
      throw toApiError(endpoint, response.statusCode, response.body, response.error);
    }

    const parsed = response.body ? parseJson(response.body) : undefined;
    if (parsed === undefined) {
      logger.debug({ url: redactUrl(url.toString()) }, 'Non-JSON API response');
      throw new CollaboratorError(
        `YouTube API returned a non-JSON body for ${endpoint}`,
        response.statusCode
      );
    }
    return parsed;
  }
}

function filterParams(filters: SearchFilters): Record<string, string> {
  const params: Record<string, string> = {};
  if (filters.regionCode) params.regionCode = filters.regionCode;
  if (filters.relevanceLanguage) params.relevanceLanguage = filters.relevanceLanguage;
  if (filters.safeSearch) params.safeSearch = filters.safeSearch;
  return params;
}

/**
 * Obtain an API handle for `apiKey`. A missing key fails here; a rejected key
 * fails with AuthError on the first request.
 */
export function authenticate(
  apiKey: string | undefined,
  options: ClientOptions = {}
): YouTubeClient {
  if (!apiKey) {
    throw new AuthError(
      'You need to provide an API key using `--api-key` or the configuration file ' +
        '(`tube-trail config set api_key <key>`) in order to query the YouTube API.'
    );
  }
  return new YouTubeClient(apiKey, options);
}
