/**
 * Shared httpcloak sessions for API requests.
 */
import httpcloak from 'httpcloak';
import { InputError } from '../errors.js';
import { logger } from '../logger.js';

/** Session metadata for lifecycle management */
interface SessionMetadata {
  session: httpcloak.Session;
  created: number;
  requestCount: number;
}

/** Session cache keyed by composite key (preset|proxy) */
const sessionCache = new Map<string, SessionMetadata>();

const SESSION_TIMEOUT_SEC = 10;
const SESSION_MAX_AGE_MS = 60 * 60 * 1000; // 1 hour
const SESSION_MAX_REQUESTS = 10000;
const DEFAULT_REQUEST_TIMEOUT_MS = 20000;
const MAX_RESPONSE_SIZE = 10 * 1024 * 1024; // 10MB

/** Allowed proxy URL schemes */
const VALID_PROXY_SCHEMES = ['http:', 'https:', 'socks5:', 'socks5h:'];

/** Default TLS preset */
const DEFAULT_PRESET = httpcloak.Preset.CHROME_143;

export interface HttpRequestOptions {
  preset?: string;
  timeoutMs?: number;
  proxy?: string;
  headers?: Record<string, string>;
}

export interface HttpResponse {
  success: boolean;
  statusCode: number;
  body?: string;
  error?: string;
}

/**
 * Redact credentials from a proxy URL for safe logging.
 */
export function redactProxyUrl(proxy: string): string {
  try {
    const url = new URL(proxy);
    if (url.password) url.password = '***';
    if (url.username) url.username = '***';
    return url.toString();
  } catch {
    return '<invalid-proxy-url>';
  }
}

/**
 * Redact query parameters that carry credentials (the API key) for safe logging.
 */
export function redactUrl(url: string): string {
  try {
    const parsed = new URL(url);
    if (parsed.searchParams.has('key')) parsed.searchParams.set('key', '***');
    return parsed.toString();
  } catch {
    return '<invalid-url>';
  }
}

/** Reject proxy URLs that do not parse or use an unsupported scheme. */
export function validateProxyUrl(proxy: string): void {
  let parsed: URL;
  try {
    parsed = new URL(proxy);
  } catch {
    throw new InputError(`Invalid proxy URL: ${redactProxyUrl(proxy)}`);
  }

  if (!VALID_PROXY_SCHEMES.includes(parsed.protocol)) {
    throw new InputError(
      `Invalid proxy scheme "${parsed.protocol}", must be one of: ${VALID_PROXY_SCHEMES.join(', ')}`
    );
  }
}

/**
 * Get or create an httpcloak session for a TLS preset and optional proxy.
 * Sessions are recycled after an hour or SESSION_MAX_REQUESTS requests.
 * Requests are issued one at a time, so no in-flight tracking is needed.
 */
export function getSession(preset?: string, proxy?: string): httpcloak.Session {
  const presetValue = preset ?? DEFAULT_PRESET;
  const cacheKey = `${presetValue}|${proxy || 'direct'}`;

  const metadata = sessionCache.get(cacheKey);
  if (metadata) {
    const age = Date.now() - metadata.created;
    if (age <= SESSION_MAX_AGE_MS && metadata.requestCount < SESSION_MAX_REQUESTS) {
      metadata.requestCount++;
      return metadata.session;
    }

    logger.info(
      { age: Math.floor(age / 1000), requests: metadata.requestCount },
      'Recycling aged httpcloak session'
    );
    sessionCache.delete(cacheKey);
    metadata.session.close();
  }

  logger.debug(
    { preset: presetValue, proxy: proxy ? redactProxyUrl(proxy) : undefined },
    'Creating httpcloak session'
  );

  const session = new httpcloak.Session({
    preset: presetValue,
    timeout: SESSION_TIMEOUT_SEC,
    ...(proxy ? { proxy } : {}),
  });
  sessionCache.set(cacheKey, { session, created: Date.now(), requestCount: 1 });
  return session;
}

/**
 * Close all httpcloak sessions.
 * Call this before the process exits.
 */
export async function closeAllSessions(): Promise<void> {
  const metadataList = Array.from(sessionCache.values());
  sessionCache.clear();

  for (const metadata of metadataList) {
    try {
      metadata.session.close();
    } catch (error) {
      logger.warn({ error: String(error) }, 'Error closing httpcloak session');
    }
  }
}

/** Create a timeout promise that rejects after the specified timeout. */
function createRequestTimeout(
  url: string,
  timeoutMs: number
): { promise: Promise<never>; cancel: () => void } {
  let timeoutId: NodeJS.Timeout;
  const promise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(
      () => reject(new Error(`Request timeout after ${timeoutMs}ms for ${redactUrl(url)}`)),
      timeoutMs
    );
  });
  return { promise, cancel: () => clearTimeout(timeoutId) };
}

/**
 * Make an HTTP GET request. Never throws: transport failures come back as
 * `{ success: false, statusCode: 0, error }`.
 */
export async function httpRequest(
  url: string,
  options: HttpRequestOptions = {}
): Promise<HttpResponse> {
  const { preset, proxy, timeoutMs = DEFAULT_REQUEST_TIMEOUT_MS } = options;
  const logUrl = redactUrl(url);

  try {
    if (proxy) validateProxyUrl(proxy);

    const session = getSession(preset, proxy);
    const requestOptions = { headers: options.headers ?? {} } as httpcloak.RequestOptions;

    logger.debug({ url: logUrl }, 'Making httpcloak request');

    const timeout = createRequestTimeout(url, timeoutMs);
    try {
      const response = await Promise.race([session.get(url, requestOptions), timeout.promise]);

      // NOTE: httpcloak v1.5.9 sometimes returns text as function, sometimes as property
      const textValue = response.text as string | (() => string);
      const body = typeof textValue === 'function' ? textValue() : textValue;

      if (body && body.length > MAX_RESPONSE_SIZE) {
        logger.warn({ url: logUrl, size: body.length }, 'Response exceeds size limit');
        return { success: false, statusCode: response.statusCode, error: 'response_too_large' };
      }

      logger.debug(
        { url: logUrl, statusCode: response.statusCode, bodyLength: body?.length || 0 },
        'httpcloak request complete'
      );

      return { success: response.ok, statusCode: response.statusCode, body };
    } finally {
      timeout.cancel();
    }
  } catch (error) {
    logger.warn({ url: logUrl, error: String(error) }, 'httpcloak request failed');
    return { success: false, statusCode: 0, error: String(error) };
  }
}
