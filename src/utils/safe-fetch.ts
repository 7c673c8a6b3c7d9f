import { createChildLogger } from './logger.js';
import { AppError, FetchFailedError, UnsafeUrlError, errorMessage } from './errors.js';
import { validateUrl, type HostResolver } from './url-validator.js';
import { isFeedMimeType, isFetchableImageMimeType } from './mime-types.js';

const logger = createChildLogger({ service: 'safe-fetch' });

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

export type FetchKind = 'image' | 'feed';

const ACCEPT_HEADERS: Record<FetchKind, string> = {
  image: 'image/jpeg, image/png, image/webp, image/gif, image/avif',
  feed: 'application/xml, text/xml, application/atom+xml, application/rss+xml',
};

export interface SafeFetchOptions {
  kind: FetchKind;
  timeoutMs: number;
  maxBytes: number;
  allowedPorts?: readonly number[];
  maxRedirects?: number;
  resolver?: HostResolver;
}

export interface SafeFetchResult {
  body: Buffer;
  contentType: string;
  /** URL of the final hop after redirects */
  url: string;
}

/**
 * Check a declared content-type against what the caller expects
 */
export function isAllowedContentType(kind: FetchKind, contentType: string | null): boolean {
  if (!contentType) {
    return false;
  }
  const mimeType = contentType.split(';')[0].trim().toLowerCase();
  return kind === 'image' ? isFetchableImageMimeType(mimeType) : isFeedMimeType(mimeType);
}

async function readBodyWithLimit(response: Response, url: string, maxBytes: number): Promise<Buffer> {
  if (!response.body) {
    return Buffer.alloc(0);
  }

  const reader = response.body.getReader();
  const chunks: Buffer[] = [];
  let received = 0;

  for (;;) {
    const { done, value } = await reader.read();
    if (done) {
      break;
    }
    received += value.byteLength;
    if (received > maxBytes) {
      await reader.cancel();
      throw new UnsafeUrlError(url, `Response exceeds the ${maxBytes} byte limit`);
    }
    chunks.push(Buffer.from(value));
  }

  return Buffer.concat(chunks);
}

async function discardBody(response: Response): Promise<void> {
  try {
    await response.body?.cancel();
  } catch (error) {
    logger.debug({ error: errorMessage(error) }, 'Failed to discard response body');
  }
}

/**
 * Fetch a URL through the SSRF checks. Every hop, redirects included, is
 * re-validated against its resolved addresses before it is requested.
 *
 * @throws UnsafeUrlError when a hop targets a blocked destination, or the
 *   response has the wrong content-type or is too large
 * @throws FetchFailedError on network failure, timeout or a non-2xx status
 */
export async function safeFetch(rawUrl: string, options: SafeFetchOptions): Promise<SafeFetchResult> {
  const { kind, timeoutMs, maxBytes, allowedPorts, maxRedirects = 3, resolver } = options;

  let currentUrl = rawUrl;

  for (let hop = 0; hop <= maxRedirects; hop++) {
    const validation = await validateUrl(currentUrl, { allowedPorts, resolver });
    if (!validation.allowed) {
      logger.warn({ url: currentUrl, hop, reason: validation.reason }, 'Blocked outbound fetch');
      throw new UnsafeUrlError(currentUrl, validation.reason);
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const response = await fetch(validation.url, {
        method: 'GET',
        redirect: 'manual',
        headers: { Accept: ACCEPT_HEADERS[kind] },
        signal: controller.signal,
      });

      if (REDIRECT_STATUSES.has(response.status)) {
        const location = response.headers.get('location');
        await discardBody(response);
        if (!location) {
          throw new FetchFailedError(currentUrl, `Redirect ${response.status} without a location`, response.status);
        }
        currentUrl = new URL(location, validation.url).toString();
        logger.debug({ from: validation.url.toString(), to: currentUrl, hop }, 'Following redirect');
        continue;
      }

      if (!response.ok) {
        await discardBody(response);
        throw new FetchFailedError(currentUrl, `HTTP ${response.status} fetching ${currentUrl}`, response.status);
      }

      const contentType = response.headers.get('content-type');
      if (!isAllowedContentType(kind, contentType)) {
        await discardBody(response);
        throw new UnsafeUrlError(
          currentUrl,
          `Content-type ${contentType ?? '(none)'} is not an accepted ${kind} type`
        );
      }

      const declaredLength = response.headers.get('content-length');
      if (declaredLength && parseInt(declaredLength, 10) > maxBytes) {
        await discardBody(response);
        throw new UnsafeUrlError(currentUrl, `Declared size ${declaredLength} exceeds the ${maxBytes} byte limit`);
      }

      const body = await readBodyWithLimit(response, currentUrl, maxBytes);

      logger.debug({ url: currentUrl, kind, bytes: body.length }, 'Fetched');

      return { body, contentType: contentType ?? '', url: currentUrl };
    } catch (error) {
      if (error instanceof AppError) {
        throw error;
      }
      if (controller.signal.aborted) {
        throw new FetchFailedError(currentUrl, `Timed out after ${timeoutMs}ms fetching ${currentUrl}`);
      }
      throw new FetchFailedError(currentUrl, `Failed to fetch ${currentUrl}: ${errorMessage(error)}`);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  throw new FetchFailedError(rawUrl, `Too many redirects (max ${maxRedirects})`);
}
