/**
 * Web content loader: fetch a page and reduce it to readable Markdown.
 */

import { Readability } from '@mozilla/readability';
import { JSDOM } from 'jsdom';
import TurndownService from 'turndown';
import { ContentFetchError, TimeoutError, TurnCancelledError, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { RetryPolicy, isRetryableError, isRetryableStatus, withRetry } from '../utils/retry.js';

const log = logger.child('loader');

const USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/123.0.0.0 Safari/537.36';

export const DEFAULT_FETCH_TIMEOUT_MS = 15_000;

export interface ContentLoader {
  load(url: string, signal?: AbortSignal): Promise<string>;
}

export interface WebContentLoaderConfig {
  timeoutMs?: number;
  retryPolicy?: RetryPolicy;
}

export function formatWebContent(url: string, content: string): string {
  return `[Web content from ${url}]:\n'''\n${content}\n'''\n[END of web content]`;
}

/**
 * Extract the readable article from an HTML document as Markdown.
 * Falls back to the collapsed body text when no article is found.
 */
export function htmlToMarkdown(html: string, url: string): string {
  const dom = new JSDOM(html, { url });
  const document = dom.window.document;
  for (const selector of ['script', 'style', 'iframe', 'noscript', 'img', 'svg']) {
    document.querySelectorAll(selector).forEach(node => node.remove());
  }

  const article = new Readability(document).parse();
  if (article?.content) {
    const turndown = new TurndownService({ headingStyle: 'atx' });
    const title = article.title?.trim();
    const markdown = turndown.turndown(article.content).trim();
    return title ? `# ${title}\n\n${markdown}` : markdown;
  }

  return document.body?.textContent?.replace(/\s+/g, ' ').trim() ?? '';
}

export class WebContentLoader implements ContentLoader {
  private timeoutMs: number;
  private retryPolicy?: RetryPolicy;

  constructor(config: WebContentLoaderConfig = {}) {
    this.timeoutMs = config.timeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS;
    this.retryPolicy = config.retryPolicy;
  }

  async load(url: string, signal?: AbortSignal): Promise<string> {
    return withRetry(() => this.fetchOnce(url, signal), {
      policy: this.retryPolicy,
      label: `fetch ${url}`,
      signal,
      isRetryable: error => (error instanceof ContentFetchError ? error.retryable : isRetryableError(error)),
    });
  }

  private async fetchOnce(url: string, signal?: AbortSignal): Promise<string> {
    let parsed: URL;
    try {
      parsed = new URL(url);
    } catch {
      throw new ContentFetchError(`Invalid URL: ${url}`, url);
    }
    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
      throw new ContentFetchError(`Unsupported protocol: ${parsed.protocol}`, url);
    }

    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);
    const onAbort = () => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const response = await fetch(parsed, {
        headers: {
          'User-Agent': USER_AGENT,
          Accept: 'text/html,application/xhtml+xml,text/plain;q=0.9,*/*;q=0.8',
        },
        signal: controller.signal,
      });

      if (!response.ok) {
        throw new ContentFetchError(
          `Fetching ${url} failed (${response.status})`,
          url,
          response.status,
          isRetryableStatus(response.status)
        );
      }

      const body = await response.text();
      const contentType = response.headers.get('content-type') ?? '';
      const content = contentType.includes('html') ? htmlToMarkdown(body, parsed.toString()) : body.trim();
      log.debug(`Loaded ${url}: ${content.length} characters`);
      return content;
    } catch (error) {
      if (signal?.aborted) {
        throw new TurnCancelledError();
      }
      if (timedOut) {
        throw new TimeoutError(`Fetching ${url} timed out after ${this.timeoutMs}ms`, this.timeoutMs);
      }
      if (error instanceof ContentFetchError) {
        throw error;
      }
      throw new ContentFetchError(`Fetching ${url} failed: ${errorMessage(error)}`, url, undefined, isRetryableError(error));
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }
  }
}
