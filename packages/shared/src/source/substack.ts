// =============================================================================
// @postwatch/shared — Blog homepage content source (cheerio)
// =============================================================================
// Finds the newest post link on the homepage, then extracts the paragraph
// text of that post. Both requests are bounded by a timeout.
// =============================================================================

import * as cheerio from "cheerio";
import { FetchError } from "../errors.js";
import { logExternalCall, type Logger } from "../logger.js";
import type { ContentItem, ContentSource } from "../types.js";

const USER_AGENT = "postwatch/0.1";

export interface SubstackSourceOptions {
  /** Homepage to poll */
  url: string;
  /** Selector whose first match links to the newest post */
  linkSelector: string;
  /** Selector of the element holding the post's paragraphs */
  bodySelector: string;
  timeoutMs: number;
  logger: Logger;
}

async function fetchHtml(url: string, timeoutMs: number): Promise<string> {
  let response: Response;
  try {
    response = await fetch(url, {
      headers: { "User-Agent": USER_AGENT, Accept: "text/html" },
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (err) {
    throw new FetchError(
      `Request to ${url} failed: ${err instanceof Error ? err.message : String(err)}`,
      { url, cause: err },
    );
  }

  if (!response.ok) {
    throw new FetchError(`Request to ${url} returned HTTP ${response.status}`, {
      url,
    });
  }
  return response.text();
}

/**
 * Resolve the first link matching `selector` against the page it came from.
 */
export function findLatestPostUrl(
  html: string,
  pageUrl: string,
  selector: string,
): string {
  const $ = cheerio.load(html);
  const href = $(selector).first().attr("href")?.trim();
  if (!href) {
    throw new FetchError(`No post link matched "${selector}" on ${pageUrl}`, {
      url: pageUrl,
    });
  }

  try {
    return new URL(href, pageUrl).toString();
  } catch (err) {
    throw new FetchError(`Post link "${href}" is not a valid URL`, {
      url: pageUrl,
      cause: err,
    });
  }
}

/**
 * Join the text of every paragraph inside the first `selector` match.
 */
export function extractPostText(
  html: string,
  postUrl: string,
  selector: string,
): string {
  const $ = cheerio.load(html);
  const container = $(selector).first();
  if (container.length === 0) {
    throw new FetchError(`No content matched "${selector}" on ${postUrl}`, {
      url: postUrl,
    });
  }

  const text = container
    .find("p")
    .map((_, el) => $(el).text())
    .get()
    .join("\n");

  if (text.trim().length === 0) {
    throw new FetchError(`Post ${postUrl} has no paragraph text`, {
      url: postUrl,
    });
  }
  return text;
}

export function createSubstackSource(
  options: SubstackSourceOptions,
): ContentSource {
  const { url, linkSelector, bodySelector, timeoutMs, logger } = options;

  async function timed<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    const start = performance.now();
    try {
      const result = await fn();
      logExternalCall(
        logger,
        "source",
        operation,
        Math.round(performance.now() - start),
      );
      return result;
    } catch (err) {
      logExternalCall(
        logger,
        "source",
        operation,
        Math.round(performance.now() - start),
        err instanceof Error ? err.message : String(err),
      );
      throw err;
    }
  }

  return {
    async fetchLatest(): Promise<ContentItem> {
      const identifier = await timed("find_latest_post", async () =>
        findLatestPostUrl(await fetchHtml(url, timeoutMs), url, linkSelector),
      );
      const body = await timed("extract_post_text", async () =>
        extractPostText(
          await fetchHtml(identifier, timeoutMs),
          identifier,
          bodySelector,
        ),
      );
      return { identifier, body };
    },
  };
}
