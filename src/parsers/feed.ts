import * as cheerio from "cheerio";
import type { Cheerio } from "cheerio";
import type { Element } from "domhandler";
import { NoDataError } from "../types/errors";
import type { FeedItem } from "../types";
import type { Logger } from "../utils/logger";
import type { Tracker } from "../utils/tracker";
import { hasExtension } from "../utils/image-url";

/**
 * Feed Parser
 * Extracts (image URL, id) pairs from RSS and Atom documents
 *
 * Markup is read in tolerant XML mode with lower-cased names, so malformed or
 * oddly-cased feeds still yield their entries. Each entry tries the image
 * strategies in a fixed order and keeps the first hit.
 */

export interface FeedParseOptions {
  // Allow-listed image extensions, for bare <url> elements
  extensions: readonly string[];
  // URL the body was fetched from; relative links resolve against it
  baseUrl?: string;
  logger?: Logger;
  tracker?: Tracker;
}

export interface FeedDiscoveryOptions extends FeedParseOptions {
  // Needed to follow an autodiscovery link from an HTML page
  fetchText?: (url: string) => Promise<string>;
  maxHops?: number;
}

const DEFAULT_MAX_HOPS = 3;
const FEED_TYPES = ["application/rss+xml", "application/atom+xml"];
const EMBEDDED_HTML = ["description", "content\\:encoded", "content", "summary"];

type Entry = Cheerio<Element>;
type ImageStrategy = ($: cheerio.CheerioAPI, entry: Entry, options: FeedParseOptions) => string | undefined;

const FEED_ROOTS = new Set(["rss", "feed", "rdf:rdf"]);
// Whitespace, XML declaration or processing instruction, comment, DOCTYPE (with internal subset)
const PROLOG_PART = /^(?:\s+|<\?[\s\S]*?\?>|<!--[\s\S]*?-->|<!doctype(?:[^>[]|\[[\s\S]*?\])*>)/i;

/**
 * Lower-cased name of the first element, after the prolog
 *
 * @example
 * rootElement('<?xml version="1.0"?><!-- x --><rss version="2.0">') // "rss"
 */
export function rootElement(body: string): string | undefined {
  let rest = body.replace(/^\uFEFF/, "");
  for (let match = PROLOG_PART.exec(rest); match; match = PROLOG_PART.exec(rest)) {
    rest = rest.slice(match[0].length);
  }
  return /^<([a-z_][\w:.-]*)/i.exec(rest)?.[1].toLowerCase();
}

export function looksLikeXml(body: string): boolean {
  const root = rootElement(body);
  return root !== undefined && FEED_ROOTS.has(root);
}

export function looksLikeHtml(body: string): boolean {
  const root = rootElement(body);
  if (root === "html") return true;
  if (root !== undefined && FEED_ROOTS.has(root)) return false;
  return /<(!doctype\s+html|html[\s>]|head[\s>])/i.test(body);
}

function resolveUrl(raw: string | undefined, baseUrl?: string): string | undefined {
  const value = raw?.trim();
  if (!value) return undefined;
  try {
    return new URL(value, baseUrl).toString();
  } catch {
    return undefined;
  }
}

function firstImageInHtml(html: string): string | undefined {
  if (!html.includes("<")) return undefined;
  return cheerio.load(html)("img[src]").first().attr("src");
}

// ============================================================================
// Image strategies, in priority order
// ============================================================================

// (a) <link rel="enclosure" type="image/..." href="...">
const atomEnclosure: ImageStrategy = ($, entry) => {
  const link = entry.find("link").filter((_, el) => {
    const $link = $(el);
    const rel = ($link.attr("rel") ?? "").toLowerCase();
    const type = $link.attr("type")?.toLowerCase();
    return rel === "enclosure" && (type === undefined || type.startsWith("image/"));
  });
  return link.first().attr("href");
};

// (b) <media:content url="...">
const mediaContent: ImageStrategy = (_$, entry) =>
  entry.find("media\\:content[url]").first().attr("url");

// (c) <enclosure url="..." type="image/...">
const rssEnclosure: ImageStrategy = ($, entry) =>
  entry
    .find("enclosure[url]")
    .filter((_, el) => ($(el).attr("type") ?? "").toLowerCase().startsWith("image/"))
    .first()
    .attr("url");

// (d) <url>...</url> naming an image file
const bareUrl: ImageStrategy = ($, entry, options) => {
  let found: string | undefined;
  entry.find("url").each((_, el) => {
    const text = $(el).text().trim();
    if (hasExtension(text, options.extensions)) {
      found = text;
      return false;
    }
    return undefined;
  });
  return found;
};

// (e) first <img src> in the entry's HTML body, entities decoded
const embeddedImage: ImageStrategy = (_$, entry) => {
  for (const selector of EMBEDDED_HTML) {
    const body = entry.find(selector).first();
    if (!body.length) continue;
    const src = body.find("img[src]").first().attr("src") ?? firstImageInHtml(body.text());
    if (src) return src;
  }
  return undefined;
};

const IMAGE_STRATEGIES: readonly ImageStrategy[] = [
  atomEnclosure,
  mediaContent,
  rssEnclosure,
  bareUrl,
  embeddedImage,
];

// Direct children only: an Atom <source> carries an <id> of its own
function childText(entry: Entry, selector: string): string | undefined {
  const text = entry.children(selector).first().text().trim();
  return text || undefined;
}

/**
 * Parse an XML feed body into its image items, in document order
 *
 * Entries without an image are dropped. When two entries share an id the
 * first URL wins and the conflict is logged.
 */
export function extractFeedItems(body: string, options: FeedParseOptions): FeedItem[] {
  const $ = cheerio.load(body, {
    xml: {
      xmlMode: true,
      lowerCaseTags: true,
      lowerCaseAttributeNames: true,
      decodeEntities: true,
    },
  });

  const items: FeedItem[] = [];
  const urlsById = new Map<string, string>();

  $("item, entry").each((_, element) => {
    const entry = $(element);

    let url: string | undefined;
    for (const strategy of IMAGE_STRATEGIES) {
      url = resolveUrl(strategy($, entry, options), options.baseUrl);
      if (url) break;
    }
    if (!url) return;

    const id =
      childText(entry, "id") ?? childText(entry, "guid") ?? childText(entry, "link") ?? url;

    const existing = urlsById.get(id);
    if (existing !== undefined) {
      if (existing !== url) {
        options.logger?.warn(
          `Feed entry ${id} appears twice with different images; keeping ${existing}`,
        );
        options.tracker?.trackFeedIssue(id, "duplicate-id", `ignored ${url}`);
      }
      return;
    }

    urlsById.set(id, url);
    items.push({ url, id });
  });

  return items;
}

/**
 * Feed URL advertised by an HTML page through
 * `<link rel="alternate" type="application/rss+xml|atom+xml" href="...">`
 */
export function discoverFeedLink(html: string, baseUrl?: string): string | undefined {
  const $ = cheerio.load(html);
  let found: string | undefined;

  $("link[href]").each((_, el) => {
    const $link = $(el);
    const rel = ($link.attr("rel") ?? "").toLowerCase().split(/\s+/);
    const type = ($link.attr("type") ?? "").toLowerCase().trim();
    if (!rel.includes("alternate") || !FEED_TYPES.includes(type)) return undefined;

    found = resolveUrl($link.attr("href"), baseUrl);
    return found ? false : undefined;
  });

  return found;
}

/**
 * Parse a feed body, following RSS/Atom autodiscovery when it is an HTML page
 *
 * @throws NoDataError when the body is not a feed and advertises none
 */
export async function parseFeed(
  body: string,
  options: FeedDiscoveryOptions,
  hops = 0,
): Promise<FeedItem[]> {
  if (looksLikeXml(body)) {
    return extractFeedItems(body, options);
  }

  const where = options.baseUrl ?? "document";
  if (!looksLikeHtml(body)) {
    throw new NoDataError(`${where} is neither a feed nor an HTML page`);
  }

  const link = discoverFeedLink(body, options.baseUrl);
  if (!link) {
    throw new NoDataError(`${where} is an HTML page without a feed link`);
  }

  const maxHops = options.maxHops ?? DEFAULT_MAX_HOPS;
  if (!options.fetchText || hops >= maxHops) {
    throw new NoDataError(`Not following feed link ${link} from ${where}`);
  }

  options.logger?.info(`Following feed link ${link}`);
  const next = await options.fetchText(link);
  return parseFeed(next, { ...options, baseUrl: link }, hops + 1);
}
