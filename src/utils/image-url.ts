/**
 * Image URL and extension helpers
 */

import path from "node:path";

/**
 * Lower-cased extension of a path or URL, without the dot
 *
 * @example
 * extensionOf("https://example.com/a/photo.JPG?size=2") // "jpg"
 * extensionOf("/srv/images/README") // ""
 */
export function extensionOf(target: string): string {
  let pathname = target;
  if (/^[a-z][a-z0-9+.-]*:\/\//i.test(target)) {
    try {
      pathname = new URL(target).pathname;
    } catch {
      return "";
    }
  }
  return path.extname(pathname).slice(1).toLowerCase();
}

/**
 * Case-insensitive check against an extension list (entries without dots)
 */
export function hasExtension(target: string, extensions: readonly string[]): boolean {
  const ext = extensionOf(target);
  if (!ext) return false;
  return extensions.some((allowed) => allowed.toLowerCase() === ext);
}

// Flickr static hosts, e.g. farm4.staticflickr.com or live.staticflickr.com
const FLICKR_HOST = /(^|\.)(static)?flickr\.com$/i;
// <id>_<secret>[_<size>].<ext>; small sizes are rewritten to "_b" (1024px)
const FLICKR_FILE = /^(\d+_[0-9a-f]+)(?:_[stmnzc])?\.([a-z]+)$/i;

/**
 * Rewrite known photo-host thumbnail URLs to their large variant
 *
 * @example
 * largeVariantUrl("https://live.staticflickr.com/65535/123_abc_m.jpg")
 * // "https://live.staticflickr.com/65535/123_abc_b.jpg"
 */
export function largeVariantUrl(url: string): string {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return url;
  }
  if (!FLICKR_HOST.test(parsed.hostname)) return url;

  const dir = parsed.pathname.slice(0, parsed.pathname.lastIndexOf("/") + 1);
  const file = parsed.pathname.slice(dir.length);
  const match = file.match(FLICKR_FILE);
  if (!match) return url;

  parsed.pathname = `${dir}${match[1]}_b.${match[2]}`;
  return parsed.toString();
}
