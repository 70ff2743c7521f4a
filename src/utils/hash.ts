import { createHash } from "node:crypto";

/**
 * Hex SHA-1 of a string; used for filesystem-safe cache names
 *
 * @example
 * hashText("https://example.com/feed.xml") // 40 lowercase hex characters
 */
export function hashText(value: string): string {
  return createHash("sha1").update(value).digest("hex");
}
