/**
 * Shared test helpers
 */

import { writeFile } from "fs/promises";
import { Logger } from "../utils/logger";
import { Tracker } from "../utils/tracker";
import { loadDefaultConfig } from "../utils/load-config";
import type { PickContext } from "../types";

/**
 * Smallest byte prefix the sniffer reads as a PNG of the given size
 */
export function pngHeader(width: number, height: number): Buffer {
  const bytes = Buffer.alloc(33);
  Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]).copy(bytes, 0);
  bytes.writeUInt32BE(13, 8);
  bytes.write("IHDR", 12, "ascii");
  bytes.writeUInt32BE(width, 16);
  bytes.writeUInt32BE(height, 20);
  return bytes;
}

export async function writePng(file: string, width: number, height: number): Promise<void> {
  await writeFile(file, pngHeader(width, height));
}

export async function createContext(
  target: string,
  cacheRoot: string,
): Promise<PickContext> {
  return {
    config: await loadDefaultConfig(),
    target,
    cacheRoot,
    tracker: new Tracker(),
    logger: new Logger("error"),
  };
}
