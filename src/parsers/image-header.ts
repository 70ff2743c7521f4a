/**
 * Image Dimension Sniffer
 * Reads pixel dimensions from the header bytes of GIF, JPEG and PNG files
 */

import { open } from "fs/promises";
import type { ImageDimensions, ImageFormat } from "../types";

export interface SniffResult extends ImageDimensions {
  format: ImageFormat;
}

// A real header fits well inside this prefix
export const DEFAULT_SNIFF_BYTES = 50 * 1024;

function readUInt16LE(bytes: Uint8Array, offset: number): number {
  return bytes[offset] | (bytes[offset + 1] << 8);
}

function readUInt16BE(bytes: Uint8Array, offset: number): number {
  return (bytes[offset] << 8) | bytes[offset + 1];
}

function readUInt32BE(bytes: Uint8Array, offset: number): number {
  return (
    bytes[offset] * 0x1000000 +
    ((bytes[offset + 1] << 16) | (bytes[offset + 2] << 8) | bytes[offset + 3])
  );
}

function matchesAscii(bytes: Uint8Array, offset: number, text: string): boolean {
  if (offset + text.length > bytes.length) return false;
  for (let i = 0; i < text.length; i++) {
    if (bytes[offset + i] !== text.charCodeAt(i)) return false;
  }
  return true;
}

/**
 * GIF87a / GIF89a: logical screen width and height, little-endian, at 6 and 8
 */
export function sniffGif(bytes: Uint8Array): ImageDimensions | null {
  if (bytes.length < 10) return null;
  if (!matchesAscii(bytes, 0, "GIF87a") && !matchesAscii(bytes, 0, "GIF89a")) {
    return null;
  }
  return { width: readUInt16LE(bytes, 6), height: readUInt16LE(bytes, 8) };
}

// C0..CF, except DHT (C4) and DAC (CC)
function isStartOfFrame(marker: number): boolean {
  return marker >= 0xc0 && marker <= 0xcf && marker !== 0xc4 && marker !== 0xcc;
}

// Markers without a length field
function isStandalone(marker: number): boolean {
  return marker === 0x01 || marker === 0xd8 || (marker >= 0xd0 && marker <= 0xd7);
}

/**
 * JPEG: walk marker segments from SOI until a Start-Of-Frame header
 *
 * Gives up at Start-Of-Scan, End-Of-Image or the end of the buffer.
 */
export function sniffJpeg(bytes: Uint8Array): ImageDimensions | null {
  if (bytes.length < 4 || bytes[0] !== 0xff || bytes[1] !== 0xd8) return null;

  let offset = 2;
  while (offset < bytes.length) {
    if (bytes[offset] !== 0xff) return null;
    while (offset < bytes.length && bytes[offset] === 0xff) offset++;
    if (offset >= bytes.length) return null;

    const marker = bytes[offset++];
    if (isStandalone(marker)) continue;
    if (marker === 0xda || marker === 0xd9) return null;

    if (offset + 2 > bytes.length) return null;
    const length = readUInt16BE(bytes, offset);

    if (isStartOfFrame(marker)) {
      // length(2) precision(1) height(2) width(2)
      if (offset + 7 > bytes.length) return null;
      return {
        height: readUInt16BE(bytes, offset + 3),
        width: readUInt16BE(bytes, offset + 5),
      };
    }

    if (length < 2) return null;
    offset += length;
  }
  return null;
}

/**
 * PNG: the first chunk must be IHDR, whose data starts with width and height
 */
export function sniffPng(bytes: Uint8Array): ImageDimensions | null {
  if (bytes.length < 24) return null;
  if (bytes[0] !== 0x89 || !matchesAscii(bytes, 1, "PNG\r")) return null;
  if (!matchesAscii(bytes, 12, "IHDR")) return null;
  return { width: readUInt32BE(bytes, 16), height: readUInt32BE(bytes, 20) };
}

const SNIFFERS: ReadonlyArray<[ImageFormat, (bytes: Uint8Array) => ImageDimensions | null]> = [
  ["gif", sniffGif],
  ["jpeg", sniffJpeg],
  ["png", sniffPng],
];

/**
 * Dimensions from the first bytes of an image, trying GIF, JPEG, then PNG
 *
 * Returns null when no format matches or the prefix is too short; that is an
 * answer, not a failure.
 */
export function imageDimensions(bytes: Uint8Array): SniffResult | null {
  for (const [format, sniff] of SNIFFERS) {
    const dimensions = sniff(bytes);
    if (dimensions) return { format, ...dimensions };
  }
  return null;
}

/**
 * Read up to `limit` bytes of `file` and sniff them
 *
 * Filesystem errors propagate; the caller decides what a missing file means.
 */
export async function readImageDimensions(
  file: string,
  limit: number = DEFAULT_SNIFF_BYTES,
): Promise<SniffResult | null> {
  const handle = await open(file, "r");
  try {
    const buffer = Buffer.alloc(limit);
    const { bytesRead } = await handle.read(buffer, 0, limit, 0);
    return imageDimensions(buffer.subarray(0, bytesRead));
  } finally {
    await handle.close();
  }
}
