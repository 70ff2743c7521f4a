/**
 * Filesystem Utilities
 * Shared filesystem helper functions
 */

import { access, rename, rm, writeFile } from "fs/promises";
import { constants } from "node:fs";
import path from "node:path";

/**
 * Check if a file or directory exists
 */
export async function fileExists(target: string): Promise<boolean> {
  try {
    await access(target, constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Write a file through a temporary sibling and a rename, so readers see
 * either the old content or the new one
 */
export async function writeFileAtomic(
  target: string,
  data: string | Uint8Array,
): Promise<void> {
  const temp = path.join(
    path.dirname(target),
    `.${path.basename(target)}.${process.pid}.tmp`,
  );
  try {
    await writeFile(temp, data);
    await rename(temp, target);
  } catch (error) {
    await rm(temp, { force: true });
    throw error;
  }
}

/**
 * Node error code of a filesystem failure, if it has one
 */
export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}
