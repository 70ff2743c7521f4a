/**
 * File List Cache
 * Persists the candidate list of one directory between runs
 *
 * The cache file holds a single record. The exclusive lock is taken before the
 * record is read and released only when the run is over, so a second run on
 * the same cache waits for the first and then reuses its fresh list.
 */

import { mkdir, readFile, rm } from "fs/promises";
import path from "node:path";
import { z } from "zod";
import { StorageError } from "../types/errors";
import { FileLock } from "./file-lock";
import { errorCode, writeFileAtomic } from "./fs";
import type { Logger } from "./logger";

const FileListRecordSchema = z.object({
  directory: z.string(),
  files: z.array(z.string()),
  writtenAt: z.string(),
});

export type FileListRecord = z.infer<typeof FileListRecordSchema>;

export interface FileListCacheOptions {
  ttlMs: number;
  lockTimeoutMs?: number;
  logger?: Logger;
  now?: () => number;
}

export class FileListCache {
  private lock: FileLock | null = null;
  private loaded = false;

  constructor(
    readonly file: string,
    private readonly options: FileListCacheOptions,
  ) {}

  /**
   * Take the exclusive lock; blocks while another run holds it
   */
  async open(): Promise<void> {
    if (this.lock) return;
    try {
      await mkdir(path.dirname(this.file), { recursive: true });
    } catch (error) {
      throw new StorageError(`Cannot create cache directory for ${this.file}`, {
        cause: error,
      });
    }
    this.lock = await FileLock.acquire(this.file, {
      timeoutMs: this.options.lockTimeoutMs,
    });
  }

  /**
   * Cached absolute paths for exactly `directory`, or null when there is no
   * record for it or the record is older than the TTL
   */
  async load(directory: string): Promise<string[] | null> {
    this.assertOpen();
    const record = await this.readRecord();
    if (!record) return null;

    const root = path.resolve(directory);
    if (record.directory !== root) {
      this.options.logger?.debug(
        `File list cache is for ${record.directory}, not ${root}`,
      );
      return null;
    }

    const writtenAt = Date.parse(record.writtenAt);
    const age = this.now() - writtenAt;
    if (!Number.isFinite(writtenAt) || age < 0 || age >= this.options.ttlMs) {
      this.options.logger?.debug(`File list cache for ${root} has expired`);
      return null;
    }

    this.loaded = true;
    return record.files
      .filter((file) => file !== "" && !file.startsWith("..") && !path.isAbsolute(file))
      .map((file) => path.join(root, file));
  }

  /**
   * Persist the list for `directory`; a no-op when this run loaded a fresh one
   *
   * @returns true when the record was written
   */
  async store(directory: string, files: readonly string[]): Promise<boolean> {
    this.assertOpen();
    if (this.loaded) return false;

    const root = path.resolve(directory);
    const record: FileListRecord = {
      directory: root,
      files: files.map((file) => path.relative(root, file)),
      writtenAt: new Date(this.now()).toISOString(),
    };

    try {
      await writeFileAtomic(this.file, JSON.stringify(record));
    } catch (error) {
      throw new StorageError(`Cannot write file list cache ${this.file}`, {
        cause: error,
      });
    }
    this.loaded = true;
    return true;
  }

  /**
   * Delete the record so the next run enumerates again
   */
  async invalidate(): Promise<void> {
    this.assertOpen();
    try {
      await rm(this.file, { force: true });
    } catch (error) {
      throw new StorageError(`Cannot remove file list cache ${this.file}`, {
        cause: error,
      });
    }
  }

  async close(): Promise<void> {
    const lock = this.lock;
    this.lock = null;
    await lock?.release();
  }

  private async readRecord(): Promise<FileListRecord | null> {
    let content: string;
    try {
      content = await readFile(this.file, "utf-8");
    } catch (error) {
      if (errorCode(error) === "ENOENT") return null;
      throw new StorageError(`Cannot read file list cache ${this.file}`, {
        cause: error,
      });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch {
      this.options.logger?.info(`Ignoring unreadable file list cache ${this.file}`);
      return null;
    }

    const result = FileListRecordSchema.safeParse(parsed);
    if (!result.success) {
      this.options.logger?.info(`Ignoring malformed file list cache ${this.file}`);
      return null;
    }
    return result.data;
  }

  private assertOpen(): void {
    if (!this.lock) {
      throw new Error(`File list cache ${this.file} is not open`);
    }
  }

  private now(): number {
    return this.options.now ? this.options.now() : Date.now();
  }
}
