import { readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { AddressRecordType } from "../cloudflare/client";
import { sanitizeName } from "./sanitize";

export class CacheError extends Error {
  public readonly path?: string;

  constructor(message: string, path?: string, cause?: unknown) {
    super(message, { cause });
    this.name = "CacheError";
    this.path = path;
  }
}

export type CacheKeySource = {
  readonly name: string;
  readonly recordId: string;
};

export const cacheFileName = (recordType: AddressRecordType, record: CacheKeySource): string =>
  `cached_ip_${recordType}_${sanitizeName(record.name)}_${record.recordId}.txt`;

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

const reasonOf = (error: unknown): string => (error instanceof Error ? error.message : String(error));

/**
 * Returns the last applied address, or an empty string when caching is
 * disabled (`basePath` empty) or the record was never cached.
 */
export const readCachedAddress = async (basePath: string, fileName: string): Promise<string> => {
  if (basePath.length === 0) {
    return "";
  }
  const path = join(basePath, fileName);
  try {
    const data = await readFile(path, "utf8");
    return data.trim();
  } catch (error) {
    if (isMissingFile(error)) {
      return "";
    }
    throw new CacheError(`failed to read cache file: ${reasonOf(error)}`, path, error);
  }
};

export const writeCachedAddress = async (basePath: string, fileName: string, address: string): Promise<void> => {
  if (basePath.length === 0) {
    throw new CacheError("cannot write cache file, no base path provided");
  }
  const path = join(basePath, fileName);
  try {
    await writeFile(path, address, { mode: 0o644 });
  } catch (error) {
    throw new CacheError(`failed to write cache file: ${reasonOf(error)}`, path, error);
  }
};
