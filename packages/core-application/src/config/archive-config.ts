import fs from "node:fs/promises";
import path from "node:path";
import { createFilterRules, type FilterRules } from "@flatdump/core-domain";

import { InvalidOptionError, OutputDirectoryError, RootNotFoundError } from "../application/errors";
import { DEFAULT_WORKER_COUNT } from "../services/worker-pool";

export type ArchiveConfig = {
  rootPath: string;
  maxFileSizeKB: number;
  outputDir: string;
  skipHidden: boolean;
  skipExtensions: string[];
  skipDirNames: string[];
  workerCount: number;
};

export const DEFAULT_ARCHIVE_CONFIG: ArchiveConfig = {
  rootPath: ".",
  maxFileSizeKB: 1024,
  outputDir: "output",
  skipHidden: true,
  skipExtensions: [],
  skipDirNames: [],
  workerCount: DEFAULT_WORKER_COUNT,
};

/** Option values as they arrive from the command line. */
export type RawArchiveOptions = {
  root?: string;
  maxSize?: string | number;
  output?: string;
  skipHidden?: boolean;
  skipExt?: string;
  skipDir?: string;
  workers?: string | number;
};

export type PreparedArchiveRun = {
  rootPath: string;
  outputDir: string;
  maxBytesPerFile: number;
  workerCount: number;
  rules: FilterRules;
};

export function splitList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item !== "");
}

export function parseIntegerOption(option: string, value: string | number): number {
  const n = typeof value === "number" ? value : Number(value.trim());
  if (!Number.isInteger(n) || (typeof value === "string" && value.trim() === "")) {
    throw new InvalidOptionError(option, `${option} must be an integer, got "${value}"`);
  }
  return n;
}

export function buildArchiveConfig(raw: RawArchiveOptions): ArchiveConfig {
  return {
    rootPath: raw.root ?? DEFAULT_ARCHIVE_CONFIG.rootPath,
    maxFileSizeKB:
      raw.maxSize === undefined ? DEFAULT_ARCHIVE_CONFIG.maxFileSizeKB : parseIntegerOption("max-size", raw.maxSize),
    outputDir: raw.output ?? DEFAULT_ARCHIVE_CONFIG.outputDir,
    skipHidden: raw.skipHidden ?? DEFAULT_ARCHIVE_CONFIG.skipHidden,
    skipExtensions: splitList(raw.skipExt),
    skipDirNames: splitList(raw.skipDir),
    workerCount:
      raw.workers === undefined ? DEFAULT_ARCHIVE_CONFIG.workerCount : parseIntegerOption("workers", raw.workers),
  };
}

/**
 * Startup checks. Anything thrown here is fatal: the run must not start
 * with a missing root, a non-positive ceiling or an output directory it
 * cannot create.
 */
export async function prepareArchiveRun(config: ArchiveConfig): Promise<PreparedArchiveRun> {
  const rootPath = path.resolve(config.rootPath);

  try {
    const stat = await fs.stat(rootPath);
    if (!stat.isDirectory()) {
      throw new InvalidOptionError("root", `Root path is not a directory: ${config.rootPath}`);
    }
  } catch (err) {
    if (err instanceof InvalidOptionError) throw err;
    throw new RootNotFoundError(config.rootPath, err);
  }

  if (!Number.isInteger(config.maxFileSizeKB) || config.maxFileSizeKB <= 0) {
    throw new InvalidOptionError("max-size", "Max file size must be positive");
  }

  if (!Number.isInteger(config.workerCount) || config.workerCount < 1) {
    throw new InvalidOptionError("workers", "Worker count must be at least 1");
  }

  const outputDir = path.resolve(config.outputDir);
  try {
    await fs.mkdir(outputDir, { recursive: true });
  } catch (err) {
    throw new OutputDirectoryError(config.outputDir, err);
  }

  return {
    rootPath,
    outputDir,
    maxBytesPerFile: config.maxFileSizeKB * 1024,
    workerCount: config.workerCount,
    rules: createFilterRules({
      skipHidden: config.skipHidden,
      skipExtensions: config.skipExtensions,
      skipDirNames: config.skipDirNames,
    }),
  };
}
