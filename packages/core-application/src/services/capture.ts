import path from "node:path";
import type { CapturedFile } from "@flatdump/core-domain";

import type { FileSource } from "../ports/file-source";
import type { Logger } from "../ports/logger";
import type { OutputSink } from "../ports/output-sink";
import { describeError } from "../application/errors";

export type CaptureContext = {
  rootPath: string;
  source: FileSource;
  logger: Logger;
};

export function toRelativePath(rootPath: string, absolutePath: string): string {
  const rel = path.relative(path.resolve(rootPath), path.resolve(absolutePath));
  // `..notes` is a valid name; only a leading `..` segment leaves the root
  if (rel === "" || rel === ".." || rel.startsWith(`..${path.sep}`) || path.isAbsolute(rel)) {
    throw new Error(`Path is not inside root ${rootPath}`);
  }
  return rel.replaceAll("\\", "/");
}

/**
 * Reads one file into a record. Each step may fail on its own; a failure is
 * logged with the path and yields `null`, so the file is left out of the
 * archive without stopping the run.
 */
export async function captureFile(absolutePath: string, ctx: CaptureContext): Promise<CapturedFile | null> {
  let content: Buffer;
  try {
    content = await ctx.source.readFile(absolutePath);
  } catch (err) {
    ctx.logger.warn(`Error reading file ${absolutePath}: ${describeError(err)}`);
    return null;
  }

  let sizeBytes: number;
  try {
    sizeBytes = (await ctx.source.stat(absolutePath)).sizeBytes;
  } catch (err) {
    ctx.logger.warn(`Error getting file info for ${absolutePath}: ${describeError(err)}`);
    return null;
  }

  let relativePath: string;
  try {
    relativePath = toRelativePath(ctx.rootPath, absolutePath);
  } catch (err) {
    ctx.logger.warn(`Error calculating relative path for ${absolutePath}: ${describeError(err)}`);
    return null;
  }

  return {
    name: path.basename(absolutePath),
    relativePath,
    sizeBytes,
    content,
  };
}

export type ArchiveOutcome = "archived" | "failed";

/** Capture followed by a write into the shared sink. Never rejects. */
export async function archiveFile(
  absolutePath: string,
  ctx: CaptureContext & { sink: OutputSink }
): Promise<ArchiveOutcome> {
  const captured = await captureFile(absolutePath, ctx);
  if (!captured) return "failed";

  try {
    await ctx.sink.submit(captured);
  } catch (err) {
    ctx.logger.warn(`Error writing file ${absolutePath} to output: ${describeError(err)}`);
    return "failed";
  }

  ctx.logger.debug(`Archived ${captured.relativePath} (${captured.sizeBytes} bytes)`);
  return "archived";
}
