import path from "node:path";

import type { DirectoryReader } from "../ports/directory-reader";
import type { FileSource } from "../ports/file-source";
import type { Logger } from "../ports/logger";
import type { OutputSink } from "../ports/output-sink";
import { NodeDirectoryReader } from "../adapters/node-directory-reader";
import { NodeFileSource } from "../adapters/node-file-source";
import { RotatingOutputSink } from "../adapters/rotating-output-sink";
import { silentLogger } from "../adapters/console-logger";
import { prepareArchiveRun, type ArchiveConfig, type PreparedArchiveRun } from "../config/archive-config";
import { archiveFile } from "./capture";
import { isOutputFileName } from "./record-format";
import { scanTree } from "./traversal";
import { runWorkerPool } from "./worker-pool";

export type ArchiveRunDeps = {
  reader?: DirectoryReader;
  source?: FileSource;
  logger?: Logger;
  sinkFactory?: (run: PreparedArchiveRun, logger: Logger) => OutputSink;
};

export type ArchiveRunSummary = {
  filesDiscovered: number;
  filesArchived: number;
  filesFailed: number;
  outputFiles: string[];
};

/**
 * Matches the output directory itself when it sits below the root, and the
 * archive files the sink writes into it when it is the root.
 */
export function createOutputExclusion(run: PreparedArchiveRun, extension = "txt") {
  return (absolutePath: string, isDirectory: boolean): boolean => {
    if (absolutePath === run.outputDir) return true;
    return (
      !isDirectory &&
      path.dirname(absolutePath) === run.outputDir &&
      isOutputFileName(path.basename(absolutePath), extension)
    );
  };
}

const defaultSinkFactory = (run: PreparedArchiveRun, logger: Logger): OutputSink =>
  new RotatingOutputSink({
    outputDir: run.outputDir,
    maxBytesPerFile: run.maxBytesPerFile,
    logger,
  });

export async function runArchive(config: ArchiveConfig, deps: ArchiveRunDeps = {}): Promise<ArchiveRunSummary> {
  const logger = deps.logger ?? silentLogger;
  const reader = deps.reader ?? new NodeDirectoryReader();
  const source = deps.source ?? new NodeFileSource();

  const run = await prepareArchiveRun(config);

  // keep earlier archives out of this one when the output lives under the root
  const { treeText, filePaths } = await scanTree(run.rootPath, {
    rules: run.rules,
    reader,
    exclude: createOutputExclusion(run),
  });
  logger.info(`Found ${filePaths.length} files under ${run.rootPath}`);

  const sink = (deps.sinkFactory ?? defaultSinkFactory)(run, logger);
  let archived = 0;
  let failed = 0;

  try {
    await sink.writeTree(treeText);

    await runWorkerPool(filePaths, { workerCount: run.workerCount, logger }, async (filePath) => {
      const outcome = await archiveFile(filePath, { rootPath: run.rootPath, source, logger, sink });
      if (outcome === "archived") archived++;
      else failed++;
    });
  } finally {
    await sink.close();
  }

  const summary: ArchiveRunSummary = {
    filesDiscovered: filePaths.length,
    filesArchived: archived,
    filesFailed: failed,
    outputFiles: [...sink.status().filesCreated],
  };

  logger.info("File processing completed successfully", {
    archived: summary.filesArchived,
    failed: summary.filesFailed,
    outputFiles: summary.outputFiles.length,
  });

  return summary;
}
