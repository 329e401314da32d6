import { Command } from "commander";
import {
  DEFAULT_ARCHIVE_CONFIG,
  buildArchiveConfig,
  type ArchiveConfig,
  type RawArchiveOptions,
} from "@flatdump/core-application";

export type CliOptions = RawArchiveOptions & {
  verbose?: boolean;
};

export type CliAction = (config: ArchiveConfig, options: CliOptions) => Promise<void>;

export function createProgram(action: CliAction): Command {
  const program = new Command();

  program
    .name("flatdump")
    .description("Dump a directory tree into size-capped text archives")
    .version("0.1.0")
    .option("-r, --root <dir>", "Root directory to process", DEFAULT_ARCHIVE_CONFIG.rootPath)
    .option("-m, --max-size <kb>", "Maximum output file size in KB", String(DEFAULT_ARCHIVE_CONFIG.maxFileSizeKB))
    .option("-o, --output <dir>", "Output directory for generated files", DEFAULT_ARCHIVE_CONFIG.outputDir)
    .option("--skip-hidden", "Skip hidden files and directories (default)")
    .option("--no-skip-hidden", "Include hidden files and directories")
    .option("--skip-ext <list>", "Comma-separated list of file extensions to skip (e.g. .log,.tmp)")
    .option("--skip-dir <list>", "Comma-separated list of directory names to skip (e.g. node_modules,.git)")
    .option("-w, --workers <n>", "Number of concurrent workers", String(DEFAULT_ARCHIVE_CONFIG.workerCount))
    .option("--verbose", "Log every archived file and rotation", false)
    .action(async (opts: CliOptions) => {
      await action(buildArchiveConfig(opts), opts);
    });

  return program;
}
