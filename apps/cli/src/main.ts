import { StartupError, createConsoleLogger, describeError, runArchive } from "@flatdump/core-application";

import { createProgram } from "./program";

async function main() {
  const program = createProgram(async (config, options) => {
    const logger = createConsoleLogger({ level: options.verbose ? "debug" : "info" });
    const summary = await runArchive(config, { logger });

    for (const file of summary.outputFiles) logger.info(`Wrote ${file}`);
    if (summary.filesFailed > 0) {
      logger.warn(`${summary.filesFailed} of ${summary.filesDiscovered} files could not be archived`);
    }
  });

  await program.parseAsync(process.argv);
}

main().catch((err) => {
  // startup problems are the operator's to fix; anything else keeps its stack
  if (err instanceof StartupError) console.error(describeError(err));
  else console.error(err);
  process.exit(1);
});
