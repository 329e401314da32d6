// Public API of the core-application package: ports, services, Node
// adapters and startup configuration. Consumers import from here rather
// than reaching into internal paths.

// Ports (interfaces)
export type { LogLevel, LogMeta, Logger } from "./ports/logger";
export type { DirectoryReader } from "./ports/directory-reader";
export type { FileSource, FileStat } from "./ports/file-source";
export type { OutputSink, OutputSinkState, OutputSinkStatus } from "./ports/output-sink";

// Application
export * from "./application/errors";
export * from "./application/mutex";

// Configuration
export * from "./config/archive-config";

// Services
export * from "./services/path-filter";
export * from "./services/traversal";
export * from "./services/work-queue";
export * from "./services/worker-pool";
export * from "./services/record-format";
export * from "./services/capture";
export * from "./services/archive-run";

// Node adapters
export * from "./adapters/node-directory-reader";
export * from "./adapters/node-file-source";
export * from "./adapters/rotating-output-sink";
export * from "./adapters/console-logger";
