import type { CapturedFile } from "@flatdump/core-domain";

export type OutputSinkState = "idle" | "open" | "closed";

export type OutputSinkStatus = {
  state: OutputSinkState;
  /** Absolute path of the archive currently open, if any */
  currentFile: string | null;
  bytesWrittenSinceRotation: number;
  nextFileIndex: number;
  filesCreated: readonly string[];
};

/**
 * One rotating stream of archive files shared by every worker. The open
 * handle and the byte counter never leave the implementation.
 */
export interface OutputSink {
  writeTree(treeText: string): Promise<void>;
  submit(file: CapturedFile): Promise<void>;
  close(): Promise<void>;
  status(): OutputSinkStatus;
}
