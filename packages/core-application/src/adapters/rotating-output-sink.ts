import fs, { type FileHandle } from "node:fs/promises";
import path from "node:path";
import type { CapturedFile } from "@flatdump/core-domain";

import type { Logger } from "../ports/logger";
import type { OutputSink, OutputSinkState, OutputSinkStatus } from "../ports/output-sink";
import { Mutex } from "../application/mutex";
import { SinkClosedError, SinkStateError } from "../application/errors";
import {
  RECORD_FOOTER,
  formatRecordHeader,
  formatTreeBlock,
  outputFileName,
  recordByteLength,
} from "../services/record-format";

export type RotatingOutputSinkOptions = {
  outputDir: string;
  maxBytesPerFile: number;
  /** Without the dot. Defaults to `txt`. */
  extension?: string;
  logger?: Logger;
};

/**
 * The single writer behind every worker. All state changes happen inside
 * `mutex`, so a rotation and the record written after it are indivisible.
 *
 * `bytesWritten` only grows by what `FileHandle.write` reports, which keeps
 * it equal to the bytes in the open file even when a write fails midway.
 */
export class RotatingOutputSink implements OutputSink {
  private readonly mutex = new Mutex();
  private readonly outputDir: string;
  private readonly maxBytesPerFile: number;
  private readonly extension: string;
  private readonly logger?: Logger;

  private handle: FileHandle | null = null;
  private currentFile: string | null = null;
  private bytesWritten = 0;
  private nextFileIndex = 1;
  private treeWritten = false;
  private state: OutputSinkState = "idle";
  private readonly filesCreated: string[] = [];

  constructor(options: RotatingOutputSinkOptions) {
    if (!Number.isSafeInteger(options.maxBytesPerFile) || options.maxBytesPerFile <= 0) {
      throw new RangeError(`maxBytesPerFile must be a positive integer, got ${options.maxBytesPerFile}`);
    }
    this.outputDir = path.resolve(options.outputDir);
    this.maxBytesPerFile = options.maxBytesPerFile;
    this.extension = options.extension ?? "txt";
    this.logger = options.logger;
  }

  async writeTree(treeText: string): Promise<void> {
    await this.mutex.runExclusive(async () => {
      this.assertOpenable("write the directory tree");
      if (this.treeWritten || this.filesCreated.length > 0) {
        throw new SinkStateError("Directory tree must be written once, before any record");
      }

      const handle = await this.openNext();
      this.treeWritten = true;
      await this.write(handle, Buffer.from(formatTreeBlock(treeText), "utf-8"));
    });
  }

  async submit(file: CapturedFile): Promise<void> {
    await this.mutex.runExclusive(async () => {
      this.assertOpenable("submit a record");

      const totalSize = recordByteLength(file);
      let handle = this.handle ?? (await this.openNext());

      if (this.bytesWritten > 0 && this.bytesWritten + totalSize > this.maxBytesPerFile) {
        handle = await this.openNext();
      }

      await this.write(handle, Buffer.from(formatRecordHeader(file), "utf-8"));
      await this.write(handle, file.content);
      await this.write(handle, Buffer.from(RECORD_FOOTER, "utf-8"));
    });
  }

  async close(): Promise<void> {
    await this.mutex.runExclusive(async () => {
      if (this.state === "closed") return;
      this.state = "closed";
      await this.closeCurrent();
    });
  }

  status(): OutputSinkStatus {
    return {
      state: this.state,
      currentFile: this.currentFile,
      bytesWrittenSinceRotation: this.bytesWritten,
      nextFileIndex: this.nextFileIndex,
      filesCreated: [...this.filesCreated],
    };
  }

  private assertOpenable(operation: string) {
    if (this.state === "closed") throw new SinkClosedError(operation);
  }

  private async closeCurrent() {
    const handle = this.handle;
    if (!handle) return;
    this.handle = null;
    this.currentFile = null;
    await handle.close();
  }

  private async openNext(): Promise<FileHandle> {
    const previous = this.currentFile;
    await this.closeCurrent();

    const filePath = path.join(this.outputDir, outputFileName(this.nextFileIndex, this.extension));
    const handle = await fs.open(filePath, "w");

    this.handle = handle;
    this.currentFile = filePath;
    this.filesCreated.push(filePath);
    this.nextFileIndex++;
    this.bytesWritten = 0;
    this.state = "open";

    if (previous) {
      this.logger?.debug(`Rotated output: ${path.basename(previous)} -> ${path.basename(filePath)}`);
    } else {
      this.logger?.debug(`Opened output: ${filePath}`);
    }

    return handle;
  }

  private async write(handle: FileHandle, data: Buffer) {
    let offset = 0;
    while (offset < data.byteLength) {
      const { bytesWritten } = await handle.write(data, offset, data.byteLength - offset);
      offset += bytesWritten;
      this.bytesWritten += bytesWritten;
    }
  }
}
