import fs from "node:fs/promises";

import type { FileSource, FileStat } from "../ports/file-source";

export class NodeFileSource implements FileSource {
  async readFile(absolutePath: string): Promise<Buffer> {
    return fs.readFile(absolutePath);
  }

  async stat(absolutePath: string): Promise<FileStat> {
    const stat = await fs.stat(absolutePath);
    return { sizeBytes: stat.size };
  }
}
