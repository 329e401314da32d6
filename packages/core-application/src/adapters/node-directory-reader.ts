import fs from "node:fs/promises";
import type { DirectoryEntry } from "@flatdump/core-domain";

import type { DirectoryReader } from "../ports/directory-reader";

/**
 * `fs.readdir` backed reader. Order is whatever the platform returns and is
 * not sorted. Symlinks are not followed.
 */
export class NodeDirectoryReader implements DirectoryReader {
  async list(absolutePath: string): Promise<DirectoryEntry[]> {
    const entries = await fs.readdir(absolutePath, { withFileTypes: true });
    return entries.map((entry) => ({
      name: entry.name,
      isDirectory: entry.isDirectory(),
    }));
  }
}
