import type { DirectoryEntry } from "@flatdump/core-domain";

export interface DirectoryReader {
  /**
   * Lists the direct children of a directory, in whatever order the
   * underlying filesystem returns them. Symbolic links are reported as
   * non-directories.
   */
  list(absolutePath: string): Promise<DirectoryEntry[]>;
}
