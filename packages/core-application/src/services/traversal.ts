import path from "node:path";
import type { FilterRules, PathNode } from "@flatdump/core-domain";

import type { DirectoryReader } from "../ports/directory-reader";
import { TraversalError } from "../application/errors";
import { decidePath } from "./path-filter";

export type NodeVisitor = (node: PathNode) => void;

export type TraversalOptions = {
  rules: FilterRules;
  reader: DirectoryReader;
  /** Entries pruned regardless of the rules, e.g. the run's own output */
  exclude?: (absolutePath: string, isDirectory: boolean) => boolean;
};

export const FILE_GLYPH = "├── ";
export const DIRECTORY_GLYPH = "└── ";

async function listOrThrow(reader: DirectoryReader, dir: string) {
  try {
    return await reader.list(dir);
  } catch (err) {
    throw new TraversalError(dir, err);
  }
}

async function walkDirectory(
  dir: string,
  depth: number,
  options: TraversalOptions,
  visit: NodeVisitor
): Promise<void> {
  const entries = await listOrThrow(options.reader, dir);

  for (const entry of entries) {
    const absolutePath = path.join(dir, entry.name);

    if (options.exclude?.(absolutePath, entry.isDirectory)) continue;
    if (decidePath(options.rules, entry.name, entry.isDirectory) === "skip") continue;

    const node: PathNode = {
      absolutePath,
      name: entry.name,
      isDirectory: entry.isDirectory,
      depth,
    };

    visit(node);

    if (node.isDirectory) {
      await walkDirectory(absolutePath, depth + 1, options, visit);
    }
  }
}

/**
 * Pre-order walk below `rootPath`. Every entry is filtered exactly once;
 * skipped directories are never listed. The root itself is neither filtered
 * nor visited. Entries keep the reader's order.
 */
export async function walkTree(rootPath: string, options: TraversalOptions, visit: NodeVisitor): Promise<void> {
  await walkDirectory(path.resolve(rootPath), 0, options, visit);
}

export function formatTreeLine(node: PathNode): string {
  const glyph = node.isDirectory ? DIRECTORY_GLYPH : FILE_GLYPH;
  return "  ".repeat(node.depth) + glyph + node.name + "\n";
}

export async function renderTree(rootPath: string, options: TraversalOptions): Promise<string> {
  let text = "";
  await walkTree(rootPath, options, (node) => {
    text += formatTreeLine(node);
  });
  return text;
}

export async function collectFilePaths(rootPath: string, options: TraversalOptions): Promise<string[]> {
  const files: string[] = [];
  await walkTree(rootPath, options, (node) => {
    if (!node.isDirectory) files.push(node.absolutePath);
  });
  return files;
}

export type TreeScan = {
  treeText: string;
  filePaths: string[];
};

/** Tree mode and collection mode fed from a single walk. */
export async function scanTree(rootPath: string, options: TraversalOptions): Promise<TreeScan> {
  let treeText = "";
  const filePaths: string[] = [];

  await walkTree(rootPath, options, (node) => {
    treeText += formatTreeLine(node);
    if (!node.isDirectory) filePaths.push(node.absolutePath);
  });

  return { treeText, filePaths };
}
