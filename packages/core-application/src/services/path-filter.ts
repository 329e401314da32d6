import path from "node:path";
import type { FilterRules } from "@flatdump/core-domain";

export type PathDecision = "skip" | "keep";

/**
 * Decides whether a single entry survives the configured rules. When a
 * directory is skipped the caller must prune its whole subtree.
 *
 * Precedence: hidden name, then skipped directory name, then skipped file
 * extension. Extension matching is case-sensitive and uses `path.extname`,
 * so `.bashrc` has no extension and is only caught by the hidden rule.
 */
export function decidePath(rules: FilterRules, name: string, isDirectory: boolean): PathDecision {
  if (rules.skipHidden && name.startsWith(".")) return "skip";

  if (isDirectory) {
    return rules.skipDirNames.has(name) ? "skip" : "keep";
  }

  const ext = path.extname(name);
  if (ext !== "" && rules.skipExtensions.has(ext)) return "skip";

  return "keep";
}
