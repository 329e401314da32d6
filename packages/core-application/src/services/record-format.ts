import type { CapturedFile } from "@flatdump/core-domain";

export const TREE_PREFIX = "DIRECTORY STRUCTURE:\n";
export const TREE_SEPARATOR = "\n";
export const RECORD_FOOTER = "\nFILE CONTENT END\n\n";

export function formatTreeBlock(treeText: string): string {
  return TREE_PREFIX + treeText + TREE_SEPARATOR;
}

export function formatRecordHeader(file: Pick<CapturedFile, "name" | "relativePath" | "sizeBytes">): string {
  return (
    `File: ${file.name}\n` +
    `Path: ${file.relativePath}\n` +
    `Size: ${file.sizeBytes} bytes\n` +
    "FILE CONTENT START:\n"
  );
}

/** Bytes the whole record will occupy on disk. */
export function recordByteLength(file: CapturedFile): number {
  return (
    Buffer.byteLength(formatRecordHeader(file), "utf-8") +
    file.content.byteLength +
    Buffer.byteLength(RECORD_FOOTER, "utf-8")
  );
}

export function outputFileName(index: number, extension: string): string {
  return `output_${String(index).padStart(3, "0")}.${extension}`;
}

export function isOutputFileName(name: string, extension: string): boolean {
  const suffix = `.${extension}`;
  if (!name.startsWith("output_") || !name.endsWith(suffix)) return false;
  return /^\d{3,}$/.test(name.slice("output_".length, name.length - suffix.length));
}
