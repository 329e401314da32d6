import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { createFilterRules } from "@flatdump/core-domain";

import type { FileSource, FileStat } from "../ports/file-source";
import { NodeDirectoryReader } from "../adapters/node-directory-reader";
import { NodeFileSource } from "../adapters/node-file-source";
import { RootNotFoundError } from "../application/errors";
import { DEFAULT_ARCHIVE_CONFIG, type ArchiveConfig } from "../config/archive-config";
import { createMemoryLogger } from "../testing/memory-logger";
import { createOutputExclusion, runArchive } from "./archive-run";
import { renderTree } from "./traversal";

const RECORD_PATTERN = /File: (.*)\nPath: (.*)\nSize: (\d+) bytes\nFILE CONTENT START:\n([\s\S]*?)\nFILE CONTENT END\n\n/g;

async function writeTree(root: string, files: Record<string, string>) {
  for (const [rel, content] of Object.entries(files)) {
    const abs = path.join(root, rel);
    await fs.mkdir(path.dirname(abs), { recursive: true });
    await fs.writeFile(abs, content);
  }
}

class FailingSource implements FileSource {
  private readonly inner = new NodeFileSource();

  constructor(private readonly brokenPath: string) {}

  async readFile(absolutePath: string): Promise<Buffer> {
    if (absolutePath === this.brokenPath) throw new Error("EACCES: permission denied");
    return this.inner.readFile(absolutePath);
  }

  stat(absolutePath: string): Promise<FileStat> {
    return this.inner.stat(absolutePath);
  }
}

describe("archive-run", () => {
  let tmp: string;
  let root: string;
  let out: string;

  beforeEach(async () => {
    tmp = await fs.mkdtemp(path.join(os.tmpdir(), "flatdump-run-"));
    root = path.join(tmp, "root");
    out = path.join(tmp, "out");
    await fs.mkdir(root);
  });

  afterEach(async () => {
    await fs.rm(tmp, { recursive: true, force: true });
  });

  const config = (overrides: Partial<ArchiveConfig> = {}): ArchiveConfig => ({
    ...DEFAULT_ARCHIVE_CONFIG,
    rootPath: root,
    outputDir: out,
    ...overrides,
  });

  it("archives only a.txt from hidden, skipped-extension and skipped-directory content", async () => {
    await writeTree(root, {
      "a.txt": "hello",
      ".hidden": "secret",
      "logs/run.log": "boot",
      "vendor/x.txt": "vendored",
    });
    const logger = createMemoryLogger();

    const summary = await runArchive(
      config({ skipExtensions: [".log"], skipDirNames: ["vendor"] }),
      { logger }
    );

    expect(summary).toEqual({
      filesDiscovered: 1,
      filesArchived: 1,
      filesFailed: 0,
      outputFiles: [path.join(out, "output_001.txt")],
    });

    const tree = await renderTree(root, {
      rules: createFilterRules({ skipExtensions: [".log"], skipDirNames: ["vendor"] }),
      reader: new NodeDirectoryReader(),
    });
    expect(tree.split("\n").filter(Boolean).sort()).toEqual(["└── logs", "├── a.txt"]);

    const text = await fs.readFile(path.join(out, "output_001.txt"), "utf-8");
    expect(text).toBe(
      "DIRECTORY STRUCTURE:\n" +
        tree +
        "\n" +
        "File: a.txt\nPath: a.txt\nSize: 5 bytes\nFILE CONTENT START:\nhello\nFILE CONTENT END\n\n"
    );
    expect(logger.messages("info")).toEqual([
      `Found 1 files under ${root}`,
      "File processing completed successfully",
    ]);
  });

  it("leaves its own output directory out when it sits under the root", async () => {
    await writeTree(root, { "a.txt": "hello", "dump/output_001.txt": "stale archive" });

    const summary = await runArchive(config({ outputDir: path.join(root, "dump") }));

    expect(summary.filesArchived).toBe(1);
    const text = await fs.readFile(path.join(root, "dump", "output_001.txt"), "utf-8");
    expect(text).toBe(
      "DIRECTORY STRUCTURE:\n├── a.txt\n\n" +
        "File: a.txt\nPath: a.txt\nSize: 5 bytes\nFILE CONTENT START:\nhello\nFILE CONTENT END\n\n"
    );
  });

  it("does not re-archive its own files when writing into the root", async () => {
    await writeTree(root, { "a.txt": "hello" });
    const expected =
      "DIRECTORY STRUCTURE:\n├── a.txt\n\n" +
      "File: a.txt\nPath: a.txt\nSize: 5 bytes\nFILE CONTENT START:\nhello\nFILE CONTENT END\n\n";

    const first = await runArchive(config({ outputDir: root }));
    expect(first.filesDiscovered).toBe(1);

    const second = await runArchive(config({ outputDir: root }));

    expect(second.filesDiscovered).toBe(1);
    expect(second.filesArchived).toBe(1);
    expect(second.outputFiles).toEqual([path.join(root, "output_001.txt")]);
    expect(await fs.readFile(path.join(root, "output_001.txt"), "utf-8")).toBe(expected);
  });

  it("still archives root files that only look like archives", async () => {
    await writeTree(root, { "output_notes.txt": "n" });

    const summary = await runArchive(config({ outputDir: root }));

    expect(summary.filesArchived).toBe(1);
    const text = await fs.readFile(path.join(root, "output_001.txt"), "utf-8");
    expect([...text.matchAll(RECORD_PATTERN)].map((m) => m[2])).toEqual(["output_notes.txt"]);
  });

  it("archives names starting with two dots when hidden entries are kept", async () => {
    await writeTree(root, { "..notes": "n", "..data/x.txt": "xyz" });
    const logger = createMemoryLogger();

    const summary = await runArchive(config({ skipHidden: false }), { logger });

    expect(summary).toMatchObject({ filesDiscovered: 2, filesArchived: 2, filesFailed: 0 });
    expect(logger.messages("warn")).toEqual([]);

    const text = await fs.readFile(summary.outputFiles[0], "utf-8");
    const records = [...text.matchAll(RECORD_PATTERN)].map((m) => [m[2], m[4]]);
    expect(records.sort()).toEqual([
      ["..data/x.txt", "xyz"],
      ["..notes", "n"],
    ]);
  });

  it("archives every file once across rotations with more files than workers", async () => {
    const files: Record<string, string> = {};
    for (let i = 0; i < 30; i++) {
      const name = `file-${String(i).padStart(2, "0")}.txt`;
      files[name] = String.fromCharCode(65 + (i % 26)).repeat(100);
    }
    await writeTree(root, files);

    // tree: 30 lines of 22 bytes + 22 bytes of framing = 682; each record is 191 bytes
    const summary = await runArchive(config({ maxFileSizeKB: 1, workerCount: 4 }));

    expect(summary.filesDiscovered).toBe(30);
    expect(summary.filesArchived).toBe(30);
    expect(summary.outputFiles).toHaveLength(7);

    const texts = await Promise.all(summary.outputFiles.map((f) => fs.readFile(f, "utf-8")));
    for (const f of summary.outputFiles) {
      expect((await fs.stat(f)).size).toBeLessThanOrEqual(1024);
    }

    const headerEnd = texts[0].indexOf("\n\n") + 2;
    expect(headerEnd).toBe(682);
    const body = texts[0].slice(headerEnd) + texts.slice(1).join("");
    const matches = [...body.matchAll(RECORD_PATTERN)];

    expect(matches.map((m) => m[0]).join("")).toBe(body);
    expect(matches.map((m) => m[2]).sort()).toEqual(Object.keys(files).sort());
    for (const m of matches) {
      expect(m[4]).toBe(files[m[2]]);
      expect(m[3]).toBe("100");
    }
  });

  it("keeps going when one file cannot be read", async () => {
    await writeTree(root, { "a.txt": "a", "b.txt": "b", "c.txt": "c", "d.txt": "d", "e.txt": "e" });
    const broken = path.join(root, "c.txt");
    const logger = createMemoryLogger();

    const summary = await runArchive(config({ workerCount: 2 }), { logger, source: new FailingSource(broken) });

    expect(summary.filesDiscovered).toBe(5);
    expect(summary.filesArchived).toBe(4);
    expect(summary.filesFailed).toBe(1);
    expect(logger.messages("warn")).toEqual([`Error reading file ${broken}: EACCES: permission denied`]);

    const text = await fs.readFile(summary.outputFiles[0], "utf-8");
    const names = [...text.matchAll(RECORD_PATTERN)].map((m) => m[1]).sort();
    expect(names).toEqual(["a.txt", "b.txt", "d.txt", "e.txt"]);
  });

  it("writes the tree even when there is nothing to archive", async () => {
    const summary = await runArchive(config());

    expect(summary.filesDiscovered).toBe(0);
    expect(await fs.readFile(summary.outputFiles[0], "utf-8")).toBe("DIRECTORY STRUCTURE:\n\n");
  });

  it("stops before writing anything when the root is missing", async () => {
    await expect(runArchive(config({ rootPath: path.join(tmp, "nope") }))).rejects.toBeInstanceOf(RootNotFoundError);
    await expect(fs.stat(out)).rejects.toThrow();
  });

  describe("createOutputExclusion", () => {
    const prepared = (outputDir: string) => ({
      rootPath: "/r",
      outputDir,
      maxBytesPerFile: 1024,
      workerCount: 4,
      rules: createFilterRules(),
    });

    it("prunes a nested output directory", () => {
      const exclude = createOutputExclusion(prepared("/r/out"));
      expect(exclude("/r/out", true)).toBe(true);
      expect(exclude("/r/other", true)).toBe(false);
      expect(exclude("/r/out_001.txt", false)).toBe(false);
    });

    it("skips only archive files when the output is the root", () => {
      const exclude = createOutputExclusion(prepared("/r"));
      expect(exclude("/r/output_001.txt", false)).toBe(true);
      expect(exclude("/r/output_001.txt", true)).toBe(false);
      expect(exclude("/r/sub/output_001.txt", false)).toBe(false);
      expect(exclude("/r/a.txt", false)).toBe(false);
    });
  });
});
