import path from "node:path";
import { readFile, writeFile } from "fs/promises";
import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { rewrite, rewriteFile } from "./rewriter";
import type { CodeFile } from "../types";
import {
  TEST_CONFIG,
  createContext,
  makeTempDir,
  removeDir,
  writeTree,
} from "../testing";

// Pass-through wrapper so single writes can be made to fail
vi.mock("fs/promises", async (importOriginal) => {
  const actual = await importOriginal<typeof import("fs/promises")>();
  return { ...actual, writeFile: vi.fn(actual.writeFile) };
});

const mapping = new Map([
  ["photo.jpg", "photo.webp"],
  ["bg.png", "bg.webp"],
]);

describe("rewriteFile", () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(root);
  });

  function codeFile(relativePath: string): CodeFile {
    return {
      path: path.join(root, relativePath),
      relativePath,
      extension: path.extname(relativePath),
    };
  }

  it("writes the file back when references change", async () => {
    await writeTree(root, {
      "index.html": '<img src="/assets/img/photo.jpg">\n',
    });

    const result = await rewriteFile(codeFile("index.html"), {
      mapping,
      encodings: ["utf-8"],
      dryRun: false,
    });

    expect(result).toEqual({ status: "rewritten", replacements: 1, written: true });
    expect(await readFile(path.join(root, "index.html"), "utf-8")).toBe(
      '<img src="/assets/img/photo.webp">\n',
    );
  });

  it("reports replacements without writing in dry-run", async () => {
    const original = ".hero { background: url('bg.png'); }";
    await writeTree(root, { "site.css": original });

    const result = await rewriteFile(codeFile("site.css"), {
      mapping,
      encodings: ["utf-8"],
      dryRun: true,
    });

    expect(result).toEqual({ status: "rewritten", replacements: 1, written: false });
    expect(await readFile(path.join(root, "site.css"), "utf-8")).toBe(original);
  });

  it("re-encodes latin1 input as UTF-8", async () => {
    const latin1 = Buffer.from('<p>caf\xe9</p><img src="photo.jpg">', "latin1");
    await writeTree(root, { "page.html": latin1 });

    const result = await rewriteFile(codeFile("page.html"), {
      mapping,
      encodings: ["utf-8", "latin1"],
      dryRun: false,
    });

    expect(result).toEqual({ status: "rewritten", replacements: 1, written: true });
    expect(await readFile(path.join(root, "page.html"), "utf-8")).toBe(
      '<p>café</p><img src="photo.webp">',
    );
  });

  it("skips files no encoding can decode", async () => {
    await writeTree(root, { "bad.md": Buffer.from([0xff, 0xfe, 0x00]) });

    const result = await rewriteFile(codeFile("bad.md"), {
      mapping,
      encodings: ["utf-8"],
      dryRun: false,
    });

    expect(result).toEqual({ status: "undecodable" });
  });

  it("returns read failures instead of throwing", async () => {
    const result = await rewriteFile(codeFile("missing.html"), {
      mapping,
      encodings: ["utf-8"],
      dryRun: false,
    });

    expect(result.status).toBe("read-failed");
  });
});

describe("rewrite", () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(root);
  });

  it("throws when earlier stages have not run", async () => {
    await expect(rewrite(createContext(root))).rejects.toThrow(
      "Scanner and mapper must run before rewriter",
    );
  });

  it("counts updated files and replacements, continuing past failures", async () => {
    await writeTree(root, {
      "a.html": '<img src="photo.jpg"><img src="img/photo.jpg">',
      "b.md": "![bg](img/bg.png)",
      "c.css": "body { color: red; }",
      "d.md": Buffer.from([0xff, 0xfe]),
    });
    const ctx = createContext(root, {
      config: {
        references: { ...TEST_CONFIG.references, encodings: ["utf-8"] },
      },
    });
    ctx.mapping = mapping;
    ctx.codeFiles = ["a.html", "b.md", "c.css", "d.md", "gone.html"].map(
      (relativePath) => ({
        path: path.join(root, relativePath),
        relativePath,
        extension: path.extname(relativePath),
      }),
    );

    await rewrite(ctx);

    expect(ctx.tracker.getStats()).toMatchObject({
      filesUpdated: 2,
      replacements: 3,
    });
    expect(
      ctx.tracker.getIssues("file").map((i) => [i.path, i.reason]),
    ).toEqual([
      ["d.md", "decode-error"],
      ["gone.html", "read-error"],
    ]);
    expect(await readFile(path.join(root, "b.md"), "utf-8")).toBe(
      "![bg](img/bg.webp)",
    );
  });

  it("reports write failures and keeps going", async () => {
    await writeTree(root, {
      "a.html": '<img src="photo.jpg">',
      "b.html": '<img src="bg.png">',
    });
    const ctx = createContext(root);
    ctx.mapping = mapping;
    ctx.codeFiles = ["a.html", "b.html"].map((relativePath) => ({
      path: path.join(root, relativePath),
      relativePath,
      extension: ".html",
    }));

    vi.mocked(writeFile).mockRejectedValueOnce(new Error("disk full"));
    await rewrite(ctx);

    expect(ctx.tracker.getIssues("file")).toEqual([
      { type: "file", path: "a.html", reason: "write-error", details: "disk full" },
    ]);
    expect(ctx.tracker.getStats()).toMatchObject({
      filesUpdated: 1,
      replacements: 1,
    });
    expect(await readFile(path.join(root, "a.html"), "utf-8")).toBe(
      '<img src="photo.jpg">',
    );
    expect(await readFile(path.join(root, "b.html"), "utf-8")).toBe(
      '<img src="bg.webp">',
    );
  });

  it("does nothing when no image was converted", async () => {
    const content = '<img src="photo.jpg">';
    await writeTree(root, { "a.html": content });
    const ctx = createContext(root);
    ctx.mapping = new Map();
    ctx.codeFiles = [
      { path: path.join(root, "a.html"), relativePath: "a.html", extension: ".html" },
    ];

    await rewrite(ctx);

    expect(await readFile(path.join(root, "a.html"), "utf-8")).toBe(content);
    expect(ctx.tracker.getStats().replacements).toBe(0);
  });
});
