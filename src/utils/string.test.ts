import path from "node:path";
import { describe, it, expect } from "vitest";
import { formatBytes, replaceExtension } from "./string";

describe("replaceExtension", () => {
  it("keeps directory and stem", () => {
    expect(replaceExtension(path.join("site", "img", "photo.jpg"), "webp")).toBe(
      path.join("site", "img", "photo.webp"),
    );
  });

  it("accepts a leading dot and replaces only the last extension", () => {
    expect(replaceExtension("logo.v2.PNG", ".webp")).toBe("logo.v2.webp");
  });
});

describe("formatBytes", () => {
  it("formats bytes and larger units", () => {
    expect(formatBytes(512)).toBe("512.0 B");
    expect(formatBytes(1536)).toBe("1.5 KB");
    expect(formatBytes(5 * 1024 * 1024)).toBe("5.0 MB");
  });
});
