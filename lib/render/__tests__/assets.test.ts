import { describe, it, expect, beforeAll, afterAll } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { FileNotFoundError, RenderError } from "../../errors.js";
import { AssetCollector, isRemote, mediaType, readAsset, resolveLocal } from "../assets.js";

describe("mediaType", () => {
  it("maps image extensions", () => {
    expect(mediaType("a.PNG")).toBe("image/png");
    expect(mediaType("b.jpeg")).toBe("image/jpeg");
    expect(mediaType("c.svg")).toBe("image/svg+xml");
    expect(mediaType("d.bin")).toBe("application/octet-stream");
  });
});

describe("isRemote", () => {
  it("treats URLs with a scheme as remote, except file:", () => {
    expect(isRemote("https://x.org/a.png")).toBe(true);
    expect(isRemote("data:image/png;base64,AAAA")).toBe(true);
    expect(isRemote("file:///tmp/a.png")).toBe(false);
    expect(isRemote("img/a.png")).toBe(false);
  });
});

describe("resolveLocal", () => {
  const root = path.resolve("/books/demo");

  it("resolves relative paths against the root", () => {
    expect(resolveLocal(root, "img/a.png")).toBe(path.join(root, "img/a.png"));
  });

  it("drops queries and fragments and decodes escapes", () => {
    expect(resolveLocal(root, "my%20pic.png?v=2#top")).toBe(path.join(root, "my pic.png"));
  });

  it("keeps a path that is not valid percent-encoding", () => {
    expect(resolveLocal(root, "100%.png")).toBe(path.join(root, "100%.png"));
  });

  it("reads file: URLs", () => {
    expect(resolveLocal(root, "file:///tmp/a.png")).toBe(path.resolve("/tmp/a.png"));
  });
});

describe("AssetCollector", () => {
  let tmpDir: string;

  beforeAll(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "assets-test-"));
    fs.writeFileSync(path.join(tmpDir, "a.png"), "A");
    fs.writeFileSync(path.join(tmpDir, "b.JPG"), "B");
  });

  afterAll(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("names assets in order and stores each source once", () => {
    const collector = new AssetCollector(tmpDir, "images", "epub");
    const a = collector.add("a.png");
    const b = collector.add("b.JPG");
    expect(collector.add("./a.png")).toBe(a);
    expect(a).toEqual({ path: "images/image_001.png", mediaType: "image/png", data: Buffer.from("A"), id: "image_001" });
    expect(b.path).toBe("images/image_002.jpg");
    expect(collector.entries("OEBPS/").map((e) => e.path)).toEqual([
      "OEBPS/images/image_001.png",
      "OEBPS/images/image_002.jpg",
    ]);
  });

  it("fails on a missing file", () => {
    const collector = new AssetCollector(tmpDir, "Pictures", "odt");
    expect(() => collector.add("missing.png", 2)).toThrow(RenderError);
  });
});

describe("readAsset", () => {
  it("wraps a missing file in a RenderError caused by FileNotFoundError", () => {
    const file = path.join(os.tmpdir(), "definitely-missing-asset.png");
    try {
      readAsset(file, "epub", 1);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(RenderError);
      if (!(err instanceof RenderError)) return;
      expect(err.message).toBe(`Could not read resource ${file}`);
      expect(err.chapter).toBe(1);
      expect(err.cause).toBeInstanceOf(FileNotFoundError);
    }
  });
});
