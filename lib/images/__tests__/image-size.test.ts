import { describe, it, expect } from "vitest";
import { PNG } from "pngjs";
import { frameSize, getPngSize, isPng } from "../image-size.js";

function createPng(width: number, height: number): Buffer {
  return PNG.sync.write(new PNG({ width, height }));
}

describe("getPngSize", () => {
  it("reads PNG dimensions", () => {
    expect(getPngSize(createPng(30, 20))).toEqual({ width: 30, height: 20 });
  });

  it("returns null for data that is not a PNG", () => {
    expect(getPngSize(Buffer.from("GIF89a"))).toBeNull();
    expect(getPngSize(Buffer.alloc(0))).toBeNull();
  });
});

describe("isPng", () => {
  it("checks the signature", () => {
    expect(isPng(createPng(1, 1))).toBe(true);
    expect(isPng(Buffer.from([0x89, 0x50, 0x4e, 0x47]))).toBe(false);
  });
});

describe("frameSize", () => {
  it("converts pixels at 96 dpi", () => {
    expect(frameSize({ width: 96, height: 48 }, 16)).toEqual({ width: 2.54, height: 1.27 });
  });

  it("scales wide images down to the column width", () => {
    expect(frameSize({ width: 1920, height: 960 }, 16)).toEqual({ width: 16, height: 8 });
  });

  it("uses a square of the column width when the size is unknown", () => {
    expect(frameSize(null, 16)).toEqual({ width: 16, height: 16 });
    expect(frameSize({ width: 0, height: 10 }, 12)).toEqual({ width: 12, height: 12 });
  });
});
