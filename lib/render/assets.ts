import fs from "node:fs";
import path from "node:path";
import { FileNotFoundError, RenderError, type OutputFormat } from "../errors.js";
import type { ContainerEntry } from "./types.js";

const MEDIA_TYPES: Record<string, string> = {
  ".png": "image/png",
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".gif": "image/gif",
  ".svg": "image/svg+xml",
  ".webp": "image/webp",
};

export function mediaType(file: string): string {
  return MEDIA_TYPES[path.extname(file).toLowerCase()] ?? "application/octet-stream";
}

/** Anything with a URL scheme (`http:`, `data:`, ...) is left as a link. */
export function isRemote(url: string): boolean {
  return /^[a-z][a-z0-9+.-]*:/i.test(url) && !/^file:/i.test(url);
}

export interface Asset {
  /** Path inside the container. */
  path: string;
  mediaType: string;
  data: Buffer;
  /** Manifest id, e.g. `image_002`. */
  id: string;
}

/**
 * Copies local images referenced by a book into a container directory.
 * The same source file is stored once, however many chapters use it.
 */
export class AssetCollector {
  private readonly bySource = new Map<string, Asset>();

  constructor(
    private readonly root: string,
    private readonly dir: string,
    private readonly format: OutputFormat
  ) {}

  /** Store the image behind `url`; returns its asset. Missing files are fatal. */
  add(url: string, chapter?: number): Asset {
    const source = this.resolve(url);
    const existing = this.bySource.get(source);
    if (existing) return existing;

    const data = readAsset(source, this.format, chapter);
    const n = this.bySource.size + 1;
    const ext = path.extname(source).toLowerCase();
    const id = `image_${String(n).padStart(3, "0")}`;
    const asset: Asset = { path: `${this.dir}/${id}${ext}`, mediaType: mediaType(source), data, id };
    this.bySource.set(source, asset);
    return asset;
  }

  assets(): Asset[] {
    return [...this.bySource.values()];
  }

  entries(prefix = ""): ContainerEntry[] {
    return this.assets().map((asset) => ({ path: `${prefix}${asset.path}`, data: asset.data }));
  }

  private resolve(url: string): string {
    return resolveLocal(this.root, url);
  }
}

/** Absolute path of a local image URL, relative URLs taken from `root`. */
export function resolveLocal(root: string, url: string): string {
  const local = /^file:/i.test(url) ? new URL(url).pathname : url.split(/[?#]/)[0];
  let decoded: string;
  try {
    decoded = decodeURI(local);
  } catch {
    // not percent-encoded after all
    decoded = local;
  }
  return path.resolve(root, decoded);
}

/** Read a referenced resource (image or cover) for a container format. */
export function readAsset(file: string, format: OutputFormat, chapter?: number): Buffer {
  try {
    return fs.readFileSync(file);
  } catch (err) {
    const cause =
      err instanceof Error && "code" in err && err.code === "ENOENT"
        ? new FileNotFoundError(file, { cause: err })
        : err;
    throw new RenderError(`Could not read resource ${file}`, { format, chapter, cause });
  }
}
