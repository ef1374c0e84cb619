import AdmZip from "adm-zip";
import type { ContainerEntry } from "./types.js";

/**
 * Zip container entries in the order given. Entries flagged `stored` are
 * written without compression, which EPUB and ODT require of `mimetype`.
 */
export function packContainer(entries: readonly ContainerEntry[]): Buffer {
  const zip = new AdmZip(undefined, { noSort: true });
  for (const entry of entries) {
    zip.addFile(entry.path, entry.data);
    if (entry.stored) {
      const added = zip.getEntry(entry.path);
      if (added) added.header.method = 0;
    }
  }
  return zip.toBuffer();
}

/** `mimetype` entry that opens every EPUB and ODT package. */
export function mimetypeEntry(mediaType: string): ContainerEntry {
  return { path: "mimetype", data: Buffer.from(mediaType, "ascii"), stored: true };
}

export function textEntry(path: string, content: string): ContainerEntry {
  return { path, data: Buffer.from(content, "utf-8") };
}
