import fs from "node:fs";
import path from "node:path";

/**
 * Write `data` to `dest` through a temporary file in the same directory,
 * renamed into place once complete. On failure the temporary file is
 * removed and `dest` is left as it was.
 */
export function writeFileAtomic(dest: string, data: string | Buffer): void {
  const dir = path.dirname(dest);
  fs.mkdirSync(dir, { recursive: true });
  const tmp = path.join(dir, `.${path.basename(dest)}.${process.pid}.${Date.now()}.tmp`);
  try {
    fs.writeFileSync(tmp, data);
    fs.renameSync(tmp, dest);
  } catch (err) {
    fs.rmSync(tmp, { force: true });
    throw err;
  }
}
