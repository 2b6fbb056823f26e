/**
 * Output file helpers.
 *
 * Files are written to a .tmp sibling and renamed into place.
 */

import fs from "node:fs";
import { join } from "node:path";

export function ensureOutputDir(dir: string): string {
  fs.mkdirSync(dir, { recursive: true });
  return dir;
}

/** Write `content` to `dir/name` atomically and return the full path. */
export function writeOutput(dir: string, name: string, content: string): string {
  const filePath = join(dir, name);
  const tmpPath = `${filePath}.tmp`;
  try {
    fs.writeFileSync(tmpPath, content);
    fs.renameSync(tmpPath, filePath);
  } catch (err: unknown) {
    try {
      fs.unlinkSync(tmpPath);
    } catch {
      /* may not exist */
    }
    throw err;
  }
  return filePath;
}
