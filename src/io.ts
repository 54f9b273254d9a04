import fs from "fs";

export function readFile(filePath: string): string {
  return fs.readFileSync(filePath, "utf8");
}

/**
 * Whether something is being piped into this process: stdin is a pipe, or a
 * non-empty redirected file. A terminal or an empty file is not input.
 */
export function isReceiving(fd = 0): boolean {
  const stats = fs.fstatSync(fd);
  if (stats.isFIFO()) {
    return true;
  }
  return stats.isFile() && stats.size > 0;
}
