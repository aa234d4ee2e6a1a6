import { readFileSync } from "node:fs";
import { gunzipSync } from "node:zlib";

export interface TarEntry {
  name: string;
  size: number;
}

function readString(block: Buffer, start: number, end: number): string {
  return block.toString("utf8", start, end).split("\0")[0];
}

/** Regular-file entries of a .tar.gz, in archive order. */
export function listTarGz(path: string): TarEntry[] {
  const buf = gunzipSync(readFileSync(path));
  const entries: TarEntry[] = [];
  let offset = 0;

  while (offset + 512 <= buf.length) {
    const header = buf.subarray(offset, offset + 512);
    if (header.every((b) => b === 0)) break;

    const name = readString(header, 0, 100);
    const size = parseInt(readString(header, 124, 136).trim() || "0", 8);
    const type = header[156];
    // '0' or NUL mark a regular file
    if (type === 0x30 || type === 0) entries.push({ name, size });

    offset += 512 + Math.ceil(size / 512) * 512;
  }
  return entries;
}
