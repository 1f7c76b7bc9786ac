/**
 * Length-prefixed container for documents made of several files (notebooks:
 * one stroke file per page plus a content manifest). Extractors and renderers
 * for such documents receive one of these as their input bytes.
 *
 * Layout: "IVB1" | u32 count | count x (u32 nameLen | name | u32 dataLen | data),
 * integers big-endian.
 */
const MAGIC = Buffer.from("IVB1", "ascii");

export interface BundleFile {
  name: string;
  data: Buffer;
}

export function packBundle(files: readonly BundleFile[]): Buffer {
  const parts: Buffer[] = [MAGIC, u32(files.length)];
  for (const f of files) {
    const name = Buffer.from(f.name, "utf8");
    parts.push(u32(name.length), name, u32(f.data.length), f.data);
  }
  return Buffer.concat(parts);
}

export function isBundle(buf: Buffer): boolean {
  return buf.length >= 8 && buf.subarray(0, 4).equals(MAGIC);
}

/** @throws Error if `buf` is not a well-formed bundle. */
export function unpackBundle(buf: Buffer): BundleFile[] {
  if (!isBundle(buf)) throw new Error("Not a document bundle");
  const count = buf.readUInt32BE(4);
  const files: BundleFile[] = [];
  let off = 8;
  const take = (n: number): Buffer => {
    if (off + n > buf.length) throw new Error("Truncated document bundle");
    const out = buf.subarray(off, off + n);
    off += n;
    return out;
  };
  for (let i = 0; i < count; i++) {
    const name = take(take(4).readUInt32BE(0)).toString("utf8");
    const data = take(take(4).readUInt32BE(0));
    files.push({ name, data });
  }
  return files;
}

function u32(n: number): Buffer {
  const b = Buffer.alloc(4);
  b.writeUInt32BE(n, 0);
  return b;
}
