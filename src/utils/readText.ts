import { stat, readFile } from "node:fs/promises";
import { errorMessage } from "../engine/errors.js";

export type ReadResult = { ok: true; text: string } | { ok: false; reason: string };

const BINARY_PROBE_BYTES = 8192;

export async function readSource(p: string, maxBytes = 1_000_000): Promise<ReadResult> {
  try {
    const s = await stat(p);
    if (!s.isFile()) return { ok: false, reason: "not a regular file" };
    if (s.size > maxBytes) return { ok: false, reason: `file is ${s.size} bytes (limit ${maxBytes})` };
    const buf = await readFile(p);
    if (buf.subarray(0, BINARY_PROBE_BYTES).includes(0)) {
      return { ok: false, reason: "file looks binary" };
    }
    return { ok: true, text: buf.toString("utf8").replace(/^\uFEFF/, "") };
  } catch (e) {
    return { ok: false, reason: errorMessage(e) };
  }
}
