import { readFile, writeFile } from "node:fs/promises";
import { z } from "zod";
import type { Finding } from "./types.js";
import { SharpscanError, errorMessage, isNotFound } from "./errors.js";

const baselineSchema = z.object({
  version: z.literal(1),
  items: z.array(z.object({ key: z.string(), count: z.number().int().positive() })),
});

export type Baseline = z.infer<typeof baselineSchema>;

/** Line numbers are left out so unrelated edits above a known finding do not resurface it. */
export function keyOf(f: Finding): string {
  return [f.ruleId, f.category, f.file, f.message].join("|");
}

export async function loadBaseline(p: string): Promise<Baseline> {
  let raw: string;
  try {
    raw = await readFile(p, "utf8");
  } catch (e) {
    if (isNotFound(e)) return { version: 1, items: [] };
    throw e;
  }
  try {
    return baselineSchema.parse(JSON.parse(raw));
  } catch (e) {
    throw new SharpscanError(`Invalid baseline file ${p}: ${errorMessage(e)}`, { cause: e });
  }
}

export function buildBaseline(findings: readonly Finding[]): Baseline {
  const counts = new Map<string, number>();
  for (const f of findings) {
    const k = keyOf(f);
    counts.set(k, (counts.get(k) ?? 0) + 1);
  }
  return {
    version: 1,
    items: [...counts.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)).map(([key, count]) => ({ key, count })),
  };
}

export async function writeBaseline(p: string, findings: readonly Finding[]): Promise<void> {
  await writeFile(p, JSON.stringify(buildBaseline(findings), null, 2), "utf8");
}

/** Drops findings already recorded in the baseline, up to the recorded count per key. */
export function applyBaseline(findings: readonly Finding[], baseline: Baseline): Finding[] {
  const seen = new Map<string, number>();
  const allowed = new Map(baseline.items.map((i) => [i.key, i.count]));
  const out: Finding[] = [];
  for (const f of findings) {
    const k = keyOf(f);
    const cur = seen.get(k) ?? 0;
    if (cur < (allowed.get(k) ?? 0)) {
      seen.set(k, cur + 1);
      continue;
    }
    out.push(f);
  }
  return out;
}
