import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { Finding } from "../../src/engine/types.js";
import { applyBaseline, buildBaseline, keyOf, loadBaseline, writeBaseline } from "../../src/engine/baseline.js";
import { SharpscanError } from "../../src/engine/errors.js";

const typo: Finding = {
  ruleId: "markup-known-typos",
  category: "naming-format",
  severity: "error",
  file: "Views/Main.axaml",
  line: 4,
  message: "Found 'RowDefinin' in 'RowDefinins' (should be 'RowDefinitions').",
};

describe("baseline", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "sharpscan-baseline-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("keys findings without their line", () => {
    expect(keyOf(typo)).toBe(keyOf({ ...typo, line: 40 }));
    expect(keyOf(typo)).toBe(
      "markup-known-typos|naming-format|Views/Main.axaml|Found 'RowDefinin' in 'RowDefinins' (should be 'RowDefinitions').",
    );
  });

  it("counts repeated keys", () => {
    expect(buildBaseline([typo, { ...typo, line: 9 }]).items).toEqual([{ key: keyOf(typo), count: 2 }]);
  });

  it("suppresses up to the recorded count", () => {
    const baseline = buildBaseline([typo]);
    const later = [typo, { ...typo, line: 12 }];
    expect(applyBaseline(later, baseline)).toEqual([{ ...typo, line: 12 }]);
  });

  it("round-trips through a file", async () => {
    const file = join(dir, "baseline.json");
    await writeBaseline(file, [typo]);
    expect(await loadBaseline(file)).toEqual({ version: 1, items: [{ key: keyOf(typo), count: 1 }] });
  });

  it("treats a missing file as empty", async () => {
    expect(await loadBaseline(join(dir, "nope.json"))).toEqual({ version: 1, items: [] });
  });

  it("rejects a malformed file", async () => {
    const file = join(dir, "bad.json");
    writeFileSync(file, JSON.stringify({ version: 2, items: [] }));
    await expect(loadBaseline(file)).rejects.toThrow(SharpscanError);
  });
});
