import type { DetectedFlavor, Finding, ParsedUnit, Rule, RuleContext, ScanConfig } from "../src/engine/types.js";
import { parseConfig } from "../src/engine/configLoader.js";
import { buildProjectIndex } from "../src/engine/projectIndex.js";
import { runRules } from "../src/engine/runRules.js";
import { parseSource } from "../src/parser/index.js";
import { detectKind } from "../src/scanner/discoverFiles.js";

/** Parses an in-memory tree keyed by root-relative POSIX path. */
export function unitsOf(files: Record<string, string>): ParsedUnit[] {
  return Object.entries(files).map(([path, text]) => {
    const kind = detectKind(path);
    if (!kind) throw new Error(`no source kind for ${path}`);
    return parseSource({ path, absPath: `/virtual/${path}`, text, kind }).unit;
  });
}

export function contextFor(
  units: readonly ParsedUnit[],
  opts: { flavor?: DetectedFlavor; config?: Partial<ScanConfig> } = {},
): RuleContext {
  return {
    rootDir: "/virtual",
    config: parseConfig(opts.config ?? {}),
    project: buildProjectIndex(units),
    flavor: opts.flavor ?? "avalonia",
  };
}

/** Runs the given rules over an in-memory tree. */
export function check(
  rules: Rule | Rule[],
  files: Record<string, string>,
  opts: { flavor?: DetectedFlavor; config?: Partial<ScanConfig> } = {},
): Finding[] {
  const units = unitsOf(files);
  return runRules(units, Array.isArray(rules) ? rules : [rules], contextFor(units, opts));
}

export function lines(...parts: string[]): string {
  return parts.join("\n");
}
