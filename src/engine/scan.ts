import { stat } from "node:fs/promises";
import path from "node:path";
import type { DetectedFlavor, Finding, ParsedUnit, Report, Rule, RuleContext, ScanConfig, SourceFile } from "./types.js";
import { ScanError, errorMessage } from "./errors.js";
import { buildProjectIndex } from "./projectIndex.js";
import { applySeverityOverrides, runRules } from "./runRules.js";
import { aggregate } from "./report.js";
import { discoverFiles, detectKind } from "../scanner/discoverFiles.js";
import { detectProject } from "../scanner/projectDetect.js";
import { parseSource } from "../parser/index.js";
import { readSource } from "../utils/readText.js";

export interface ScanResult {
  rootDir: string;
  flavor: DetectedFlavor;
  projectFile?: string;
  fileCount: number;
  report: Report;
}

export interface ScanHooks {
  onPhase?: (phase: "collect" | "parse" | "rules" | "report") => void;
}

async function assertDirectory(rootDir: string): Promise<void> {
  try {
    const s = await stat(rootDir);
    if (!s.isDirectory()) throw new ScanError(`Scan root is not a directory: ${rootDir}`);
  } catch (e) {
    if (e instanceof ScanError) throw e;
    throw new ScanError(`Scan root does not exist or cannot be read: ${rootDir} (${errorMessage(e)})`, { cause: e });
  }
}

/** Reads every collected file; unreadable ones become `io` findings instead of sources. */
export async function collectSources(
  rootDir: string,
  config: ScanConfig,
): Promise<{ sources: SourceFile[]; findings: Finding[] }> {
  const sources: SourceFile[] = [];
  const findings: Finding[] = [];

  for (const file of await discoverFiles(rootDir, config)) {
    const kind = detectKind(file.path);
    if (!kind) continue;
    const read = await readSource(file.absPath, config.maxFileBytes);
    if (!read.ok) {
      findings.push({
        ruleId: "io-unreadable",
        category: "io",
        severity: "warning",
        file: file.path,
        message: `File skipped: ${read.reason}.`,
      });
      continue;
    }
    sources.push({ path: file.path, absPath: file.absPath, text: read.text, kind });
  }

  return { sources, findings };
}

/** FileCollector → ContentParser → RuleEngine → ReportAggregator for one run. */
export async function scan(
  root: string,
  config: ScanConfig,
  rules: readonly Rule[],
  hooks: ScanHooks = {},
): Promise<ScanResult> {
  const rootDir = path.resolve(root);
  await assertDirectory(rootDir);

  hooks.onPhase?.("collect");
  const collected = await collectSources(rootDir, config);
  const findings: Finding[] = [...collected.findings];

  hooks.onPhase?.("parse");
  const units: ParsedUnit[] = [];
  for (const source of collected.sources) {
    const parsed = parseSource(source);
    units.push(parsed.unit);
    findings.push(...parsed.findings);
  }

  hooks.onPhase?.("rules");
  const detected = detectProject(rootDir, units);
  const flavor = config.flavor === "auto" ? detected.flavor : config.flavor;
  const ctx: RuleContext = { rootDir, config, project: buildProjectIndex(units), flavor };
  const allFindings = applySeverityOverrides(findings, config.severityOverrides);
  allFindings.push(...runRules(units, rules, ctx));

  hooks.onPhase?.("report");
  const result: ScanResult = {
    rootDir,
    flavor,
    fileCount: collected.sources.length,
    report: aggregate(allFindings),
  };
  if (detected.projectFile) result.projectFile = detected.projectFile;
  return result;
}
