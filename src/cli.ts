#!/usr/bin/env node
import { Command, Option } from "commander";
import chalk from "chalk";
import path from "node:path";
import { writeFile } from "node:fs/promises";

import type { FlavorName, OutputFormat, ScanConfig } from "./engine/types.js";
import { loadConfig } from "./engine/configLoader.js";
import { scan, type ScanHooks, type ScanResult } from "./engine/scan.js";
import { aggregate, exitCode, printConsole, summaryLine } from "./engine/report.js";
import { applyBaseline, loadBaseline, writeBaseline } from "./engine/baseline.js";
import { SharpscanError } from "./engine/errors.js";
import { toSarif } from "./engine/sarif.js";
import { ALL_RULES } from "./rules/index.js";
import { startStatusLine } from "./utils/status.js";

const FLAVORS: FlavorName[] = ["auto", "avalonia", "wpf", "maui", "generic"];
const FORMATS: OutputFormat[] = ["console", "json", "sarif"];

const PHASE_LABELS = {
  collect: "Collecting",
  parse: "Parsing",
  rules: "Checking",
  report: "Reporting",
} as const;

type ScanOptions = {
  include?: string[];
  flavor?: FlavorName;
  strict: boolean;
  baseline?: string;
  format: OutputFormat;
  out?: string;
};

type BaselineOptions = {
  include?: string[];
  flavor?: FlavorName;
  out: string;
};

function overrideOf(opts: { include?: string[]; flavor?: FlavorName }): Partial<ScanConfig> {
  return { include: opts.include, flavor: opts.flavor };
}

async function runScan(dir: string, override: Partial<ScanConfig>): Promise<{ config: ScanConfig; result: ScanResult }> {
  const rootDir = path.resolve(process.cwd(), dir);
  const status = startStatusLine({ label: "Loading config" });
  const hooks: ScanHooks = { onPhase: (phase) => status.setLabel(PHASE_LABELS[phase]) };
  try {
    const config = await loadConfig(rootDir, override);
    const result = await scan(rootDir, config, ALL_RULES, hooks);
    status.stop(`Scanned ${result.fileCount} file(s) (${result.flavor}).`);
    return { config, result };
  } catch (e) {
    status.stop();
    throw e;
  }
}

async function emit(text: string, out: string | undefined): Promise<void> {
  if (out) await writeFile(path.resolve(process.cwd(), out), text, "utf8");
  else console.log(text);
}

const program = new Command();

program
  .name("sharpscan")
  .description("Static consistency checker for C# and XAML/AXAML projects")
  .version("0.1.0");

program
  .command("scan")
  .description("Scan a project tree and report findings")
  .argument("[dir]", "project root directory", ".")
  .option("--include <glob...>", "file globs to scan (replaces the defaults)")
  .addOption(new Option("--flavor <flavor>", "UI framework flavor").choices(FLAVORS))
  .option("--strict", "exit 2 on errors and 1 on warnings", false)
  .option("--baseline <file>", "baseline file path")
  .addOption(new Option("--format <format>", "output format").choices(FORMATS).default("console"))
  .option("--out <file>", "write the report to a file (json/sarif)")
  .action(async (dir: string, opts: ScanOptions) => {
    const { config, result } = await runScan(dir, overrideOf(opts));

    let report = result.report;
    if (opts.baseline) {
      const baseline = await loadBaseline(path.resolve(process.cwd(), opts.baseline));
      report = aggregate(applyBaseline(report.findings, baseline));
    }

    if (opts.format === "json") {
      const payload = {
        rootDir: result.rootDir,
        flavor: result.flavor,
        config,
        summary: report.summary,
        findings: report.findings,
      };
      await emit(JSON.stringify(payload, null, 2), opts.out);
    } else if (opts.format === "sarif") {
      await emit(JSON.stringify(toSarif(report, ALL_RULES), null, 2), opts.out);
    } else {
      printConsole(report);
      console.log(summaryLine(report.summary));
    }

    process.exitCode = exitCode(report, opts.strict);
  });

program
  .command("baseline")
  .description("Baseline management")
  .command("init")
  .description("Record the current findings so later scans only report new ones")
  .argument("[dir]", "project root directory", ".")
  .option("--include <glob...>", "file globs to scan (replaces the defaults)")
  .addOption(new Option("--flavor <flavor>", "UI framework flavor").choices(FLAVORS))
  .option("--out <file>", "baseline output file", ".sharpscan-baseline.json")
  .action(async (dir: string, opts: BaselineOptions) => {
    const { result } = await runScan(dir, overrideOf(opts));
    const outPath = path.resolve(process.cwd(), opts.out);
    await writeBaseline(outPath, result.report.findings);
    console.log(`Baseline written to ${outPath} (${result.report.findings.length} findings recorded).`);
  });

program
  .command("rules")
  .description("List available rules")
  .action(() => {
    for (const rule of ALL_RULES) {
      const flavors = rule.flavors.join(",");
      console.log(`${chalk.bold(rule.id)} ${chalk.gray(`[${rule.category}; ${flavors}]`)}`);
      console.log(`  ${rule.description}`);
    }
  });

program.parseAsync(process.argv).catch((e: unknown) => {
  if (e instanceof SharpscanError) {
    console.error(chalk.red(`${e.name}: ${e.message}`));
    process.exitCode = 2;
    return;
  }
  console.error(e);
  process.exitCode = 1;
});
