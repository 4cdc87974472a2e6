import chalk from "chalk";
import type { CategoryGroup, Finding, Report, ReportSummary, Severity } from "./types.js";

export const SEVERITY_ORDER: Severity[] = ["error", "warning", "info"];

const COLOR: Record<Severity, (s: string) => string> = {
  error: chalk.red,
  warning: chalk.yellow,
  info: chalk.gray,
};

function cmp(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function compareFindings(a: Finding, b: Finding): number {
  return (
    cmp(a.category, b.category) ||
    SEVERITY_ORDER.indexOf(a.severity) - SEVERITY_ORDER.indexOf(b.severity) ||
    cmp(a.file, b.file) ||
    (a.line ?? 0) - (b.line ?? 0) ||
    (a.col ?? 0) - (b.col ?? 0) ||
    cmp(a.ruleId, b.ruleId) ||
    cmp(a.message, b.message)
  );
}

export function summarize(findings: readonly Finding[]): ReportSummary {
  const summary: ReportSummary = {
    total: findings.length,
    bySeverity: { error: 0, warning: 0, info: 0 },
    byCategory: {},
  };
  for (const f of findings) {
    summary.bySeverity[f.severity] += 1;
    summary.byCategory[f.category] = (summary.byCategory[f.category] ?? 0) + 1;
  }
  return summary;
}

/** Groups findings by category, then severity; order never depends on input order. */
export function aggregate(findings: readonly Finding[]): Report {
  const sorted = [...findings].sort(compareFindings);
  const groups: CategoryGroup[] = [];

  for (const f of sorted) {
    let cat = groups[groups.length - 1];
    if (cat?.category !== f.category) {
      cat = { category: f.category, severities: [] };
      groups.push(cat);
    }
    let sev = cat.severities[cat.severities.length - 1];
    if (sev?.severity !== f.severity) {
      sev = { severity: f.severity, findings: [] };
      cat.severities.push(sev);
    }
    sev.findings.push(f);
  }

  return { findings: sorted, groups, summary: summarize(sorted) };
}

export function location(f: Finding): string {
  return f.line != null ? `${f.file}:${f.line}${f.col != null ? `:${f.col}` : ""}` : f.file;
}

export function printConsole(report: Report): void {
  for (const group of report.groups) {
    console.log(chalk.bold(`${group.category} (${countOf(group)})`));
    for (const { findings } of group.severities) {
      for (const f of findings) {
        const tag = f.severity.toUpperCase();
        console.log(`  ${COLOR[f.severity](`${tag} [${f.ruleId}]`)} ${location(f)}`);
        console.log(`    ${f.message}`);
        if (f.fixHint) console.log(`    Fix: ${f.fixHint}`);
      }
    }
    console.log();
  }
}

export function summaryLine(summary: ReportSummary): string {
  const cats = Object.entries(summary.byCategory)
    .sort(([a], [b]) => cmp(a, b))
    .map(([c, n]) => `${c}=${n ?? 0}`)
    .join(" ");
  const sev = SEVERITY_ORDER.map((s) => `${s}=${summary.bySeverity[s]}`).join(" ");
  return cats ? `Summary: ${sev} | ${cats}` : `Summary: ${sev}`;
}

function countOf(group: CategoryGroup): number {
  return group.severities.reduce((n, s) => n + s.findings.length, 0);
}

export function exitCode(report: Report, strict: boolean): number {
  if (!strict) return 0;
  if (report.summary.bySeverity.error) return 2;
  if (report.summary.bySeverity.warning) return 1;
  return 0;
}
