import { describe, it, expect } from "vitest";
import type { Finding, Report } from "../../src/engine/types.js";
import { aggregate, compareFindings, exitCode, summaryLine } from "../../src/engine/report.js";

function finding(partial: Partial<Finding> & Pick<Finding, "category" | "severity" | "file">): Finding {
  return { ruleId: "test-rule", message: "m", ...partial };
}

const findings: Finding[] = [
  finding({ category: "naming-format", severity: "warning", file: "b.cs", line: 3 }),
  finding({ category: "missing-reference", severity: "error", file: "Views/Main.axaml", line: 9 }),
  finding({ category: "naming-format", severity: "error", file: "a.cs", line: 1 }),
  finding({ category: "missing-reference", severity: "error", file: "Views/Main.axaml", line: 2 }),
  finding({ category: "io", severity: "warning", file: "blob.cs" }),
  finding({ category: "naming-format", severity: "warning", file: "a.cs", line: 7 }),
];

function flatten(report: Report): Finding[] {
  return report.groups.flatMap((g) => g.severities.flatMap((s) => s.findings));
}

describe("aggregate", () => {
  it("orders by category, severity, file and line", () => {
    const report = aggregate(findings);
    expect(report.findings.map((f) => `${f.category}/${f.severity}/${f.file}:${f.line ?? "-"}`)).toEqual([
      "io/warning/blob.cs:-",
      "missing-reference/error/Views/Main.axaml:2",
      "missing-reference/error/Views/Main.axaml:9",
      "naming-format/error/a.cs:1",
      "naming-format/warning/a.cs:7",
      "naming-format/warning/b.cs:3",
    ]);
  });

  it("does not depend on input order", () => {
    const forward = aggregate(findings);
    const backward = aggregate([...findings].reverse());
    expect(backward).toEqual(forward);
  });

  it("partitions findings into non-overlapping groups", () => {
    const report = aggregate(findings);
    expect(report.groups.map((g) => [g.category, g.severities.map((s) => [s.severity, s.findings.length])])).toEqual([
      ["io", [["warning", 1]]],
      ["missing-reference", [["error", 2]]],
      [
        "naming-format",
        [
          ["error", 1],
          ["warning", 2],
        ],
      ],
    ]);
    const grouped = flatten(report);
    expect(grouped).toHaveLength(findings.length);
    expect(new Set(grouped)).toEqual(new Set(findings));
  });

  it("summarizes by severity and category", () => {
    const { summary } = aggregate(findings);
    expect(summary).toEqual({
      total: 6,
      bySeverity: { error: 3, warning: 3, info: 0 },
      byCategory: { io: 1, "missing-reference": 2, "naming-format": 3 },
    });
    expect(summaryLine(summary)).toBe("Summary: error=3 warning=3 info=0 | io=1 missing-reference=2 naming-format=3");
  });

  it("handles an empty input", () => {
    const report = aggregate([]);
    expect(report.groups).toEqual([]);
    expect(summaryLine(report.summary)).toBe("Summary: error=0 warning=0 info=0");
  });
});

describe("compareFindings", () => {
  it("falls back to rule id and message for otherwise equal findings", () => {
    const a = finding({ category: "io", severity: "info", file: "x", ruleId: "a" });
    const b = finding({ category: "io", severity: "info", file: "x", ruleId: "b" });
    expect(compareFindings(a, b)).toBeLessThan(0);
    expect(compareFindings(b, a)).toBeGreaterThan(0);
    expect(compareFindings(a, { ...a })).toBe(0);
  });
});

describe("exitCode", () => {
  it("is zero unless strict", () => {
    expect(exitCode(aggregate(findings), false)).toBe(0);
  });

  it("reflects the worst severity under strict", () => {
    expect(exitCode(aggregate(findings), true)).toBe(2);
    expect(exitCode(aggregate([finding({ category: "io", severity: "warning", file: "x" })]), true)).toBe(1);
    expect(exitCode(aggregate([finding({ category: "io", severity: "info", file: "x" })]), true)).toBe(0);
  });
});
