import type { Report, Rule, Severity } from "./types.js";

const LEVEL: Record<Severity, "error" | "warning" | "note"> = {
  error: "error",
  warning: "warning",
  info: "note",
};

export function toSarif(report: Report, rules: readonly Rule[]) {
  return {
    version: "2.1.0",
    $schema: "https://json.schemastore.org/sarif-2.1.0.json",
    runs: [
      {
        tool: {
          driver: {
            name: "sharpscan",
            rules: rules.map((r) => ({
              id: r.id,
              shortDescription: { text: r.description },
              properties: { category: r.category },
            })),
          },
        },
        results: report.findings.map((f) => ({
          ruleId: f.ruleId,
          level: LEVEL[f.severity],
          message: { text: f.fixHint ? `${f.message} ${f.fixHint}` : f.message },
          properties: { category: f.category },
          locations: [
            {
              physicalLocation: {
                artifactLocation: { uri: f.file },
                region: { startLine: f.line ?? 1, startColumn: (f.col ?? 0) + 1 },
              },
            },
          ],
        })),
      },
    ],
  };
}
