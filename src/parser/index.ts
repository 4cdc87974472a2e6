import type { Finding, ParsedUnit, ParseResult, Region, SourceFile } from "../engine/types.js";
import { errorMessage } from "../engine/errors.js";
import { scanCSharp } from "./csharp.js";
import { scanMarkup } from "./markup.js";
import { projectView } from "./project.js";

export { scanCSharp } from "./csharp.js";
export { scanMarkup, parseBinding } from "./markup.js";

/**
 * Best-effort parse of one file. Never throws: problems in the input become
 * findings and a degraded unit, and a crash inside a kind parser becomes an
 * `unparsed` region covering the whole file.
 */
export function parseSource(file: SourceFile): ParseResult {
  try {
    return parseByKind(file);
  } catch (e) {
    const lineCount = file.text.split("\n").length;
    return {
      unit: {
        file,
        regions: [{ kind: "unparsed", startLine: 1, endLine: lineCount }],
        symbols: [],
        degraded: true,
      },
      findings: [
        {
          ruleId: "parse-degraded",
          category: "parse-degraded",
          severity: "warning",
          file: file.path,
          line: 1,
          message: `Could not parse ${file.kind} file: ${errorMessage(e)}`,
          fixHint: "The file was skipped by structural rules; check it for unusual syntax.",
        },
      ],
    };
  }
}

function parseByKind(file: SourceFile): ParseResult {
  switch (file.kind) {
    case "markup":
    case "project": {
      const scan = scanMarkup(file.text);
      const findings: Finding[] = scan.problems.map((p) => ({
        ruleId: "malformed-markup",
        category: "malformed-markup",
        severity: "error",
        file: file.path,
        line: p.line,
        message: p.message,
      }));
      const symbols = [scan.view.xClass, scan.view.xDataType].filter((s): s is string => Boolean(s));
      const base = { file, regions: scan.regions, symbols, degraded: scan.problems.length > 0 };
      const unit: ParsedUnit =
        file.kind === "project" ? { ...base, project: projectView(scan) } : { ...base, markup: scan.view };
      return { unit, findings };
    }
    case "csharp": {
      const scan = scanCSharp(file.text);
      const regions: Region[] = scan.regions;
      const symbols = scan.view.types.flatMap((t) => [t.name, ...t.members.map((m) => `${t.name}.${m.name}`)]);
      const findings: Finding[] = scan.problems.map((p) => ({
        ruleId: "parse-degraded",
        category: "parse-degraded",
        severity: "warning",
        file: file.path,
        line: p.line,
        message: p.message,
      }));
      return { unit: { file, regions, symbols, degraded: scan.problems.length > 0, code: scan.view }, findings };
    }
  }
}
