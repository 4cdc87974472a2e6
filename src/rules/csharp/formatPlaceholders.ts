import type { Finding, Invocation, Rule } from "../../engine/types.js";

const PLACEHOLDER = /\{(\d+)(?:,\s*-?\d+)?(?::[^{}]*)?\}/g;

function isFormatCall(callee: string, argCount: number): boolean {
  const parts = callee.split(".");
  const last = parts[parts.length - 1];
  const owner = parts[parts.length - 2];
  if (last === "Format") return owner === "string" || owner === "String";
  if (last === "AppendFormat") return true;
  if (last === "WriteLine" || last === "Write") return owner === "Console" && argCount > 1;
  return false;
}

/** Body of a plain or verbatim string literal argument; interpolated literals return undefined. */
export function literalBody(arg: string): string | undefined {
  const m = /^@?"([\s\S]*)"$/.exec(arg.trim());
  return m ? m[1] : undefined;
}

export interface PlaceholderScan {
  maxIndex: number;
  malformed: boolean;
}

export function scanPlaceholders(format: string): PlaceholderScan {
  let maxIndex = -1;
  const rest = format
    .replace(/\{\{|\}\}/g, "")
    .replace(PLACEHOLDER, (_, n: string) => {
      maxIndex = Math.max(maxIndex, Number(n));
      return "";
    });
  return { maxIndex, malformed: /[{}]/.test(rest) };
}

function check(inv: Invocation, file: string): Finding | undefined {
  if (!isFormatCall(inv.callee, inv.args.length)) return undefined;
  const fmtIdx = inv.args.findIndex((a) => literalBody(a) !== undefined);
  if (fmtIdx < 0) return undefined;

  const values = inv.args.slice(fmtIdx + 1);
  if (values.some((a) => /^new\s*(?:object)?\s*\[/.test(a.trim()))) return undefined;

  const body = literalBody(inv.args[fmtIdx] ?? "") ?? "";
  const { maxIndex, malformed } = scanPlaceholders(body);

  if (malformed) {
    return {
      ruleId: "csharp-format-placeholders",
      category: "naming-format",
      severity: "error",
      file,
      line: inv.line,
      message: `Format string passed to ${inv.callee} has an unbalanced '{' or '}'.`,
      fixHint: "Escape literal braces as '{{' and '}}'.",
    };
  }
  if (maxIndex >= values.length) {
    return {
      ruleId: "csharp-format-placeholders",
      category: "naming-format",
      severity: "error",
      file,
      line: inv.line,
      message: `Format string passed to ${inv.callee} uses {${maxIndex}} but only ${values.length} argument(s) follow it.`,
      fixHint: `Pass ${maxIndex + 1} format argument(s) or renumber the placeholders.`,
    };
  }
  return undefined;
}

export const formatPlaceholdersRule: Rule = {
  id: "csharp-format-placeholders",
  category: "naming-format",
  description: "Composite format strings whose placeholders exceed the arguments passed.",
  kinds: ["csharp"],
  flavors: ["any"],
  check(unit) {
    const out: Finding[] = [];
    for (const inv of unit.code?.invocations ?? []) {
      const finding = check(inv, unit.file.path);
      if (finding) out.push(finding);
    }
    return out;
  },
};
