import type { Finding, Rule } from "../../engine/types.js";

const HOLE = /\{([A-Za-z_][A-Za-z0-9_]*(?:\.[A-Za-z_][A-Za-z0-9_]*)*)\}/;

// Message templates and route templates use `{name}` on purpose.
const TEMPLATE_CALLEES =
  /^(?:Log\w*|Information|Warning|Error|Debug|Verbose|Fatal|Trace|Critical|Write|BeginScope|Route|Http(?:Get|Post|Put|Delete|Patch|Head|Options)|Map\w*)$/;

function isTemplateCallee(callee: string | undefined): boolean {
  if (!callee) return false;
  return TEMPLATE_CALLEES.test(callee.split(".").pop() ?? "");
}

export const missingInterpolationRule: Rule = {
  id: "csharp-missing-interpolation",
  category: "naming-format",
  description: "A plain string literal contains `{identifier}` but is missing the `$` prefix.",
  kinds: ["csharp"],
  flavors: ["any"],
  check(unit) {
    const out: Finding[] = [];
    for (const lit of unit.code?.strings ?? []) {
      if (lit.interpolated || isTemplateCallee(lit.callee)) continue;
      const hole = HOLE.exec(lit.value.replace(/\{\{|\}\}/g, ""));
      if (!hole) continue;
      out.push({
        ruleId: "csharp-missing-interpolation",
        category: "naming-format",
        severity: "warning",
        file: unit.file.path,
        line: lit.line,
        message: `String literal contains '{${hole[1]}}' but is not interpolated.`,
        fixHint: `Prefix the literal with '$' if '${hole[1]}' should be substituted.`,
      });
    }
    return out;
  },
};
