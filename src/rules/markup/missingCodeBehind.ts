import type { Rule } from "../../engine/types.js";
import { findType } from "../../engine/projectIndex.js";

export const missingCodeBehindRule: Rule = {
  id: "markup-missing-code-behind",
  category: "missing-reference",
  description: "x:Class names a type that no scanned C# file declares.",
  kinds: ["markup"],
  flavors: ["any"],
  check(unit, ctx) {
    const xClass = unit.markup?.xClass;
    if (!xClass || findType(ctx.project, xClass)) return [];

    const root = unit.markup?.elements.find((e) => e.depth === 0);
    return [
      {
        ruleId: "markup-missing-code-behind",
        category: "missing-reference",
        severity: "error",
        file: unit.file.path,
        line: root?.line ?? 1,
        message: `x:Class '${xClass}' has no matching C# class in the scanned files.`,
        fixHint: `Create ${unit.file.path}.cs declaring 'partial class ${xClass.split(".").pop() ?? xClass}'.`,
      },
    ];
  },
};
