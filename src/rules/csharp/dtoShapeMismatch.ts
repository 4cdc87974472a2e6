import type { Finding, Rule, TypeDecl } from "../../engine/types.js";
import { samePartialType } from "../_shared.js";

const DTO_NAME = /(Dto|DTO|Request|Response)$/;

function propertyNames(type: TypeDecl): Set<string> {
  return new Set(type.members.filter((m) => m.kind === "property").map((m) => m.name));
}

function difference(a: Set<string>, b: Set<string>): string[] {
  return [...a].filter((x) => !b.has(x)).sort();
}

/** Same-named DTOs declared in more than one place must agree on their properties. */
export const dtoShapeMismatchRule: Rule = {
  id: "csharp-dto-shape-mismatch",
  category: "structural-mismatch",
  description: "Two DTO types with the same name declare different properties.",
  kinds: ["csharp"],
  flavors: ["any"],
  check(unit, ctx) {
    const out: Finding[] = [];
    for (const type of unit.code?.types ?? []) {
      if (!DTO_NAME.test(type.name) || type.kind === "interface" || type.kind === "enum") continue;
      const mine = propertyNames(type);

      const self = { type, file: unit.file.path };
      for (const other of ctx.project.types.get(type.name) ?? []) {
        if (other.file <= unit.file.path || samePartialType(ctx.project, self, other)) continue;
        if (other.type.kind === "interface" || other.type.kind === "enum") continue;

        const theirs = propertyNames(other.type);
        const onlyHere = difference(mine, theirs);
        const onlyThere = difference(theirs, mine);
        if (!onlyHere.length && !onlyThere.length) continue;

        const parts: string[] = [];
        if (onlyHere.length) parts.push(`only here: ${onlyHere.join(", ")}`);
        if (onlyThere.length) parts.push(`only in ${other.file}: ${onlyThere.join(", ")}`);
        out.push({
          ruleId: "csharp-dto-shape-mismatch",
          category: "structural-mismatch",
          severity: "warning",
          file: unit.file.path,
          line: type.line,
          message: `${type.fullName} and ${other.type.fullName} (${other.file}) have different shapes; ${parts.join("; ")}.`,
          fixHint: "Share one DTO definition or keep both property sets in sync.",
          related: [other.file],
        });
      }
    }
    return out;
  },
};
