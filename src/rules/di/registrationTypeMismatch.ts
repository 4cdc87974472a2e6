import type { Finding, ProjectIndex, Rule } from "../../engine/types.js";
import { findType, simpleTypeName } from "../../engine/projectIndex.js";
import { collectMembers, declarationsOf } from "../_shared.js";

/** True when `impl` lists `service` among its bases, directly or through scanned ancestors. */
export function inheritsFrom(index: ProjectIndex, impl: string, service: string, seen = new Set<string>()): boolean {
  const found = findType(index, impl);
  if (!found || seen.has(found.type.fullName)) return false;
  seen.add(found.type.fullName);

  for (const decl of declarationsOf(index, found)) {
    for (const base of decl.type.baseTypes) {
      if (simpleTypeName(base) === service) return true;
      if (inheritsFrom(index, base, service, seen)) return true;
    }
  }
  return false;
}

export const registrationTypeMismatchRule: Rule = {
  id: "di-registration-type-mismatch",
  category: "structural-mismatch",
  description: "A registration maps a service to an implementation that does not implement it.",
  kinds: ["csharp"],
  flavors: ["any"],
  check(unit, ctx) {
    const out: Finding[] = [];
    for (const reg of ctx.project.registrations) {
      if (reg.file !== unit.file.path || !reg.implementation || reg.implementation === reg.service) continue;
      const impl = findType(ctx.project, reg.implementation);
      if (!impl || inheritsFrom(ctx.project, reg.implementation, reg.service)) continue;
      // An unscanned base class may implement the service.
      if (!collectMembers(ctx.project, impl).complete) continue;

      out.push({
        ruleId: "di-registration-type-mismatch",
        category: "structural-mismatch",
        severity: "error",
        file: unit.file.path,
        line: reg.line,
        message: `${reg.method}<${reg.service}, ${reg.implementation}> registers ${reg.implementation} (${impl.file}), which does not implement ${reg.service}.`,
        fixHint: `Add ${reg.service} to the base list of ${reg.implementation} or register the right implementation.`,
        related: [impl.file],
      });
    }
    return out;
  },
};
