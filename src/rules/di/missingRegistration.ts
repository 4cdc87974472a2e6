import type { Finding, ProjectIndex, Rule } from "../../engine/types.js";
import { findType, simpleTypeName } from "../../engine/projectIndex.js";
import { isClassLike } from "../_shared.js";

const CONVENTION_SCANS = /(?:^|\.)(?:Scan|RegisterAssemblyTypes|AddClasses|RegisterAssemblyModules)$/;

function usesConventionScanning(index: ProjectIndex): boolean {
  return index.units.some((u) => u.code?.invocations.some((inv) => CONVENTION_SCANS.test(inv.callee)) ?? false);
}

/** Classes in the scanned set that list the interface among their bases. */
function implementationsOf(index: ProjectIndex, iface: string): string[] {
  const names = new Set<string>();
  for (const located of index.types.values()) {
    for (const { type } of located) {
      if (isClassLike(type) && type.baseTypes.some((b) => simpleTypeName(b) === iface)) names.add(type.name);
    }
  }
  return [...names].sort();
}

export const missingRegistrationRule: Rule = {
  id: "di-missing-registration",
  category: "registration-consistency",
  description: "A constructor depends on a scanned interface that is never registered in the container.",
  kinds: ["csharp"],
  flavors: ["any"],
  check(unit, ctx) {
    const { project } = ctx;
    if (!project.registrations.length || usesConventionScanning(project)) return [];

    const registered = new Set(project.registrations.map((r) => r.service));
    const out: Finding[] = [];

    for (const type of unit.code?.types ?? []) {
      if (!isClassLike(type)) continue;
      const reported = new Set<string>();

      for (const params of type.constructors) {
        for (const param of params) {
          const name = simpleTypeName(param.type);
          if (registered.has(name) || reported.has(name)) continue;
          if (findType(project, param.type)?.type.kind !== "interface") continue;
          reported.add(name);

          const impls = implementationsOf(project, name);
          const finding: Finding = {
            ruleId: "di-missing-registration",
            category: "registration-consistency",
            severity: "warning",
            file: unit.file.path,
            line: type.line,
            message: `${type.name} takes ${name} '${param.name}' in its constructor, but ${name} is never registered.`,
          };
          if (impls.length) finding.fixHint = `Register it, e.g. services.AddSingleton<${name}, ${impls[0]}>().`;
          out.push(finding);
        }
      }
    }
    return out;
  },
};
