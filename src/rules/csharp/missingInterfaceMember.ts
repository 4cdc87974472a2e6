import type { Finding, LocatedType, MemberDecl, ProjectIndex, Rule } from "../../engine/types.js";
import { findType } from "../../engine/projectIndex.js";
import { collectMembers, declarationsOf, isClassLike } from "../_shared.js";

interface Required {
  member: MemberDecl;
  owner: LocatedType;
}

/** Abstract members of an interface and of every interface it extends, keyed by name. */
export function requiredMembers(index: ProjectIndex, iface: LocatedType, seen = new Set<string>()): Map<string, Required> {
  const out = new Map<string, Required>();
  if (seen.has(iface.type.fullName)) return out;
  seen.add(iface.type.fullName);

  for (const decl of declarationsOf(index, iface)) {
    for (const m of decl.type.members) {
      if (m.hasBody || m.modifiers.includes("static")) continue;
      if (m.kind !== "method" && m.kind !== "property" && m.kind !== "event") continue;
      if (!out.has(m.name)) out.set(m.name, { member: m, owner: decl });
    }
    for (const base of decl.type.baseTypes) {
      const parent = findType(index, base);
      if (parent?.type.kind !== "interface") continue;
      for (const [name, req] of requiredMembers(index, parent, seen)) {
        if (!out.has(name)) out.set(name, req);
      }
    }
  }
  return out;
}

interface Missing extends Required {
  /** The listed interface that brings the member in. */
  via: LocatedType;
}

export const missingInterfaceMemberRule: Rule = {
  id: "csharp-missing-interface-member",
  category: "structural-mismatch",
  description: "A type lists an interface from this codebase but omits one of its members.",
  kinds: ["csharp"],
  flavors: ["any"],
  check(unit, ctx) {
    const out: Finding[] = [];
    for (const type of unit.code?.types ?? []) {
      if (!isClassLike(type)) continue;
      const self: LocatedType = { type, file: unit.file.path };

      // Partial types: every interface across the parts counts; the first part listing one reports.
      const required = new Map<string, Missing>();
      let reporter: LocatedType | undefined;
      for (const decl of declarationsOf(ctx.project, self)) {
        for (const base of decl.type.baseTypes) {
          const iface = findType(ctx.project, base);
          if (iface?.type.kind !== "interface") continue;
          reporter ??= decl;
          for (const [name, req] of requiredMembers(ctx.project, iface)) {
            if (!required.has(name)) required.set(name, { ...req, via: iface });
          }
        }
      }
      if (!reporter || reporter.type !== type) continue;

      const members = collectMembers(ctx.project, self);
      if (!members.complete) continue;

      for (const [name, req] of required) {
        if (members.names.has(name)) continue;
        out.push({
          ruleId: "csharp-missing-interface-member",
          category: "structural-mismatch",
          severity: "error",
          file: unit.file.path,
          line: type.line,
          message: `${type.name} implements ${req.via.type.name} but does not declare ${req.member.kind} '${name}' (declared in ${req.owner.file}:${req.member.line}).`,
          fixHint: `Implement '${name}' on ${type.name}.`,
          related: [req.owner.file],
        });
      }
    }
    return out;
  },
};
