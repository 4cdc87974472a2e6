import type { Rule, Finding, LocatedType } from "../../engine/types.js";
import { findType } from "../../engine/projectIndex.js";
import { codeBehindOf, collectMembers } from "../_shared.js";

/**
 * A binding's first path segment must be a member of the type it binds
 * against: the `x:DataType` in scope, else the view's code-behind class.
 * Stays silent when the inheritance chain leaves the scanned set.
 */
export const bindingMissingPropertyRule: Rule = {
  id: "markup-binding-missing-property",
  category: "missing-reference",
  description: "Binding path refers to a property its target type does not declare.",
  kinds: ["markup"],
  flavors: ["any"],
  check(unit, ctx) {
    const out: Finding[] = [];
    const view = unit.markup;
    if (!view) return out;

    const codeBehind = codeBehindOf(unit, ctx.project);
    const reported = new Set<string>();

    for (const b of view.bindings) {
      if (!b.property || reported.has(b.property)) continue;

      let target: LocatedType | undefined = codeBehind;
      if (b.dataType) target = findType(ctx.project, b.dataType);
      if (!target) continue;

      const members = collectMembers(ctx.project, target);
      if (!members.complete || members.names.has(b.property)) continue;

      reported.add(b.property);
      out.push({
        ruleId: "markup-binding-missing-property",
        category: "missing-reference",
        severity: "error",
        file: unit.file.path,
        line: b.line,
        message: `Binding '${b.path}' in ${unit.file.path} refers to '${b.property}', which ${target.type.name} (${target.file}) does not declare.`,
        fixHint: `Add a public '${b.property}' property to ${target.type.name} or fix the binding path.`,
        related: [target.file],
      });
    }
    return out;
  },
};
