import type { Rule } from "../../engine/types.js";
import { codeBehindOf, declarationsOf } from "../_shared.js";

const LOADERS = /(^|\.)InitializeComponent$|AvaloniaXamlLoader\.Load$/;

export const codeBehindInitializeRule: Rule = {
  id: "markup-code-behind-initialize",
  category: "structural-mismatch",
  description: "Code-behind of a view never calls InitializeComponent().",
  kinds: ["markup"],
  flavors: ["avalonia", "wpf", "maui"],
  check(unit, ctx) {
    if (!unit.markup?.xClass) return [];
    const codeBehind = codeBehindOf(unit, ctx.project);
    if (!codeBehind) return [];

    const files = new Set(declarationsOf(ctx.project, codeBehind).map((d) => d.file));
    const calls = [...files].some((f) => ctx.project.byPath.get(f)?.code?.invocations.some((i) => LOADERS.test(i.callee)));
    if (calls) return [];

    return [
      {
        ruleId: "markup-code-behind-initialize",
        category: "structural-mismatch",
        severity: "warning",
        file: codeBehind.file,
        line: codeBehind.type.line,
        message: `${codeBehind.type.name} is the code-behind of ${unit.file.path} but never calls InitializeComponent().`,
        fixHint: "Call InitializeComponent() from the constructor (or AvaloniaXamlLoader.Load(this) in Initialize for App).",
        related: [unit.file.path],
      },
    ];
  },
};
