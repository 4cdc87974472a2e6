import type { Rule, Finding } from "../../engine/types.js";

const UNSUPPORTED = new Map<string, Map<string, string>>([
  [
    "StackPanel",
    new Map([
      ["Padding", "StackPanel doesn't support Padding (wrap it in a Border instead)."],
      ["ColumnGap", "ColumnGap is not an Avalonia property (use Spacing or Margin instead)."],
      ["RowGap", "RowGap is not an Avalonia property (use Spacing or Margin instead)."],
    ]),
  ],
]);

export const unsupportedPropertyRule: Rule = {
  id: "markup-unsupported-property",
  category: "compatibility",
  description: "Properties set on controls that do not define them in Avalonia.",
  kinds: ["markup"],
  flavors: ["avalonia"],
  check(unit) {
    const out: Finding[] = [];
    for (const el of unit.markup?.elements ?? []) {
      const props = UNSUPPORTED.get(el.name);
      if (!props) continue;
      for (const a of el.attributes) {
        const message = props.get(a.name);
        if (!message) continue;
        out.push({
          ruleId: "markup-unsupported-property",
          category: "compatibility",
          severity: "error",
          file: unit.file.path,
          line: a.line,
          message,
        });
      }
    }
    return out;
  },
};
