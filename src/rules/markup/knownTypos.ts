import type { Rule, Finding } from "../../engine/types.js";

const TYPOS: [typo: string, correct: string][] = [
  ["ColumnDefinin", "ColumnDefinitions"],
  ["RowDefinin", "RowDefinitions"],
  ["MultiClass", "Classes"],
];

export const knownTyposRule: Rule = {
  id: "markup-known-typos",
  category: "naming-format",
  description: "Element or attribute names with common misspellings.",
  kinds: ["markup"],
  flavors: ["any"],
  check(unit) {
    const out: Finding[] = [];
    const seen = new Set<string>();

    for (const el of unit.markup?.elements ?? []) {
      const names = [{ name: el.name, line: el.line }, ...el.attributes.map((a) => ({ name: a.name, line: a.line }))];
      for (const { name, line } of names) {
        for (const [typo, correct] of TYPOS) {
          if (!name.includes(typo) || seen.has(`${line}:${typo}`)) continue;
          seen.add(`${line}:${typo}`);
          out.push({
            ruleId: "markup-known-typos",
            category: "naming-format",
            severity: "error",
            file: unit.file.path,
            line,
            message: `Found '${typo}' in '${name}' (should be '${correct}').`,
            fixHint: `Rename to '${name.replace(typo, correct)}'.`,
          });
        }
      }
    }
    return out;
  },
};
