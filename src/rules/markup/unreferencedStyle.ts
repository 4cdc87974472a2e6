import path from "node:path";
import type { Rule } from "../../engine/types.js";
import { dirOf, joinPosix, projectDirOf } from "../_shared.js";
import { resolveIncludeSource } from "./missingInclude.js";

export const unreferencedStyleRule: Rule = {
  id: "markup-unreferenced-style",
  category: "registration-consistency",
  description: "A file under Styles/ is never included by App.axaml.",
  kinds: ["markup"],
  flavors: ["avalonia"],
  check(unit, ctx) {
    const projectDir = projectDirOf(unit.file.path, ctx.project);
    if (dirOf(unit.file.path) !== joinPosix(projectDir, "Styles")) return [];

    const app = ctx.project.byPath.get(joinPosix(projectDir, "App.axaml"));
    if (!app?.markup) return [];

    const name = path.posix.basename(unit.file.path);
    const included = app.markup.includes.some((inc) => {
      const resolved = resolveIncludeSource(inc.source, app.file.path, ctx.project);
      return "path" in resolved && resolved.path === unit.file.path;
    });
    if (included || app.file.text.includes(`Styles/${name}`)) return [];

    return [
      {
        ruleId: "markup-unreferenced-style",
        category: "registration-consistency",
        severity: "warning",
        file: unit.file.path,
        line: 1,
        message: `Style file ${name} is not referenced in ${app.file.path}.`,
        fixHint: `Add <StyleInclude Source="/Styles/${name}"/> to Application.Styles in App.axaml.`,
        related: [app.file.path],
      },
    ];
  },
};
