import type { Finding, Rule } from "../../engine/types.js";
import { dirOf, projectUnitOf } from "../_shared.js";
import { flavorOf } from "../../scanner/projectDetect.js";

const APP_VIEWS = /(^|\/)App\.a?xaml$/;

export const missingAppFilesRule: Rule = {
  id: "project-missing-app-files",
  category: "missing-reference",
  description: "An Avalonia project without a well-formed App.axaml and its code-behind.",
  kinds: ["project"],
  flavors: ["any"],
  check(unit, ctx) {
    if (flavorOf(unit) !== "avalonia") return [];
    const app = [...ctx.project.byPath.keys()].find(
      (p) => APP_VIEWS.test(p) && projectUnitOf(p, ctx.project)?.file.path === unit.file.path,
    );

    if (!app) {
      return [
        {
          ruleId: "project-missing-app-files",
          category: "missing-reference",
          severity: "error",
          file: unit.file.path,
          line: 1,
          message: "Avalonia project has no App.axaml in the scanned files.",
          fixHint: `Add App.axaml and App.axaml.cs under ${dirOf(unit.file.path) || "the project root"}.`,
        },
      ];
    }

    const out: Finding[] = [];
    const view = ctx.project.byPath.get(app)?.markup;
    const root = view?.root;
    if (root && root.split(":").pop() !== "Application") {
      out.push({
        ruleId: "project-missing-app-files",
        category: "missing-reference",
        severity: "error",
        file: app,
        line: view?.elements[0]?.line ?? 1,
        message: `${app} has root element <${root}> instead of <Application>.`,
        fixHint: "Make <Application> the root element of App.axaml.",
        related: [unit.file.path],
      });
    }
    if (!ctx.project.byPath.has(`${app}.cs`)) {
      out.push({
        ruleId: "project-missing-app-files",
        category: "missing-reference",
        severity: "error",
        file: unit.file.path,
        line: 1,
        message: `${app} has no code-behind (${app}.cs).`,
        fixHint: "Add the Application subclass that loads App.axaml.",
        related: [app],
      });
    }
    return out;
  },
};
