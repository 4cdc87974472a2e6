import path from "node:path";
import type { Finding, PackageRef, Rule } from "../../engine/types.js";
import { projectUnitOf } from "../_shared.js";

function isAvaloniaPackage(p: PackageRef): boolean {
  return p.include === "Avalonia" || (p.include.startsWith("Avalonia.") && !p.include.startsWith("Avalonia.Xaml."));
}

/** Property-driven versions like `$(AvaloniaVersion)` are resolved by MSBuild, not here. */
function literalVersion(p: PackageRef): string | undefined {
  return p.version && !p.version.includes("$(") ? p.version.trim() : undefined;
}

export const avaloniaPackagesRule: Rule = {
  id: "project-avalonia-packages",
  category: "registration-consistency",
  description: "Avalonia markup without an Avalonia package reference, or Avalonia packages at mixed versions.",
  kinds: ["project"],
  flavors: ["avalonia"],
  check(unit, ctx) {
    const view = unit.project;
    if (!view) return [];
    const out: Finding[] = [];
    const name = path.posix.basename(unit.file.path);
    const avalonia = view.packages.filter(isAvaloniaPackage);

    const views = ctx.project.units.filter(
      (u) => u.file.path.endsWith(".axaml") && projectUnitOf(u.file.path, ctx.project)?.file.path === unit.file.path,
    );
    if (views.length && !avalonia.length) {
      out.push({
        ruleId: "project-avalonia-packages",
        category: "registration-consistency",
        severity: "error",
        file: unit.file.path,
        line: 1,
        message: `${name} owns ${views.length} .axaml file(s) but references no Avalonia package.`,
        fixHint: 'Add <PackageReference Include="Avalonia" Version="..." /> and Avalonia.Desktop.',
      });
    }

    const core = avalonia.find((p) => p.include === "Avalonia");
    const expected = core && literalVersion(core);
    if (!expected) return out;

    for (const p of avalonia) {
      const version = literalVersion(p);
      if (p === core || !version || version === expected) continue;
      out.push({
        ruleId: "project-avalonia-packages",
        category: "registration-consistency",
        severity: "warning",
        file: unit.file.path,
        line: p.line,
        message: `${p.include} is at ${version} while Avalonia is at ${expected}.`,
        fixHint: `Align ${p.include} to ${expected}.`,
      });
    }
    return out;
  },
};
