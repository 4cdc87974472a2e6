import path from "node:path";
import type { ProjectIndex, Rule, ScanConfig } from "../../engine/types.js";
import { dirOf, projectUnitOf } from "../_shared.js";

function identifierPart(s: string): string {
  return s.replace(/[^\w]/g, "_");
}

export function rootNamespaceFor(file: string, index: ProjectIndex, config: ScanConfig): string | undefined {
  if (config.rootNamespace) return config.rootNamespace;
  const project = projectUnitOf(file, index);
  if (!project?.project) return undefined;
  return project.project.properties["RootNamespace"] || identifierPart(path.posix.basename(project.file.path, ".csproj"));
}

/** `<RootNamespace>.<folders>.<file stem>` for a view under its project directory. */
export function expectedClassName(file: string, index: ProjectIndex, config: ScanConfig): string | undefined {
  const root = rootNamespaceFor(file, index, config);
  if (!root) return undefined;
  const project = projectUnitOf(file, index);
  const projectDir = project ? dirOf(project.file.path) : "";
  const rel = projectDir ? file.slice(projectDir.length + 1) : file;
  const folders = dirOf(rel).split("/").filter(Boolean).map(identifierPart);
  const stem = path.posix.basename(rel).replace(/\.(axaml|xaml)$/i, "");
  return [root, ...folders, identifierPart(stem)].join(".");
}

export const classNamespaceRule: Rule = {
  id: "markup-class-namespace",
  category: "naming-format",
  description: "x:Class does not match the namespace implied by the file's location.",
  kinds: ["markup"],
  flavors: ["any"],
  check(unit, ctx) {
    const declared = unit.markup?.xClass;
    if (!declared) return [];
    const expected = expectedClassName(unit.file.path, ctx.project, ctx.config);
    if (!expected || expected === declared) return [];

    const root = unit.markup?.elements.find((e) => e.depth === 0);
    return [
      {
        ruleId: "markup-class-namespace",
        category: "naming-format",
        severity: "warning",
        file: unit.file.path,
        line: root?.line ?? 1,
        message: `x:Class '${declared}' might not match file location (expected '${expected}').`,
        fixHint: "Move the file or rename the class/namespace so they agree.",
      },
    ];
  },
};
