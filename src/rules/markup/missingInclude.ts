import type { Rule, Finding, ProjectIndex } from "../../engine/types.js";
import { assemblyNames, dirOf, joinPosix, projectDirOf } from "../_shared.js";

type Resolved = { path: string } | { external: true };

export function resolveIncludeSource(source: string, file: string, index: ProjectIndex): Resolved {
  const s = source.trim();
  const projectDir = projectDirOf(file, index);

  const avares = /^avares:\/\/([^/]+)\/(.*)$/.exec(s);
  if (avares) {
    const [, assembly, rest] = avares;
    const known = assemblyNames(index);
    if (assembly.startsWith("Avalonia") || (known.size > 0 && !known.has(assembly))) return { external: true };
    return { path: joinPosix(projectDir, rest) };
  }

  const pack = /^pack:\/\/application:,,,\/(?:([^;]+);component\/)?(.*)$/.exec(s);
  if (pack) {
    const [, assembly, rest] = pack;
    if (assembly && !assemblyNames(index).has(assembly)) return { external: true };
    return { path: joinPosix(projectDir, rest) };
  }

  if (/^[a-z][\w+.-]*:/i.test(s)) return { external: true };
  if (s.startsWith("/")) return { path: joinPosix(projectDir, s.slice(1)) };
  return { path: joinPosix(dirOf(file), s) };
}

export const missingIncludeRule: Rule = {
  id: "markup-missing-include",
  category: "missing-reference",
  description: "StyleInclude / ResourceInclude Source points at a file that is not in the tree.",
  kinds: ["markup"],
  flavors: ["any"],
  check(unit, ctx) {
    const out: Finding[] = [];
    for (const inc of unit.markup?.includes ?? []) {
      const resolved = resolveIncludeSource(inc.source, unit.file.path, ctx.project);
      if ("external" in resolved) continue;
      if (!/\.(axaml|xaml)$/i.test(resolved.path) || ctx.project.byPath.has(resolved.path)) continue;

      out.push({
        ruleId: "markup-missing-include",
        category: "missing-reference",
        severity: "error",
        file: unit.file.path,
        line: inc.line,
        message: `<${inc.element} Source="${inc.source}"> references ${resolved.path}, which does not exist.`,
        fixHint: "Fix the Source path or add the missing style/resource file.",
      });
    }
    return out;
  },
};
