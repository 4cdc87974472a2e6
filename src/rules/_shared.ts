import path from "node:path";
import type { LocatedType, MemberDecl, ParsedUnit, ProjectIndex, TypeDecl } from "../engine/types.js";
import { findType, simpleTypeName } from "../engine/projectIndex.js";

/** Framework base types whose members are not in the scanned set but are known not to hide user members. */
export const FRAMEWORK_BASES = new Set([
  "object",
  "Object",
  "Application",
  "Window",
  "UserControl",
  "ContentControl",
  "TemplatedControl",
  "Control",
  "Panel",
  "Page",
  "ContentPage",
  "ContentView",
  "ObservableObject",
  "ObservableRecipient",
  "ObservableValidator",
  "ReactiveObject",
  "ReactiveWindow",
  "ReactiveUserControl",
  "Exception",
  "Attribute",
  "EventArgs",
]);

/** Interfaces follow the `IName` convention; external ones contribute nothing we need to resolve. */
export function looksLikeInterface(name: string): boolean {
  return /^I[A-Z]/.test(simpleTypeName(name));
}

/** Two declarations are parts of one type only when both are `partial` and compile into the same project. */
export function samePartialType(index: ProjectIndex, a: LocatedType, b: LocatedType): boolean {
  if (a.type === b.type) return true;
  if (a.type.fullName !== b.type.fullName) return false;
  if (!a.type.modifiers.includes("partial") || !b.type.modifiers.includes("partial")) return false;
  return projectDirOf(a.file, index) === projectDirOf(b.file, index);
}

/** Every partial declaration of the located type. */
export function declarationsOf(index: ProjectIndex, located: LocatedType): LocatedType[] {
  const all = index.types.get(located.type.name) ?? [];
  return all.filter((c) => samePartialType(index, c, located));
}

/** `_userName` / `m_userName` / `userName` → `UserName` */
export function observablePropertyName(field: string): string {
  const bare = field.replace(/^m_/, "").replace(/^_+/, "");
  return bare.charAt(0).toUpperCase() + bare.slice(1);
}

/** `Save` / `SaveAsync` → `SaveCommand` */
export function relayCommandName(method: string): string {
  return `${method.replace(/Async$/, "")}Command`;
}

export function memberNamesOf(member: MemberDecl): string[] {
  const names = [member.name];
  if (member.attributes.includes("ObservableProperty") && member.kind === "field") {
    names.push(observablePropertyName(member.name));
  }
  if (member.attributes.includes("RelayCommand") && member.kind === "method") {
    names.push(relayCommandName(member.name));
  }
  return names;
}

export interface MemberSet {
  names: Set<string>;
  /** False when some base type could not be resolved, so the set may be incomplete. */
  complete: boolean;
}

/** Members of a type including generated ones and everything inherited from scanned base types. */
export function collectMembers(index: ProjectIndex, located: LocatedType, seen = new Set<string>()): MemberSet {
  const result: MemberSet = { names: new Set(), complete: true };
  if (seen.has(located.type.fullName)) return result;
  seen.add(located.type.fullName);

  for (const decl of declarationsOf(index, located)) {
    for (const m of decl.type.members) {
      for (const n of memberNamesOf(m)) result.names.add(n);
    }
    for (const base of decl.type.baseTypes) {
      const found = findType(index, base);
      if (found) {
        // A class still has to declare what its interfaces require.
        if (found.type.kind === "interface" && located.type.kind !== "interface") continue;
        const inherited = collectMembers(index, found, seen);
        for (const n of inherited.names) result.names.add(n);
        result.complete &&= inherited.complete;
      } else if (!FRAMEWORK_BASES.has(simpleTypeName(base)) && !looksLikeInterface(base)) {
        result.complete = false;
      }
    }
  }
  return result;
}

/** The C# type paired with a view: its `x:Class`, else the type declared in `View.axaml.cs`. */
export function codeBehindOf(unit: ParsedUnit, index: ProjectIndex): LocatedType | undefined {
  const xClass = unit.markup?.xClass;
  if (xClass) {
    const found = findType(index, xClass);
    if (found) return found;
  }
  const sibling = index.byPath.get(`${unit.file.path}.cs`);
  const type = sibling?.code?.types.find((t) => t.kind === "class");
  return type && sibling ? { type, file: sibling.file.path } : undefined;
}

export function isClassLike(type: TypeDecl): boolean {
  return type.kind === "class" || type.kind === "record" || type.kind === "struct";
}

/** Root-relative POSIX directory of a file, "" at the root. */
export function dirOf(file: string): string {
  const d = path.posix.dirname(file);
  return d === "." ? "" : d;
}

/** The nearest `.csproj` at or above the file. */
export function projectUnitOf(file: string, index: ProjectIndex): ParsedUnit | undefined {
  let best: ParsedUnit | undefined;
  for (const unit of index.units) {
    if (unit.file.kind !== "project") continue;
    const dir = dirOf(unit.file.path);
    if (dir !== "" && !file.startsWith(`${dir}/`)) continue;
    if (!best || dir.length > dirOf(best.file.path).length) best = unit;
  }
  return best;
}

/** Directory of the nearest `.csproj` at or above the file, or the scan root. */
export function projectDirOf(file: string, index: ProjectIndex): string {
  const project = projectUnitOf(file, index);
  return project ? dirOf(project.file.path) : "";
}

/** Names this scan's assemblies may go by: project file stems plus AssemblyName / RootNamespace. */
export function assemblyNames(index: ProjectIndex): Set<string> {
  const names = new Set<string>();
  for (const unit of index.units) {
    if (!unit.project) continue;
    names.add(path.posix.basename(unit.file.path, ".csproj"));
    for (const key of ["AssemblyName", "RootNamespace"]) {
      const v = unit.project.properties[key];
      if (v) names.add(v);
    }
  }
  return names;
}

export function joinPosix(dir: string, rel: string): string {
  const joined = path.posix.normalize(dir ? `${dir}/${rel}` : rel);
  return joined.replace(/^\.\//, "");
}
