import type { Invocation, LocatedType, ParsedUnit, ProjectIndex, Registration } from "./types.js";

const REGISTRATION_RE =
  /^(?:Try)?Add(?:Keyed)?(?:Singleton|Scoped|Transient)$|^Add(?:HostedService|HttpClient|DbContext)$|^Register(?:Singleton|LazySingleton|Constant|Instance|Type)?$/;

/** `Foo.Bar<T>?` → `Bar` */
export function simpleTypeName(name: string): string {
  let s = name.trim().replace(/\?$/, "");
  const lt = s.indexOf("<");
  if (lt >= 0) s = s.slice(0, lt);
  const dot = s.lastIndexOf(".");
  return (dot >= 0 ? s.slice(dot + 1) : s).replace(/^global::/, "");
}

export function isRegistrationCall(callee: string): boolean {
  return REGISTRATION_RE.test(callee.split(".").pop() ?? "");
}

export function registrationOf(inv: Invocation, file: string): Registration | undefined {
  const method = inv.callee.split(".").pop() ?? inv.callee;
  if (!isRegistrationCall(inv.callee)) return undefined;

  let service: string | undefined;
  let implementation: string | undefined;
  if (inv.genericArgs.length) {
    service = inv.genericArgs[0];
    implementation = inv.genericArgs[1];
  } else {
    const typeofArgs = inv.args
      .map((a) => /^typeof\s*\(\s*([^)]+?)\s*\)$/.exec(a)?.[1])
      .filter((a): a is string => Boolean(a));
    if (typeofArgs.length) {
      service = typeofArgs[0];
      implementation = typeofArgs[1];
    } else {
      service = inv.args.map((a) => /^new\s+([\w.]+)/.exec(a)?.[1]).find(Boolean);
    }
  }
  if (!service) return undefined;

  const reg: Registration = { service: simpleTypeName(service), method, file, line: inv.line };
  if (implementation) reg.implementation = simpleTypeName(implementation);
  return reg;
}

/** Read-only lookup over every unit of one scan. */
export function buildProjectIndex(units: readonly ParsedUnit[]): ProjectIndex {
  const byPath = new Map<string, ParsedUnit>();
  const types = new Map<string, LocatedType[]>();
  const registrations: Registration[] = [];

  for (const unit of units) {
    byPath.set(unit.file.path, unit);
    if (!unit.code) continue;
    for (const type of unit.code.types) {
      const list = types.get(type.name) ?? [];
      list.push({ type, file: unit.file.path });
      types.set(type.name, list);
    }
    for (const inv of unit.code.invocations) {
      const reg = registrationOf(inv, unit.file.path);
      if (reg) registrations.push(reg);
    }
  }

  return { units, byPath, types, registrations };
}

/** Looks a type up by (possibly qualified or generic) name. Prefers a match on full name. */
export function findType(index: ProjectIndex, name: string): LocatedType | undefined {
  const candidates = index.types.get(simpleTypeName(name));
  if (!candidates?.length) return undefined;
  const qualified = name.replace(/<.*$/, "");
  return candidates.find((c) => c.type.fullName === qualified) ?? candidates[0];
}
