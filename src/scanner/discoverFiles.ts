import fg from "fast-glob";
import path from "node:path";
import type { ScanConfig, SourceKind } from "../engine/types.js";
import { toPosix } from "../utils/path.js";

export const DEFAULT_INCLUDE = ["**/*.cs", "**/*.axaml", "**/*.xaml", "**/*.csproj"];

const BUILTIN_IGNORE = [
  "**/bin/**",
  "**/obj/**",
  "**/.git/**",
  "**/.vs/**",
  "**/.idea/**",
  "**/node_modules/**",
];

export interface CollectedFile {
  path: string;
  absPath: string;
}

export async function discoverFiles(rootDir: string, config: ScanConfig): Promise<CollectedFile[]> {
  const patterns = config.include.length ? config.include : DEFAULT_INCLUDE;
  const ignore = [...BUILTIN_IGNORE, ...config.ignore];

  const entries = await fg(patterns, { cwd: rootDir, dot: true, ignore, onlyFiles: true, unique: true });

  const seen = new Map<string, CollectedFile>();
  for (const entry of entries) {
    const rel = toPosix(path.normalize(entry));
    if (!seen.has(rel)) seen.set(rel, { path: rel, absPath: path.resolve(rootDir, entry) });
  }
  return [...seen.values()].sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
}

export function detectKind(p: string): SourceKind | undefined {
  const ext = path.extname(p).toLowerCase();
  if (ext === ".cs") return "csharp";
  if (ext === ".xaml" || ext === ".axaml") return "markup";
  if (ext === ".csproj") return "project";
  return undefined;
}
