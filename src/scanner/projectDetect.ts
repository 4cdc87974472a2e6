import type { DetectedFlavor, ParsedUnit, ProjectDetectResult } from "../engine/types.js";

function isTrue(v: string | undefined): boolean {
  return v?.trim().toLowerCase() === "true";
}

export function flavorOf(unit: ParsedUnit): DetectedFlavor | undefined {
  const project = unit.project;
  if (!project) return undefined;
  if (project.packages.some((p) => p.include === "Avalonia" || p.include.startsWith("Avalonia."))) return "avalonia";
  if (isTrue(project.properties["UseMaui"])) return "maui";
  if (isTrue(project.properties["UseWPF"])) return "wpf";
  return undefined;
}

/**
 * Picks the UI flavor from the first project file that names one, falling
 * back to the markup extension in use.
 */
export function detectProject(rootDir: string, units: readonly ParsedUnit[]): ProjectDetectResult {
  const projects = units.filter((u) => u.file.kind === "project");

  for (const unit of projects) {
    const flavor = flavorOf(unit);
    if (flavor) return { rootDir, flavor, projectFile: unit.file.path };
  }

  let flavor: DetectedFlavor = "generic";
  if (units.some((u) => u.file.path.endsWith(".axaml"))) flavor = "avalonia";
  else if (units.some((u) => u.file.path.endsWith(".xaml"))) flavor = "wpf";

  const result: ProjectDetectResult = { rootDir, flavor };
  if (projects[0]) result.projectFile = projects[0].file.path;
  return result;
}
