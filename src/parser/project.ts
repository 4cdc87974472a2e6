import type { PackageRef, ProjectView } from "../engine/types.js";
import { attr, type MarkupScan } from "./markup.js";

/** Reads package references and properties out of an already scanned `.csproj`. */
export function projectView(scan: MarkupScan): ProjectView {
  const { elements } = scan.view;
  const view: ProjectView = { packages: [], properties: {} };

  const root = elements.find((e) => e.depth === 0);
  const sdk = root ? attr(root.attributes, "Sdk") : undefined;
  if (sdk) view.sdk = sdk;

  for (let i = 0; i < elements.length; i++) {
    const el = elements[i];
    if (el.name === "PackageReference") {
      const include = attr(el.attributes, "Include") ?? attr(el.attributes, "Update");
      if (!include) continue;
      const ref: PackageRef = { include, line: el.line };
      const version = attr(el.attributes, "Version");
      if (version) ref.version = version;
      view.packages.push(ref);
      continue;
    }
    const parent = elements.slice(0, i).reverse().find((p) => p.depth === el.depth - 1);
    if (parent?.name === "PropertyGroup" && !el.selfClosing) {
      view.properties[el.name] = el.text ?? "";
    }
  }
  return view;
}
