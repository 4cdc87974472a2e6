import type { Rule } from "../engine/types.js";

import { bindingMissingPropertyRule } from "./markup/bindingMissingProperty.js";
import { missingCodeBehindRule } from "./markup/missingCodeBehind.js";
import { codeBehindInitializeRule } from "./markup/codeBehindInitialize.js";
import { missingIncludeRule } from "./markup/missingInclude.js";
import { knownTyposRule } from "./markup/knownTypos.js";
import { classNamespaceRule } from "./markup/classNamespace.js";
import { unreferencedStyleRule } from "./markup/unreferencedStyle.js";
import { unsupportedPropertyRule } from "./markup/unsupportedProperty.js";

import { missingInterfaceMemberRule } from "./csharp/missingInterfaceMember.js";
import { dtoShapeMismatchRule } from "./csharp/dtoShapeMismatch.js";
import { formatPlaceholdersRule } from "./csharp/formatPlaceholders.js";
import { missingInterpolationRule } from "./csharp/missingInterpolation.js";

import { missingRegistrationRule } from "./di/missingRegistration.js";
import { registrationTypeMismatchRule } from "./di/registrationTypeMismatch.js";

import { avaloniaPackagesRule } from "./project/avaloniaPackages.js";
import { missingAppFilesRule } from "./project/missingAppFiles.js";

export const ALL_RULES: Rule[] = [
  // Markup
  bindingMissingPropertyRule,
  missingCodeBehindRule,
  codeBehindInitializeRule,
  missingIncludeRule,
  knownTyposRule,
  classNamespaceRule,
  unreferencedStyleRule,
  unsupportedPropertyRule,

  // C#
  missingInterfaceMemberRule,
  dtoShapeMismatchRule,
  formatPlaceholdersRule,
  missingInterpolationRule,

  // Dependency injection
  missingRegistrationRule,
  registrationTypeMismatchRule,

  // Project files
  avaloniaPackagesRule,
  missingAppFilesRule,
];

export function ruleById(id: string): Rule | undefined {
  return ALL_RULES.find((r) => r.id === id);
}
