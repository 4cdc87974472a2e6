import type { Finding, ParsedUnit, Rule, RuleContext, Severity } from "./types.js";
import { errorMessage } from "./errors.js";

export function applicableRules(rules: readonly Rule[], ctx: RuleContext): Rule[] {
  const disabled = new Set(ctx.config.disabledRules);
  return rules.filter(
    (r) => !disabled.has(r.id) && (r.flavors.includes("any") || r.flavors.includes(ctx.flavor)),
  );
}

export function runRules(units: readonly ParsedUnit[], rules: readonly Rule[], ctx: RuleContext): Finding[] {
  const out: Finding[] = [];
  const active = applicableRules(rules, ctx);
  for (const unit of units) deepFreeze(unit);

  for (const unit of units) {
    for (const rule of active) {
      if (!rule.kinds.includes(unit.file.kind)) continue;

      let findings: Finding[];
      try {
        findings = rule.check(unit, ctx);
      } catch (e) {
        findings = [
          {
            ruleId: "rule-internal-error",
            category: "rule-internal-error",
            severity: "error",
            file: unit.file.path,
            message: `Rule ${rule.id} crashed: ${errorMessage(e)}`,
          },
        ];
      }

      out.push(...findings.map((f) => withOverride(f, ctx.config.severityOverrides)));
    }
  }

  return out;
}

export function applySeverityOverrides(findings: readonly Finding[], overrides: Record<string, Severity>): Finding[] {
  return findings.map((f) => withOverride(f, overrides));
}

function withOverride(f: Finding, overrides: Record<string, Severity>): Finding {
  const severity = overrides[f.ruleId];
  return severity && severity !== f.severity ? { ...f, severity } : f;
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const v of Object.values(value)) deepFreeze(v);
  }
  return value;
}
