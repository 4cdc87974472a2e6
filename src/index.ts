export * from "./engine/types.js";
export { SharpscanError, ScanError, ConfigError } from "./engine/errors.js";
export { scan, collectSources } from "./engine/scan.js";
export type { ScanHooks, ScanResult } from "./engine/scan.js";
export { loadConfig, parseConfig, CONFIG_FILES } from "./engine/configLoader.js";
export { runRules } from "./engine/runRules.js";
export { buildProjectIndex, findType } from "./engine/projectIndex.js";
export { aggregate, compareFindings, exitCode, summaryLine } from "./engine/report.js";
export { applyBaseline, buildBaseline, loadBaseline, writeBaseline } from "./engine/baseline.js";
export type { Baseline } from "./engine/baseline.js";
export { toSarif } from "./engine/sarif.js";
export { parseSource, scanCSharp, scanMarkup, parseBinding } from "./parser/index.js";
export { ALL_RULES, ruleById } from "./rules/index.js";
