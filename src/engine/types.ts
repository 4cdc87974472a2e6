export type Severity = "error" | "warning" | "info";
export type FlavorName = "auto" | "avalonia" | "wpf" | "maui" | "generic";
export type DetectedFlavor = Exclude<FlavorName, "auto">;
export type OutputFormat = "console" | "json" | "sarif";
export type SourceKind = "csharp" | "markup" | "project";

export type Category =
  | "io"
  | "malformed-markup"
  | "parse-degraded"
  | "rule-internal-error"
  | "missing-reference"
  | "structural-mismatch"
  | "naming-format"
  | "registration-consistency"
  | "compatibility";

export interface ScanConfig {
  flavor: FlavorName;
  include: string[];
  ignore: string[];
  maxFileBytes: number;
  rootNamespace?: string;
  disabledRules: string[];
  severityOverrides: Record<string, Severity>;
}

export interface ProjectDetectResult {
  rootDir: string;
  flavor: DetectedFlavor;
  /** Root-relative path of the first project file found, if any. */
  projectFile?: string;
}

export interface SourceFile {
  readonly path: string;
  readonly absPath: string;
  readonly text: string;
  readonly kind: SourceKind;
}

export type RegionKind = "type" | "member" | "element" | "binding" | "unparsed";

export interface Region {
  kind: RegionKind;
  name?: string;
  startLine: number;
  endLine: number;
}

// ---- markup ----

export interface MarkupAttribute {
  name: string;
  value: string;
  line: number;
}

export interface MarkupElement {
  name: string;
  attributes: MarkupAttribute[];
  depth: number;
  line: number;
  selfClosing: boolean;
  /** First run of character data inside the element, trimmed. */
  text?: string;
}

export interface MarkupBinding {
  attribute: string;
  element: string;
  expression: string;
  path: string;
  /** First member segment of the path, or undefined when the binding is not resolvable statically. */
  property?: string;
  /** `x:DataType` in scope for this binding, if any. */
  dataType?: string;
  line: number;
}

export interface MarkupInclude {
  element: string;
  source: string;
  line: number;
}

export interface MarkupView {
  elements: MarkupElement[];
  root?: string;
  xClass?: string;
  xDataType?: string;
  bindings: MarkupBinding[];
  includes: MarkupInclude[];
}

// ---- csharp ----

export type TypeKind = "class" | "interface" | "record" | "struct" | "enum";
export type MemberKind = "property" | "method" | "field" | "event" | "enum-member";

export interface Parameter {
  type: string;
  name: string;
}

export interface MemberDecl {
  kind: MemberKind;
  name: string;
  type?: string;
  /** Set for explicit interface implementations, e.g. `IFoo` for `IFoo.Bar()`. */
  explicitInterface?: string;
  parameters?: Parameter[];
  modifiers: string[];
  attributes: string[];
  hasBody: boolean;
  line: number;
}

export interface TypeDecl {
  name: string;
  kind: TypeKind;
  namespace?: string;
  fullName: string;
  modifiers: string[];
  typeParameters: string[];
  baseTypes: string[];
  members: MemberDecl[];
  constructors: Parameter[][];
  line: number;
  endLine: number;
}

export interface StringLiteral {
  value: string;
  line: number;
  interpolated: boolean;
  verbatim: boolean;
  /** Callee of the innermost call this literal is a direct argument of. */
  callee?: string;
  argIndex?: number;
}

export interface Invocation {
  callee: string;
  genericArgs: string[];
  args: string[];
  line: number;
}

export interface CodeView {
  namespace?: string;
  usings: string[];
  types: TypeDecl[];
  strings: StringLiteral[];
  invocations: Invocation[];
}

// ---- project ----

export interface PackageRef {
  include: string;
  version?: string;
  line: number;
}

export interface ProjectView {
  sdk?: string;
  packages: PackageRef[];
  properties: Record<string, string>;
}

export interface ParsedUnit {
  readonly file: SourceFile;
  readonly regions: readonly Region[];
  readonly symbols: readonly string[];
  readonly degraded: boolean;
  readonly markup?: MarkupView;
  readonly code?: CodeView;
  readonly project?: ProjectView;
}

export interface Finding {
  ruleId: string;
  category: Category;
  severity: Severity;
  message: string;
  file: string;
  line?: number;
  col?: number;
  fixHint?: string;
  related?: string[];
}

export interface ParseResult {
  unit: ParsedUnit;
  findings: Finding[];
}

export interface Registration {
  service: string;
  implementation?: string;
  method: string;
  file: string;
  line: number;
}

export interface ProjectIndex {
  readonly units: readonly ParsedUnit[];
  readonly byPath: ReadonlyMap<string, ParsedUnit>;
  /** Types keyed by simple name (generic arity stripped). */
  readonly types: ReadonlyMap<string, readonly LocatedType[]>;
  readonly registrations: readonly Registration[];
}

export interface LocatedType {
  type: TypeDecl;
  file: string;
}

export interface RuleContext {
  rootDir: string;
  config: ScanConfig;
  project: ProjectIndex;
  flavor: DetectedFlavor;
}

export interface Rule {
  id: string;
  category: Category;
  description: string;
  kinds: SourceKind[];
  flavors: (DetectedFlavor | "any")[];
  check: (unit: ParsedUnit, ctx: RuleContext) => Finding[];
}

export interface SeverityGroup {
  severity: Severity;
  findings: Finding[];
}

export interface CategoryGroup {
  category: Category;
  severities: SeverityGroup[];
}

export interface ReportSummary {
  total: number;
  bySeverity: Record<Severity, number>;
  byCategory: Partial<Record<Category, number>>;
}

export interface Report {
  findings: Finding[];
  groups: CategoryGroup[];
  summary: ReportSummary;
}
