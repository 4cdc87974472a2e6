import type {
  CodeView,
  Invocation,
  MemberDecl,
  MemberKind,
  Parameter,
  Region,
  StringLiteral,
  TypeDecl,
  TypeKind,
} from "../engine/types.js";
import { LineMap } from "./lines.js";
import { maskSource, tokenize, type RawLiteral, type Token } from "./csharpLexer.js";

export interface CodeProblem {
  message: string;
  line: number;
}

export interface CodeScan {
  view: CodeView;
  regions: Region[];
  problems: CodeProblem[];
}

const TYPE_KEYWORDS: readonly string[] = ["class", "interface", "struct", "enum", "record"] satisfies TypeKind[];
const TYPE_MODIFIERS = new Set([
  "public", "private", "protected", "internal", "static", "abstract", "sealed",
  "partial", "readonly", "unsafe", "new", "file", "ref",
]);
const MEMBER_MODIFIERS = new Set([
  "public", "private", "protected", "internal", "static", "abstract", "virtual",
  "override", "sealed", "readonly", "const", "volatile", "async", "extern", "new",
  "unsafe", "partial", "required", "event", "implicit", "explicit",
]);
const NOT_CALLEES = new Set([
  "if", "while", "for", "foreach", "switch", "catch", "using", "lock", "return",
  "nameof", "typeof", "sizeof", "default", "when", "fixed", "checked", "unchecked",
  "base", "this", "new", "throw", "in", "is", "as", "await", "else",
]);
const KEYWORD_PREFIXES = new Set(["return", "await", "throw", "else", "in", "yield", "case", "is", "as"]);

type Ctx =
  | { kind: "root" }
  | { kind: "namespace"; name: string; line: number }
  | { kind: "type"; type: TypeDecl }
  | { kind: "member"; member?: MemberDecl; sawBody: boolean; line: number }
  | { kind: "expr"; line: number }
  | { kind: "block"; line: number };

/**
 * Brace-depth structural scan of a C# file. Recognises namespaces, type
 * declarations and their members, string literals and call sites; bodies
 * of members are otherwise opaque.
 */
export function scanCSharp(text: string): CodeScan {
  const { masked, literals } = maskSource(text);
  const tokens = tokenize(masked);
  const lines = new LineMap(text);
  const view: CodeView = { usings: [], types: [], strings: [], invocations: [] };
  const regions: Region[] = [];
  const problems: CodeProblem[] = [];

  const src = (from: number, to: number) => text.slice(from, to).replace(/\s+/g, " ").trim();
  const spanText = (toks: Token[]) => (toks.length ? src(toks[0].start, toks[toks.length - 1].end) : "");
  const lineOf = (t: Token) => lines.line(t.start);

  const callSpans: { inv: Invocation; args: [number, number][] }[] = [];
  const stack: Ctx[] = [{ kind: "root" }];
  const top = () => stack[stack.length - 1];
  let headerStart = 0;

  for (let k = 0; k < tokens.length; k++) {
    const t = tokens[k];
    const ctx = top();

    if (ctx.kind === "member" || ctx.kind === "block" || ctx.kind === "expr") {
      if (t.text === "{") {
        if (ctx.kind === "member") ctx.sawBody = true;
        stack.push(ctx.kind === "expr" ? { kind: "expr", line: lineOf(t) } : { kind: "block", line: lineOf(t) });
      } else if (t.text === "=>" && ctx.kind === "member") {
        ctx.sawBody = true;
      } else if (t.text === "}") {
        stack.pop();
        if (ctx.kind === "member" && ctx.member) ctx.member.hasBody ||= ctx.sawBody;
        const parent = top();
        if (ctx.kind !== "expr" && (parent.kind === "root" || parent.kind === "namespace" || parent.kind === "type")) {
          headerStart = k + 1;
        }
      }
      continue;
    }

    const header = tokens.slice(headerStart, k);

    if (ctx.kind === "type" && ctx.type.kind === "enum") {
      if (t.text === "," || t.text === "}") {
        addEnumMember(ctx.type, header);
        headerStart = k + 1;
      }
      if (t.text === "}") {
        stack.pop();
        closeType(ctx.type, t);
      }
      if (t.text === "{") stack.push({ kind: "expr", line: lineOf(t) });
      continue;
    }

    if (t.text === ";") {
      onStatement(header, ctx);
      headerStart = k + 1;
    } else if (t.text === "{") {
      if (topLevelIndex(header, "=") >= 0 || topLevelIndex(header, "=>") >= 0) {
        stack.push({ kind: "expr", line: lineOf(t) });
        continue;
      }
      stack.push(onOpen(header, ctx, t));
      headerStart = k + 1;
    } else if (t.text === "}") {
      if (stack.length === 1) {
        problems.push({ message: "Unbalanced '}' with no matching '{'.", line: lineOf(t) });
      } else {
        stack.pop();
        if (ctx.kind === "type") closeType(ctx.type, t);
      }
      headerStart = k + 1;
    }
  }

  for (let s = stack.length - 1; s > 0; s--) {
    const ctx = stack[s];
    if (ctx.kind === "namespace" && ctx.line < 0) continue;
    const line = ctx.kind === "type" ? ctx.type.line : ctx.kind === "root" ? 1 : ctx.line;
    problems.push({ message: `Block opened at line ${line} is never closed.`, line });
    regions.push({ kind: "unparsed", startLine: line, endLine: lines.lineCount });
    if (ctx.kind === "type") ctx.type.endLine = lines.lineCount;
  }

  collectInvocations();
  attachStrings();

  return { view, regions, problems };

  // ---- declarations ----

  function namespaceOf(): string | undefined {
    const parts = stack.filter((c): c is Extract<Ctx, { kind: "namespace" }> => c.kind === "namespace").map((c) => c.name);
    return parts.length ? parts.join(".") : undefined;
  }

  function outerTypes(): string[] {
    return stack.filter((c): c is Extract<Ctx, { kind: "type" }> => c.kind === "type").map((c) => c.type.name);
  }

  function onStatement(header: Token[], ctx: Ctx): void {
    if (!header.length) return;
    const h = stripAttributes(header).tokens;
    if (ctx.kind === "root" || ctx.kind === "namespace") {
      if (h[0]?.text === "using" || (h[0]?.text === "global" && h[1]?.text === "using")) {
        const body = h.slice(h[0].text === "global" ? 2 : 1).filter((x) => x.text !== "static");
        const eq = body.findIndex((x) => x.text === "=");
        view.usings.push(spanText(eq >= 0 ? body.slice(eq + 1) : body));
        return;
      }
      if (h[0]?.text === "namespace") {
        const name = spanText(h.slice(1)).replace(/\s/g, "");
        view.namespace ??= name;
        stack.push({ kind: "namespace", name, line: -1 });
        return;
      }
    }
    const decl = parseTypeHeader(header);
    if (decl) {
      decl.endLine = decl.line;
      return;
    }
    if (ctx.kind !== "type") return;

    const arrow = topLevelIndex(header, "=>");
    const eq = topLevelIndex(header, "=");
    // `Func<int, int> F = x => ...` is a field whose initializer is a lambda.
    if (arrow >= 0 && (eq < 0 || arrow < eq)) {
      addMember(ctx.type, header.slice(0, arrow), "expression");
      return;
    }
    if (eq === 0) return;
    addMember(ctx.type, eq >= 0 ? header.slice(0, eq) : header, "statement");
  }

  function onOpen(header: Token[], ctx: Ctx, brace: Token): Ctx {
    const line = lineOf(brace);
    if (ctx.kind === "root" || ctx.kind === "namespace") {
      const h = stripAttributes(header).tokens;
      if (h[0]?.text === "namespace") {
        const name = spanText(h.slice(1)).replace(/\s/g, "");
        view.namespace ??= name;
        return { kind: "namespace", name, line: lineOf(h[0]) };
      }
    }
    const decl = parseTypeHeader(header);
    if (decl) return { kind: "type", type: decl };
    if (ctx.kind !== "type") return { kind: "block", line };

    const member = addMember(ctx.type, header, "block");
    return { kind: "member", member, sawBody: false, line };
  }

  function closeType(type: TypeDecl, brace: Token): void {
    type.endLine = lineOf(brace);
    const region = regions.find((r) => r.kind === "type" && r.name === type.fullName && r.startLine === type.line);
    if (region) region.endLine = type.endLine;
  }

  function parseTypeHeader(header: Token[]): TypeDecl | undefined {
    const { tokens: h } = stripAttributes(header);
    let i = 0;
    const modifiers: string[] = [];
    while (i < h.length && TYPE_MODIFIERS.has(h[i].text)) {
      modifiers.push(h[i].text);
      i++;
    }
    const kwToken = h[i];
    if (!kwToken || !isTypeKeyword(kwToken.text)) return undefined;
    const kind = kwToken.text;
    i++;
    if (kind === "record" && (h[i]?.text === "class" || h[i]?.text === "struct")) i++;
    const nameTok = h[i];
    if (!nameTok || nameTok.kind !== "ident") return undefined;
    i++;

    const typeParameters: string[] = [];
    if (h[i]?.text === "<") {
      const close = matching(h, i, "<", ">");
      for (const p of h.slice(i + 1, close)) {
        if (p.kind === "ident" && p.text !== "in" && p.text !== "out") typeParameters.push(p.text);
      }
      i = close + 1;
    }

    const constructors: Parameter[][] = [];
    if (h[i]?.text === "(") {
      const close = matching(h, i, "(", ")");
      constructors.push(parseParameters(h.slice(i + 1, close)));
      i = close + 1;
    }

    const baseTypes: string[] = [];
    if (h[i]?.text === ":") {
      let end = h.findIndex((x, idx) => idx > i && x.text === "where");
      if (end < 0) end = h.length;
      for (const part of splitTopLevel(h.slice(i + 1, end))) {
        const paren = part.findIndex((x) => x.text === "(");
        const base = spanText(paren >= 0 ? part.slice(0, paren) : part);
        if (base) baseTypes.push(base);
      }
    }

    const outer = outerTypes();
    const namespace = namespaceOf();
    const name = nameTok.text;
    const decl: TypeDecl = {
      name,
      kind,
      fullName: [namespace, ...outer, name].filter(Boolean).join("."),
      modifiers,
      typeParameters,
      baseTypes,
      members: [],
      constructors,
      line: lineOf(kwToken),
      endLine: lineOf(kwToken),
    };
    if (namespace) decl.namespace = namespace;
    if (kind === "record" && constructors.length) {
      for (const p of constructors[0]) {
        decl.members.push({ kind: "property", name: p.name, type: p.type, modifiers: ["public"], attributes: [], hasBody: false, line: decl.line });
      }
    }
    view.types.push(decl);
    regions.push({ kind: "type", name: decl.fullName, startLine: decl.line, endLine: decl.line });
    return decl;
  }

  function addEnumMember(type: TypeDecl, header: Token[]): void {
    const h = stripAttributes(header).tokens;
    const nameTok = h[0];
    if (!nameTok || nameTok.kind !== "ident") return;
    type.members.push({ kind: "enum-member", name: nameTok.text, modifiers: [], attributes: [], hasBody: false, line: lineOf(nameTok) });
  }

  function addMember(type: TypeDecl, header: Token[], terminator: "statement" | "expression" | "block"): MemberDecl | undefined {
    const { tokens: h, attributes } = stripAttributes(header);
    let i = 0;
    const modifiers: string[] = [];
    while (i < h.length && MEMBER_MODIFIERS.has(h[i].text)) {
      modifiers.push(h[i].text);
      i++;
    }
    const rest = h.slice(i);
    if (!rest.length || rest.some((x) => x.text === "operator") || rest[0].text === "~") return undefined;

    const paren = topLevelIndex(rest, "(");
    const bracket = rest.findIndex((x, idx) => x.text === "this" && rest[idx + 1]?.text === "[");
    let member: MemberDecl | undefined;

    if (paren >= 0 && (bracket < 0 || paren < bracket)) {
      let nameIdx = paren - 1;
      if (rest[nameIdx]?.text === ">") nameIdx = matchingBack(rest, nameIdx, "<", ">") - 1;
      const nameTok = rest[nameIdx];
      if (!nameTok || nameTok.kind !== "ident") return undefined;
      const close = matching(rest, paren, "(", ")");
      const parameters = parseParameters(rest.slice(paren + 1, close));

      let typeEnd = nameIdx;
      let explicitInterface: string | undefined;
      if (rest[nameIdx - 1]?.text === ".") {
        const q = qualifierStart(rest, nameIdx - 1);
        explicitInterface = spanText(rest.slice(q, nameIdx - 1));
        typeEnd = q;
      }

      if (typeEnd === 0 && nameTok.text === type.name) {
        type.constructors.push(parameters);
        return undefined;
      }
      member = {
        kind: "method",
        name: nameTok.text,
        type: spanText(rest.slice(0, typeEnd)),
        parameters,
        modifiers,
        attributes,
        hasBody: terminator !== "statement",
        line: lineOf(nameTok),
      };
      if (explicitInterface) member.explicitInterface = explicitInterface;
    } else {
      const nameIdx = bracket >= 0 ? bracket : rest.length - 1;
      const nameTok = rest[nameIdx];
      if (!nameTok || nameTok.kind !== "ident" || nameIdx === 0) return undefined;
      let typeEnd = nameIdx;
      let explicitInterface: string | undefined;
      if (rest[nameIdx - 1]?.text === ".") {
        const q = qualifierStart(rest, nameIdx - 1);
        explicitInterface = spanText(rest.slice(q, nameIdx - 1));
        typeEnd = q;
      }
      const isEvent = modifiers.includes("event");
      let kind: MemberKind = "field";
      if (isEvent) kind = "event";
      else if (terminator !== "statement") kind = "property";
      member = {
        kind,
        name: nameTok.text,
        type: spanText(rest.slice(0, typeEnd)),
        modifiers: modifiers.filter((m) => m !== "event"),
        attributes,
        hasBody: terminator === "expression",
        line: lineOf(nameTok),
      };
      if (explicitInterface) member.explicitInterface = explicitInterface;
    }

    type.members.push(member);
    regions.push({ kind: "member", name: `${type.name}.${member.name}`, startLine: member.line, endLine: member.line });
    return member;
  }

  function parseParameters(toks: Token[]): Parameter[] {
    const out: Parameter[] = [];
    for (const part of splitTopLevel(toks)) {
      const { tokens: p } = stripAttributes(part);
      const eq = topLevelIndex(p, "=");
      const decl = (eq >= 0 ? p.slice(0, eq) : p).filter(
        (x, idx) => !(idx === 0 && ["this", "ref", "out", "in", "params", "scoped", "readonly"].includes(x.text)),
      );
      const nameTok = decl[decl.length - 1];
      if (!nameTok || nameTok.kind !== "ident" || decl.length < 2) continue;
      out.push({ type: spanText(decl.slice(0, -1)), name: nameTok.text });
    }
    return out;
  }

  // ---- call sites and literals ----

  function collectInvocations(): void {
    for (let k = 0; k < tokens.length; k++) {
      const t = tokens[k];
      if (t.kind !== "ident" || NOT_CALLEES.has(t.text)) continue;

      let next = k + 1;
      const genericArgs: string[] = [];
      if (tokens[next]?.text === "<") {
        const close = genericClose(tokens, next);
        if (close < 0) continue;
        for (const part of splitTopLevel(tokens.slice(next + 1, close))) genericArgs.push(spanText(part));
        next = close + 1;
      }
      if (tokens[next]?.text !== "(") continue;

      const prev = tokens[k - 1];
      if (prev && prev.text !== "." && prev.text !== "?.") {
        if (prev.text === "new") continue;
        // `string? Find(...) {` declares; `ok ? Find(a) : b` calls.
        const nullableReturn = prev.text === "?" && declarationTail(tokens, matching(tokens, next, "(", ")") + 1);
        if ((prev.kind === "ident" && !KEYWORD_PREFIXES.has(prev.text)) || prev.text === ">" || prev.text === "]" || nullableReturn) {
          continue;
        }
      }

      const chain = [t.text];
      let b = k - 1;
      while ((tokens[b]?.text === "." || tokens[b]?.text === "?.") && tokens[b - 1]?.kind === "ident") {
        chain.unshift(tokens[b - 1].text);
        b -= 2;
      }
      // `void IFoo.Bar(` and `new Foo.Bar(` are not calls
      const before = tokens[b];
      if (chain.length > 1 && before?.kind === "ident" && !KEYWORD_PREFIXES.has(before.text)) continue;

      const close = matching(tokens, next, "(", ")");
      const argTokens = splitTopLevel(tokens.slice(next + 1, close));
      const inv: Invocation = {
        callee: chain.join("."),
        genericArgs,
        args: argTokens.map((a) => (a.length ? text.slice(a[0].start, a[a.length - 1].end).trim() : "")),
        line: lineOf(t),
      };
      view.invocations.push(inv);
      callSpans.push({
        inv,
        args: argTokens.map((a): [number, number] => (a.length ? [a[0].start, a[a.length - 1].end] : [-1, -1])),
      });
    }
  }

  function attachStrings(): void {
    for (const lit of literals) {
      const s: StringLiteral = {
        value: lit.value,
        line: lines.line(lit.start),
        interpolated: lit.interpolated,
        verbatim: lit.verbatim,
      };
      const owner = directArgumentOf(lit);
      if (owner) {
        s.callee = owner.callee;
        s.argIndex = owner.argIndex;
      }
      view.strings.push(s);
    }
  }

  function directArgumentOf(lit: RawLiteral): { callee: string; argIndex: number } | undefined {
    for (let c = callSpans.length - 1; c >= 0; c--) {
      const { inv, args } = callSpans[c];
      const idx = args.findIndex(([from, to]) => from === lit.start && to === lit.end);
      if (idx >= 0) return { callee: inv.callee, argIndex: idx };
    }
    return undefined;
  }
}

// ---- token helpers ----

function isTypeKeyword(text: string): text is TypeKind {
  return TYPE_KEYWORDS.includes(text);
}

function stripAttributes(header: Token[]): { tokens: Token[]; attributes: string[] } {
  const attributes: string[] = [];
  let i = 0;
  while (header[i]?.text === "[") {
    const close = matching(header, i, "[", "]");
    for (const part of splitTopLevel(header.slice(i + 1, close))) {
      let p = part;
      if (p[1]?.text === ":") p = p.slice(2);
      const paren = p.findIndex((x) => x.text === "(");
      const idents = (paren >= 0 ? p.slice(0, paren) : p).filter((x) => x.kind === "ident");
      const last = idents[idents.length - 1];
      if (last) attributes.push(last.text.replace(/Attribute$/, ""));
    }
    i = close + 1;
  }
  return { tokens: header.slice(i), attributes };
}

/** Index of the token closing the bracket opened at `open`, or the last index when unbalanced. */
function matching(toks: Token[], open: number, o: string, c: string): number {
  let depth = 0;
  for (let i = open; i < toks.length; i++) {
    if (toks[i].text === o) depth++;
    else if (toks[i].text === c && --depth === 0) return i;
  }
  return toks.length;
}

function matchingBack(toks: Token[], close: number, o: string, c: string): number {
  let depth = 0;
  for (let i = close; i >= 0; i--) {
    if (toks[i].text === c) depth++;
    else if (toks[i].text === o && --depth === 0) return i;
  }
  return 0;
}

/** `<` ... `>` made only of type-name tokens; -1 when the `<` is a comparison. */
function genericClose(toks: Token[], open: number): number {
  let depth = 0;
  for (let i = open; i < toks.length; i++) {
    const x = toks[i].text;
    if (x === "<") depth++;
    else if (x === ">") {
      if (--depth === 0) return i;
    } else if (toks[i].kind !== "ident" && ![".", ",", "?", "[", "]", "(", ")"].includes(x)) return -1;
  }
  return -1;
}

/** What can follow a method's parameter list. */
function declarationTail(toks: Token[], i: number): boolean {
  const after = toks[i]?.text;
  return after === undefined || after === "{" || after === "=>" || after === ";" || after === "where";
}

function qualifierStart(toks: Token[], dot: number): number {
  let q = dot - 1;
  if (toks[q]?.text === ">") q = matchingBack(toks, q, "<", ">") - 1;
  while (toks[q - 1]?.text === "." && toks[q - 2]?.kind === "ident") q -= 2;
  return Math.max(0, q);
}

function topLevelIndex(toks: Token[], text: string): number {
  let depth = 0;
  for (let i = 0; i < toks.length; i++) {
    const x = toks[i].text;
    if (depth === 0 && x === text) return i;
    if (x === "(" || x === "[" || x === "{") depth++;
    else if (x === ")" || x === "]" || x === "}") depth--;
  }
  return -1;
}

function splitTopLevel(toks: Token[]): Token[][] {
  const out: Token[][] = [];
  let cur: Token[] = [];
  let depth = 0;
  for (let i = 0; i < toks.length; i++) {
    const t = toks[i];
    if (t.text === "<") {
      const close = genericClose(toks, i);
      if (close > i) {
        cur.push(...toks.slice(i, close + 1));
        i = close;
        continue;
      }
    }
    if (t.text === "(" || t.text === "[" || t.text === "{") depth++;
    else if (t.text === ")" || t.text === "]" || t.text === "}") depth--;
    if (t.text === "," && depth === 0) {
      out.push(cur);
      cur = [];
      continue;
    }
    cur.push(t);
  }
  if (cur.length || out.length) out.push(cur);
  return out;
}
