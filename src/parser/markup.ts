import type {
  MarkupAttribute,
  MarkupBinding,
  MarkupElement,
  MarkupInclude,
  MarkupView,
  Region,
} from "../engine/types.js";
import { LineMap } from "./lines.js";

export interface MarkupProblem {
  message: string;
  line: number;
}

export interface MarkupScan {
  view: MarkupView;
  regions: Region[];
  problems: MarkupProblem[];
}

const NAME_RE = /[A-Za-z_][\w:.\-]*/y;
const ATTR_NAME_RE = /[^\s=/>"'<]+/y;
const BINDING_RE = /^\{\s*(Binding|CompiledBinding|ReflectionBinding|x:Bind)(?=[\s}])([\s\S]*)\}$/;
const INCLUDE_ELEMENTS = new Set(["StyleInclude", "ResourceInclude", "MergeResourceInclude"]);
const UNRESOLVABLE_ARGS = ["ElementName", "RelativeSource", "Source"];

type Scope = { known: true; dataType?: string } | { known: false };

interface Open {
  element: MarkupElement;
  region: Region;
  scope: Scope;
}

/**
 * Tolerant tag scanner. Never throws on malformed input: problems are
 * collected and everything recognised up to that point is kept.
 */
export function scanMarkup(text: string): MarkupScan {
  const lines = new LineMap(text);
  const view: MarkupView = { elements: [], bindings: [], includes: [] };
  const regions: Region[] = [];
  const problems: MarkupProblem[] = [];
  const problem = (offset: number, message: string) => problems.push({ message, line: lines.line(offset) });

  const first = text.search(/\S/);
  if (first < 0) {
    problems.push({ message: "File is empty.", line: 1 });
    return { view, regions, problems };
  }
  if (text[first] !== "<") {
    problem(first, "Content does not start with a root element.");
  }

  const stack: Open[] = [];
  let rootCount = 0;
  let i = 0;

  scan: while (i < text.length) {
    const lt = text.indexOf("<", i);
    const chars = text.slice(i, lt < 0 ? text.length : lt).trim();
    const current = stack[stack.length - 1];
    if (chars && current && current.element.text === undefined) current.element.text = decodeEntities(chars);
    if (lt < 0) break;
    i = lt;

    const special: [string, string, string][] = [
      ["<!--", "-->", "comment"],
      ["<![CDATA[", "]]>", "CDATA section"],
      ["<?", "?>", "processing instruction"],
      ["<!", ">", "declaration"],
    ];
    for (const [open, close, what] of special) {
      if (text.startsWith(open, i)) {
        const end = text.indexOf(close, i + open.length);
        if (end < 0) {
          problem(i, `Unterminated ${what}.`);
          break scan;
        }
        i = end + close.length;
        continue scan;
      }
    }

    if (text.startsWith("</", i)) {
      const end = text.indexOf(">", i);
      const next = text.indexOf("<", i + 2);
      if (end < 0 || (next >= 0 && next < end)) {
        problem(i, "Unterminated closing tag.");
        if (end < 0) break;
        i = next;
        continue;
      }
      const name = text.slice(i + 2, end).trim();
      closeElement(name, i, end);
      i = end + 1;
      continue;
    }

    NAME_RE.lastIndex = i + 1;
    const nameMatch = NAME_RE.exec(text);
    if (!nameMatch) {
      problem(i, "Stray '<' that does not start a tag.");
      i++;
      continue;
    }
    const name = nameMatch[0];
    const attributes: MarkupAttribute[] = [];
    let j = NAME_RE.lastIndex;
    let selfClosing = false;

    for (;;) {
      while (j < text.length && /\s/.test(text[j])) j++;
      if (j >= text.length) {
        problem(i, `Tag <${name}> is never terminated.`);
        pushElement(name, attributes, i, true);
        break scan;
      }
      if (text.startsWith("/>", j)) {
        selfClosing = true;
        j += 2;
        break;
      }
      if (text[j] === ">") {
        j++;
        break;
      }
      if (text[j] === "<") {
        problem(i, `Tag <${name}> is not terminated before the next tag.`);
        break;
      }

      ATTR_NAME_RE.lastIndex = j;
      const attrMatch = ATTR_NAME_RE.exec(text);
      if (!attrMatch) {
        problem(j, `Unexpected character '${text[j]}' in tag <${name}>.`);
        j++;
        continue;
      }
      const attrName = attrMatch[0];
      const attrOffset = j;
      j = ATTR_NAME_RE.lastIndex;
      while (j < text.length && /\s/.test(text[j])) j++;

      let value = "";
      if (text[j] === "=") {
        j++;
        while (j < text.length && /\s/.test(text[j])) j++;
        const quote = text[j];
        if (quote === '"' || quote === "'") {
          const close = text.indexOf(quote, j + 1);
          if (close < 0) {
            problem(attrOffset, `Attribute '${attrName}' on <${name}> has an unterminated value.`);
            pushElement(name, attributes, i, true);
            break scan;
          }
          value = text.slice(j + 1, close);
          j = close + 1;
        } else {
          const start = j;
          while (j < text.length && !/[\s>]/.test(text[j]) && !text.startsWith("/>", j)) j++;
          value = text.slice(start, j);
          problem(attrOffset, `Attribute '${attrName}' on <${name}> is not quoted.`);
        }
      }
      attributes.push({ name: attrName, value: decodeEntities(value), line: lines.line(attrOffset) });
    }

    pushElement(name, attributes, i, selfClosing);
    i = j;
  }

  while (stack.length) {
    const open = stack.pop();
    if (!open) break;
    problems.push({
      message: `<${open.element.name}> opened at line ${open.element.line} is never closed.`,
      line: open.element.line,
    });
    open.region.endLine = lines.lineCount;
  }

  return { view, regions, problems };

  function pushElement(name: string, attributes: MarkupAttribute[], offset: number, selfClosing: boolean): void {
    const line = lines.line(offset);
    const depth = stack.length;
    if (depth === 0) {
      rootCount++;
      if (rootCount === 2) problem(offset, `Second root element <${name}>; markup must have a single root.`);
    }

    const element: MarkupElement = { name, attributes, depth, line, selfClosing };
    view.elements.push(element);
    const region: Region = { kind: "element", name, startLine: line, endLine: line };
    regions.push(region);

    const parent: Scope = stack.length ? stack[stack.length - 1].scope : { known: true };
    const dataType = attr(attributes, "x:DataType");
    let scope: Scope = parent;
    if (dataType) scope = { known: true, dataType: stripMarkupTypeName(dataType) };
    else if (name.endsWith("Template") || attr(attributes, "DataContext") !== undefined) scope = { known: false };

    if (depth === 0) {
      view.root ??= name;
      view.xClass ??= attr(attributes, "x:Class");
      if (dataType) view.xDataType ??= stripMarkupTypeName(dataType);
    }

    if (INCLUDE_ELEMENTS.has(name)) {
      const source = attr(attributes, "Source");
      if (source) view.includes.push({ element: name, source, line } satisfies MarkupInclude);
    }

    for (const a of attributes) {
      const binding = parseBinding(a.value);
      if (!binding) continue;
      const s = a.name === "DataContext" ? parent : scope;
      const b: MarkupBinding = {
        attribute: a.name,
        element: name,
        expression: a.value,
        path: binding.path,
        line: a.line,
      };
      if (binding.property && s.known) {
        b.property = binding.property;
        if (s.dataType) b.dataType = s.dataType;
      }
      view.bindings.push(b);
      regions.push({ kind: "binding", name: binding.path, startLine: a.line, endLine: a.line });
    }

    if (!selfClosing) stack.push({ element, region, scope });
  }

  function closeElement(name: string, offset: number, end: number): void {
    const line = lines.line(end);
    const idx = findOpen(name);
    if (idx < 0) {
      problem(offset, `Closing tag </${name}> has no matching open tag.`);
      return;
    }
    while (stack.length > idx + 1) {
      const open = stack.pop();
      if (!open) break;
      problem(offset, `<${open.element.name}> opened at line ${open.element.line} is not closed before </${name}>.`);
      open.region.endLine = line;
    }
    const open = stack.pop();
    if (open) open.region.endLine = line;
  }

  function findOpen(name: string): number {
    for (let k = stack.length - 1; k >= 0; k--) {
      if (stack[k].element.name === name) return k;
    }
    return -1;
  }
}

export function attr(attributes: readonly MarkupAttribute[], name: string): string | undefined {
  return attributes.find((a) => a.name === name)?.value;
}

/** `vm:MainViewModel` / `{x:Type vm:MainViewModel}` → `MainViewModel`. */
export function stripMarkupTypeName(value: string): string {
  const inner = value.replace(/^\{\s*x:Type\s+/, "").replace(/\}$/, "").trim();
  const local = inner.includes(":") ? inner.slice(inner.lastIndexOf(":") + 1) : inner;
  return local.split(".").pop() ?? local;
}

export interface ParsedBinding {
  path: string;
  property?: string;
}

export function parseBinding(value: string): ParsedBinding | undefined {
  const m = BINDING_RE.exec(value.trim());
  if (!m) return undefined;

  let path = "";
  let resolvable = true;
  for (const arg of splitTopLevel(m[2])) {
    const eq = arg.indexOf("=");
    if (eq < 0) {
      if (!path) path = arg;
      continue;
    }
    const key = arg.slice(0, eq).trim();
    if (key === "Path") path = arg.slice(eq + 1).trim();
    if (UNRESOLVABLE_ARGS.includes(key)) resolvable = false;
  }

  const cleaned = path.replace(/^!+/, "");
  if (!resolvable || !cleaned || cleaned === "." || /^[$#(^]/.test(cleaned)) return { path };
  const head = cleaned.split(/[.[]/)[0];
  return /^[A-Za-z_]\w*$/.test(head) ? { path, property: head } : { path };
}

function splitTopLevel(s: string): string[] {
  const out: string[] = [];
  let depth = 0;
  let quote = "";
  let cur = "";
  for (const ch of s) {
    if (quote) {
      if (ch === quote) quote = "";
    } else if (ch === "'" || ch === '"') quote = ch;
    else if (ch === "{") depth++;
    else if (ch === "}") depth--;
    else if (ch === "," && depth === 0) {
      out.push(cur.trim());
      cur = "";
      continue;
    }
    cur += ch;
  }
  if (cur.trim()) out.push(cur.trim());
  return out;
}

function decodeEntities(s: string): string {
  return s
    .replace(/&lt;/g, "<")
    .replace(/&gt;/g, ">")
    .replace(/&quot;/g, '"')
    .replace(/&apos;/g, "'")
    .replace(/&amp;/g, "&");
}
