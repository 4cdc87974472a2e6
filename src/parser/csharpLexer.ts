export interface RawLiteral {
  start: number;
  end: number;
  value: string;
  interpolated: boolean;
  verbatim: boolean;
}

export type TokenKind = "ident" | "punct" | "string" | "char" | "number";

export interface Token {
  kind: TokenKind;
  text: string;
  start: number;
  end: number;
}

export interface Masked {
  /** Source with comments, preprocessor lines and literal contents blanked; offsets and newlines preserved. */
  masked: string;
  literals: RawLiteral[];
}

const PREFIX_RE = /(?:\$+@?|@\$*)?"/y;
const PUNCT2 = new Set(["=>", "?.", "??", "::", "==", "!=", "<=", ">=", "&&", "||", "++", "--", "+=", "-="]);

export function maskSource(text: string): Masked {
  const out = text.split("");
  const literals: RawLiteral[] = [];
  const n = text.length;

  const blank = (from: number, to: number) => {
    for (let k = from; k < to && k < n; k++) {
      if (out[k] !== "\n" && out[k] !== "\r") out[k] = " ";
    }
  };

  let i = 0;
  let lineStart = true;
  while (i < n) {
    const c = text[i];
    if (c === "\n") {
      lineStart = true;
      i++;
      continue;
    }
    if (lineStart && c === "#") {
      const e = lineEnd(text, i);
      blank(i, e);
      i = e;
      continue;
    }
    if (!/\s/.test(c)) lineStart = false;

    if (c === "/" && text[i + 1] === "/") {
      const e = lineEnd(text, i);
      blank(i, e);
      i = e;
      continue;
    }
    if (c === "/" && text[i + 1] === "*") {
      const e = text.indexOf("*/", i + 2);
      const end = e < 0 ? n : e + 2;
      blank(i, end);
      i = end;
      continue;
    }

    PREFIX_RE.lastIndex = i;
    if ((c === '"' || c === "$" || c === "@") && PREFIX_RE.test(text) && !isIdentChar(text[i - 1])) {
      const lit = scanLiteral(text, i);
      literals.push(lit);
      blank(lit.start, lit.end);
      out[lit.start] = '"';
      if (lit.end - 1 > lit.start) out[lit.end - 1] = '"';
      i = lit.end;
      continue;
    }

    if (c === "'") {
      let j = i + 1;
      j += text[j] === "\\" ? 2 : 1;
      const close = text.slice(j, j + 8).indexOf("'");
      if (close >= 0 && !text.slice(i, j + close).includes("\n")) {
        const end = j + close + 1;
        blank(i, end);
        out[i] = "'";
        out[end - 1] = "'";
        i = end;
        continue;
      }
    }

    i++;
  }

  return { masked: out.join(""), literals };
}

function scanLiteral(text: string, start: number): RawLiteral {
  let q = start;
  while (text[q] === "$" || text[q] === "@") q++;
  const prefix = text.slice(start, q);
  const interpolated = prefix.includes("$");
  const verbatim = prefix.includes("@");

  let quotes = 0;
  while (text[q + quotes] === '"') quotes++;

  if (!verbatim && quotes >= 3) {
    const fence = '"'.repeat(quotes);
    const close = text.indexOf(fence, q + quotes);
    const end = close < 0 ? text.length : close + quotes;
    return { start, end, value: text.slice(q + quotes, close < 0 ? text.length : close), interpolated, verbatim };
  }
  if (!verbatim && quotes === 2) {
    return { start, end: q + 2, value: "", interpolated, verbatim };
  }

  const end = scanQuoted(text, q + 1, interpolated, verbatim);
  const closed = text[end - 1] === '"' && end - 1 > q;
  const raw = text.slice(q + 1, closed ? end - 1 : end);
  return { start, end, value: verbatim ? raw.replace(/""/g, '"') : raw, interpolated, verbatim };
}

/** Returns the offset just past the closing quote (or the end of the line for unterminated regular strings). */
function scanQuoted(text: string, from: number, interpolated: boolean, verbatim: boolean): number {
  let depth = 0;
  let j = from;
  while (j < text.length) {
    const ch = text[j];
    if (depth > 0) {
      if (ch === '"' || ch === "$" || ch === "@") {
        PREFIX_RE.lastIndex = j;
        if (PREFIX_RE.test(text)) {
          j = scanLiteral(text, j).end;
          continue;
        }
      }
      if (ch === "{") depth++;
      else if (ch === "}") depth--;
      j++;
      continue;
    }
    if (interpolated && ch === "{") {
      if (text[j + 1] === "{") j += 2;
      else {
        depth++;
        j++;
      }
      continue;
    }
    if (!verbatim && ch === "\\") {
      j += 2;
      continue;
    }
    if (!verbatim && ch === "\n") return j;
    if (ch === '"') {
      if (verbatim && text[j + 1] === '"') {
        j += 2;
        continue;
      }
      return j + 1;
    }
    j++;
  }
  return text.length;
}

function lineEnd(text: string, from: number): number {
  const e = text.indexOf("\n", from);
  return e < 0 ? text.length : e;
}

function isIdentChar(ch: string | undefined): boolean {
  return ch !== undefined && /[\w]/.test(ch);
}

export function tokenize(masked: string): Token[] {
  const tokens: Token[] = [];
  const n = masked.length;
  let i = 0;
  while (i < n) {
    const c = masked[i];
    if (/\s/.test(c)) {
      i++;
      continue;
    }
    if (/[@A-Za-z_]/.test(c)) {
      let j = i + 1;
      while (j < n && /\w/.test(masked[j])) j++;
      tokens.push({ kind: "ident", text: masked.slice(i, j).replace(/^@/, ""), start: i, end: j });
      i = j;
      continue;
    }
    if (/\d/.test(c)) {
      let j = i + 1;
      while (j < n && /[\w.]/.test(masked[j])) j++;
      tokens.push({ kind: "number", text: masked.slice(i, j), start: i, end: j });
      i = j;
      continue;
    }
    if (c === '"' || c === "'") {
      const close = masked.indexOf(c, i + 1);
      const end = close < 0 ? n : close + 1;
      tokens.push({ kind: c === '"' ? "string" : "char", text: c, start: i, end });
      i = end;
      continue;
    }
    const two = masked.slice(i, i + 2);
    if (PUNCT2.has(two)) {
      tokens.push({ kind: "punct", text: two, start: i, end: i + 2 });
      i += 2;
      continue;
    }
    tokens.push({ kind: "punct", text: c, start: i, end: i + 1 });
    i++;
  }
  return tokens;
}
