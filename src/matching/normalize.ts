import { SnippetCodeInvalidError } from "../errors/input.errors.js";

export const STRING_PLACEHOLDER = "__STR__";
export const NUMBER_PLACEHOLDER = "__NUM__";

const isWordChar = (ch: string): boolean => /[A-Za-z0-9_$]/.test(ch);
const isDigit = (ch: string): boolean => ch >= "0" && ch <= "9";

export function assertCode(value: unknown, label: string): asserts value is string {
  if (typeof value !== "string") {
    throw new SnippetCodeInvalidError(label, value === null ? "null" : typeof value);
  }
}

// Returns the index just past a quoted literal starting at `start`.
function skipQuoted(code: string, start: number): number {
  const quote = code[start];
  const multiline = quote === "`";
  let i = start + 1;
  while (i < code.length) {
    const ch = code[i];
    if (ch === "\\") {
      i += 2;
      continue;
    }
    if (ch === quote) return i + 1;
    if (!multiline && ch === "\n") return i;
    i += 1;
  }
  return code.length;
}

/**
 * Canonical form of a snippet: comments removed, string and numeric literals replaced by
 * placeholders, whitespace collapsed. Total over strings and idempotent.
 */
export function normalize(code: string): string {
  assertCode(code, "normalize");
  const out: string[] = [];
  let i = 0;
  while (i < code.length) {
    const ch = code[i];
    const next = code[i + 1];

    if (ch === "/" && next === "/") {
      const end = code.indexOf("\n", i + 2);
      i = end === -1 ? code.length : end;
      out.push(" ");
      continue;
    }
    if (ch === "/" && next === "*") {
      const end = code.indexOf("*/", i + 2);
      i = end === -1 ? code.length : end + 2;
      out.push(" ");
      continue;
    }
    if (ch === '"' || ch === "'" || ch === "`") {
      i = skipQuoted(code, i);
      out.push(` ${STRING_PLACEHOLDER} `);
      continue;
    }
    if (isWordChar(ch)) {
      let end = i + 1;
      if (isDigit(ch)) {
        while (end < code.length && (isWordChar(code[end]) || code[end] === ".")) end += 1;
        out.push(` ${NUMBER_PLACEHOLDER} `);
      } else {
        while (end < code.length && isWordChar(code[end])) end += 1;
        out.push(code.slice(i, end));
      }
      i = end;
      continue;
    }
    out.push(ch);
    i += 1;
  }
  return out.join("").replace(/\s+/g, " ").trim();
}
