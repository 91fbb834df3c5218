// Longest first: the scanner takes the first operator that matches at the cursor.
export const MULTI_CHAR_OPERATORS = [
  ">>>=",
  "...",
  "===",
  "!==",
  "**=",
  "<<=",
  ">>=",
  ">>>",
  "&&=",
  "||=",
  "??=",
  "=>",
  "==",
  "!=",
  "<=",
  ">=",
  "&&",
  "||",
  "??",
  "?.",
  "++",
  "--",
  "+=",
  "-=",
  "*=",
  "/=",
  "%=",
  "&=",
  "|=",
  "^=",
  "<<",
  ">>",
  "**",
  "::",
  "->"
] as const;

const WORD_RE = /[A-Za-z0-9_$]/;
const WHITESPACE_RE = /\s/;

function matchOperator(code: string, index: number): string | null {
  for (const op of MULTI_CHAR_OPERATORS) {
    if (code.startsWith(op, index)) return op;
  }
  return null;
}

/**
 * Splits normalized code into tokens: word runs, multi-character operators, and single
 * punctuation characters. Whitespace never produces a token.
 */
export function tokenize(normalizedCode: string): string[] {
  const tokens: string[] = [];
  let i = 0;
  while (i < normalizedCode.length) {
    const ch = normalizedCode[i];
    if (WHITESPACE_RE.test(ch)) {
      i += 1;
      continue;
    }
    if (WORD_RE.test(ch)) {
      let end = i + 1;
      while (end < normalizedCode.length && WORD_RE.test(normalizedCode[end])) end += 1;
      tokens.push(normalizedCode.slice(i, end));
      i = end;
      continue;
    }
    const op = matchOperator(normalizedCode, i);
    if (op) {
      tokens.push(op);
      i += op.length;
      continue;
    }
    tokens.push(ch);
    i += 1;
  }
  return tokens;
}

export function toFrequencyMap(tokens: readonly string[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const token of tokens) {
    if (!token || !token.trim()) continue;
    counts.set(token, (counts.get(token) ?? 0) + 1);
  }
  return counts;
}
