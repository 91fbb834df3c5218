import path from "node:path";
import { readFile } from "node:fs/promises";
import type { Snippet, SnippetCollection } from "../types.js";
import { SnippetFileInvalidError } from "../errors/input.errors.js";
import { toSnippetCollection } from "../matching/matcher.js";

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function firstString(...values: unknown[]): string | null {
  for (const value of values) {
    if (typeof value !== "string") continue;
    const trimmed = value.trim();
    if (trimmed) return trimmed;
  }
  return null;
}

function parseLineNumber(value: unknown): number | null {
  if (typeof value === "number" && Number.isFinite(value)) {
    return Math.trunc(value);
  }
  if (typeof value === "string" && value.trim()) {
    const parsed = Number(value);
    if (Number.isFinite(parsed)) {
      return Math.trunc(parsed);
    }
  }
  return null;
}

function parseEntry(source: string, entry: unknown, keyId: string | null, label: string): Snippet {
  if (typeof entry === "string" && keyId) {
    return { id: keyId, code: entry, filepath: null, startLine: null };
  }
  if (!isPlainObject(entry)) {
    throw new SnippetFileInvalidError(source, `${label} must be an object`);
  }
  const id = keyId ?? firstString(entry.id, entry.hash, entry.snippetId);
  if (!id) {
    throw new SnippetFileInvalidError(source, `${label} is missing an id`);
  }
  // Code is kept verbatim: whitespace is significant until normalization.
  const code = [entry.code, entry.snippet, entry.text].find((value) => typeof value === "string");
  if (typeof code !== "string") {
    throw new SnippetFileInvalidError(source, `${label} (${id}) has no code string`);
  }
  const filepath = firstString(entry.filepath, entry.filePath, entry.path, entry.file);
  return {
    id,
    code,
    filepath: filepath ? filepath.replace(/\\/g, "/") : null,
    startLine: parseLineNumber(entry.startLine ?? entry.start_line ?? entry.line)
  };
}

/**
 * Accepts either an array of `{ id, code, filepath?, startLine? }` entries or an object keyed by
 * snippet id whose values are entries or bare code strings.
 */
export function parseSnippetCollection(raw: unknown, source = "<input>"): SnippetCollection {
  if (Array.isArray(raw)) {
    return toSnippetCollection(raw.map((entry, index) => parseEntry(source, entry, null, `entry #${index + 1}`)));
  }
  if (isPlainObject(raw)) {
    return toSnippetCollection(
      Object.entries(raw).map(([key, entry]) => parseEntry(source, entry, key, `entry "${key}"`))
    );
  }
  throw new SnippetFileInvalidError(source, "expected a JSON array or object");
}

export async function loadSnippetCollection(filePath: string): Promise<SnippetCollection> {
  const resolved = path.resolve(process.cwd(), filePath);
  const raw = await readFile(resolved, "utf-8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new SnippetFileInvalidError(filePath, `JSON invalid: ${message}`);
  }
  return parseSnippetCollection(parsed, filePath);
}
