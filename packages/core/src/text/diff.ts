import { SpanRecord } from "../types";
import { PreconditionError } from "../errors";

export interface DiffSpanOptions {
  kind?: string;
  source?: string;
  score?: number;
  // Defaults to the transformed slice, so "replace" reproduces the transformed text
  replacement?: string | ((original: string, transformed: string) => string);
}

/**
 * Maximal runs of differing codepoints between `original` and a same-length
 * `transformed` copy (e.g. the output of a censoring detector). Transforms
 * that insert or delete characters cannot be mapped back and are rejected.
 */
export function extractDiffSpans(original: string, transformed: string, opts: DiffSpanOptions = {}): SpanRecord[] {
  const a = Array.from(original);
  const b = Array.from(transformed);
  if (a.length !== b.length) {
    throw new PreconditionError(
      `diff inputs must have equal length (original ${a.length}, transformed ${b.length})`,
      { original: a.length, transformed: b.length }
    );
  }
  if (!original.trim()) return [];

  const kind = opts.kind ?? "censored";
  const source = opts.source ?? "diff";
  const score = opts.score ?? 1;
  const spans: SpanRecord[] = [];
  let i = 0;
  while (i < a.length) {
    if (a[i] === b[i]) { i++; continue; }
    let j = i;
    while (j < a.length && a[j] !== b[j]) j++;
    const value = a.slice(i, j).join("");
    const changed = b.slice(i, j).join("");
    const replacement = typeof opts.replacement === "function"
      ? opts.replacement(value, changed)
      : opts.replacement ?? changed;
    spans.push({ kind, source, start: i, end: j, score, replacement, value });
    i = j;
  }
  return spans;
}
