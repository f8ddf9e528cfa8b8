import { ReconstructParams, RewritePolicy, SpanRecord } from "../types";
import { ValidationError } from "../errors";
import { validateSpans } from "../spans/validate";
import { CodepointText } from "./codepoints";
import { getLogger } from "../logger";

const log = getLogger("core");

export const DEFAULT_REDACT_TOKEN = "[REDACTED]";

type Range = { start: number; end: number };

function byStart<T extends Range>(spans: readonly T[]): T[] {
  return [...spans].sort((a, b) => a.start - b.start);
}

function replaceSpans(doc: CodepointText, spans: readonly SpanRecord[]): string {
  const out: string[] = [];
  let cursor = 0;
  byStart(spans).forEach((s, index) => {
    if (s.start < cursor) {
      throw new ValidationError(`span ${index}: [${s.start}, ${s.end}) overlaps a previous span`, { index, start: s.start, cursor }, "overlapping_spans");
    }
    out.push(doc.slice(cursor, s.start), s.replacement);
    cursor = s.end;
  });
  out.push(doc.slice(cursor));
  return out.join("");
}

function redactRanges(doc: CodepointText, ranges: readonly Range[], token: string): string {
  const out: string[] = [];
  let cursor = 0;
  for (const r of byStart(ranges)) {
    if (r.start < cursor) continue;
    out.push(doc.slice(cursor, r.start), token);
    cursor = r.end;
  }
  out.push(doc.slice(cursor));
  return out.join("");
}

/** Gaps around the union of the given ranges, including the head and tail of the text. */
export function keepRanges(text: string, spans: readonly Range[]): Range[] {
  const length = new CodepointText(text).length;
  const keep: Range[] = [];
  let cursor = 0;
  for (const s of byStart(spans)) {
    if (s.start > cursor) keep.push({ start: cursor, end: s.start });
    cursor = Math.max(cursor, s.end);
  }
  if (cursor < length) keep.push({ start: cursor, end: length });
  return keep;
}

// Whitespace runs collapse to one space; original spacing is not recoverable.
export function collapseWhitespace(text: string): string {
  return text.split(/\s+/).filter(Boolean).join(" ");
}

function removeRanges(doc: CodepointText, ranges: readonly Range[]): string {
  return collapseWhitespace(keepRanges(doc.value, ranges).map((r) => doc.slice(r.start, r.end)).join(""));
}

export function reconstruct(
  text: string,
  spans: readonly SpanRecord[],
  policy: RewritePolicy,
  params: ReconstructParams = {}
): string {
  if (!text.trim()) return text;
  const doc = new CodepointText(text);
  validateSpans(doc.length, spans);

  let out: string;
  switch (policy) {
    case "replace":
      out = replaceSpans(doc, spans);
      break;
    case "redact":
      out = redactRanges(doc, spans, params.token ?? DEFAULT_REDACT_TOKEN);
      break;
    case "remove":
      out = removeRanges(doc, spans);
      break;
  }

  log.debug("text.reconstruct", { policy, spans: spans.length, chars_in: doc.length, chars_out: out.length });
  return out;
}
