import { SourceTier, SpanBatch, SpanRecord } from "../types";
import { validateSpans } from "./validate";
import { getLogger } from "../logger";

const log = getLogger("core");

interface Entry {
  span: SpanRecord;
  tier: SourceTier;
  order: number;
}

function length(s: SpanRecord): number {
  return s.end - s.start;
}

function overlaps(a: SpanRecord, b: SpanRecord): boolean {
  return a.start < b.end && a.end > b.start;
}

// Whether the candidate displaces the last accepted entry.
function candidateWins(current: Entry, candidate: Entry): boolean {
  if (current.tier !== candidate.tier) return candidate.tier === "structured";
  const a = length(current.span);
  const b = length(candidate.span);
  if (b !== a) return b > a;
  return candidate.span.score > current.span.score;
}

/**
 * Reconcile span lists from several detector families into one
 * non-overlapping, start-ascending list.
 *
 * Structured spans beat semantic ones on any overlap. Within a tier the longer
 * span wins, then the higher score; exact ties keep the span accepted first.
 * Each candidate is compared only with the most recently accepted span. The
 * output never overlaps, but a span discarded against an accepted span stays
 * discarded when that accepted span is itself displaced later, even if it does
 * not overlap the winner.
 */
export function mergeSpans(text: string, batches: readonly SpanBatch[]): SpanRecord[] {
  const entries: Entry[] = [];
  for (const batch of batches) {
    validateSpans(text, batch.spans);
    for (const span of batch.spans) {
      entries.push({ span, tier: batch.tier, order: entries.length });
    }
  }

  entries.sort((a, b) => (a.span.start - b.span.start) || (b.span.end - a.span.end) || (a.order - b.order));

  const merged: Entry[] = [];
  let dropped = 0;
  for (const entry of entries) {
    const last = merged[merged.length - 1];
    if (!last || !overlaps(entry.span, last.span)) {
      merged.push(entry);
      continue;
    }
    if (candidateWins(last, entry)) merged[merged.length - 1] = entry;
    dropped++;
  }

  log.debug("spans.merge.done", { batches: batches.length, input: entries.length, output: merged.length, dropped });
  return merged.map((e) => e.span);
}
