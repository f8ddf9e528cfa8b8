import { DetectOptions, Detector, SpanBatch, SpanRecord } from "./types";
import { ScanConfig } from "./config";
import { extractDiffSpans } from "./text/diff";
import { validateSpans } from "./spans/validate";
import { CodepointText } from "./text/codepoints";

/**
 * Normalize a detector's output for `text` into SpanRecords. Offset-capable
 * detectors are used as-is; censor-only detectors go through diff extraction,
 * which requires their output to keep the input length.
 */
export async function collectSpans(
  text: string,
  detector: Detector,
  config: ScanConfig,
  opts: DetectOptions = {}
): Promise<SpanRecord[]> {
  if (detector.capability === "censor") {
    const censored = await detector.censor(text);
    return extractDiffSpans(text, censored, {
      kind: detector.kind,
      source: detector.name,
      replacement: config.placeholderFor(detector.kind),
    });
  }
  const found = await detector.detect(text, opts);
  validateSpans(text, found);
  const doc = new CodepointText(text);
  return found.map((d) => ({
    kind: d.kind,
    source: detector.name,
    start: d.start,
    end: d.end,
    score: d.score,
    replacement: config.placeholderFor(d.kind),
    value: doc.slice(d.start, d.end),
  }));
}

export function toBatch(detector: Detector, spans: SpanRecord[]): SpanBatch {
  return { source: detector.name, tier: detector.tier, spans };
}

/**
 * Once-only async initialization for expensive collaborators (models,
 * tokenizers). Concurrent callers share the same pending promise; a failed
 * attempt is not cached.
 */
export function lazy<T>(factory: () => Promise<T> | T): () => Promise<T> {
  let pending: Promise<T> | null = null;
  return () => {
    if (!pending) {
      pending = Promise.resolve().then(factory).catch((err: unknown) => {
        pending = null;
        throw err;
      });
    }
    return pending;
  };
}
