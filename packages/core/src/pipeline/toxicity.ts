import { CensoringDetector, SentenceSpan, SpanRecord, SentenceTokenizer, ToxicityClassifier } from "../types";
import { iterateSentences } from "../text/sentences";
import { extractDiffSpans } from "../text/diff";
import { collapseWhitespace, reconstruct } from "../text/reconstruct";
import { codepointLength } from "../text/codepoints";
import { getLogger } from "../logger";
import { ScanResult, ScanStep, noopResult } from "./types";

export const DEFAULT_TOXICITY_LABELS = [
  "toxicity", "severe_toxicity", "obscene", "threat", "insult", "identity_attack", "sexual_explicit",
];
export const DEFAULT_TOXIC_TOKEN = "[TOXIC]";

export type ToxicityMode = "sentence" | "text";
export type ToxicityAction = "remove_sentences" | "remove_all" | "redact";
export type ProfanityAction = "mask" | "remove";

export interface ToxicityFlag {
  type: "toxicity" | "profanity";
  score: number;
  span: [number, number];
  sentence?: string;
  token?: string;
}

export interface ToxicityDeps {
  classifier: ToxicityClassifier;
  tokenizer: SentenceTokenizer;
  profanity?: CensoringDetector;
}

export interface ToxicityScanOptions {
  mode?: ToxicityMode;
  threshold?: number;
  labels?: string[];
  action?: ToxicityAction;
  profanityEnabled?: boolean;
  profanityAction?: ProfanityAction;
  redactToken?: string;
}

export interface ToxicityScanResult extends ScanResult<ToxicityFlag> {
  scores: Record<string, number>;
}

function pickScores(raw: Record<string, number> | undefined, wanted: Set<string>): Record<string, number> {
  const out: Record<string, number> = {};
  for (const [k, v] of Object.entries(raw || {})) {
    const key = k.toLowerCase();
    if (wanted.has(key)) out[key] = Number(v);
  }
  return out;
}

function maxOf(scores: Record<string, number>): number {
  const values = Object.values(scores);
  return values.length ? Math.max(...values) : 0;
}

const log = getLogger("core").child({ pipeline: "toxicity" });

export async function scanToxicity(
  text: string,
  deps: ToxicityDeps,
  opts: ToxicityScanOptions = {}
): Promise<ToxicityScanResult> {
  if (!text.trim()) return { ...noopResult<ToxicityFlag>(text), scores: {} };

  const mode = opts.mode ?? "sentence";
  const threshold = opts.threshold ?? 0.5;
  const labels = (opts.labels?.length ? opts.labels : DEFAULT_TOXICITY_LABELS).map((l) => l.trim().toLowerCase());
  const wanted = new Set(labels);
  const action = opts.action ?? "remove_sentences";
  const profanityEnabled = opts.profanityEnabled ?? Boolean(deps.profanity);
  const profanityAction = opts.profanityAction ?? "mask";

  const aggregate: Record<string, number> = Object.fromEntries(labels.map((l) => [l, 0]));
  const flagged: ToxicityFlag[] = [];
  const bad: SentenceSpan[] = [];

  let units: SentenceSpan[];
  if (mode === "text") {
    units = [{ start: 0, end: codepointLength(text), text }];
  } else {
    units = [...iterateSentences(text, deps.tokenizer)].filter((u) => u.end > u.start);
    if (!units.length) units = [{ start: 0, end: codepointLength(text), text }];
  }

  const scored = await deps.classifier.score(units.map((u) => u.text));
  units.forEach((unit, idx) => {
    const scores = pickScores(scored[idx], wanted);
    for (const [k, v] of Object.entries(scores)) {
      if (v > (aggregate[k] ?? 0)) aggregate[k] = v;
    }
    if (labels.some((l) => (scores[l] ?? 0) >= threshold)) {
      bad.push(unit);
      flagged.push({ type: "toxicity", score: maxOf(scores), span: [unit.start, unit.end], sentence: unit.text });
    }
  });

  const steps: ScanStep[] = [
    { name: "toxicity", passed: true, details: { mode, threshold, labels, toxic_spans: bad.length } },
  ];

  // Profanity is located on the original text so every reported offset
  // refers to it; hits inside removed or redacted sentences are dropped.
  let profane: SpanRecord[] = [];
  const wiped = bad.length > 0 && action === "remove_all";
  if (profanityEnabled && deps.profanity && !wiped) {
    const censored = await deps.profanity.censor(text);
    profane = extractDiffSpans(text, censored, {
      kind: deps.profanity.kind,
      source: deps.profanity.name,
      replacement: profanityAction === "remove" ? "" : undefined,
    }).filter((p) => !bad.some((u) => p.start < u.end && p.end > u.start));
    for (const s of profane) {
      flagged.push({ type: "profanity", score: 1, span: [s.start, s.end], token: s.value });
    }
  }
  steps.push({ name: "profanity", passed: true, details: { hits: profane.length, action: profanityAction } });

  let out: string;
  if (wiped) {
    out = "";
  } else if (bad.length) {
    const replacement = action === "redact" ? (opts.redactToken ?? DEFAULT_TOXIC_TOKEN) : "";
    const ranges: SpanRecord[] = bad.map((u) => ({
      kind: "toxicity", source: "classifier", start: u.start, end: u.end, score: 1, replacement,
    }));
    const rewritten = reconstruct(text, [...ranges, ...profane], "replace");
    out = action === "redact" ? rewritten : collapseWhitespace(rewritten);
  } else {
    out = profane.length ? reconstruct(text, profane, "replace") : text;
  }
  const changed = bad.length > 0 || profane.length > 0;
  const profanityHits = profane.length;

  const reasons: string[] = [];
  if (bad.length) {
    if (action === "remove_all") reasons.push("Toxic content removed (entire text).");
    else if (action === "redact") reasons.push("Toxic sentences redacted.");
    else reasons.push("Toxic sentences removed.");
  }
  if (profanityHits) {
    reasons.push(profanityAction === "remove" ? `${profanityHits} profanities removed.` : `${profanityHits} profanities masked.`);
  }
  if (!changed) reasons.push("No toxicity or profanity detected");

  log.info("toxicity.scan.done", { mode, units: units.length, toxic: bad.length, profanity: profanityHits, action });
  return { status: changed ? "fixed" : "pass", text: out, flagged, scores: aggregate, steps, reasons };
}
