export type SourceTier = "structured" | "semantic";

export interface SpanRecord {
  kind: string;
  source: string;
  start: number; // inclusive codepoint offset in the original text
  end: number; // exclusive codepoint offset
  score: number; // 0..1
  replacement: string;
  value?: string; // original text[start:end], when known
}

export interface SpanBatch {
  source: string;
  tier: SourceTier;
  spans: SpanRecord[];
}

export interface SentenceSpan {
  start: number;
  end: number;
  text: string;
}

export type RewritePolicy = "replace" | "redact" | "remove";

export interface ReconstructParams {
  token?: string; // used by "redact"
}

// Raw detector output before it is normalized into SpanRecords
export interface DetectedSpan {
  kind: string;
  start: number;
  end: number;
  score: number;
}

export interface DetectOptions {
  labels?: string[];
  threshold?: number;
  thresholds?: Record<string, number>;
  language?: string;
}

export interface OffsetDetector {
  capability: "offsets";
  name: string;
  tier: SourceTier;
  detect(text: string, opts: DetectOptions): DetectedSpan[] | Promise<DetectedSpan[]>;
}

// Detectors that can only hand back a censored copy of the input (same length)
export interface CensoringDetector {
  capability: "censor";
  name: string;
  tier: SourceTier;
  kind: string;
  censor(text: string): string | Promise<string>;
}

export type Detector = OffsetDetector | CensoringDetector;

export interface SentenceTokenizer {
  split(text: string): string[];
}

export interface ToxicityClassifier {
  // One label -> score map per input text, in order
  score(texts: string[]): Promise<Array<Record<string, number>>>;
}

export interface GuardModel {
  classify(text: string): Promise<string>;
}
