import { Detector, SpanRecord } from "../types";
import { ScanConfigInput, resolveScanConfig } from "../config";
import { collectSpans, toBatch } from "../detectors";
import { mergeSpans } from "../spans/merge";
import { reconstruct } from "../text/reconstruct";
import { getLogger } from "../logger";
import { ScanResult, ScanStep, noopResult } from "./types";

export const DEFAULT_PII_ENTITIES = [
  "EMAIL_ADDRESS", "PHONE_NUMBER", "CREDIT_CARD", "US_SSN", "US_PASSPORT", "IP_ADDRESS",
  "IBAN_CODE", "PERSON", "LOCATION", "ORGANIZATION", "IN_AADHAAR", "IN_PAN", "IN_PASSPORT",
];

// Entity types the semantic tagger can find, keyed by structured entity name
export const SEMANTIC_LABELS: Record<string, string> = {
  PERSON: "person",
  LOCATION: "location",
  ORGANIZATION: "organization",
};

// Field labels a tagger tends to return as entities ("Email: ..." -> "Email")
const GENERIC_PREFACE = new Set([
  "email", "e-mail", "mail", "phone", "tel", "telephone", "mobile", "mob", "address", "addr",
  "name", "location", "loc", "city", "state", "country", "contact", "contacts", "contact:",
]);

export function isGenericPreface(value: string): boolean {
  return GENERIC_PREFACE.has(value.trim().toLowerCase());
}

export function normalizeSemanticLabel(label: string): string {
  const upper = label.toUpperCase();
  if (upper.includes("PERSON")) return "PERSON";
  if (upper.includes("LOC")) return "LOCATION";
  if (upper.includes("ORG")) return "ORGANIZATION";
  return upper || "PERSON";
}

export interface PiiDetectors {
  structured: Detector;
  semantic?: Detector;
}

export interface PiiScanOptions extends ScanConfigInput {
  entities?: string[];
  semanticLabels?: string[];
  semanticThreshold?: number;
  language?: string;
  returnSpans?: boolean;
}

export type PiiScanResult = ScanResult<SpanRecord>;

const log = getLogger("core").child({ pipeline: "pii" });

export async function scanPii(
  text: string,
  detectors: PiiDetectors,
  opts: PiiScanOptions = {},
  base: ScanConfigInput = {}
): Promise<PiiScanResult> {
  if (!text.trim()) return noopResult(text);
  const config = resolveScanConfig(base, opts);
  const entities = opts.entities?.length ? opts.entities : DEFAULT_PII_ENTITIES;

  const structuredRaw = await collectSpans(text, detectors.structured, config, {
    labels: entities,
    threshold: config.globalThreshold,
    thresholds: config.thresholds,
    language: opts.language,
  });
  const structured = structuredRaw.filter((s) => s.score >= config.thresholdFor(s.kind));

  const labels = opts.semanticLabels?.length
    ? opts.semanticLabels
    : [...new Set(entities.map((e) => SEMANTIC_LABELS[e]).filter((l): l is string => Boolean(l)))];

  let semantic: SpanRecord[] = [];
  if (detectors.semantic && labels.length) {
    const raw = await collectSpans(text, detectors.semantic, config, {
      labels,
      threshold: opts.semanticThreshold,
      language: opts.language,
    });
    semantic = raw.flatMap((s) => {
      const value = s.value ?? "";
      if (isGenericPreface(value)) return [];
      const kind = normalizeSemanticLabel(s.kind);
      if ((kind === "PERSON" || kind === "ORGANIZATION") && value.trim().length < 2) return [];
      return [{ ...s, kind, replacement: config.placeholderFor(kind) }];
    });
  }

  const steps: ScanStep[] = [
    { name: detectors.structured.name, passed: true, details: { count: structured.length } },
    { name: detectors.semantic?.name ?? "semantic", passed: true, details: { count: semantic.length, labels } },
  ];

  const batches = [toBatch(detectors.structured, structured)];
  if (detectors.semantic) batches.push(toBatch(detectors.semantic, semantic));
  const merged = mergeSpans(text, batches);
  log.info("pii.scan.done", { structured: structured.length, semantic: semantic.length, merged: merged.length });

  if (!merged.length) {
    return { status: "pass", text, flagged: [], steps, reasons: ["No PII detected"] };
  }
  return {
    status: "fixed",
    text: reconstruct(text, merged, "replace"),
    flagged: opts.returnSpans === false ? [] : merged,
    steps,
    reasons: ["PII redacted"],
  };
}
