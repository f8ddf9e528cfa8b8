import { z } from "zod";

// Offsets are range-checked by the core (422), not here.
const Tier = z.enum(["structured", "semantic"]);

export const SpanSchema = z.object({
  kind: z.string(),
  source: z.string(),
  start: z.number(),
  end: z.number(),
  score: z.number(),
  replacement: z.string(),
  value: z.string().optional(),
});

export const DetectedSpanSchema = z.object({
  kind: z.string(),
  start: z.number(),
  end: z.number(),
  score: z.number(),
});

export const MergeBody = z.object({
  text: z.string(),
  batches: z.array(z.object({ source: z.string(), tier: Tier, spans: z.array(SpanSchema) })),
});

export const ReconstructBody = z.object({
  text: z.string(),
  spans: z.array(SpanSchema),
  policy: z.enum(["replace", "redact", "remove"]),
  token: z.string().optional(),
});

export const SentencesBody = z.object({ text: z.string() });

export const DiffBody = z.object({
  original: z.string(),
  transformed: z.string(),
  kind: z.string().optional(),
  source: z.string().optional(),
  replacement: z.string().optional(),
});

const OffsetSource = z.object({
  source: z.string().min(1),
  tier: Tier,
  spans: z.array(DetectedSpanSchema),
});

const CensorSource = z.object({
  source: z.string().min(1),
  tier: Tier,
  kind: z.string().min(1),
  censored: z.string(),
});

export const RedactBody = z.object({
  text: z.string(),
  sources: z.array(z.union([OffsetSource, CensorSource])),
  policy: z.enum(["replace", "redact", "remove"]).default("replace"),
  token: z.string().optional(),
  thresholds: z.record(z.number().min(0).max(1)).optional(),
  placeholders: z.record(z.string()).optional(),
});

export type RedactSource = z.infer<typeof OffsetSource> | z.infer<typeof CensorSource>;
