import { z } from "zod";
import { CategoryTable, ConfigError, parsePlaceholderTable, parseThresholdTable } from "@textguard/core";

function list(raw: string): string[] {
  return raw.split(",").map((s) => s.trim()).filter(Boolean);
}

const EnvSchema = z.object({
  API_PORT: z.coerce.number().int().min(0).max(65535).default(3001),
  API_KEYS: z.string().default(""),
  CORS_ALLOWED_ORIGINS: z.string().default("*"),
  PLACEHOLDERS: z.string().optional(),
  ENTITY_THRESHOLDS: z.string().optional(),
  REDACT_TOKEN: z.string().min(1).default("[REDACTED]"),
  BODY_LIMIT: z.string().min(1).default("1mb"),
  SENTENCE_TOKENIZER: z.enum(["wink", "regex"]).default("wink"),
});

export interface ApiConfig {
  port: number;
  apiKeys: string[];
  corsOrigins: "*" | string[];
  placeholders: CategoryTable<string>;
  thresholds: Record<string, number>;
  redactToken: string;
  bodyLimit: string;
  sentenceTokenizer: "wink" | "regex";
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ApiConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new ConfigError(`invalid environment: ${issues.join("; ")}`, { issues });
  }
  const e = parsed.data;
  const origins = list(e.CORS_ALLOWED_ORIGINS);
  return {
    port: e.API_PORT,
    apiKeys: list(e.API_KEYS),
    corsOrigins: origins.length === 0 || origins.includes("*") ? "*" : origins,
    placeholders: parsePlaceholderTable(e.PLACEHOLDERS),
    thresholds: parseThresholdTable(e.ENTITY_THRESHOLDS),
    redactToken: e.REDACT_TOKEN,
    bodyLimit: e.BODY_LIMIT,
    sentenceTokenizer: e.SENTENCE_TOKENIZER,
  };
}
