import { ConfigError } from "./errors";

// Per-category values (thresholds, placeholder tokens) with a required fallback
export type CategoryTable<T> = { DEFAULT: T } & Record<string, T>;

export const DEFAULT_PLACEHOLDER = "[REDACTED]";
export const DEFAULT_GLOBAL_THRESHOLD = 0.3;

export function resolveCategory<T>(table: CategoryTable<T>, key: string): T {
  if (Object.prototype.hasOwnProperty.call(table, key)) return table[key];
  const upper = key.toUpperCase();
  if (Object.prototype.hasOwnProperty.call(table, upper)) return table[upper];
  return table.DEFAULT;
}

export interface ScanConfigInput {
  thresholds?: Record<string, number>;
  placeholders?: Record<string, string>;
}

export interface ScanConfig {
  globalThreshold: number;
  thresholdFor(kind: string): number;
  placeholderFor(kind: string): string;
  thresholds: Record<string, number>;
}

/**
 * Merge base configuration with per-call overrides. Done once per call; the
 * returned lookups do not consult anything else.
 */
export function resolveScanConfig(base: ScanConfigInput = {}, overrides: ScanConfigInput = {}): ScanConfig {
  const thresholds: Record<string, number> = { ...(base.thresholds || {}), ...(overrides.thresholds || {}) };
  const values = Object.values(thresholds);
  const globalThreshold = values.length ? Math.min(...values) : DEFAULT_GLOBAL_THRESHOLD;
  const thresholdTable: CategoryTable<number> = { ...thresholds, DEFAULT: thresholds.DEFAULT ?? globalThreshold };

  const merged: Record<string, string> = { ...(base.placeholders || {}), ...(overrides.placeholders || {}) };
  const placeholderTable: CategoryTable<string> = { ...merged, DEFAULT: merged.DEFAULT ?? DEFAULT_PLACEHOLDER };

  return {
    globalThreshold,
    thresholds,
    thresholdFor: (kind) => resolveCategory(thresholdTable, kind),
    placeholderFor: (kind) => resolveCategory(placeholderTable, kind),
  };
}

function parseObject(raw: string, name: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (e) {
    throw new ConfigError(`${name}: not valid JSON (${e instanceof Error ? e.message : String(e)})`);
  }
  if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new ConfigError(`${name}: expected a JSON object`);
  }
  return Object.fromEntries(Object.entries(parsed));
}

export function parsePlaceholderTable(raw: string | undefined, name = "PLACEHOLDERS"): CategoryTable<string> {
  const obj = raw && raw.trim() ? parseObject(raw, name) : {};
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(obj)) {
    if (typeof v !== "string") throw new ConfigError(`${name}.${k}: expected a string`);
    out[k] = v;
  }
  return { ...out, DEFAULT: out.DEFAULT ?? DEFAULT_PLACEHOLDER };
}

export function parseThresholdTable(raw: string | undefined, name = "ENTITY_THRESHOLDS"): Record<string, number> {
  const obj = raw && raw.trim() ? parseObject(raw, name) : {};
  const out: Record<string, number> = {};
  for (const [k, v] of Object.entries(obj)) {
    if (typeof v !== "number" || !Number.isFinite(v) || v < 0 || v > 1) {
      throw new ConfigError(`${name}.${k}: expected a number in [0, 1]`);
    }
    out[k] = v;
  }
  return out;
}
