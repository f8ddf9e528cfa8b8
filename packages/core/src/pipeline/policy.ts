import { GuardModel } from "../types";
import { getLogger } from "../logger";
import { ScanResult, noopResult } from "./types";

export type PolicyAction = "refrain" | "filter" | "reask";

export const FILTERED_NOTICE = "[REQUEST REDACTED DUE TO SAFETY POLICY]";
export const REASK_PROMPT = "I can’t help with that. Could you rephrase your request safely?";

export interface GuardVerdict {
  unsafe: boolean;
  categories: string[];
}

export interface PolicyFlag {
  type: "policy";
  score: number;
  categories: string[];
}

export interface ModerateOptions {
  action?: PolicyAction;
}

export type ModerateResult = ScanResult<PolicyFlag>;

/**
 * Read a guard model's free-form answer. Only the first non-empty line counts;
 * anything that is not recognisably SAFE is treated as unsafe.
 */
export function parseGuardVerdict(raw: string): GuardVerdict {
  const first = raw.trim().split(/\r?\n/)[0]?.trim() ?? "";
  if (first.toUpperCase().startsWith("SAFE")) return { unsafe: false, categories: [] };
  const m = /^UNSAFE\s*:?\s*(.*)$/i.exec(first);
  if (m) {
    const categories = (m[1] ?? "").split(/[;,]/).map((c) => c.trim()).filter(Boolean);
    return { unsafe: true, categories: categories.length ? categories : ["UNSPECIFIED"] };
  }
  return { unsafe: true, categories: ["UNSPECIFIED"] };
}

function applyAction(text: string, unsafe: boolean, action: PolicyAction): { text: string; reason: string } {
  if (!unsafe) return { text, reason: "Complies with policy" };
  switch (action) {
    case "filter":
      return { text: FILTERED_NOTICE, reason: "Filtered" };
    case "reask":
      return { text: REASK_PROMPT, reason: "Re-asked" };
    case "refrain":
      return { text: "", reason: "Blocked" };
  }
}

const log = getLogger("core").child({ pipeline: "policy" });

export async function moderate(text: string, guard: GuardModel, opts: ModerateOptions = {}): Promise<ModerateResult> {
  const input = text.trim();
  if (!input) return noopResult("");
  const action = opts.action ?? "refrain";

  const raw = await guard.classify(input);
  const verdict = parseGuardVerdict(raw);
  const { text: out, reason } = applyAction(input, verdict.unsafe, action);

  log.info("policy.moderate.done", {
    unsafe: verdict.unsafe,
    categories: verdict.categories,
    action,
  });

  return {
    status: !verdict.unsafe ? "pass" : action === "refrain" ? "blocked" : "fixed",
    text: out,
    flagged: verdict.unsafe ? [{ type: "policy", score: 1, categories: verdict.categories }] : [],
    steps: [{ name: "guard", passed: !verdict.unsafe, details: { raw: raw.trim().slice(0, 200) } }],
    reasons: [reason],
  };
}
