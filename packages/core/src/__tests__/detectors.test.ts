import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { collectSpans, lazy, toBatch } from "../detectors";
import { resolveScanConfig } from "../config";
import { PreconditionError, ValidationError } from "../errors";
import { CensoringDetector, DetectedSpan, OffsetDetector } from "../types";

function offsets(found: DetectedSpan[]): OffsetDetector {
  return { capability: "offsets", name: "fake", tier: "structured", detect: () => found };
}

function censor(fn: (text: string) => string): CensoringDetector {
  return { capability: "censor", name: "swear-filter", tier: "structured", kind: "PROFANITY", censor: async (t) => fn(t) };
}

describe("lazy", () => {
  it("shares one pending initialization", async () => {
    let calls = 0;
    const get = lazy(async () => {
      calls++;
      return { ready: true };
    });
    const [a, b] = await Promise.all([get(), get()]);
    assert.equal(a, b);
    assert.equal(calls, 1);
  });

  it("retries after a failed initialization", async () => {
    let calls = 0;
    const get = lazy(() => {
      calls++;
      if (calls === 1) throw new Error("model missing");
      return "model";
    });
    await assert.rejects(get(), /model missing/);
    assert.equal(await get(), "model");
    assert.equal(calls, 2);
  });
});

describe("collectSpans", () => {
  const config = resolveScanConfig({ placeholders: { EMAIL_ADDRESS: "<EMAIL>" } });

  it("normalizes offset detector output", async () => {
    const detector = offsets([{ kind: "EMAIL_ADDRESS", start: 5, end: 13, score: 0.9 }]);
    const spans = await collectSpans("mail bob@x.io now", detector, config);
    assert.deepEqual(spans, [
      { kind: "EMAIL_ADDRESS", source: "fake", start: 5, end: 13, score: 0.9, replacement: "<EMAIL>", value: "bob@x.io" },
    ]);
  });

  it("rejects malformed detector output", async () => {
    const detector = offsets([{ kind: "EMAIL_ADDRESS", start: 5, end: 40, score: 0.9 }]);
    await assert.rejects(collectSpans("mail bob@x.io now", detector, config), ValidationError);
  });

  it("diffs censor-only detectors", async () => {
    const detector = censor((t) => t.replace(/darn/g, "****"));
    const spans = await collectSpans("oh darn it", detector, config);
    assert.deepEqual(spans, [
      { kind: "PROFANITY", source: "swear-filter", start: 3, end: 7, score: 1, replacement: "[REDACTED]", value: "darn" },
    ]);
  });

  it("rejects censors that change the length", async () => {
    const detector = censor((t) => t.replace(/darn/g, "*"));
    await assert.rejects(collectSpans("oh darn it", detector, config), PreconditionError);
  });
});

describe("toBatch", () => {
  it("tags spans with the detector's tier", () => {
    const detector = offsets([]);
    assert.deepEqual(toBatch(detector, []), { source: "fake", tier: "structured", spans: [] });
  });
});
