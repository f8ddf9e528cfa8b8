import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { DEFAULT_PII_ENTITIES, isGenericPreface, normalizeSemanticLabel, scanPii } from "../pipeline/pii";
import { DetectOptions, DetectedSpan, OffsetDetector, SourceTier } from "../types";

class FakeDetector implements OffsetDetector {
  readonly capability = "offsets";
  seen: DetectOptions[] = [];
  constructor(readonly name: string, readonly tier: SourceTier, private readonly found: DetectedSpan[]) {}
  async detect(_text: string, opts: DetectOptions): Promise<DetectedSpan[]> {
    this.seen.push(opts);
    return this.found;
  }
}

// "john@example.com" is [6, 22), "John Smith" is [28, 38)
const TEXT = "Email john@example.com from John Smith";
const placeholders = { EMAIL_ADDRESS: "<EMAIL>", PERSON: "<PERSON>" };

describe("scanPii", () => {
  it("merges structured and semantic findings and rewrites the text", async () => {
    const structured = new FakeDetector("fake-structured", "structured", [
      { kind: "EMAIL_ADDRESS", start: 6, end: 22, score: 0.95 },
    ]);
    const semantic = new FakeDetector("fake-semantic", "semantic", [
      { kind: "person", start: 0, end: 5, score: 0.9 },
      { kind: "person", start: 28, end: 38, score: 0.8 },
      { kind: "person", start: 10, end: 15, score: 0.99 },
    ]);
    const res = await scanPii(TEXT, { structured, semantic }, { placeholders });

    assert.equal(res.status, "fixed");
    assert.equal(res.text, "Email <EMAIL> from <PERSON>");
    assert.deepEqual(res.flagged.map((s) => [s.kind, s.start, s.end, s.value]), [
      ["EMAIL_ADDRESS", 6, 22, "john@example.com"],
      ["PERSON", 28, 38, "John Smith"],
    ]);
    assert.deepEqual(res.steps.map((s) => s.name), ["fake-structured", "fake-semantic"]);
    assert.deepEqual(res.reasons, ["PII redacted"]);
  });

  it("asks detectors for the configured labels", async () => {
    const structured = new FakeDetector("s", "structured", []);
    const semantic = new FakeDetector("g", "semantic", []);
    await scanPii(TEXT, { structured, semantic }, { thresholds: { PERSON: 0.6, EMAIL_ADDRESS: 0.4 } });
    assert.deepEqual(structured.seen[0].labels, DEFAULT_PII_ENTITIES);
    assert.equal(structured.seen[0].threshold, 0.4);
    assert.deepEqual(semantic.seen[0].labels, ["person", "location", "organization"]);
  });

  it("drops structured findings below their entity threshold", async () => {
    const structured = new FakeDetector("s", "structured", [{ kind: "PERSON", start: 28, end: 38, score: 0.4 }]);
    const res = await scanPii(TEXT, { structured }, { thresholds: { PERSON: 0.5 } });
    assert.equal(res.status, "pass");
    assert.equal(res.text, TEXT);
    assert.deepEqual(res.reasons, ["No PII detected"]);
    assert.equal(res.steps[1].name, "semantic");
  });

  it("ignores one-character names", async () => {
    const structured = new FakeDetector("s", "structured", []);
    const semantic = new FakeDetector("g", "semantic", [{ kind: "person", start: 0, end: 1, score: 0.9 }]);
    const res = await scanPii("J went home", { structured, semantic });
    assert.equal(res.status, "pass");
  });

  it("can omit spans from the result", async () => {
    const structured = new FakeDetector("s", "structured", [{ kind: "EMAIL_ADDRESS", start: 6, end: 22, score: 0.95 }]);
    const res = await scanPii(TEXT, { structured }, { returnSpans: false });
    assert.equal(res.text, "Email [REDACTED] from John Smith");
    assert.deepEqual(res.flagged, []);
  });

  it("skips blank text", async () => {
    const structured = new FakeDetector("s", "structured", []);
    const res = await scanPii("  ", { structured });
    assert.deepEqual(res, { status: "pass", text: "  ", flagged: [], steps: [{ name: "noop", passed: true }], reasons: ["Empty text"] });
    assert.equal(structured.seen.length, 0);
  });
});

describe("semantic label helpers", () => {
  it("recognises field labels", () => {
    assert.equal(isGenericPreface(" Email "), true);
    assert.equal(isGenericPreface("Emily"), false);
  });

  it("maps tagger labels to entity names", () => {
    assert.equal(normalizeSemanticLabel("person"), "PERSON");
    assert.equal(normalizeSemanticLabel("location"), "LOCATION");
    assert.equal(normalizeSemanticLabel("organization"), "ORGANIZATION");
    assert.equal(normalizeSemanticLabel("date"), "DATE");
  });
});
