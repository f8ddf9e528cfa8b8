import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { CodepointText, codepointLength } from "../text/codepoints";

describe("codepoint text", () => {
  it("counts astral characters once", () => {
    assert.equal(codepointLength("😀😀"), 2);
    assert.equal(new CodepointText("a😀b").length, 3);
  });

  it("slices by codepoint", () => {
    const doc = new CodepointText("a😀b");
    assert.equal(doc.slice(1, 2), "😀");
    assert.equal(doc.slice(2), "b");
    assert.equal(doc.at(0), "a");
  });

  it("maps between codepoints and utf-16 units", () => {
    const doc = new CodepointText("a😀b");
    assert.equal(doc.toUnit(2), 3);
    assert.equal(doc.toCodepoint(3), 2);
    // low surrogate belongs to the emoji
    assert.equal(doc.toCodepoint(2), 1);
  });

  it("finds needles from a codepoint cursor", () => {
    const doc = new CodepointText("😀b😀b");
    assert.equal(doc.indexOf("b", 0), 1);
    assert.equal(doc.indexOf("b", 2), 3);
    assert.equal(doc.indexOf("z", 0), -1);
  });
});
