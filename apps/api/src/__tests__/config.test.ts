import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { ConfigError } from "@textguard/core";
import { loadConfig } from "../config";

describe("loadConfig", () => {
  it("applies defaults", () => {
    assert.deepEqual(loadConfig({}), {
      port: 3001,
      apiKeys: [],
      corsOrigins: "*",
      placeholders: { DEFAULT: "[REDACTED]" },
      thresholds: {},
      redactToken: "[REDACTED]",
      bodyLimit: "1mb",
      sentenceTokenizer: "wink",
    });
  });

  it("reads lists and tables", () => {
    const config = loadConfig({
      API_PORT: "8080",
      API_KEYS: "test-secret, other-secret",
      CORS_ALLOWED_ORIGINS: "http://a.test,http://b.test",
      PLACEHOLDERS: '{"EMAIL_ADDRESS":"<EMAIL>"}',
      ENTITY_THRESHOLDS: '{"PERSON":0.6}',
      SENTENCE_TOKENIZER: "regex",
    });
    assert.equal(config.port, 8080);
    assert.deepEqual(config.apiKeys, ["test-secret", "other-secret"]);
    assert.deepEqual(config.corsOrigins, ["http://a.test", "http://b.test"]);
    assert.deepEqual(config.placeholders, { EMAIL_ADDRESS: "<EMAIL>", DEFAULT: "[REDACTED]" });
    assert.deepEqual(config.thresholds, { PERSON: 0.6 });
    assert.equal(config.sentenceTokenizer, "regex");
  });

  it("treats a wildcard origin as allow-all", () => {
    assert.equal(loadConfig({ CORS_ALLOWED_ORIGINS: "http://a.test, *" }).corsOrigins, "*");
  });

  it("rejects invalid values", () => {
    assert.throws(() => loadConfig({ API_PORT: "not-a-port" }), ConfigError);
    assert.throws(() => loadConfig({ SENTENCE_TOKENIZER: "spacy" }), ConfigError);
    assert.throws(() => loadConfig({ PLACEHOLDERS: "{" }), ConfigError);
    assert.throws(() => loadConfig({ ENTITY_THRESHOLDS: '{"PERSON":7}' }), ConfigError);
  });
});
