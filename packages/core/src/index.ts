export * from "./types";
export * from "./errors";
export { getLogger } from "./logger";
export type { Logger, Level, LogFormat, LogOptions, LogFields, BaseCtx } from "./logger";

export { CodepointText, codepointLength } from "./text/codepoints";
export { validateSpans } from "./spans/validate";
export { mergeSpans } from "./spans/merge";
export { reconstruct, keepRanges, collapseWhitespace, DEFAULT_REDACT_TOKEN } from "./text/reconstruct";
export { WinkSentenceTokenizer, RegexSentenceTokenizer } from "./text/tokenizer";
export { iterateSentences, segmentSentences } from "./text/sentences";
export { extractDiffSpans } from "./text/diff";
export type { DiffSpanOptions } from "./text/diff";
export * from "./config";
export { collectSpans, toBatch, lazy } from "./detectors";

export * from "./pipeline/types";
export * from "./pipeline/pii";
export * from "./pipeline/toxicity";
export * from "./pipeline/policy";
