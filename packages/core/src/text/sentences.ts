import { SentenceSpan, SentenceTokenizer } from "../types";
import { CodepointText, codepointLength } from "./codepoints";

function* scan(text: string, tokenizer: SentenceTokenizer): Generator<SentenceSpan> {
  if (!text.trim()) return;
  const doc = new CodepointText(text);
  let cursor = 0;
  for (const sentence of tokenizer.split(text)) {
    let start = doc.indexOf(sentence, cursor);
    // The tokenizer may have normalized whitespace or punctuation; place the
    // sentence at the cursor. Offsets can drift from here on.
    if (start === -1) start = cursor;
    const end = Math.min(start + codepointLength(sentence), doc.length);
    // Nothing left to place it over
    if (end <= start) continue;
    yield { start, end, text: doc.slice(start, end) };
    cursor = end;
  }
}

/**
 * Lazy sentence spans over `text`. Each iteration re-runs the tokenizer, so
 * the result can be consumed more than once. Empty or whitespace-only text
 * yields nothing; callers wanting a total segmentation treat that as one
 * implicit sentence. Spans are never empty.
 */
export function iterateSentences(text: string, tokenizer: SentenceTokenizer): Iterable<SentenceSpan> {
  return { [Symbol.iterator]: () => scan(text, tokenizer) };
}

export function segmentSentences(text: string, tokenizer: SentenceTokenizer): SentenceSpan[] {
  return [...iterateSentences(text, tokenizer)];
}
