import winkNLP from "wink-nlp";
import model from "wink-eng-lite-web-model";
import { SentenceTokenizer } from "../types";

type Nlp = ReturnType<typeof winkNLP>;

/**
 * Sentence splitter backed by wink-nlp's English lite model. The model is
 * loaded on the first split, once per instance.
 */
export class WinkSentenceTokenizer implements SentenceTokenizer {
  private nlp: Nlp | null = null;

  split(text: string): string[] {
    if (!this.nlp) this.nlp = winkNLP(model);
    const out: unknown = this.nlp.readDoc(text).sentences().out();
    if (!Array.isArray(out)) return [];
    return out.filter((s): s is string => typeof s === "string" && s.length > 0);
  }
}

// Fallback splitter on terminal punctuation; no model required.
export class RegexSentenceTokenizer implements SentenceTokenizer {
  split(text: string): string[] {
    const res: string[] = [];
    const re = /[^.!?…]+[.!?…]+|\S[^.!?…]*$/g;
    let m: RegExpExecArray | null;
    while ((m = re.exec(text))) {
      const seg = m[0].trim();
      if (seg.length) res.push(seg);
    }
    return res;
  }
}
