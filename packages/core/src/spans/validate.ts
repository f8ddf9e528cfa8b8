import { ValidationError } from "../errors";
import { codepointLength } from "../text/codepoints";

interface Offsets {
  start: number;
  end: number;
  score?: number;
}

// Throws on the first malformed span. Offsets are never clamped or swapped.
export function validateSpans(text: string | number, spans: readonly Offsets[]): void {
  const length = typeof text === "number" ? text : codepointLength(text);
  spans.forEach((s, index) => {
    const { start, end } = s;
    if (!Number.isInteger(start) || !Number.isInteger(end)) {
      throw new ValidationError(`span ${index}: offsets must be integers`, { index, start, end });
    }
    if (end <= start) {
      throw new ValidationError(`span ${index}: end (${end}) must be greater than start (${start})`, { index, start, end });
    }
    if (start < 0 || end > length) {
      throw new ValidationError(`span ${index}: [${start}, ${end}) is outside [0, ${length}]`, { index, start, end, length });
    }
    if (s.score !== undefined && !(Number.isFinite(s.score) && s.score >= 0 && s.score <= 1)) {
      throw new ValidationError(`span ${index}: score ${s.score} is outside [0, 1]`, { index, score: s.score });
    }
  });
}
