// Span offsets are codepoints, JS strings index UTF-16 units. This keeps a
// table of the UTF-16 offset where each codepoint starts so both can be mapped.
export class CodepointText {
  readonly value: string;
  readonly length: number;
  private readonly offsets: number[];

  constructor(value: string) {
    this.value = value;
    const offsets: number[] = [];
    let unit = 0;
    for (const ch of value) {
      offsets.push(unit);
      unit += ch.length;
    }
    offsets.push(unit);
    this.offsets = offsets;
    this.length = offsets.length - 1;
  }

  slice(start: number, end: number = this.length): string {
    return this.value.slice(this.toUnit(start), this.toUnit(end));
  }

  at(index: number): string {
    return this.slice(index, index + 1);
  }

  toUnit(codepoint: number): number {
    const i = Math.max(0, Math.min(this.length, codepoint));
    return this.offsets[i];
  }

  // UTF-16 offset -> index of the codepoint starting at or containing it
  toCodepoint(unit: number): number {
    let lo = 0;
    let hi = this.length;
    while (lo < hi) {
      const mid = (lo + hi + 1) >> 1;
      if (this.offsets[mid] <= unit) lo = mid; else hi = mid - 1;
    }
    return lo;
  }

  // Next literal occurrence of needle at or after the codepoint cursor
  indexOf(needle: string, fromCodepoint: number): number {
    const unit = this.value.indexOf(needle, this.toUnit(fromCodepoint));
    return unit === -1 ? -1 : this.toCodepoint(unit);
  }
}

export function codepointLength(s: string): number {
  let n = 0;
  for (const _ of s) n++;
  return n;
}
