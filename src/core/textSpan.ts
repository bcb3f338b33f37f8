/**
 * Immutable view over a range of a source string.
 *
 * Slicing shares the source; only `toString()` materializes characters.
 * Offsets passed to and returned from a span are relative to its start.
 */
export class TextSpan {
  private constructor(
    private readonly source: string,
    private readonly start: number,
    private readonly end: number
  ) {}

  static of(text: string): TextSpan {
    return new TextSpan(text, 0, text.length);
  }

  get length(): number {
    return this.end - this.start;
  }

  charCodeAt(index: number): number {
    return this.source.charCodeAt(this.start + index);
  }

  /** Bounds are clamped to `[0, length]`; `from > to` yields an empty span. */
  slice(from: number, to: number = this.length): TextSpan {
    const lo = clamp(from, 0, this.length);
    const hi = Math.max(lo, clamp(to, 0, this.length));
    return new TextSpan(this.source, this.start + lo, this.start + hi);
  }

  /** Index of `char` at or after `from`, or -1. */
  indexOf(char: string, from = 0): number {
    const idx = this.source.indexOf(char, this.start + Math.max(0, from));
    return idx < 0 || idx + char.length > this.end ? -1 : idx - this.start;
  }

  toString(): string {
    return this.source.slice(this.start, this.end);
  }
}

function clamp(n: number, lo: number, hi: number): number {
  return Math.min(hi, Math.max(lo, n));
}
