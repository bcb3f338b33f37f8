import { TextSpan } from "./textSpan.js";

export interface TitledText {
  /** First line, without its line terminator. */
  title: string;
  /** Everything after the first `\n`; empty when there is none. */
  body: TextSpan;
}

/**
 * Splits off the first line as the title.
 * A `\r` directly before the first `\n` belongs to neither part.
 */
export function splitTitle(text: TextSpan | string): TitledText {
  const span = typeof text === "string" ? TextSpan.of(text) : text;
  const nl = span.indexOf("\n");
  if (nl < 0) {
    return { title: span.toString(), body: span.slice(span.length) };
  }

  const titleEnd = nl > 0 && span.charCodeAt(nl - 1) === 13 ? nl - 1 : nl;
  return { title: span.slice(0, titleEnd).toString(), body: span.slice(nl + 1) };
}

export function extractTitle(text: TextSpan | string): string {
  return splitTitle(text).title;
}
