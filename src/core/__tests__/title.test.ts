import { describe, expect, it } from "vitest";
import { TextSpan } from "../textSpan.js";
import { extractTitle, splitTitle } from "../title.js";

describe("extractTitle", () => {
  it("returns the first line without its newline", () => {
    expect(extractTitle("Title line\nThe cat sat.")).toBe("Title line");
  });

  it("returns the whole text when there is no newline", () => {
    expect(extractTitle("only a title")).toBe("only a title");
  });

  it("returns an empty string for empty text", () => {
    expect(extractTitle("")).toBe("");
  });

  it("drops a carriage return before the first newline", () => {
    expect(extractTitle("Windows title\r\nbody")).toBe("Windows title");
  });

  it("returns an empty title when the text starts with a newline", () => {
    expect(extractTitle("\nbody")).toBe("");
  });
});

describe("splitTitle", () => {
  it("starts the body right after the first newline", () => {
    const { title, body } = splitTitle("Title line\nThe cat sat.\nSecond line");
    expect(title).toBe("Title line");
    expect(body.toString()).toBe("The cat sat.\nSecond line");
  });

  it("yields an empty body for single-line text", () => {
    const { body } = splitTitle("no newline here");
    expect(body.length).toBe(0);
  });

  it("works on a slice of a larger span", () => {
    const span = TextSpan.of("xxHead\nrest of itxx").slice(2, 17);
    const { title, body } = splitTitle(span);
    expect(title).toBe("Head");
    expect(body.toString()).toBe("rest of it");
  });
});

describe("TextSpan", () => {
  it("slices relative to its own start", () => {
    const span = TextSpan.of("0123456789").slice(3, 8);
    expect(span.toString()).toBe("34567");
    expect(span.slice(1, 3).toString()).toBe("45");
    expect(span.charCodeAt(0)).toBe("3".charCodeAt(0));
  });

  it("clamps out-of-range bounds", () => {
    const span = TextSpan.of("abcdef").slice(2, 4);
    expect(span.slice(-5, 100).toString()).toBe("cd");
    expect(span.slice(3, 1).length).toBe(0);
  });

  it("does not find characters past its end", () => {
    const span = TextSpan.of("ab\ncd").slice(0, 2);
    expect(span.indexOf("\n")).toBe(-1);
    expect(TextSpan.of("ab\ncd").slice(1).indexOf("\n")).toBe(1);
  });
});
