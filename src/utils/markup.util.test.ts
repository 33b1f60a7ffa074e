import { describe, expect, it } from "vitest";
import { stripMarkup } from "./markup.util";

describe("stripMarkup", () => {
  it("keeps only the text of storage markup", () => {
    expect(stripMarkup("<p>Hello &amp; <strong>world</strong></p>")).toBe("Hello & world");
  });

  it("returns an empty string without a body", () => {
    expect(stripMarkup(null)).toBe("");
    expect(stripMarkup("")).toBe("");
  });

  it("trims surrounding whitespace", () => {
    expect(stripMarkup("  <p> plain </p>\n")).toBe("plain");
  });
});
