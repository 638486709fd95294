import { describe, expect, it } from "vitest";
import { parseListLiteral } from "../../packages/core/src/profiles/list-literal";

describe("list literal parser", () => {
  it("parses single and double quoted strings", () => {
    expect(parseListLiteral(`['Hiking', "Street food"]`)).toEqual({
      ok: true,
      values: ["Hiking", "Street food"],
    });
  });

  it("parses integers, tuples, sets and trailing commas", () => {
    expect(parseListLiteral("[3, -7, 12]")).toEqual({ ok: true, values: [3, -7, 12] });
    expect(parseListLiteral("(5,)")).toEqual({ ok: true, values: [5] });
    expect(parseListLiteral("{'es'}")).toEqual({ ok: true, values: ["es"] });
  });

  it("treats blank cells and empty brackets as empty lists", () => {
    expect(parseListLiteral("")).toEqual({ ok: true, values: [] });
    expect(parseListLiteral("   ")).toEqual({ ok: true, values: [] });
    expect(parseListLiteral("[ ]")).toEqual({ ok: true, values: [] });
  });

  it("decodes escaped quotes inside strings", () => {
    expect(parseListLiteral(String.raw`['Women\'s market', "say \"hi\""]`)).toEqual({
      ok: true,
      values: ["Women's market", 'say "hi"'],
    });
  });

  it("rejects unterminated lists and strings", () => {
    expect(parseListLiteral("['Hike', 'Museum'")).toEqual({
      ok: false,
      error: "Missing closing ']'",
      position: 17,
    });
    expect(parseListLiteral("['Hike")).toEqual({
      ok: false,
      error: "Unterminated string",
      position: 1,
    });
  });

  it("rejects bare words, floats and trailing text", () => {
    expect(parseListLiteral("[Hike]").ok).toBe(false);
    expect(parseListLiteral("[1.5]")).toEqual({
      ok: false,
      error: "Expected ',' or ']'",
      position: 2,
    });
    expect(parseListLiteral("[] extra")).toEqual({
      ok: false,
      error: "Unexpected trailing characters",
      position: 3,
    });
    expect(parseListLiteral("Hike, Food")).toEqual({
      ok: false,
      error: "Expected '[', '(' or '{'",
      position: 0,
    });
  });
});
