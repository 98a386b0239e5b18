import { describe, expect, it } from "vitest";
import {
  compileScheme,
  DEFAULT_SCHEME,
  formatScheme,
  literal,
  metadataKey,
  parseSchemePattern,
} from "./scheme.js";

describe("compileScheme", () => {
  it("keeps text and keys in order and drops everything else", () => {
    expect(compileScheme([5, "A-", metadataKey("key"), null, "B"])).toEqual([
      { kind: "literal", text: "A-" },
      { kind: "key", name: "key" },
      { kind: "literal", text: "B" },
    ]);
  });

  it("returns an empty scheme for empty or fully invalid input", () => {
    expect(compileScheme([])).toEqual([]);
    expect(compileScheme([1, undefined, {}, [], true])).toEqual([]);
  });

  it("returns an empty scheme for non-array input", () => {
    expect(compileScheme("Test-")).toEqual([]);
    expect(compileScheme(undefined)).toEqual([]);
    expect(compileScheme({ kind: "literal", text: "x" })).toEqual([]);
  });

  it("accepts already compiled literal tokens", () => {
    expect(compileScheme([literal("x"), { kind: "literal", text: "y" }])).toEqual([
      { kind: "literal", text: "x" },
      { kind: "literal", text: "y" },
    ]);
  });

  it("drops malformed tokens", () => {
    expect(
      compileScheme([
        { kind: "key", name: "" },
        { kind: "key", name: 7 },
        { kind: "literal" },
        { kind: "other", text: "x" },
        { name: "date_time" },
      ]),
    ).toEqual([]);
  });

  it("returns a new array without aliasing the input tokens", () => {
    const token = metadataKey("artist");
    const input = [token];
    const compiled = compileScheme(input);
    expect(compiled).not.toBe(input);
    expect(compiled[0]).not.toBe(token);
    expect(compiled[0]).toEqual(token);
  });
});

describe("parseSchemePattern", () => {
  it("splits literals and keys", () => {
    expect(parseSchemePattern("Test-{date_time}")).toEqual([
      { kind: "literal", text: "Test-" },
      { kind: "key", name: "date_time" },
    ]);
  });

  it("handles adjacent keys and trailing text", () => {
    expect(parseSchemePattern("{artist}{title}_v2")).toEqual([
      { kind: "key", name: "artist" },
      { kind: "key", name: "title" },
      { kind: "literal", text: "_v2" },
    ]);
  });

  it("keeps unmatched braces as literal text", () => {
    expect(parseSchemePattern("a{b-c}{ d")).toEqual([{ kind: "literal", text: "a{b-c}{ d" }]);
  });

  it("reads doubled braces as literal braces", () => {
    expect(parseSchemePattern("Trip-{{year}}_{title}")).toEqual([
      { kind: "literal", text: "Trip-{year}_" },
      { kind: "key", name: "title" },
    ]);
    expect(parseSchemePattern("{{{artist}}}")).toEqual([
      { kind: "literal", text: "{" },
      { kind: "key", name: "artist" },
      { kind: "literal", text: "}" },
    ]);
  });

  it("returns an empty scheme for an empty pattern", () => {
    expect(parseSchemePattern("")).toEqual([]);
  });
});

describe("formatScheme", () => {
  it("renders the pattern form", () => {
    expect(formatScheme([literal("Trip-"), metadataKey("date_time"), literal("_")])).toBe(
      "Trip-{date_time}_",
    );
    expect(formatScheme(DEFAULT_SCHEME)).toBe("Renamed-default-");
  });

  it("escapes braces in literal text", () => {
    expect(formatScheme([literal("{year}"), metadataKey("title")])).toBe("{{year}}{title}");
    expect(formatScheme([literal("a}b{")])).toBe("a}}b{{");
  });

  it("reads back what it renders", () => {
    const schemes = [
      [literal("{year}"), metadataKey("title")],
      [metadataKey("artist"), literal(" - {live} }{ "), metadataKey("title"), literal(".v2")],
      [literal("Trip-"), metadataKey("date_time")],
      [literal("{{"), metadataKey("a"), metadataKey("b")],
    ];
    for (const scheme of schemes) {
      expect(parseSchemePattern(formatScheme(scheme))).toEqual(scheme);
    }
  });
});
