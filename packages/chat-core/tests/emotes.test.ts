import { describe, expect, it } from "vitest";
import { emoteText, parseEmotes } from "../src/trovo/emotes";

describe("parseEmotes", () => {
  it("parses ids and end-exclusive ranges", () => {
    expect(parseEmotes("25:0-4,6-10", "Kappa Kappa")).toEqual([{ id: 25, ranges: [{ start: 0, end: 4 }, { start: 6, end: 10 }] }]);
  });

  it("parses several emotes", () => {
    expect(parseEmotes("1:0-2/2:3-5", "abcdef")).toEqual([
      { id: 1, ranges: [{ start: 0, end: 2 }] },
      { id: 2, ranges: [{ start: 3, end: 5 }] }
    ]);
  });

  it("allows a range ending at the text length", () => {
    expect(parseEmotes("1:0-3", "abc")).toEqual([{ id: 1, ranges: [{ start: 0, end: 3 }] }]);
  });

  it("measures bounds in UTF-8 bytes", () => {
    // "é" is two bytes.
    expect(parseEmotes("1:0-4", "éab")).toEqual([{ id: 1, ranges: [{ start: 0, end: 4 }] }]);
    expect(parseEmotes("1:0-5", "éab")).toEqual([]);
  });

  it.each([["1:0-4"], ["x:0-1"], ["1:2-1"], ["1:1-1"], ["1:0-1,"], ["1:0-1-2"], ["1"], ["1:a-b"], ["1:0-1/bad"]])("drops every emote for %j", (value) => {
    expect(parseEmotes(value, "abc")).toEqual([]);
  });

  it("is empty for a missing tag", () => {
    expect(parseEmotes(undefined, "abc")).toEqual([]);
  });
});

describe("emoteText", () => {
  it("slices by byte offsets", () => {
    expect(emoteText("café Kappa", { start: 6, end: 11 })).toBe("Kappa");
  });
});
