import { describe, expect, it } from "vitest";
import { DecodeError } from "../src/errors";
import { decodeTags, encodeTags, escapeTagValue, unescapeTagValue } from "../src/irc/tags";

describe("tag values", () => {
  it("unescapes the IRCv3 escapes", () => {
    expect(unescapeTagValue("a\\sb\\:c\\\\d\\re\\nf")).toBe("a b;c\\d\re\nf");
  });

  it("keeps the character after an unknown escape", () => {
    expect(unescapeTagValue("a\\bc")).toBe("abc");
  });

  it("drops a dangling backslash", () => {
    expect(unescapeTagValue("abc\\")).toBe("abc");
  });

  it("escapes what unescape reads back", () => {
    const value = "semi; space\\slash\r\n";
    expect(escapeTagValue(value)).toBe("semi\\:\\sspace\\\\slash\\r\\n");
    expect(unescapeTagValue(escapeTagValue(value))).toBe(value);
  });
});

describe("decodeTags", () => {
  it("decodes keys and escaped values", () => {
    expect(decodeTags("@display-name=Some\\sOne;mod=1;flags=")).toEqual({
      "display-name": "Some One",
      mod: "1",
      flags: ""
    });
  });

  it("reads a bare key as an empty value", () => {
    expect(decodeTags("emote-only;slow=10")).toEqual({ "emote-only": "", slow: "10" });
  });

  it("skips empty segments", () => {
    expect(decodeTags("a=1;;b=2;")).toEqual({ a: "1", b: "2" });
  });

  it("lets a repeated key win with its last value", () => {
    expect(decodeTags("a=1;a=2")).toEqual({ a: "2" });
  });

  it("rejects a tag without a key", () => {
    expect(() => decodeTags("a=1;=2")).toThrowError(DecodeError);
    expect(() => decodeTags("a=1;=2")).toThrowError('Tag without a key: "=2".');
  });
});

describe("encodeTags", () => {
  it("is empty for no tags", () => {
    expect(encodeTags({})).toBe("");
  });

  it("writes empty values as bare keys", () => {
    expect(encodeTags({ id: "x y", "emote-only": "" })).toBe("@id=x\\sy;emote-only");
  });

  it("is read back by decodeTags", () => {
    const tags = { badges: "moderator/1,subscriber/12", "system-msg": "5 months; thanks!", flags: "" };
    expect(decodeTags(encodeTags(tags))).toEqual(tags);
  });
});
