import { describe, expect, it } from "vitest";
import { parseBadge, parseBadges } from "../src/trovo/badges";

describe("parseBadges", () => {
  it("parses kind/version pairs in order", () => {
    expect(parseBadges("broadcaster/1,subscriber/12")).toEqual([
      { kind: "broadcaster", name: "broadcaster", version: "1" },
      { kind: "subscriber", name: "subscriber", version: "12" }
    ]);
  });

  it("keeps unknown kinds under their own name", () => {
    expect(parseBadge("glhf-pledge/1")).toEqual({ kind: "other", name: "glhf-pledge", version: "1" });
  });

  it("keeps the full version after the first slash", () => {
    expect(parseBadge("bits/1000/extra")).toEqual({ kind: "bits", name: "bits", version: "1000/extra" });
  });

  it("skips entries without a kind", () => {
    expect(parseBadges("/1,,premium,turbo/1")).toEqual([{ kind: "turbo", name: "turbo", version: "1" }]);
  });

  it("is empty for a missing tag", () => {
    expect(parseBadges(undefined)).toEqual([]);
    expect(parseBadges("")).toEqual([]);
  });
});
