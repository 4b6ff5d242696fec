import { ValiError } from "valibot";
import { describe, expect, it } from "vitest";
import { capabilityWireName, parseCapability } from "../src/trovo/capability";
import { ANONYMOUS_NICK, anonymousUserConfig, createUserConfig } from "../src/trovo/userConfig";

describe("createUserConfig", () => {
  it("adds the oauth prefix and defaults to every capability", () => {
    const config = createUserConfig({ nick: "test_bot", token: "test-secret" });
    expect(config.nick).toBe("test_bot");
    expect(config.token).toBe("oauth:test-secret");
    expect([...config.capabilities]).toEqual(["membership", "tags", "commands"]);
  });

  it("keeps a token that already has the prefix", () => {
    expect(createUserConfig({ nick: "test_bot", token: "oauth:test-secret" }).token).toBe("oauth:test-secret");
  });

  it("trims and deduplicates", () => {
    const config = createUserConfig({ nick: "  test_bot ", token: " test-secret", capabilities: ["tags", "tags"] });
    expect(config.nick).toBe("test_bot");
    expect([...config.capabilities]).toEqual(["tags"]);
  });

  it("allows requesting no capabilities", () => {
    expect(createUserConfig({ nick: "test_bot", token: "test-secret", capabilities: [] }).capabilities.size).toBe(0);
  });

  it("is frozen", () => {
    expect(Object.isFrozen(createUserConfig({ nick: "test_bot", token: "test-secret" }))).toBe(true);
  });

  it.each([
    [{ nick: "", token: "test-secret" }],
    [{ nick: "test bot", token: "test-secret" }],
    [{ nick: "test_bot", token: "   " }]
  ])("rejects %j", (input) => {
    expect(() => createUserConfig(input)).toThrowError(ValiError);
  });
});

describe("anonymousUserConfig", () => {
  it("logs in without an oauth token", () => {
    const config = anonymousUserConfig(["membership"]);
    expect(config.nick).toBe(ANONYMOUS_NICK);
    expect(config.token).toBe(ANONYMOUS_NICK);
    expect([...config.capabilities]).toEqual(["membership"]);
  });
});

describe("capability names", () => {
  it("maps to and from wire names", () => {
    expect(capabilityWireName("commands")).toBe("trovo.tv/commands");
    expect(parseCapability("trovo.tv/membership")).toBe("membership");
    expect(parseCapability("example.com/other")).toBeUndefined();
  });
});
