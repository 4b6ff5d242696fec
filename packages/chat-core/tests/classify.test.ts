import { describe, expect, it } from "vitest";
import { parseIrcMessage } from "../src/irc/ircParser";
import { classify } from "../src/trovo/classify";

const event = (line: string) => classify(parseIrcMessage(line));

describe("classify", () => {
  it("reads a tagged PRIVMSG", () => {
    const result = event(
      "@badges=broadcaster/1,subscriber/12;color=#FF4500;display-name=Streamer;emotes=25:0-4,6-10;id=msg-1;user-id=42 :streamer!streamer@streamer.tmi.trovo.tv PRIVMSG #streamer :Kappa Kappa"
    );
    expect(result).toMatchObject({
      type: "privmsg",
      channel: "streamer",
      sender: "streamer",
      text: "Kappa Kappa",
      action: false,
      displayName: "Streamer",
      userId: "42",
      id: "msg-1",
      color: { red: 255, green: 69, blue: 0 },
      badges: [
        { kind: "broadcaster", name: "broadcaster", version: "1" },
        { kind: "subscriber", name: "subscriber", version: "12" }
      ],
      emotes: [{ id: 25, ranges: [{ start: 0, end: 4 }, { start: 6, end: 10 }] }]
    });
  });

  it("unwraps an ACTION and measures emotes against the unwrapped text", () => {
    const result = event("@emotes=7:6-11 :cat!cat@cat PRIVMSG #room :\u0001ACTION waves Kappa\u0001");
    expect(result.type).toBe("privmsg");
    if (result.type !== "privmsg") return;
    expect(result.action).toBe(true);
    expect(result.text).toBe("waves Kappa");
    expect(result.emotes).toEqual([{ id: 7, ranges: [{ start: 6, end: 11 }] }]);
  });

  it("degrades malformed sub-fields instead of failing", () => {
    const result = event("@badges=nonsense,vip/1;color=orange;emotes=25:0-99;bits=lots :cat!cat@cat PRIVMSG #room :hi");
    expect(result).toMatchObject({
      type: "privmsg",
      badges: [{ kind: "vip", name: "vip", version: "1" }],
      color: undefined,
      emotes: [],
      bits: undefined
    });
  });

  it("reads cheer bits", () => {
    expect(event("@bits=100 :cat!cat@cat PRIVMSG #room :cheer100")).toMatchObject({ type: "privmsg", bits: 100 });
  });

  it("reads JOIN and PART", () => {
    expect(event(":cat!cat@cat.tmi.trovo.tv JOIN #room")).toMatchObject({ type: "join", channel: "room", user: "cat" });
    expect(event(":cat!cat@cat.tmi.trovo.tv PART #room")).toMatchObject({ type: "part", channel: "room", user: "cat" });
  });

  it("reads capability acks and naks", () => {
    expect(event(":tmi.trovo.tv CAP * ACK :trovo.tv/tags trovo.tv/membership")).toMatchObject({
      type: "cap-ack",
      names: ["trovo.tv/tags", "trovo.tv/membership"],
      capabilities: ["tags", "membership"]
    });
    expect(event(":tmi.trovo.tv CAP * NAK :trovo.tv/commands example.com/other")).toMatchObject({
      type: "cap-nak",
      names: ["trovo.tv/commands", "example.com/other"],
      capabilities: ["commands"]
    });
  });

  it("reads PING and PONG tokens", () => {
    expect(event("PING :tmi.trovo.tv")).toMatchObject({ type: "ping", token: "tmi.trovo.tv" });
    expect(event(":tmi.trovo.tv PONG tmi.trovo.tv :abc")).toMatchObject({ type: "pong", token: "abc" });
    expect(event("PING")).toMatchObject({ type: "ping", token: "" });
  });

  it("reads the welcome and the global user state", () => {
    expect(event(":tmi.trovo.tv 001 test_bot :Welcome, GLHF!")).toMatchObject({ type: "irc-ready", nickname: "test_bot" });
    expect(event("@display-name=Test_Bot;user-id=1234;emote-sets=0,33;color= :tmi.trovo.tv GLOBALUSERSTATE")).toMatchObject({
      type: "globaluserstate",
      displayName: "Test_Bot",
      userId: "1234",
      emoteSets: ["0", "33"],
      color: undefined,
      badges: []
    });
  });

  it("defaults emote sets to the global set", () => {
    expect(event(":tmi.trovo.tv GLOBALUSERSTATE")).toMatchObject({ type: "globaluserstate", emoteSets: ["0"] });
  });

  it("reads USERSTATE", () => {
    expect(event("@mod=1;badges=moderator/1;emote-sets=0 :tmi.trovo.tv USERSTATE #room")).toMatchObject({
      type: "userstate",
      channel: "room",
      moderator: true,
      emoteSets: ["0"],
      badges: [{ kind: "moderator", name: "moderator", version: "1" }]
    });
  });

  it("reads NOTICE with its msg-id", () => {
    expect(event("@msg-id=slow_on :tmi.trovo.tv NOTICE #room :This room is now in slow mode.")).toMatchObject({
      type: "notice",
      target: "room",
      text: "This room is now in slow mode.",
      msgId: "slow_on"
    });
    expect(event(":tmi.trovo.tv NOTICE * :Login authentication failed")).toMatchObject({ type: "notice", target: "*", msgId: undefined });
  });

  it("reads ROOMSTATE flags", () => {
    const result = event("@emote-only=0;followers-only=-1;r9k=1;room-id=99;slow=30 :tmi.trovo.tv ROOMSTATE #room");
    expect(result).toMatchObject({
      type: "roomstate",
      channel: "room",
      roomId: "99",
      emoteOnly: false,
      followersOnly: -1,
      r9k: true,
      slow: 30,
      subsOnly: undefined
    });
  });

  it("reads CLEARCHAT and CLEARMSG", () => {
    expect(event("@ban-duration=600 :tmi.trovo.tv CLEARCHAT #room :spammer")).toMatchObject({
      type: "clearchat",
      channel: "room",
      user: "spammer",
      duration: 600
    });
    expect(event(":tmi.trovo.tv CLEARCHAT #room")).toMatchObject({ type: "clearchat", user: undefined, duration: undefined });
    expect(event("@login=cat;target-msg-id=msg-9 :tmi.trovo.tv CLEARMSG #room :bad words")).toMatchObject({
      type: "clearmsg",
      login: "cat",
      targetMessageId: "msg-9",
      text: "bad words"
    });
  });

  it("reads USERNOTICE and WHISPER", () => {
    expect(event("@msg-id=resub;system-msg=cat\\ssubscribed :tmi.trovo.tv USERNOTICE #room :hello")).toMatchObject({
      type: "usernotice",
      channel: "room",
      msgId: "resub",
      systemMessage: "cat subscribed",
      text: "hello"
    });
    expect(event(":cat!cat@cat WHISPER test_bot :psst")).toMatchObject({ type: "whisper", sender: "cat", target: "test_bot", text: "psst" });
  });

  it("reads RECONNECT", () => {
    expect(event(":tmi.trovo.tv RECONNECT").type).toBe("reconnect");
  });

  it.each([
    [":tmi.trovo.tv 372 test_bot :You are in a maze"],
    [":tmi.trovo.tv HOSTTARGET #room :other 10"],
    [":cat!cat@cat PRIVMSG #room"],
    ["JOIN #room"],
    [":tmi.trovo.tv CAP * LS :trovo.tv/tags"],
    ["hasOwnProperty"]
  ])("falls back to unknown for %j", (line) => {
    const result = event(line);
    expect(result.type).toBe("unknown");
    expect(result).toHaveProperty("message.raw", line);
  });
});
