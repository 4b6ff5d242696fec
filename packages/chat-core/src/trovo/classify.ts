import { prefixName, type IrcMessage } from "../irc/ircParser";
import type { Tags } from "../irc/tags";
import type { ChatEvent } from "../types";
import { parseBadges } from "./badges";
import { parseCapability, type Capability } from "./capability";
import { parseColor } from "./color";
import { parseEmotes } from "./emotes";

const ACTION_START = "\u0001ACTION ";
const ACTION_END = "\u0001";

const channelName = (param: string) => param.replace(/^#/, "");

const optional = (value: string | undefined) => (value ? value : undefined);

const flag = (value: string | undefined) => (value === undefined || value === "" ? undefined : value === "1");

const integer = (value: string | undefined) => {
  if (!value || !/^-?\d+$/.test(value)) return undefined;
  return Number(value);
};

const userTags = (tags: Tags) => ({
  badges: parseBadges(tags.badges),
  color: parseColor(tags.color),
  displayName: optional(tags["display-name"]),
  userId: optional(tags["user-id"])
});

const emoteSets = (tags: Tags) => (tags["emote-sets"] ? tags["emote-sets"].split(",").filter(Boolean) : ["0"]);

const unknown = (message: IrcMessage): ChatEvent => ({ type: "unknown", message });

const classifyPrivmsg = (message: IrcMessage): ChatEvent => {
  const [channel, body] = message.params;
  const sender = prefixName(message) ?? message.tags.login;
  if (!channel || body === undefined || !sender) return unknown(message);

  const action = body.startsWith(ACTION_START) && body.endsWith(ACTION_END) && body.length > ACTION_START.length;
  const text = action ? body.slice(ACTION_START.length, -ACTION_END.length) : body;

  return {
    type: "privmsg",
    message,
    channel: channelName(channel),
    sender,
    text,
    action,
    ...userTags(message.tags),
    emotes: parseEmotes(message.tags.emotes, text),
    id: optional(message.tags.id),
    bits: integer(message.tags.bits)
  };
};

const classifyMembership = (message: IrcMessage, type: "join" | "part"): ChatEvent => {
  const channel = message.params[0];
  const user = prefixName(message);
  if (!channel || !user) return unknown(message);
  return { type, message, channel: channelName(channel), user };
};

const classifyCap = (message: IrcMessage): ChatEvent => {
  const subcommand = message.params[1];
  const list = message.params.length > 2 ? message.params[message.params.length - 1] : undefined;
  if ((subcommand !== "ACK" && subcommand !== "NAK") || list === undefined) return unknown(message);

  const names = list.split(" ").filter(Boolean);
  const capabilities = names.map(parseCapability).filter((capability): capability is Capability => capability !== undefined);
  return { type: subcommand === "ACK" ? "cap-ack" : "cap-nak", message, names, capabilities };
};

const lastParam = (message: IrcMessage) => message.params[message.params.length - 1] ?? "";

const CLASSIFIERS: Record<string, (message: IrcMessage) => ChatEvent> = {
  PRIVMSG: classifyPrivmsg,
  JOIN: (message) => classifyMembership(message, "join"),
  PART: (message) => classifyMembership(message, "part"),
  USERSTATE: (message) => {
    const channel = message.params[0];
    if (!channel) return unknown(message);
    const { userId: _userId, ...tags } = userTags(message.tags);
    return {
      type: "userstate",
      message,
      channel: channelName(channel),
      ...tags,
      emoteSets: emoteSets(message.tags),
      moderator: message.tags.mod === "1"
    };
  },
  NOTICE: (message) => {
    const [target, text] = message.params;
    if (!target) return unknown(message);
    return { type: "notice", message, target: target === "*" ? target : channelName(target), text: text ?? "", msgId: optional(message.tags["msg-id"]) };
  },
  PING: (message) => ({ type: "ping", message, token: lastParam(message) }),
  PONG: (message) => ({ type: "pong", message, token: lastParam(message) }),
  CAP: classifyCap,
  "001": (message) => {
    const nickname = message.params[0];
    return nickname ? { type: "irc-ready", message, nickname } : unknown(message);
  },
  GLOBALUSERSTATE: (message) => ({
    type: "globaluserstate",
    message,
    ...userTags(message.tags),
    emoteSets: emoteSets(message.tags)
  }),
  ROOMSTATE: (message) => {
    const channel = message.params[0];
    if (!channel) return unknown(message);
    const { tags } = message;
    return {
      type: "roomstate",
      message,
      channel: channelName(channel),
      roomId: optional(tags["room-id"]),
      emoteOnly: flag(tags["emote-only"]),
      followersOnly: integer(tags["followers-only"]),
      r9k: flag(tags.r9k),
      slow: integer(tags.slow),
      subsOnly: flag(tags["subs-only"])
    };
  },
  CLEARCHAT: (message) => {
    const [channel, user] = message.params;
    if (!channel) return unknown(message);
    return { type: "clearchat", message, channel: channelName(channel), user: optional(user), duration: integer(message.tags["ban-duration"]) };
  },
  CLEARMSG: (message) => {
    const [channel, text] = message.params;
    if (!channel) return unknown(message);
    return {
      type: "clearmsg",
      message,
      channel: channelName(channel),
      login: optional(message.tags.login),
      targetMessageId: optional(message.tags["target-msg-id"]),
      text: text ?? ""
    };
  },
  USERNOTICE: (message) => {
    const [channel, text] = message.params;
    if (!channel) return unknown(message);
    return {
      type: "usernotice",
      message,
      channel: channelName(channel),
      ...userTags(message.tags),
      msgId: optional(message.tags["msg-id"]),
      systemMessage: optional(message.tags["system-msg"]),
      text
    };
  },
  WHISPER: (message) => {
    const [target, text] = message.params;
    const sender = prefixName(message);
    if (!target || text === undefined || !sender) return unknown(message);
    return { type: "whisper", message, sender, target, text, ...userTags(message.tags) };
  },
  RECONNECT: (message) => ({ type: "reconnect", message })
};

/**
 * Maps a decoded line to a typed event. Unrecognized commands, and known
 * commands missing a parameter they need, come back as `unknown`.
 */
export const classify = (message: IrcMessage): ChatEvent => {
  const classifier = Object.hasOwn(CLASSIFIERS, message.command) ? CLASSIFIERS[message.command] : undefined;
  return classifier ? classifier(message) : unknown(message);
};
