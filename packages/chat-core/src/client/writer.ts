import { WriteError } from "../errors";
import { encode } from "../irc/encode";
import { formatColor, type Color, type NamedColor } from "../trovo/color";
import type { WriteQueue } from "./writeQueue";

export const MAX_MESSAGE_LENGTH = 500;
export const MAX_MARKER_LENGTH = 140;

// Whispers go out as a command in this pseudo-channel.
const WHISPER_CHANNEL = "jtv";

const normalizeChannel = (channel: string) => {
  const name = channel.trim().replace(/^#/, "").toLowerCase();
  if (!name) throw new WriteError("EmptyChannelName", "Channel name is required.");
  if (/[\s,]/.test(name)) throw new WriteError("InvalidArgument", `Invalid channel name "${channel}".`);
  return `#${name}`;
};

const word = (value: string, what: string) => {
  const trimmed = value.trim();
  if (!trimmed || /\s/.test(trimmed)) throw new WriteError("InvalidArgument", `Invalid ${what} "${value}".`);
  return trimmed;
};

const positive = (value: number, what: string) => {
  if (!Number.isInteger(value) || value <= 0) throw new WriteError("InvalidArgument", `${what} must be a positive number of seconds.`);
  return String(value);
};

type CommandArg = string | number | undefined;

const checkText = (text: string) => {
  if (text.length > MAX_MESSAGE_LENGTH) {
    throw new WriteError("MessageTooLong", `Message is too long (${text.length} > ${MAX_MESSAGE_LENGTH}).`);
  }
  return text;
};

/**
 * Queues outgoing commands. Every method resolves once its line is accepted
 * into the connection's queue, not when it reaches the wire, and rejects with
 * a `Closed` WriteError once the connection is gone.
 *
 * Clones share the queue but get their own lane: each clone's lines leave in
 * the order they were queued, and the drain rotates fairly between clones.
 */
export class Writer {
  private readonly queue: WriteQueue;
  private readonly lane: number;

  constructor(queue: WriteQueue) {
    this.queue = queue;
    this.lane = queue.createLane();
  }

  clone(): Writer {
    return new Writer(this.queue);
  }

  async send(channel: string, text: string): Promise<void> {
    this.push(encode("PRIVMSG", [normalizeChannel(channel), checkText(text)], { trailing: true }), true);
  }

  /** Sends `text` as an action (`/me`). */
  async me(channel: string, text: string): Promise<void> {
    this.push(encode("PRIVMSG", [normalizeChannel(channel), `\u0001ACTION ${checkText(text)}\u0001`], { trailing: true }), true);
  }

  async join(channel: string): Promise<void> {
    this.push(encode("JOIN", [normalizeChannel(channel)]), false);
  }

  async part(channel: string): Promise<void> {
    this.push(encode("PART", [normalizeChannel(channel)]), false);
  }

  async pong(token: string): Promise<void> {
    this.queue.pushControl(encode("PONG", [token], { trailing: true }));
  }

  async ping(token: string): Promise<void> {
    this.queue.pushControl(encode("PING", [token], { trailing: true }));
  }

  /**
   * Sends a chat command (`/name args`) to a channel. Commands share the
   * PRIVMSG flood budget; empty and undefined arguments are left out.
   */
  async command(channel: string, name: string, args: readonly CommandArg[] = []): Promise<void> {
    if (!/^[A-Za-z0-9]+$/.test(name)) throw new WriteError("InvalidArgument", `Invalid chat command "${name}".`);
    const words = args.filter((arg): arg is string | number => arg !== undefined && arg !== "").map(String);
    await this.send(channel, [`/${name}`, ...words].join(" "));
  }

  async ban(channel: string, user: string, reason?: string) {
    return this.command(channel, "ban", [word(user, "user name"), reason]);
  }

  async unban(channel: string, user: string) {
    return this.command(channel, "unban", [word(user, "user name")]);
  }

  /** `duration` is seconds, or a span such as `10m` or `1d2h`; the server default is ten minutes. */
  async timeout(channel: string, user: string, duration?: number | string, reason?: string) {
    const span = typeof duration === "number" ? positive(duration, "Timeout") : duration === undefined ? undefined : word(duration, "timeout");
    return this.command(channel, "timeout", [word(user, "user name"), span, reason]);
  }

  async untimeout(channel: string, user: string) {
    return this.command(channel, "untimeout", [word(user, "user name")]);
  }

  async slow(channel: string, seconds?: number) {
    return this.command(channel, "slow", [seconds === undefined ? undefined : positive(seconds, "Slow mode delay")]);
  }

  async slowOff(channel: string) {
    return this.command(channel, "slowoff");
  }

  /** `duration` is how long users must have followed, such as `30m` or `1 week`. */
  async followers(channel: string, duration?: string) {
    return this.command(channel, "followers", [duration?.trim()]);
  }

  async followersOff(channel: string) {
    return this.command(channel, "followersoff");
  }

  async subscribers(channel: string) {
    return this.command(channel, "subscribers");
  }

  async subscribersOff(channel: string) {
    return this.command(channel, "subscribersoff");
  }

  async r9kBeta(channel: string) {
    return this.command(channel, "r9kbeta");
  }

  async r9kBetaOff(channel: string) {
    return this.command(channel, "r9kbetaoff");
  }

  async emoteOnly(channel: string) {
    return this.command(channel, "emoteonly");
  }

  async emoteOnlyOff(channel: string) {
    return this.command(channel, "emoteonlyoff");
  }

  async clear(channel: string) {
    return this.command(channel, "clear");
  }

  async mods(channel: string) {
    return this.command(channel, "mods");
  }

  async vips(channel: string) {
    return this.command(channel, "vips");
  }

  /** Grants moderator status (`/mod`). */
  async op(channel: string, user: string) {
    return this.command(channel, "mod", [word(user, "user name")]);
  }

  async unmod(channel: string, user: string) {
    return this.command(channel, "unmod", [word(user, "user name")]);
  }

  async vip(channel: string, user: string) {
    return this.command(channel, "vip", [word(user, "user name")]);
  }

  async unvip(channel: string, user: string) {
    return this.command(channel, "unvip", [word(user, "user name")]);
  }

  async raid(channel: string, target: string) {
    return this.command(channel, "raid", [word(target, "channel")]);
  }

  async unraid(channel: string) {
    return this.command(channel, "unraid");
  }

  async host(channel: string, target: string) {
    return this.command(channel, "host", [word(target, "channel")]);
  }

  async unhost(channel: string) {
    return this.command(channel, "unhost");
  }

  async commercial(channel: string, seconds?: number) {
    return this.command(channel, "commercial", [seconds === undefined ? undefined : positive(seconds, "Commercial length")]);
  }

  /** Adds a stream marker; the comment is cut to its first 140 characters. */
  async marker(channel: string, comment?: string) {
    return this.command(channel, "marker", [comment?.trim().slice(0, MAX_MARKER_LENGTH)]);
  }

  /** Changes the account's name color to a palette name or an `#RRGGBB` value. */
  async color(channel: string, color: Color | NamedColor) {
    return this.command(channel, "color", [typeof color === "string" ? color : formatColor(color)]);
  }

  async whisper(user: string, text: string) {
    return this.command(WHISPER_CHANNEL, "w", [word(user, "user name"), text]);
  }

  /** Queues a pre-encoded line (without CRLF) in this writer's lane, outside the flood budget. */
  async raw(line: string): Promise<void> {
    if (/[\r\n\0]/.test(line)) throw new WriteError("InvalidArgument", "Raw line contains a line break.");
    if (!line.trim()) throw new WriteError("InvalidArgument", "Raw line is empty.");
    this.push(line, false);
  }

  private push(line: string, limited: boolean) {
    this.queue.push(this.lane, { line, limited });
  }
}
