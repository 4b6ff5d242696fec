import type { IrcMessage } from "./irc/ircParser";
import type { Badge } from "./trovo/badges";
import type { Capability } from "./trovo/capability";
import type { Color } from "./trovo/color";
import type { Emote } from "./trovo/emotes";

export type Logger = (message: string) => void;

/** The account the server registered us as. */
export type RegisteredUser = {
  readonly id: string;
  readonly name: string;
  readonly displayName?: string;
  readonly color?: Color;
  readonly capabilities: ReadonlySet<Capability>;
  readonly badges: readonly Badge[];
  readonly emoteSets: readonly string[];
};

type FromMessage = {
  message: IrcMessage;
};

type UserTags = {
  badges: Badge[];
  color?: Color;
  displayName?: string;
  userId?: string;
};

export type PrivateMessage = FromMessage &
  UserTags & {
    type: "privmsg";
    channel: string;
    sender: string;
    text: string;
    /** The text was sent as a CTCP ACTION (`/me`); `text` holds the action without its framing. */
    action: boolean;
    emotes: Emote[];
    id?: string;
    bits?: number;
  };

export type Join = FromMessage & { type: "join"; channel: string; user: string };

export type Part = FromMessage & { type: "part"; channel: string; user: string };

export type UserStateUpdate = FromMessage &
  Omit<UserTags, "userId"> & {
    type: "userstate";
    channel: string;
    emoteSets: string[];
    moderator: boolean;
  };

export type Notice = FromMessage & {
  type: "notice";
  /** A channel, or `*` for notices about the connection itself. */
  target: string;
  text: string;
  msgId?: string;
};

export type Ping = FromMessage & { type: "ping"; token: string };

export type Pong = FromMessage & { type: "pong"; token: string };

type CapabilityReply = FromMessage & {
  /** Capability names as the server sent them. */
  names: string[];
  /** The subset of `names` this client knows how to request. */
  capabilities: Capability[];
};

export type CapabilityAck = CapabilityReply & { type: "cap-ack" };

export type CapabilityNak = CapabilityReply & { type: "cap-nak" };

export type Ready = { type: "ready"; user: RegisteredUser };

export type IrcReady = FromMessage & { type: "irc-ready"; nickname: string };

export type GlobalUserState = FromMessage &
  UserTags & {
    type: "globaluserstate";
    emoteSets: string[];
  };

export type RoomState = FromMessage & {
  type: "roomstate";
  channel: string;
  roomId?: string;
  emoteOnly?: boolean;
  /** Minutes an account must have followed to chat; -1 when followers-only mode is off. */
  followersOnly?: number;
  r9k?: boolean;
  /** Seconds between messages. */
  slow?: number;
  subsOnly?: boolean;
};

export type ClearChat = FromMessage & {
  type: "clearchat";
  channel: string;
  /** Present when a single user was timed out or banned; absent when the whole chat was cleared. */
  user?: string;
  /** Timeout length in seconds; absent for a permanent ban. */
  duration?: number;
};

export type ClearMsg = FromMessage & {
  type: "clearmsg";
  channel: string;
  login?: string;
  targetMessageId?: string;
  text: string;
};

export type UserNotice = FromMessage &
  UserTags & {
    type: "usernotice";
    channel: string;
    msgId?: string;
    systemMessage?: string;
    text?: string;
  };

export type Whisper = FromMessage &
  UserTags & {
    type: "whisper";
    sender: string;
    target: string;
    text: string;
  };

export type Reconnect = FromMessage & { type: "reconnect" };

export type Unknown = FromMessage & { type: "unknown" };

export type ChatEvent =
  | PrivateMessage
  | Join
  | Part
  | UserStateUpdate
  | Notice
  | Ping
  | Pong
  | CapabilityAck
  | CapabilityNak
  | Ready
  | IrcReady
  | GlobalUserState
  | RoomState
  | ClearChat
  | ClearMsg
  | UserNotice
  | Whisper
  | Reconnect
  | Unknown;

export type ChatEventType = ChatEvent["type"];

export type ChatEventOf<K extends ChatEventType> = Extract<ChatEvent, { type: K }>;
