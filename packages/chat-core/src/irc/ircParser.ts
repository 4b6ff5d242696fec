import { DecodeError } from "../errors";
import { decodeTags, type Tags } from "./tags";

export type IrcMessage = {
  tags: Tags;
  prefix?: string;
  command: string;
  /** Positional parameters; when the line had a trailing parameter it is the last element. */
  params: string[];
  trailing?: string;
  raw: string;
};

export type Prefix = {
  name: string;
  user?: string;
  host?: string;
};

const malformed = (line: string, reason: string) => new DecodeError("MalformedFrame", line, reason);

/**
 * Decodes one protocol line: `['@'tags SP] [':'prefix SP] command [SP param]* [SP ':'trailing]`.
 */
export const parseIrcMessage = (input: string): IrcMessage => {
  const line = input.replace(/\r?\n$/, "").replace(/\r$/, "");
  let cursor = 0;
  let tags: Tags = {};
  let prefix: string | undefined;

  if (line.startsWith("@")) {
    const spaceIndex = line.indexOf(" ");
    if (spaceIndex === -1) throw malformed(line, "Tags are not followed by a command.");
    tags = decodeTags(line.slice(1, spaceIndex));
    cursor = skipSpaces(line, spaceIndex);
  }

  if (line.startsWith(":", cursor)) {
    const spaceIndex = line.indexOf(" ", cursor);
    if (spaceIndex === -1) throw malformed(line, "Prefix is not followed by a command.");
    prefix = line.slice(cursor + 1, spaceIndex);
    cursor = skipSpaces(line, spaceIndex);
  }

  let rest = line.slice(cursor);
  let trailing: string | undefined;
  const trailingIndex = rest.startsWith(":") ? 0 : rest.indexOf(" :");
  if (trailingIndex !== -1) {
    trailing = rest.slice(trailingIndex === 0 ? 1 : trailingIndex + 2);
    rest = rest.slice(0, trailingIndex);
  }

  const parts = rest.split(" ").filter(Boolean);
  const command = parts[0];
  if (!command) throw malformed(line, "Line has no command.");

  const params = parts.slice(1);
  if (trailing !== undefined) params.push(trailing);

  return {
    tags,
    prefix,
    command,
    params,
    trailing,
    raw: line
  };
};

const skipSpaces = (line: string, from: number) => {
  let index = from;
  while (line[index] === " ") index += 1;
  return index;
};

/** Splits `nick!user@host` (or a bare server name) into its parts. */
export const parsePrefix = (prefix: string): Prefix => {
  const bang = prefix.indexOf("!");
  const at = prefix.indexOf("@", bang === -1 ? 0 : bang);
  if (bang === -1 && at === -1) return { name: prefix };

  const nameEnd = bang !== -1 ? bang : at;
  return {
    name: prefix.slice(0, nameEnd),
    user: bang !== -1 ? prefix.slice(bang + 1, at === -1 ? undefined : at) : undefined,
    host: at !== -1 ? prefix.slice(at + 1) : undefined
  };
};

export const prefixName = (message: IrcMessage): string | undefined =>
  message.prefix ? parsePrefix(message.prefix).name : undefined;
