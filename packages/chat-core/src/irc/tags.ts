import { DecodeError } from "../errors";

export type Tags = Record<string, string>;

const UNESCAPES: Record<string, string> = {
  ":": ";",
  s: " ",
  "\\": "\\",
  r: "\r",
  n: "\n"
};

const ESCAPES: Record<string, string> = {
  ";": "\\:",
  " ": "\\s",
  "\\": "\\\\",
  "\r": "\\r",
  "\n": "\\n"
};

/**
 * Unescapes an IRCv3 tag value. An escape followed by an unknown character
 * yields that character, and a dangling backslash at the end is dropped.
 */
export const unescapeTagValue = (value: string): string => {
  if (!value.includes("\\")) return value;

  let out = "";
  for (let i = 0; i < value.length; i += 1) {
    const ch = value[i];
    if (ch !== "\\") {
      out += ch;
      continue;
    }
    i += 1;
    if (i >= value.length) break;
    const next = value[i];
    out += UNESCAPES[next] ?? next;
  }
  return out;
};

export const escapeTagValue = (value: string): string => value.replace(/[; \\\r\n]/g, (ch) => ESCAPES[ch] ?? ch);

export const decodeTags = (raw: string): Tags => {
  const input = raw.startsWith("@") ? raw.slice(1) : raw;
  const entries: Array<[string, string]> = [];

  for (const pair of input.split(";")) {
    if (!pair) continue;
    const eq = pair.indexOf("=");
    const key = eq === -1 ? pair : pair.slice(0, eq);
    if (!key) {
      throw new DecodeError("MalformedTag", raw, `Tag without a key: "${pair}".`);
    }
    entries.push([key, eq === -1 ? "" : unescapeTagValue(pair.slice(eq + 1))]);
  }

  return Object.fromEntries(entries);
};

export const encodeTags = (tags: Tags): string => {
  const pairs = Object.entries(tags).map(([key, value]) => (value ? `${key}=${escapeTagValue(value)}` : key));
  return pairs.length ? `@${pairs.join(";")}` : "";
};
