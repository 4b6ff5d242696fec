/** Half-open `[start, end)` byte range into the message text. */
export type EmoteRange = {
  start: number;
  end: number;
};

export type Emote = {
  id: number;
  ranges: EmoteRange[];
};

const NUMBER = /^\d+$/;

const parseRange = (input: string, limit: number): EmoteRange | undefined => {
  const [start, end, ...extra] = input.split("-");
  if (extra.length || !start || !end || !NUMBER.test(start) || !NUMBER.test(end)) return undefined;
  const range = { start: Number(start), end: Number(end) };
  return range.start < range.end && range.end <= limit ? range : undefined;
};

/**
 * Parses an `emotes` tag (`id:start-end,start-end/id:start-end`) against the
 * message text. Any malformed part yields no emotes at all for the message.
 */
export const parseEmotes = (value: string | undefined, text: string): Emote[] => {
  if (!value) return [];
  const limit = Buffer.byteLength(text, "utf8");
  const emotes: Emote[] = [];

  for (const entry of value.split("/")) {
    const colon = entry.indexOf(":");
    const id = entry.slice(0, colon);
    if (colon === -1 || !NUMBER.test(id)) return [];

    const ranges: EmoteRange[] = [];
    for (const part of entry.slice(colon + 1).split(",")) {
      const range = parseRange(part, limit);
      if (!range) return [];
      ranges.push(range);
    }
    emotes.push({ id: Number(id), ranges });
  }

  return emotes;
};

/** The text an emote range covers. */
export const emoteText = (text: string, range: EmoteRange): string =>
  Buffer.from(text, "utf8").subarray(range.start, range.end).toString("utf8");
