export type Color = {
  red: number;
  green: number;
  blue: number;
};

// The palette users without a custom color pick from.
const PALETTE = [
  ["Blue", "#0000FF"],
  ["BlueViolet", "#8A2BE2"],
  ["CadetBlue", "#5F9EA0"],
  ["Chocolate", "#D2691E"],
  ["Coral", "#FF7F50"],
  ["DodgerBlue", "#1E90FF"],
  ["Firebrick", "#B22222"],
  ["GoldenRod", "#DAA520"],
  ["Green", "#008000"],
  ["HotPink", "#FF69B4"],
  ["OrangeRed", "#FF4500"],
  ["Red", "#FF0000"],
  ["SeaGreen", "#2E8B57"],
  ["SpringGreen", "#00FF7F"],
  ["YellowGreen", "#ADFF2F"]
] as const;

export type NamedColor = (typeof PALETTE)[number][0];

const HEX = /^#?([0-9a-fA-F]{6})$/;

/** Parses `#RRGGBB`. Anything else, including an empty tag, is no color. */
export const parseColor = (value: string | undefined): Color | undefined => {
  const match = value ? HEX.exec(value.trim()) : null;
  if (!match) return undefined;
  const rgb = Number.parseInt(match[1], 16);
  return {
    red: (rgb >> 16) & 0xff,
    green: (rgb >> 8) & 0xff,
    blue: rgb & 0xff
  };
};

const hex = (channel: number) => channel.toString(16).toUpperCase().padStart(2, "0");

export const formatColor = (color: Color): string => `#${hex(color.red)}${hex(color.green)}${hex(color.blue)}`;

export const namedColor = (color: Color): NamedColor | undefined => {
  const formatted = formatColor(color);
  return PALETTE.find(([, value]) => value === formatted)?.[0];
};

/** Looks a palette color up by name, case and separators ignored (`hot_pink`, `Hot Pink`, `HotPink`). */
export const colorByName = (name: string): Color | undefined => {
  const wanted = name.replace(/[\s_]/g, "").toLowerCase();
  const match = PALETTE.find(([key]) => key.toLowerCase() === wanted);
  return match ? parseColor(match[1]) : undefined;
};
