export type BadgeKind =
  | "admin"
  | "bits"
  | "broadcaster"
  | "global_mod"
  | "moderator"
  | "subscriber"
  | "staff"
  | "turbo"
  | "premium"
  | "vip"
  | "partner"
  | "other";

export type Badge = {
  kind: BadgeKind;
  /** The badge name as sent; the only way to tell `other` badges apart. */
  name: string;
  /** Version, or other badge data such as the bits tier or subscription months. */
  version: string;
};

const KNOWN_KINDS = new Set<string>([
  "admin",
  "bits",
  "broadcaster",
  "global_mod",
  "moderator",
  "subscriber",
  "staff",
  "turbo",
  "premium",
  "vip",
  "partner"
]);

const isKnownKind = (name: string): name is Exclude<BadgeKind, "other"> => KNOWN_KINDS.has(name);

export const parseBadge = (input: string): Badge | undefined => {
  const slash = input.indexOf("/");
  if (slash <= 0) return undefined;
  const name = input.slice(0, slash);
  return {
    kind: isKnownKind(name) ? name : "other",
    name,
    version: input.slice(slash + 1)
  };
};

/** Parses a `badges` (or `badge-info`) tag: `kind/version,kind/version`. Malformed entries are skipped. */
export const parseBadges = (value: string | undefined): Badge[] => {
  if (!value) return [];
  return value
    .split(",")
    .map(parseBadge)
    .filter((badge): badge is Badge => badge !== undefined);
};
