/**
 * Capabilities requested during registration. Requesting none leaves the
 * connection in plain IRC mode: PRIVMSG in and out for joined channels.
 */
export type Capability = "membership" | "tags" | "commands";

export const CAPABILITIES: readonly Capability[] = ["membership", "tags", "commands"];

const WIRE_NAMES: Record<Capability, string> = {
  membership: "trovo.tv/membership",
  tags: "trovo.tv/tags",
  commands: "trovo.tv/commands"
};

export const capabilityWireName = (capability: Capability): string => WIRE_NAMES[capability];

export const parseCapability = (wireName: string): Capability | undefined =>
  CAPABILITIES.find((capability) => WIRE_NAMES[capability] === wireName);
