import * as v from "valibot";
import { CAPABILITIES, type Capability } from "./capability";

export const ANONYMOUS_NICK = "justinfan1234";

const UserConfigSchema = v.object({
  nick: v.pipe(v.string(), v.trim(), v.nonEmpty("Nickname is required."), v.regex(/^\S+$/, "Nickname cannot contain spaces.")),
  token: v.pipe(v.string(), v.trim(), v.nonEmpty("Token is required."), v.regex(/^\S+$/, "Token cannot contain spaces.")),
  capabilities: v.optional(v.array(v.picklist(CAPABILITIES)), () => [...CAPABILITIES])
});

export type UserConfigInput = v.InferInput<typeof UserConfigSchema>;

/** Credentials and capability set used for registration. Immutable once built. */
export type UserConfig = {
  readonly nick: string;
  readonly token: string;
  readonly capabilities: ReadonlySet<Capability>;
};

const normalizeToken = (token: string, nick: string) =>
  nick === ANONYMOUS_NICK || token.startsWith("oauth:") ? token : `oauth:${token}`;

/**
 * Validates and freezes a registration config. Capabilities default to all of
 * them; the token gets its `oauth:` prefix when it was given without one.
 *
 * @throws {v.ValiError} If the nickname or token is missing or malformed
 */
export const createUserConfig = (input: UserConfigInput): UserConfig => {
  const parsed = v.parse(UserConfigSchema, input);
  return Object.freeze({
    nick: parsed.nick,
    token: normalizeToken(parsed.token, parsed.nick),
    capabilities: new Set(parsed.capabilities)
  });
};

/** Read-only login that needs no account. */
export const anonymousUserConfig = (capabilities?: Capability[]): UserConfig =>
  createUserConfig({ nick: ANONYMOUS_NICK, token: ANONYMOUS_NICK, capabilities });
