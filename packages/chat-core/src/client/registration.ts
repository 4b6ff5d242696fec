import { RegistrationError } from "../errors";
import { encode } from "../irc/encode";
import { capabilityWireName, type Capability } from "../trovo/capability";
import type { UserConfig } from "../trovo/userConfig";
import type { ChatEvent, GlobalUserState, Logger, RegisteredUser } from "../types";

export type RegistrationState = "idle" | "awaiting-cap-ack" | "awaiting-welcome" | "ready" | "closed" | "failed";

const AUTH_FAILURES = new Set(["Login authentication failed", "Improperly formatted auth"]);

/**
 * Drives PASS/NICK and capability negotiation to a registered user.
 *
 * Capability replies may arrive in any order. Once none are pending, the
 * server's confirmation finishes registration: the GLOBALUSERSTATE when the
 * commands capability was granted, the 001 welcome otherwise.
 */
export class Registration {
  private current: RegistrationState = "idle";
  private pending = new Set<Capability>();
  private granted = new Set<Capability>();
  private nick = "";
  private welcomeName?: string;
  private userState?: GlobalUserState;
  private readonly ready: Promise<RegisteredUser>;
  private resolveReady: (user: RegisteredUser) => void = () => undefined;
  private rejectReady: (error: RegistrationError) => void = () => undefined;
  private readonly logger?: Logger;

  constructor(logger?: Logger) {
    this.logger = logger;
    this.ready = new Promise<RegisteredUser>((resolve, reject) => {
      this.resolveReady = resolve;
      this.rejectReady = reject;
    });
    // Only waitForReady observes the failure.
    void this.ready.catch(() => undefined);
  }

  get state(): RegistrationState {
    return this.current;
  }

  get negotiating(): boolean {
    return this.current === "awaiting-cap-ack" || this.current === "awaiting-welcome";
  }

  waitForReady(): Promise<RegisteredUser> {
    return this.ready;
  }

  /** Moves out of idle and returns the handshake lines to send, in order. */
  start(config: UserConfig): string[] {
    if (this.current !== "idle") {
      throw new RegistrationError("AlreadyRegistered", `Registration already started (state: ${this.current}).`);
    }
    this.nick = config.nick;
    this.pending = new Set(config.capabilities);

    const lines = [
      encode("PASS", [config.token]),
      encode("NICK", [config.nick]),
      ...[...config.capabilities].map((capability) => encode("CAP", ["REQ", capabilityWireName(capability)], { trailing: true }))
    ];

    this.transition(this.pending.size ? "awaiting-cap-ack" : "awaiting-welcome");
    return lines;
  }

  /** Feeds one event received while negotiating; returns the user once registration completes. */
  handle(event: ChatEvent): RegisteredUser | undefined {
    if (!this.negotiating) return undefined;

    switch (event.type) {
      case "cap-ack":
      case "cap-nak":
        this.resolveCapabilities(event.capabilities, event.type === "cap-ack");
        break;
      case "irc-ready":
        this.welcomeName = event.nickname;
        break;
      case "globaluserstate":
        this.userState = event;
        break;
      case "notice":
        if (AUTH_FAILURES.has(event.text)) {
          this.fail(`Server rejected the credentials: ${event.text}`);
          return undefined;
        }
        break;
      default:
        break;
    }

    return this.advance();
  }

  /** The connection ended. Fails any registration that has not reached ready. */
  close() {
    if (this.current === "idle") {
      this.fail("Connection closed before registration started.");
      return;
    }
    if (this.negotiating) {
      this.fail("Connection closed before registration completed.");
      return;
    }
    if (this.current === "ready") this.transition("closed");
  }

  private resolveCapabilities(capabilities: Capability[], acknowledged: boolean) {
    for (const capability of capabilities) {
      if (!this.pending.delete(capability)) continue;
      if (acknowledged) {
        this.granted.add(capability);
      } else {
        this.logger?.(`Capability ${capabilityWireName(capability)} was refused.`);
      }
    }
  }

  private advance(): RegisteredUser | undefined {
    if (this.pending.size) return undefined;
    if (this.current === "awaiting-cap-ack") this.transition("awaiting-welcome");

    const user = this.granted.has("commands") ? this.fromUserState() : this.fromWelcome();
    if (!user) return undefined;

    this.transition("ready");
    this.resolveReady(user);
    return user;
  }

  private fromUserState(): RegisteredUser | undefined {
    const state = this.userState;
    if (!state) return undefined;
    return Object.freeze({
      id: state.userId ?? this.welcomeName ?? this.nick,
      name: this.welcomeName ?? this.nick,
      displayName: state.displayName,
      color: state.color,
      capabilities: new Set(this.granted),
      badges: state.badges,
      emoteSets: state.emoteSets
    });
  }

  private fromWelcome(): RegisteredUser | undefined {
    const name = this.welcomeName;
    if (!name) return undefined;
    return Object.freeze({
      id: name,
      name,
      capabilities: new Set(this.granted),
      badges: [],
      emoteSets: []
    });
  }

  private fail(reason: string) {
    this.transition("failed");
    this.rejectReady(new RegistrationError("InvalidRegistration", reason));
  }

  private transition(next: RegistrationState) {
    this.logger?.(`Registration ${this.current} -> ${next}.`);
    this.current = next;
  }
}
