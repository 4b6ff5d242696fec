import * as v from "valibot";
import { DecodeError, ReadError, WriteError } from "../errors";
import { encode } from "../irc/encode";
import { parseIrcMessage } from "../irc/ircParser";
import { LineBuffer, MAX_LINE_LENGTH } from "../irc/lineBuffer";
import { classify } from "../trovo/classify";
import type { UserConfig } from "../trovo/userConfig";
import type { ChatEvent, Logger, RegisteredUser } from "../types";
import { Dispatcher, type EventHandler, type EventKey, type EventMap, type SubscriptionToken } from "./dispatcher";
import { RateClass, RateLimiter, type RateClassName } from "./rateLimit";
import { Registration, type RegistrationState } from "./registration";
import type { ByteStream } from "./stream";
import { WriteQueue } from "./writeQueue";
import { Writer } from "./writer";

const ClientOptionsSchema = v.object({
  rateLimit: v.optional(
    v.union([
      v.picklist(["regular", "known", "moderator", "verified"] satisfies RateClassName[]),
      v.object({
        limit: v.pipe(v.number(), v.integer(), v.minValue(1)),
        windowMs: v.pipe(v.number(), v.integer(), v.minValue(1))
      })
    ]),
    "regular"
  ),
  maxLineLength: v.optional(v.pipe(v.number(), v.integer(), v.minValue(1)), MAX_LINE_LENGTH),
  logger: v.optional(v.custom<Logger>((input) => typeof input === "function", "Logger must be a function.")),
  random: v.optional(v.custom<() => number>((input) => typeof input === "function", "Random source must be a function.")),
  now: v.optional(v.custom<() => number>((input) => typeof input === "function", "Clock must be a function."))
});

export type ClientOptions = v.InferInput<typeof ClientOptionsSchema>;

const encoder = new TextEncoder();

const errorMessage = (error: unknown) => (error instanceof Error ? error.message : String(error));

/**
 * One connection's runtime. Owns the byte stream: `run()` reads, decodes and
 * dispatches on one side and drains the write queue under the rate limit on
 * the other, until the stream ends.
 */
export class Client {
  private readonly stream: ByteStream;
  private readonly dispatcher: Dispatcher;
  private readonly registration: Registration;
  private readonly queue: WriteQueue;
  private readonly control: Writer;
  private readonly logger?: Logger;
  private readonly maxLineLength: number;
  private started = false;
  private finished = false;

  constructor(stream: ByteStream, options: ClientOptions = {}) {
    const parsed = v.parse(ClientOptionsSchema, options);
    const rate = typeof parsed.rateLimit === "string" ? RateClass[parsed.rateLimit] : parsed.rateLimit;

    this.stream = stream;
    this.logger = parsed.logger;
    this.maxLineLength = parsed.maxLineLength;
    this.dispatcher = new Dispatcher(parsed.logger);
    this.registration = new Registration(parsed.logger);
    this.queue = new WriteQueue(new RateLimiter(rate, parsed.now), parsed.random);
    this.control = new Writer(this.queue);
  }

  get state(): RegistrationState {
    return this.registration.state;
  }

  /** Queues PASS, NICK and the capability requests. Call before or after `run()`. */
  async register(config: UserConfig): Promise<void> {
    if (this.queue.isClosed) throw new WriteError("Closed", "The connection has been closed.");
    for (const line of this.registration.start(config)) {
      this.queue.pushControl(line);
    }
    this.logger?.(`Registering as ${config.nick}.`);
  }

  /** Resolves with the registered user, or rejects with an `InvalidRegistration` error. */
  waitForReady(): Promise<RegisteredUser> {
    return this.registration.waitForReady();
  }

  on<K extends EventKey>(key: K, handler: EventHandler<K>): SubscriptionToken {
    return this.dispatcher.on(key, handler);
  }

  /** The next event of `key`; rejects if the run ends first. */
  async waitFor<K extends EventKey>(key: K): Promise<EventMap[K]> {
    if (this.finished) throw new Error("Client has finished.");
    return this.dispatcher.waitFor(key);
  }

  remove(token: SubscriptionToken): boolean {
    return this.dispatcher.remove(token);
  }

  /** A new writer with its own lane in the shared queue. */
  writer(): Writer {
    return this.control.clone();
  }

  /**
   * Runs until the stream ends. Rejects with a ReadError when reading fails,
   * or with the WriteError of a failed write.
   */
  async run(): Promise<void> {
    if (this.started) throw new Error("Client is already running or has finished.");
    this.started = true;

    const reading = this.readLoop();
    const draining = this.drainLoop();
    // Whichever loop loses the race still settles later; its outcome is only logged.
    void reading.catch((error) => this.logger?.(`Read loop ended: ${errorMessage(error)}`));
    void draining.catch((error) => this.logger?.(`Write loop ended: ${errorMessage(error)}`));

    try {
      await Promise.race([reading, draining]);
      await reading;
    } finally {
      this.shutdown();
    }
    await draining;
  }

  private async readLoop(): Promise<void> {
    const lines = new LineBuffer({ maxLineLength: this.maxLineLength, logger: this.logger });
    for (;;) {
      let chunk: Uint8Array | null;
      try {
        chunk = await this.stream.read();
      } catch (error) {
        throw new ReadError(`Cannot read: ${errorMessage(error)}`, { cause: error });
      }
      if (this.finished) return;

      if (chunk === null) {
        lines.end().forEach((line) => this.handleLine(line));
        this.logger?.("Stream closed.");
        return;
      }
      lines.push(chunk).forEach((line) => this.handleLine(line));
    }
  }

  private async drainLoop(): Promise<void> {
    for (;;) {
      const line = await this.queue.take();
      if (line === null) return;
      this.logger?.(`> ${line.startsWith("PASS ") ? "PASS ***" : line}`);
      try {
        await this.stream.write(encoder.encode(`${line}\r\n`));
      } catch (error) {
        throw new WriteError("Io", `Cannot write: ${errorMessage(error)}`, { cause: error });
      }
    }
  }

  private handleLine(line: string) {
    if (this.finished) return;

    let event: ChatEvent;
    try {
      event = classify(parseIrcMessage(line));
    } catch (error) {
      if (!(error instanceof DecodeError)) throw error;
      this.logger?.(`Dropped line (${error.kind}): ${error.message}`);
      return;
    }

    if (event.type === "ping") this.queue.pushControl(encode("PONG", [event.token], { trailing: true }));

    if (!this.registration.negotiating) {
      this.dispatcher.dispatch(event);
      return;
    }

    const user = this.registration.handle(event);
    if (user) {
      this.logger?.(`Registered as ${user.name}.`);
      this.dispatcher.dispatch({ type: "ready", user });
    }
  }

  private shutdown() {
    if (this.finished) return;
    this.finished = true;
    this.registration.close();
    this.queue.close();
    this.dispatcher.clear();
  }
}
