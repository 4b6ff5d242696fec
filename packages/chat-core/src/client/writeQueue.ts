import { WriteError } from "../errors";
import type { RateLimiter } from "./rateLimit";

export type QueuedLine = {
  line: string;
  /** Counts against the flood budget. */
  limited: boolean;
};

/**
 * Shared outgoing queue: many producers, one consumer.
 *
 * Protocol lines (pong, registration) go in the control tier and leave first,
 * ignoring the budget. User lines go in one FIFO lane per producer; when more
 * than one lane can send, the consumer picks a lane at random so a busy
 * producer cannot starve the others.
 */
export class WriteQueue {
  private control: string[] = [];
  private lanes = new Map<number, QueuedLine[]>();
  private nextLane = 0;
  private closed = false;
  private wake: (() => void) | null = null;
  private readonly limiter: RateLimiter;
  private readonly random: () => number;

  constructor(limiter: RateLimiter, random: () => number = Math.random) {
    this.limiter = limiter;
    this.random = random;
  }

  get isClosed() {
    return this.closed;
  }

  get size() {
    let size = this.control.length;
    for (const lane of this.lanes.values()) size += lane.length;
    return size;
  }

  createLane(): number {
    const lane = this.nextLane;
    this.nextLane += 1;
    return lane;
  }

  pushControl(line: string) {
    this.ensureOpen();
    this.control.push(line);
    this.notify();
  }

  push(lane: number, item: QueuedLine) {
    this.ensureOpen();
    const queue = this.lanes.get(lane);
    if (queue) {
      queue.push(item);
    } else {
      this.lanes.set(lane, [item]);
    }
    this.notify();
  }

  /** Drops anything still queued; later pushes fail and `take` resolves to null. */
  close() {
    if (this.closed) return;
    this.closed = true;
    this.control = [];
    this.lanes.clear();
    this.notify();
  }

  /** Waits for the next line the budget allows, or null once the queue is closed. */
  async take(): Promise<string | null> {
    for (;;) {
      if (this.closed) return null;

      const control = this.control.shift();
      if (control !== undefined) return control;

      const line = this.takeFromLane();
      if (line !== undefined) return line;

      await this.waitForChange(this.lanes.size ? this.limiter.delay() : undefined);
    }
  }

  private takeFromLane(): string | undefined {
    const canSpend = this.limiter.available() > 0;
    const ready: number[] = [];
    for (const [lane, queue] of this.lanes) {
      if (!queue[0].limited || canSpend) ready.push(lane);
    }
    if (!ready.length) return undefined;

    const lane = ready[Math.min(ready.length - 1, Math.floor(this.random() * ready.length))];
    const queue = this.lanes.get(lane);
    const item = queue?.shift();
    if (!queue || !item) return undefined;
    if (!queue.length) this.lanes.delete(lane);
    if (item.limited) this.limiter.tryConsume();
    return item.line;
  }

  private waitForChange(timeoutMs?: number) {
    return new Promise<void>((resolve) => {
      const timer = timeoutMs === undefined ? undefined : setTimeout(() => done(), Math.max(timeoutMs, 1));
      const done = () => {
        if (timer !== undefined) clearTimeout(timer);
        this.wake = null;
        resolve();
      };
      this.wake = done;
    });
  }

  private notify() {
    this.wake?.();
  }

  private ensureOpen() {
    if (this.closed) throw new WriteError("Closed", "The write queue has been closed.");
  }
}
