import winston from "winston";
import { Clock } from "../../src/utils/types/sync.types";
import { IndexMessage, IndexNotifier } from "../../src/utils/types/redis.types";

export function silentLogger(): winston.Logger {
  return winston.createLogger({
    transports: [new winston.transports.Console({ silent: true })],
  });
}

export class FakeClock implements Clock {
  sleeps: number[] = [];
  private current: Date;
  private waiting: (() => void)[] = [];
  /** when true, sleep() stays pending until release() */
  hold = false;

  constructor(start = new Date("2024-06-01T00:00:00Z")) {
    this.current = start;
  }

  now(): Date {
    return this.current;
  }

  advance(ms: number): void {
    this.current = new Date(this.current.getTime() + ms);
  }

  sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    if (!this.hold) {
      return Promise.resolve();
    }
    return new Promise((resolve) => this.waiting.push(resolve));
  }

  release(): void {
    const waiting = this.waiting;
    this.waiting = [];
    waiting.forEach((resolve) => resolve());
  }
}

/** Lets pending promise callbacks run until `predicate` holds. */
export async function waitFor(predicate: () => boolean, attempts = 200): Promise<void> {
  for (let i = 0; i < attempts; i++) {
    if (predicate()) {
      return;
    }
    await new Promise((resolve) => setImmediate(resolve));
  }
  throw new Error("condition not reached");
}

export class RecordingNotifier implements IndexNotifier {
  messages: IndexMessage[] = [];
  failWith: Error | null = null;

  async publish(message: IndexMessage): Promise<void> {
    if (this.failWith) {
      throw this.failWith;
    }
    this.messages.push(message);
  }
}
