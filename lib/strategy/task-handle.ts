/**
 * Observable wrapper around an in-flight agent call.
 *
 * There is no cancellation: a handle can be abandoned (its outcome is no
 * longer tracked) but the underlying call keeps running until it settles
 * on its own.
 */

import { DeadlineExceeded } from "./errors";

export type HandleSnapshot<T> =
  | { state: "pending" }
  | { state: "fulfilled"; value: T }
  | { state: "rejected"; error: unknown };

export class TaskHandle<T> {
  readonly label: string;
  /** Resolves when the call settles either way; never rejects. */
  readonly settled: Promise<void>;

  private snapshot: HandleSnapshot<T> = { state: "pending" };
  private abandonedAt: number | null = null;

  constructor(label: string, call: Promise<T>) {
    this.label = label;
    this.settled = call.then(
      (value) => {
        this.snapshot = { state: "fulfilled", value };
        if (this.abandonedAt !== null) {
          console.info(`[task] ${label} finished after being abandoned; result discarded`);
        }
      },
      (error: unknown) => {
        this.snapshot = { state: "rejected", error };
        if (this.abandonedAt !== null) {
          console.warn(`[task] ${label} failed after being abandoned:`, error);
        }
      }
    );
  }

  /** Zero-wait readiness check. */
  poll(): HandleSnapshot<T> {
    return this.snapshot;
  }

  get isSettled(): boolean {
    return this.snapshot.state !== "pending";
  }

  get abandoned(): boolean {
    return this.abandonedAt !== null;
  }

  /** Stop caring about the outcome. Idempotent. */
  abandon(): void {
    if (this.abandonedAt === null) this.abandonedAt = Date.now();
  }

  /**
   * Wait for the call up to `timeoutMs`. Throws the call's own error, or
   * DeadlineExceeded when the deadline passes first. The call itself is
   * left running in the latter case.
   */
  async result(timeoutMs: number): Promise<T> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const deadline = new Promise<void>((resolve) => {
      timer = setTimeout(resolve, timeoutMs);
    });

    try {
      await Promise.race([this.settled, deadline]);
    } finally {
      clearTimeout(timer);
    }

    const snapshot = this.snapshot;
    if (snapshot.state === "fulfilled") return snapshot.value;
    if (snapshot.state === "rejected") throw snapshot.error;
    throw new DeadlineExceeded(this.label, timeoutMs);
  }
}
