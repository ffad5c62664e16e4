/**
 * Deterministic clock for engine tests.
 *
 * Time moves only when `advance(ms)` is called; scheduled frame callbacks
 * then fire synchronously with the new timestamp.
 */

import type { CancelHandle, Clock } from "./clock.js";

/**
 * A clock that advances time only when explicitly told to.
 *
 * @example
 * ```ts
 * const clock = new TestClock();
 * const stage = new CompanionStage({ clock, surface, size, breedId: "corgi" });
 * stage.start();
 * clock.advance(16); // one frame
 * ```
 */
export class TestClock implements Clock {
  private currentTime = 0;
  private nextId = 1;
  private scheduled = new Map<number, (timestamp: number) => void>();

  /** Current time in milliseconds. Starts at 0. */
  now(): number {
    return this.currentTime;
  }

  /** Schedule a callback for the next frame. */
  requestFrame(callback: (timestamp: number) => void): CancelHandle {
    const id = this.nextId++;
    this.scheduled.set(id, callback);
    return {
      cancel: () => {
        this.scheduled.delete(id);
      },
    };
  }

  /**
   * Advance time by the given number of milliseconds.
   *
   * Pending callbacks fire at the new timestamp. Callbacks scheduled while
   * they run are kept for the next `advance()` call.
   */
  advance(ms: number): void {
    this.currentTime += ms;
    const callbacks = new Map(this.scheduled);
    this.scheduled.clear();
    for (const callback of callbacks.values()) {
      callback(this.currentTime);
    }
  }

  /** Advance one frame at a time, `frames` times. */
  advanceFrames(frames: number, frameMs = 16): void {
    for (let i = 0; i < frames; i++) {
      this.advance(frameMs);
    }
  }

  /** Number of currently pending frame callbacks. */
  get pendingCount(): number {
    return this.scheduled.size;
  }
}
