/**
 * BrowserClock: real-time clock for the companion stage.
 *
 * Timestamps come from `performance.now()`. Frames come from
 * `requestAnimationFrame` when the host has it, otherwise from a timer at
 * roughly 60 fps (Node hosts, workers without rAF).
 */

import type { CancelHandle, Clock } from "./clock.js";

/** Timer interval used when `requestAnimationFrame` is unavailable. */
export const FALLBACK_FRAME_MS = 1000 / 60;

export class BrowserClock implements Clock {
  now(): number {
    return performance.now();
  }

  /**
   * Schedule a callback on the next frame.
   * @returns A handle to cancel the scheduled callback.
   */
  requestFrame(callback: (timestamp: number) => void): CancelHandle {
    if (typeof globalThis.requestAnimationFrame === "function") {
      const id = globalThis.requestAnimationFrame(callback);
      return { cancel: () => globalThis.cancelAnimationFrame(id) };
    }

    const timer = setTimeout(() => callback(performance.now()), FALLBACK_FRAME_MS);
    return { cancel: () => clearTimeout(timer) };
  }
}
