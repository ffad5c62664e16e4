/**
 * Clock abstraction for frame-driven hosts.
 *
 * Lets the companion stage and the gesture recognizer run in the browser
 * (requestAnimationFrame), or in tests (manual time advancement).
 */

/** Handle returned by scheduling operations. Call `cancel()` to unschedule. */
export interface CancelHandle {
  cancel(): void;
}

/**
 * Time source and frame scheduler.
 *
 * Nothing in the engine calls `Date.now()` or `requestAnimationFrame`
 * directly; it always goes through a Clock, so every timing decision is
 * deterministic under a test clock.
 */
export interface Clock {
  /** Current time in milliseconds (monotonic). */
  now(): number;

  /**
   * Request a callback on the next frame.
   * In browser: wraps requestAnimationFrame.
   * In tests: fires when time is manually advanced.
   *
   * @param callback - Receives the current timestamp in ms.
   * @returns A handle to cancel the scheduled callback.
   */
  requestFrame(callback: (timestamp: number) => void): CancelHandle;
}
