/**
 * GestureRecognizer: turns raw pointer events into tap, long-press and pan
 * gestures.
 *
 * The long-press timer runs on the Clock: while a press is pending, the
 * recognizer checks elapsed time once per frame. Under a TestClock the
 * whole classification is deterministic.
 */

import type { CancelHandle, Clock } from "../timing/clock.js";
import type { GestureTarget } from "./interaction-controller.js";

/** Options for creating a GestureRecognizer. */
export interface GestureRecognizerOptions {
  readonly clock: Clock;
  readonly target: GestureTarget;
  /** Hold duration that turns a press into a long press, in ms. Default: 500. */
  readonly longPressMs?: number;
  /** Travel in px before a press becomes a pan. Default: 8. */
  readonly panSlop?: number;
}

/** Recognizer phase for the current pointer. */
export type GesturePhase = "idle" | "pressed" | "longPress" | "panning";

export const DEFAULT_LONG_PRESS_MS = 500;
export const DEFAULT_PAN_SLOP = 8;

export class GestureRecognizer {
  private readonly clock: Clock;
  private readonly target: GestureTarget;
  private readonly longPressMs: number;
  private readonly panSlop: number;

  private currentPhase: GesturePhase = "idle";
  private downAt = 0;
  private startX = 0;
  private startY = 0;
  private lastX = 0;
  private timer: CancelHandle | null = null;
  private isDisposed = false;

  constructor(options: GestureRecognizerOptions) {
    this.clock = options.clock;
    this.target = options.target;
    this.longPressMs = options.longPressMs ?? DEFAULT_LONG_PRESS_MS;
    this.panSlop = options.panSlop ?? DEFAULT_PAN_SLOP;
  }

  get phase(): GesturePhase {
    return this.currentPhase;
  }

  /** Start a press. Ignored while another press is in progress. */
  pointerDown(x: number, y: number): void {
    if (this.isDisposed || this.currentPhase !== "idle") return;

    this.currentPhase = "pressed";
    this.downAt = this.clock.now();
    this.startX = x;
    this.startY = y;
    this.lastX = x;
    this.scheduleLongPressCheck();
  }

  pointerMove(x: number, y: number): void {
    if (this.isDisposed) return;

    if (this.currentPhase === "pressed") {
      const travel = Math.hypot(x - this.startX, y - this.startY);
      if (travel <= this.panSlop) return;
      this.cancelTimer();
      this.currentPhase = "panning";
      this.emitPan(x);
      return;
    }

    if (this.currentPhase === "panning") {
      this.emitPan(x);
    }
  }

  /** Finish the press: a tap, the end of a pan, or the end of a long press. */
  pointerUp(): void {
    if (this.isDisposed) return;
    const phase = this.currentPhase;
    this.reset();

    switch (phase) {
      case "pressed":
        this.target.onTap();
        break;
      case "panning":
        this.target.onPanEnd();
        break;
      case "longPress":
        this.target.onLongPressEnd();
        break;
      case "idle":
        break;
    }
  }

  /** Abort the press. A pending tap is dropped; started gestures are ended. */
  pointerCancel(): void {
    if (this.isDisposed) return;
    const phase = this.currentPhase;
    this.reset();

    if (phase === "panning") this.target.onPanEnd();
    else if (phase === "longPress") this.target.onLongPressEnd();
  }

  dispose(): void {
    this.reset();
    this.isDisposed = true;
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private emitPan(x: number): void {
    const dx = x - this.lastX;
    this.lastX = x;
    if (dx !== 0) this.target.onPanUpdate(dx);
  }

  private scheduleLongPressCheck(): void {
    this.timer = this.clock.requestFrame((timestamp) => {
      this.timer = null;
      if (this.currentPhase !== "pressed") return;

      if (timestamp - this.downAt >= this.longPressMs) {
        this.currentPhase = "longPress";
        this.target.onLongPressStart();
      } else {
        this.scheduleLongPressCheck();
      }
    });
  }

  private cancelTimer(): void {
    if (this.timer !== null) {
      this.timer.cancel();
      this.timer = null;
    }
  }

  private reset(): void {
    this.cancelTimer();
    this.currentPhase = "idle";
  }
}
