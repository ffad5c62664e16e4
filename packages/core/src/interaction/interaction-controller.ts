/**
 * DogInteractionController: arbitrates gestures and mood against each other.
 *
 * Priority, highest first: petting (an active long press), tap impulse,
 * drag/walk, ambient mood. The interaction mode sits above the animation
 * state: while the mode is "petting", taps, drags and mood updates are
 * silently dropped.
 */

import type { DogAnimationController } from "../animation/animation-controller.js";
import { animationStateForMood } from "./mood.js";

/** Top-level interaction mode. */
export type InteractionMode = "free" | "petting";

/**
 * The gesture vocabulary the controller consumes. A GestureRecognizer emits
 * into anything that implements it.
 */
export interface GestureTarget {
  onTap(): void;
  onLongPressStart(): void;
  onLongPressEnd(): void;
  /** Horizontal drag delta since the last update; only its sign matters. */
  onPanUpdate(dx: number): void;
  onPanEnd(): void;
}

export class DogInteractionController implements GestureTarget {
  private currentMode: InteractionMode = "free";
  private isDisposed = false;

  constructor(private readonly animation: DogAnimationController) {}

  get mode(): InteractionMode {
    return this.currentMode;
  }

  get isPetting(): boolean {
    return this.currentMode === "petting";
  }

  get disposed(): boolean {
    return this.isDisposed;
  }

  onTap(): void {
    if (this.isDisposed || this.isPetting) return;
    this.animation.triggerTap();
  }

  onLongPressStart(): void {
    if (this.isDisposed) return;
    this.currentMode = "petting";
    this.animation.triggerHold();
  }

  /** Ends petting and returns to idle, whether or not a hold was running. */
  onLongPressEnd(): void {
    if (this.isDisposed) return;
    this.currentMode = "free";
    this.animation.triggerRelease();
  }

  onPanUpdate(dx: number): void {
    if (this.isDisposed || this.isPetting) return;
    this.animation.setWalkVelocity(dx);
  }

  onPanEnd(): void {
    if (this.isDisposed || this.isPetting) return;
    this.animation.triggerRelease();
  }

  /** Route an ambient mood key. Unknown keys select idle. */
  applyMoodState(key: string): void {
    if (this.isDisposed || this.isPetting) return;
    this.animation.setAnimationState(animationStateForMood(key));
  }

  /**
   * Stop routing. The animation controller is owned by the caller and is
   * not disposed here.
   */
  dispose(): void {
    this.isDisposed = true;
    this.currentMode = "free";
  }
}
