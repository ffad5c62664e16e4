/**
 * DogAnimationController: per-companion animation state machine.
 *
 * Owns the current state, the facing direction and the phase accumulator.
 * The host calls `tick(dt)` once per frame and reads `transform`; gesture
 * and mood routing call the transition methods. Nothing here transitions
 * on its own.
 */

import type { BreedSkeleton } from "@pupkit/schema";
import type { DogAnimationState } from "./animation-state.js";
import { createTransform, lerpTransform } from "./bone-transform.js";
import type { DogBoneTransform } from "./bone-transform.js";
import { expressionFromState } from "./expression.js";
import type { DogExpression } from "./expression.js";
import {
  MAX_FRAME_SECONDS,
  PHASE_WRAP_SECONDS,
  synthesizePose,
} from "./poses.js";
import { easeOut } from "../timing/easing.js";
import type { EasingFn } from "../timing/easing.js";

/** Receives every state change, after it has been committed. */
export type AnimationStateListener = (
  state: DogAnimationState,
  previous: DogAnimationState,
) => void;

/** Options for creating a DogAnimationController. */
export interface DogAnimationControllerOptions {
  /** Breed the controller animates. Only its tempo is read here. */
  readonly skeleton: BreedSkeleton;
  /**
   * Wall-clock seconds to cross-fade from the outgoing pose after a
   * transition. 0 (default) is a hard cut.
   */
  readonly blendSeconds?: number;
  /** Easing applied to blend progress. Default: easeOut. */
  readonly blendEasing?: EasingFn;
  /** State at construction. Default: "idle". */
  readonly initialState?: DogAnimationState;
}

interface ActiveBlend {
  readonly origin: DogBoneTransform;
  elapsed: number;
}

/** Sanitize a frame delta: non-finite or negative → 0, then clamp. */
function sanitizeDelta(dt: number): number {
  if (!Number.isFinite(dt) || dt <= 0) return 0;
  return Math.min(dt, MAX_FRAME_SECONDS);
}

/**
 * Frame-driven animation controller for one companion.
 *
 * @example
 * ```ts
 * const controller = new DogAnimationController({ skeleton });
 * controller.setWalkVelocity(-3); // walking, facing left
 * controller.tick(1 / 60);
 * painter.paint(canvas, size, controller.transform, controller.expression);
 * ```
 */
export class DogAnimationController {
  private readonly speed: number;
  private readonly blendSeconds: number;
  private readonly blendEasing: EasingFn;
  private readonly listeners = new Set<AnimationStateListener>();

  private currentState: DogAnimationState;
  private facingRight = true;
  private phase = 0;
  private committed: DogBoneTransform;
  private blend: ActiveBlend | null = null;
  private nextTapIsWag = true;
  private isDisposed = false;

  constructor(options: DogAnimationControllerOptions) {
    const multiplier = options.skeleton.animationSpeedMultiplier;
    this.speed = Number.isFinite(multiplier) && multiplier > 0 ? multiplier : 1;

    const blendSeconds = options.blendSeconds ?? 0;
    this.blendSeconds =
      Number.isFinite(blendSeconds) && blendSeconds > 0 ? blendSeconds : 0;
    this.blendEasing = options.blendEasing ?? easeOut;

    this.currentState = options.initialState ?? "idle";
    this.committed = synthesizePose(this.currentState, 0, this.facingRight);
  }

  // ---------------------------------------------------------------------------
  // Frame loop
  // ---------------------------------------------------------------------------

  /**
   * Advance by `dt` seconds and recompute the committed transform.
   * The phase accumulator is tempo-scaled and wrapped; a running blend
   * advances on unscaled wall time and always shows the current facing.
   */
  tick(dt: number): void {
    if (this.isDisposed) return;
    const step = sanitizeDelta(dt);

    this.phase = (this.phase + step * this.speed) % PHASE_WRAP_SECONDS;

    const target = synthesizePose(this.currentState, this.phase, this.facingRight);
    const blend = this.blend;
    if (blend === null) {
      this.committed = target;
      return;
    }

    blend.elapsed += step;
    const progress = blend.elapsed / this.blendSeconds;
    if (progress >= 1) {
      this.blend = null;
      this.committed = target;
      return;
    }
    // Facing is a surface flip, never interpolated.
    this.committed = createTransform({
      ...lerpTransform(blend.origin, target, this.blendEasing(progress)),
      isFacingRight: this.facingRight,
    });
  }

  // ---------------------------------------------------------------------------
  // Transitions
  // ---------------------------------------------------------------------------

  /**
   * Hard transition. Resets the phase so the new state starts from its
   * canonical pose, and notifies listeners once. Same-state calls do nothing.
   */
  setAnimationState(state: DogAnimationState): void {
    if (this.isDisposed || state === this.currentState) return;

    const previous = this.currentState;
    this.currentState = state;
    this.phase = 0;

    if (this.blendSeconds > 0) {
      this.blend = { origin: this.committed, elapsed: 0 };
    } else {
      this.committed = synthesizePose(state, 0, this.facingRight);
    }

    for (const listener of [...this.listeners]) {
      listener(state, previous);
    }
  }

  /**
   * Drag input. The sign sets facing and any nonzero value starts walking;
   * the magnitude is ignored. Zero or non-finite input changes nothing.
   */
  setWalkVelocity(dx: number): void {
    if (this.isDisposed || !Number.isFinite(dx) || dx === 0) return;

    const facingRight = dx > 0;
    if (facingRight !== this.facingRight) {
      this.facingRight = facingRight;
      this.committed =
        this.currentState === "walking" && this.blend === null
          ? synthesizePose("walking", this.phase, facingRight)
          : createTransform({ ...this.committed, isFacingRight: facingRight });
    }
    this.setAnimationState("walking");
  }

  /** Tap impulse: alternates tailWag and headTilt, starting with tailWag. */
  triggerTap(): void {
    if (this.isDisposed) return;
    const next: DogAnimationState = this.nextTapIsWag ? "tailWag" : "headTilt";
    this.nextTapIsWag = !this.nextTapIsWag;
    this.setAnimationState(next);
  }

  /** Long-press start. */
  triggerHold(): void {
    this.setAnimationState("petting");
  }

  /** Long-press or drag end. */
  triggerRelease(): void {
    this.setAnimationState("idle");
  }

  // ---------------------------------------------------------------------------
  // Observation
  // ---------------------------------------------------------------------------

  get state(): DogAnimationState {
    return this.currentState;
  }

  get transform(): DogBoneTransform {
    return this.committed;
  }

  get isFacingRight(): boolean {
    return this.facingRight;
  }

  /** Face for the current state. */
  get expression(): DogExpression {
    return expressionFromState(this.currentState);
  }

  /** Tempo-scaled phase time in seconds, in [0, PHASE_WRAP_SECONDS). */
  get phaseSeconds(): number {
    return this.phase;
  }

  /** True while a cross-fade from the previous pose is running. */
  get isBlending(): boolean {
    return this.blend !== null;
  }

  get disposed(): boolean {
    return this.isDisposed;
  }

  /**
   * Register a state-change listener.
   * @returns A function that removes the listener.
   */
  subscribe(listener: AnimationStateListener): () => void {
    if (this.isDisposed) return () => {};
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Drop all listeners. Every later call is a no-op. */
  dispose(): void {
    this.isDisposed = true;
    this.listeners.clear();
    this.blend = null;
  }
}
