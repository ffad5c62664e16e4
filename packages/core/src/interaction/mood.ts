/**
 * Mood routing: the coarse keys an external mood source emits, mapped onto
 * animation states.
 */

import type { DogAnimationState } from "../animation/animation-state.js";

/** Mood keys with a dedicated animation. */
export const MOOD_ANIMATIONS = {
  tail_wag: "tailWag",
  head_tilt: "headTilt",
  zoomies: "zoomies",
  yawn: "sleeping",
  sit: "sitting",
} as const satisfies Readonly<Record<string, DogAnimationState>>;

/** A recognized mood key. */
export type MoodKey = keyof typeof MOOD_ANIMATIONS;

/** Recognized mood keys, in declaration order. */
export const MOOD_KEYS: readonly MoodKey[] = ["tail_wag", "head_tilt", "zoomies", "yawn", "sit"];

export function isMoodKey(key: string): key is MoodKey {
  return Object.prototype.hasOwnProperty.call(MOOD_ANIMATIONS, key);
}

/** Map a mood key to its animation state. Anything unrecognized is idle. */
export function animationStateForMood(key: string): DogAnimationState {
  return isMoodKey(key) ? MOOD_ANIMATIONS[key] : "idle";
}
