/**
 * Animation states for a companion dog.
 *
 * The controller moves between these only on explicit calls (gesture
 * triggers, mood routing, `setAnimationState`). Nothing transitions on a
 * timer.
 */

/** Every animation state, in declaration order. */
export const DOG_ANIMATION_STATES = [
  // Standing still with a gentle breathing bob.
  "idle",
  // Trotting left or right; the gait cycle is active.
  "walking",
  // Hind legs folded under the body, forelegs straight.
  "sitting",
  // Fast lateral tail swing with a body shimmy.
  "tailWag",
  // Slow sideways head rotation.
  "headTilt",
  // Leaning into the user's hand, tail at maximum wag rate.
  "petting",
  // High-speed running gait.
  "zoomies",
  // Crouched, eyes closed, slow breathing only.
  "sleeping",
] as const;

/** A companion animation state. */
export type DogAnimationState = (typeof DOG_ANIMATION_STATES)[number];

/** Type guard for values coming from untyped sources. */
export function isDogAnimationState(value: unknown): value is DogAnimationState {
  return DOG_ANIMATION_STATES.some((state) => state === value);
}
