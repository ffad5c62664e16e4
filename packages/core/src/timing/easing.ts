/**
 * Easing for pose blending. Maps raw progress t ∈ [0, 1] to eased progress.
 */

export type EasingFn = (t: number) => number;

/** Decelerate to rest. Quadratic. */
export function easeOut(t: number): number {
  return 1 - (1 - t) * (1 - t);
}
