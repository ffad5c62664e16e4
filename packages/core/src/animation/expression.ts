/**
 * Face expressions derived from the animation state.
 *
 * The painter reads an expression to choose eye shape, mouth curve, tongue
 * and blush. Expressions are never stored on their own: they are always a
 * function of the current state, so several states can share a face
 * (idle and walking both look neutral).
 */

import type { DogAnimationState } from "./animation-state.js";

/** Name of a face expression. */
export type DogExpressionName =
  | "neutral"
  | "happy"
  | "excited"
  | "curious"
  | "loving"
  | "sleepy";

/** Constant face parameters for one expression. */
export interface DogExpression {
  /** Expression name, used by the painter for per-face details. */
  readonly name: DogExpressionName;
  /** Multiplier applied to the base eye radius. */
  readonly eyeScale: number;
  /** 0 = closed smile, 1 = wide open mouth. */
  readonly mouthOpenness: number;
  /** False draws closed arcs instead of eyes. */
  readonly eyesOpen: boolean;
  /** Draw a tongue below the lower lip. */
  readonly showsTongue: boolean;
  /** Draw pink cheek blush circles. */
  readonly showsBlush: boolean;
}

function expression(
  name: DogExpressionName,
  eyeScale: number,
  mouthOpenness: number,
  eyesOpen: boolean,
  showsTongue: boolean,
  showsBlush: boolean,
): DogExpression {
  return Object.freeze({
    name,
    eyeScale,
    mouthOpenness,
    eyesOpen,
    showsTongue,
    showsBlush,
  });
}

/**
 * The expression table. Each entry is a single shared frozen instance, so
 * identity comparison is enough to tell two expressions apart.
 */
export const DOG_EXPRESSIONS: Readonly<Record<DogExpressionName, DogExpression>> = {
  // Relaxed eyes, soft closed-mouth smile.
  neutral: expression("neutral", 1.0, 0.0, true, false, false),
  // Arched eyes, big open smile, tongue out, blush.
  happy: expression("happy", 1.05, 0.7, true, true, true),
  // Widest eyes, open-O mouth, raised brows.
  excited: expression("excited", 1.25, 0.9, true, false, false),
  // Tilted eye, small quizzical smile, one brow raised.
  curious: expression("curious", 1.0, 0.2, true, false, false),
  // Squinting happy eyes, wide smile, tongue, blush.
  loving: expression("loving", 0.85, 0.8, true, true, true),
  // Closed arc eyes, resting mouth.
  sleepy: expression("sleepy", 0.0, 0.0, false, false, false),
};

/**
 * Derive the face for an animation state.
 *
 * Total over `DogAnimationState`: adding a state without a face here is a
 * compile error through the `never` check, and anything that slips past the
 * type system at runtime gets the neutral face.
 */
export function expressionFromState(state: DogAnimationState): DogExpression {
  switch (state) {
    case "idle":
    case "walking":
      return DOG_EXPRESSIONS.neutral;
    case "sitting":
    case "tailWag":
      return DOG_EXPRESSIONS.happy;
    case "headTilt":
      return DOG_EXPRESSIONS.curious;
    case "petting":
      return DOG_EXPRESSIONS.loving;
    case "zoomies":
      return DOG_EXPRESSIONS.excited;
    case "sleeping":
      return DOG_EXPRESSIONS.sleepy;
    default: {
      // Values arriving from untyped callers land here.
      const unhandled: never = state;
      void unhandled;
      return DOG_EXPRESSIONS.neutral;
    }
  }
}
