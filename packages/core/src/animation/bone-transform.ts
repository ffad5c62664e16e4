/**
 * One frame's pose: every joint angle and offset of the dog skeleton.
 *
 * Angles are radians; positive is clockwise when the dog is seen facing
 * screen-right. The controller produces a fresh transform each tick and the
 * painter reads it to place every bone.
 */

/** Immutable pose snapshot. */
export interface DogBoneTransform {
  /** Tilt of the whole torso (breathing, gallop bob). */
  readonly torsoAngle: number;
  /** Head rotation around the neck joint. */
  readonly headAngle: number;
  /** Tail rotation around its root. */
  readonly tailAngle: number;

  readonly frontLeftLegAngle: number;
  readonly frontRightLegAngle: number;
  readonly backLeftLegAngle: number;
  readonly backRightLegAngle: number;

  /** Knee bend of the lower leg segment, relative to the upper segment. */
  readonly frontLeftKneeAngle: number;
  readonly frontRightKneeAngle: number;
  readonly backLeftKneeAngle: number;
  readonly backRightKneeAngle: number;

  /** Lift above the resting line in logical pixels (negative = crouch). */
  readonly verticalOffset: number;
  /** Whether the figure faces screen-right. */
  readonly isFacingRight: boolean;
}

/** The numeric fields of a transform, i.e. everything that interpolates. */
export type DogBoneTransformNumericKey = Exclude<
  keyof DogBoneTransform,
  "isFacingRight"
>;

/** Numeric field names, in a fixed order. */
export const TRANSFORM_NUMERIC_KEYS: readonly DogBoneTransformNumericKey[] = [
  "torsoAngle",
  "headAngle",
  "tailAngle",
  "frontLeftLegAngle",
  "frontRightLegAngle",
  "backLeftLegAngle",
  "backRightLegAngle",
  "frontLeftKneeAngle",
  "frontRightKneeAngle",
  "backLeftKneeAngle",
  "backRightKneeAngle",
  "verticalOffset",
];

/** All-zero pose facing right. */
export const NEUTRAL_TRANSFORM: DogBoneTransform = Object.freeze({
  torsoAngle: 0,
  headAngle: 0,
  tailAngle: 0,
  frontLeftLegAngle: 0,
  frontRightLegAngle: 0,
  backLeftLegAngle: 0,
  backRightLegAngle: 0,
  frontLeftKneeAngle: 0,
  frontRightKneeAngle: 0,
  backLeftKneeAngle: 0,
  backRightKneeAngle: 0,
  verticalOffset: 0,
  isFacingRight: true,
});

/**
 * Build a frozen transform from a partial pose.
 * Omitted angles and offsets are zero; facing defaults to right.
 */
export function createTransform(
  pose: Partial<DogBoneTransform>,
): DogBoneTransform {
  return Object.freeze({ ...NEUTRAL_TRANSFORM, ...pose });
}

/**
 * Linear interpolation between two poses.
 *
 * `t` is clamped to [0, 1]. `isFacingRight` comes from `b` once `t ≥ 0.5`
 * and from `a` before that, so a facing change flips at the midpoint.
 */
export function lerpTransform(
  a: DogBoneTransform,
  b: DogBoneTransform,
  t: number,
): DogBoneTransform {
  const tc = Number.isFinite(t) ? Math.min(1, Math.max(0, t)) : 0;
  const lerp = (from: number, to: number): number => from + (to - from) * tc;

  return Object.freeze({
    torsoAngle: lerp(a.torsoAngle, b.torsoAngle),
    headAngle: lerp(a.headAngle, b.headAngle),
    tailAngle: lerp(a.tailAngle, b.tailAngle),
    frontLeftLegAngle: lerp(a.frontLeftLegAngle, b.frontLeftLegAngle),
    frontRightLegAngle: lerp(a.frontRightLegAngle, b.frontRightLegAngle),
    backLeftLegAngle: lerp(a.backLeftLegAngle, b.backLeftLegAngle),
    backRightLegAngle: lerp(a.backRightLegAngle, b.backRightLegAngle),
    frontLeftKneeAngle: lerp(a.frontLeftKneeAngle, b.frontLeftKneeAngle),
    frontRightKneeAngle: lerp(a.frontRightKneeAngle, b.frontRightKneeAngle),
    backLeftKneeAngle: lerp(a.backLeftKneeAngle, b.backLeftKneeAngle),
    backRightKneeAngle: lerp(a.backRightKneeAngle, b.backRightKneeAngle),
    verticalOffset: lerp(a.verticalOffset, b.verticalOffset),
    isFacingRight: tc >= 0.5 ? b.isFacingRight : a.isFacingRight,
  });
}

/** Field-wise equality. */
export function transformsEqual(
  a: DogBoneTransform,
  b: DogBoneTransform,
): boolean {
  if (a === b) return true;
  if (a.isFacingRight !== b.isFacingRight) return false;
  return TRANSFORM_NUMERIC_KEYS.every((key) => a[key] === b[key]);
}

/** True when every numeric field is finite (no NaN, no ±Infinity). */
export function isFiniteTransform(t: DogBoneTransform): boolean {
  return TRANSFORM_NUMERIC_KEYS.every((key) => Number.isFinite(t[key]));
}
