/**
 * Procedural pose synthesis.
 *
 * Every pose is a pure function of (state, t, facing), where `t` is the
 * controller's tempo-scaled phase accumulator in seconds. There are no
 * authored clips and no frame-to-frame state: the same `t` always yields the
 * same pose.
 *
 * Frequencies are all multiples of 0.1 Hz so that every periodic term
 * completes a whole number of cycles in `PHASE_WRAP_SECONDS`. That lets the
 * controller wrap its accumulator without a visible seam.
 */

import type { DogAnimationState } from "./animation-state.js";
import { createTransform } from "./bone-transform.js";
import type { DogBoneTransform } from "./bone-transform.js";

const TAU = Math.PI * 2;

/** Accumulator wrap period in seconds. */
export const PHASE_WRAP_SECONDS = 10;

/** Largest single-frame step fed into the accumulator, in seconds. Longer gaps are stalls. */
export const MAX_FRAME_SECONDS = 1;

/** sin(2π·f·t) */
function wave(frequency: number, t: number, offset = 0): number {
  return Math.sin(TAU * frequency * t + offset);
}

/** Breathing term in [0, 2·amplitude]. */
function breath(frequency: number, amplitude: number, t: number): number {
  return amplitude * (1 + wave(frequency, t));
}

// ---------------------------------------------------------------------------
// Gait family (walking, zoomies)
// ---------------------------------------------------------------------------

/** Parameters of a trot gait. */
export interface GaitParams {
  /** Stride frequency in Hz. */
  readonly frequency: number;
  /** Peak leg swing in radians. */
  readonly legAmplitude: number;
  /** Peak knee bend in radians. */
  readonly kneeAmplitude: number;
  /** Body bounce amplitude in pixels (bounce runs at twice the stride). */
  readonly bounce: number;
  readonly torsoSway: number;
  readonly headSway: number;
  readonly tailAmplitude: number;
  /** Tail oscillations per stride. */
  readonly tailHarmonic: number;
}

/** Phase lag of each back leg behind its diagonal front partner. */
export const BACK_LEG_LAG = Math.PI / 8;

/** Phase lead of a knee over its parent leg. */
const KNEE_LEAD = Math.PI / 4;

export const WALK_GAIT: GaitParams = {
  frequency: 1,
  legAmplitude: 0.45,
  kneeAmplitude: 0.25,
  bounce: 2,
  torsoSway: 0.04,
  headSway: 0.05,
  tailAmplitude: 0.5,
  tailHarmonic: 1,
};

export const ZOOMIES_GAIT: GaitParams = {
  frequency: 2.5,
  legAmplitude: 0.6,
  kneeAmplitude: 0.4,
  bounce: 4,
  torsoSway: 0.1,
  headSway: 0.08,
  tailAmplitude: 0.8,
  tailHarmonic: 3,
};

/**
 * Diagonal trot.
 *
 * Front legs swing in strict opposition (π apart). Each back leg follows its
 * diagonally opposite front leg, lagging by `BACK_LEG_LAG`. Knees bend only
 * while their leg swings forward, leading the leg by a quarter cycle.
 */
export function gaitPose(
  params: GaitParams,
  t: number,
  isFacingRight: boolean,
): DogBoneTransform {
  const phase = TAU * params.frequency * t;
  const frontRight = phase;
  const frontLeft = phase + Math.PI;
  const backLeft = frontRight - BACK_LEG_LAG;
  const backRight = frontLeft - BACK_LEG_LAG;

  const leg = (legPhase: number): number =>
    params.legAmplitude * Math.sin(legPhase);
  const knee = (legPhase: number): number =>
    Math.max(0, params.kneeAmplitude * Math.sin(legPhase + KNEE_LEAD));

  return createTransform({
    torsoAngle: params.torsoSway * Math.sin(2 * phase),
    headAngle: params.headSway * Math.sin(2 * phase),
    tailAngle: params.tailAmplitude * Math.sin(params.tailHarmonic * phase),
    frontRightLegAngle: leg(frontRight),
    frontLeftLegAngle: leg(frontLeft),
    backLeftLegAngle: leg(backLeft),
    backRightLegAngle: leg(backRight),
    frontRightKneeAngle: knee(frontRight),
    frontLeftKneeAngle: knee(frontLeft),
    backLeftKneeAngle: knee(backLeft),
    backRightKneeAngle: knee(backRight),
    verticalOffset: params.bounce * (1 + Math.sin(2 * phase)),
    isFacingRight,
  });
}

// ---------------------------------------------------------------------------
// Stationary poses
// ---------------------------------------------------------------------------

/** Standing; slow breathing bob and a lazy tail. */
export function idlePose(t: number, isFacingRight: boolean): DogBoneTransform {
  return createTransform({
    tailAngle: 0.1 * wave(1.5, t),
    verticalOffset: breath(1.2, 1.5, t),
    isFacingRight,
  });
}

/** Folded hind legs, slight forward lean, tail sweeping the floor. */
export function sittingPose(t: number, isFacingRight: boolean): DogBoneTransform {
  return createTransform({
    torsoAngle: 0.08,
    headAngle: -0.05,
    tailAngle: 0.4 * wave(1, t),
    backLeftLegAngle: 1.2,
    backRightLegAngle: 1.2,
    backLeftKneeAngle: 0.8,
    backRightKneeAngle: 0.8,
    verticalOffset: breath(1, 0.8, t),
    isFacingRight,
  });
}

/** Fast tail with a half-rate body shimmy. */
export function tailWagPose(t: number, isFacingRight: boolean): DogBoneTransform {
  return createTransform({
    torsoAngle: 0.06 * wave(2, t),
    tailAngle: 0.9 * wave(4, t),
    verticalOffset: breath(2, 1.5, t),
    isFacingRight,
  });
}

/** Slow sideways head rotation. */
export function headTiltPose(t: number, isFacingRight: boolean): DogBoneTransform {
  return createTransform({
    headAngle: 0.35 * wave(0.5, t),
    tailAngle: 0.3 * wave(1.5, t),
    verticalOffset: 1.5,
    isFacingRight,
  });
}

/** Head biased toward the touch point; tail at the maximum wag rate. */
export const PETTING_HEAD_BIAS = -0.1;
export const PETTING_WAG_FREQUENCY = 5;

export function pettingPose(t: number, isFacingRight: boolean): DogBoneTransform {
  return createTransform({
    headAngle: PETTING_HEAD_BIAS,
    tailAngle: 1.1 * wave(PETTING_WAG_FREQUENCY, t),
    verticalOffset: breath(1.2, 1.5, t),
    isFacingRight,
  });
}

/** Crouch depth of the sleeping pose, in pixels below the resting line. */
export const SLEEP_CROUCH = 4;

/** Crouched and still; only a slow breath remains. */
export function sleepingPose(t: number, isFacingRight: boolean): DogBoneTransform {
  return createTransform({
    headAngle: 0.12,
    tailAngle: 0.05 * wave(0.4, t),
    verticalOffset: -SLEEP_CROUCH + breath(0.4, 0.5, t),
    isFacingRight,
  });
}

// ---------------------------------------------------------------------------
// Dispatch
// ---------------------------------------------------------------------------

/**
 * Synthesize the pose for a state at phase time `t`.
 * Unknown states (untyped callers) fall back to the idle pose.
 */
export function synthesizePose(
  state: DogAnimationState,
  t: number,
  isFacingRight: boolean,
): DogBoneTransform {
  switch (state) {
    case "idle":
      return idlePose(t, isFacingRight);
    case "walking":
      return gaitPose(WALK_GAIT, t, isFacingRight);
    case "zoomies":
      return gaitPose(ZOOMIES_GAIT, t, isFacingRight);
    case "sitting":
      return sittingPose(t, isFacingRight);
    case "tailWag":
      return tailWagPose(t, isFacingRight);
    case "headTilt":
      return headTiltPose(t, isFacingRight);
    case "petting":
      return pettingPose(t, isFacingRight);
    case "sleeping":
      return sleepingPose(t, isFacingRight);
    default: {
      const unhandled: never = state;
      void unhandled;
      return idlePose(t, isFacingRight);
    }
  }
}
