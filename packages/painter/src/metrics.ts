/**
 * Layout metrics: every body-part dimension, derived once per paint from
 * the canvas size and the breed ratios.
 */

import type { BreedSkeleton } from "@pupkit/schema";
import type { CanvasSize } from "./canvas.js";

export interface DogMetrics {
  readonly torsoWidth: number;
  readonly torsoHeight: number;
  readonly legLength: number;
  readonly legThickness: number;
  readonly headRadius: number;
  readonly earWidth: number;
  readonly earHeight: number;
  readonly tailLength: number;
  readonly outlineWidth: number;
}

export const MIN_OUTLINE_WIDTH = 2.5;
export const MAX_OUTLINE_WIDTH = 5;

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

export function computeMetrics(size: CanvasSize, skeleton: BreedSkeleton): DogMetrics {
  const reference = size.height * skeleton.heightScale;
  const torsoHeight = reference * 0.32;
  const torsoWidth = torsoHeight * skeleton.torsoAspectRatio;
  const headRadius = torsoHeight * skeleton.headSizeRatio * 0.6;

  return {
    torsoWidth,
    torsoHeight,
    legLength: reference * skeleton.legLengthRatio * 1.1,
    legThickness: torsoWidth * skeleton.legThicknessRatio * 0.3,
    headRadius,
    earWidth: headRadius * 0.5,
    earHeight: headRadius * skeleton.earHeightRatio,
    tailLength: torsoHeight * skeleton.tailLengthRatio * 1.5,
    outlineWidth: clamp(size.width * 0.018, MIN_OUTLINE_WIDTH, MAX_OUTLINE_WIDTH),
  };
}

/** True when the size can be painted into (finite and positive). */
export function isPaintableSize(size: CanvasSize): boolean {
  return (
    Number.isFinite(size.width) &&
    Number.isFinite(size.height) &&
    size.width > 0 &&
    size.height > 0
  );
}
