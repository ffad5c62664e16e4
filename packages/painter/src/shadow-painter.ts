/**
 * Soft ground ellipse under the dog.
 *
 * The shadow stays on the ground line while the body moves, and shrinks and
 * fades as the body lifts. Draw it before the body.
 */

import type { BreedSkeleton } from "@pupkit/schema";
import { ellipseOf, solid } from "./canvas.js";
import type { CanvasSize, PainterCanvas } from "./canvas.js";
import { BODY_CENTER_Y } from "./dog-body-painter.js";
import { computeMetrics, isPaintableSize } from "./metrics.js";

export const SHADOW_ALPHA = 0.18;
/** Lift in px at which the shadow reaches its smallest size. */
const LIFT_RANGE = 30;
const MIN_LIFT_FACTOR = 0.3;

export interface ShadowPainterOptions {
  readonly skeleton: BreedSkeleton;
  readonly verticalOffset: number;
}

/** 1 on the ground, down to 0.3 at full lift. Crouching counts as grounded. */
export function liftFactor(verticalOffset: number): number {
  if (!Number.isFinite(verticalOffset)) return 1;
  return Math.min(1, Math.max(MIN_LIFT_FACTOR, 1 - verticalOffset / LIFT_RANGE));
}

export class ShadowPainter {
  readonly skeleton: BreedSkeleton;
  readonly verticalOffset: number;

  constructor(options: ShadowPainterOptions) {
    this.skeleton = options.skeleton;
    this.verticalOffset = options.verticalOffset;
  }

  shouldRepaint(previous: ShadowPainter | null): boolean {
    return (
      previous === null ||
      previous.skeleton !== this.skeleton ||
      previous.verticalOffset !== this.verticalOffset
    );
  }

  paint(canvas: PainterCanvas, size: CanvasSize): void {
    if (!isPaintableSize(size)) return;
    const m = computeMetrics(size, this.skeleton);
    const lift = liftFactor(this.verticalOffset);

    const width = size.width * 0.55 * this.skeleton.torsoAspectRatio * 0.4 * lift;
    const groundY =
      size.height * BODY_CENTER_Y + m.torsoHeight * 0.4 + m.legLength * 1.04;

    canvas.fillEllipse(
      ellipseOf(size.width / 2, groundY, width, width * 0.3),
      solid("#000000", SHADOW_ALPHA * lift),
    );
  }
}
