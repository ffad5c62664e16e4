/**
 * DogBodyPainter: renders one pose of a breed as a layered 2-D figure.
 *
 * Every body part is drawn twice: a dark outline stroke first, then the fill
 * on top, which gives the chunky clay-toy look. Torso and head fills are
 * radial gradients with a lighter highlight toward the upper left.
 *
 * The figure is laid out facing +x. Facing left mirrors the whole surface
 * before anything is drawn.
 *
 * Layers, back to front:
 *   0. far legs (shaded by BACK_LAYER_DEPTH)
 *   1. torso, belly, breed markings
 *   2. tail
 *   3. far ear, head, near ear, muzzle, face
 *   4. near legs
 *
 * The painter is a value: it holds its three inputs and nothing else, so
 * painting the same painter twice issues the same calls.
 */

import type { BreedSkeleton } from "@pupkit/schema";
import { lightenColor, shadeColor } from "@pupkit/schema";
import { transformsEqual } from "@pupkit/core";
import type { DogBoneTransform, DogExpression } from "@pupkit/core";
import {
  centeredRect,
  ellipseOf,
  linePath,
  solid,
} from "./canvas.js";
import type {
  CanvasSize,
  FillStyle,
  PainterCanvas,
  PathCommand,
  Point,
  StrokeStyle,
} from "./canvas.js";
import { computeMetrics, isPaintableSize } from "./metrics.js";
import type { DogMetrics } from "./metrics.js";

export const OUTLINE_COLOR = "#1a1a1a";

/** Color and stroke multiplier for the far layer. */
export const BACK_LAYER_DEPTH = 0.88;

/** Shepherd saddle, drawn translucent over the coat. */
export const SADDLE_COLOR = "#1a1a1a";

/** Vertical position of the body centre, as a fraction of canvas height. */
export const BODY_CENTER_Y = 0.6;

const WHITE = "#ffffff";
const IRIS_COLOR = "#4a2800";
const PUPIL_COLOR = "#0a0a0a";
const FACE_LINE_COLOR = "#2c1a00";
const MOUTH_COLOR = "#8b1a1a";
const TONGUE_COLOR = "#e8607a";
const TONGUE_CREASE_COLOR = "#c04060";
const BLUSH_COLOR = "#ff9999";

/** Resting head lean toward the nose. */
const HEAD_REST_ANGLE = 0.12;
const TAIL_REST_ANGLE = -Math.PI * 0.12;
const CURLED_TAIL_REST_ANGLE = Math.PI * 0.55;

/** Dalmatian spots: (x, y) as torso fractions, radius as a torso-height fraction. */
const SPOTS: readonly (readonly [number, number, number])[] = [
  [-0.3, -0.12, 0.1],
  [0.04, -0.26, 0.08],
  [0.26, -0.02, 0.09],
  [-0.08, 0.08, 0.07],
  [0.36, -0.28, 0.06],
];

const FUZZ_PUFFS = 7;

/** Inputs for a DogBodyPainter. */
export interface DogBodyPainterOptions {
  readonly skeleton: BreedSkeleton;
  readonly transform: DogBoneTransform;
  readonly expression: DogExpression;
}

function outline(width: number): StrokeStyle {
  return { color: OUTLINE_COLOR, width, cap: "round", join: "round" };
}

export class DogBodyPainter {
  readonly skeleton: BreedSkeleton;
  readonly transform: DogBoneTransform;
  readonly expression: DogExpression;

  constructor(options: DogBodyPainterOptions) {
    this.skeleton = options.skeleton;
    this.transform = options.transform;
    this.expression = options.expression;
  }

  /**
   * True when this painter would draw something different from `previous`.
   * Skeleton and expression compare by identity, the transform field by field.
   */
  shouldRepaint(previous: DogBodyPainter | null): boolean {
    if (previous === null) return true;
    return (
      previous.skeleton !== this.skeleton ||
      previous.expression !== this.expression ||
      !transformsEqual(previous.transform, this.transform)
    );
  }

  /** Draw the figure. A zero or non-finite size draws nothing. */
  paint(canvas: PainterCanvas, size: CanvasSize): void {
    if (!isPaintableSize(size)) return;
    const m = computeMetrics(size, this.skeleton);
    const t = this.transform;

    canvas.save();

    if (!t.isFacingRight) {
      canvas.translate(size.width, 0);
      canvas.scale(-1, 1);
    }

    canvas.translate(size.width / 2, size.height * BODY_CENTER_Y - t.verticalOffset);
    canvas.rotate(t.torsoAngle);

    // Layer 0: far legs
    this.drawLeg(canvas, m, t.backLeftLegAngle, t.backLeftKneeAngle, -m.torsoWidth * 0.28, true);
    this.drawLeg(canvas, m, t.backRightLegAngle, t.backRightKneeAngle, m.torsoWidth * 0.28, true);

    // Layer 1: torso
    this.drawTorso(canvas, m);

    // Layer 2: tail
    this.drawTail(canvas, m);

    // Layer 3: head
    this.drawHead(canvas, m);

    // Layer 4: near legs
    this.drawLeg(canvas, m, t.frontLeftLegAngle, t.frontLeftKneeAngle, -m.torsoWidth * 0.25, false);
    this.drawLeg(canvas, m, t.frontRightLegAngle, t.frontRightKneeAngle, m.torsoWidth * 0.25, false);

    canvas.restore();
  }

  // ---------------------------------------------------------------------------
  // Fills
  // ---------------------------------------------------------------------------

  /**
   * Radial highlight fill over a box of `width` x `height` centred on
   * `center`. The highlight sits up and to the left of centre.
   */
  private bodyFill(center: Point, width: number, height: number): FillStyle {
    const base = this.skeleton.primaryColor;
    const boxW = width * 1.5;
    const boxH = height * 1.5;
    return {
      kind: "radial",
      center: { x: center.x - 0.35 * (boxW / 2), y: center.y - 0.45 * (boxH / 2) },
      radius: 0.85 * Math.min(boxW, boxH),
      stops: [
        { offset: 0, color: lightenColor(base, 35, 25, 10) },
        { offset: 1, color: base },
      ],
    };
  }

  // ---------------------------------------------------------------------------
  // Torso
  // ---------------------------------------------------------------------------

  private drawTorso(canvas: PainterCanvas, m: DogMetrics): void {
    const s = this.skeleton;
    const tw = m.torsoWidth;
    const th = m.torsoHeight;
    const rect = centeredRect(0, 0, tw, th);
    const radius = th * 0.46;

    canvas.strokeRoundRect(rect, radius, outline(m.outlineWidth));
    canvas.fillRoundRect(rect, radius, this.bodyFill({ x: 0, y: 0 }, tw, th));

    // Belly
    canvas.fillEllipse(ellipseOf(0, th * 0.18, tw * 0.6, th * 0.55), solid(s.secondaryColor));

    if (s.breedId === "germanShepherd") {
      canvas.fillEllipse(
        ellipseOf(0, -th * 0.05, tw * 0.75, th * 0.55),
        solid(SADDLE_COLOR, 0.7),
      );
    }

    if (s.hasSpots) {
      for (const [fx, fy, fr] of SPOTS) {
        canvas.fillCircle(fx * tw, fy * th, fr * th, solid(s.accentColor));
      }
    }

    if (s.hasPoodleFuzz) {
      const puff = solid(lightenColor(s.primaryColor, 20, 20, 20));
      const span = tw * 0.84;
      for (let i = 0; i < FUZZ_PUFFS; i++) {
        const x = -span / 2 + (i * span) / (FUZZ_PUFFS - 1);
        canvas.fillCircle(x, -th * 0.46, th * 0.14, puff);
      }
    }
  }

  // ---------------------------------------------------------------------------
  // Tail
  // ---------------------------------------------------------------------------

  private drawTail(canvas: PainterCanvas, m: DogMetrics): void {
    const s = this.skeleton;
    const len = m.tailLength;
    if (len <= 0) return;

    canvas.save();
    canvas.translate(-m.torsoWidth * 0.47, -m.torsoHeight * 0.05);
    canvas.rotate(
      this.transform.tailAngle +
        (s.tailCurledOverBack ? CURLED_TAIL_REST_ANGLE : TAIL_REST_ANGLE),
    );

    const path: PathCommand[] = s.tailCurledOverBack
      ? [
          { op: "moveTo", x: 0, y: 0 },
          {
            op: "cubicTo",
            c1x: -len * 0.5,
            c1y: -len * 0.6,
            c2x: -len * 0.8,
            c2y: -len,
            x: 0,
            y: -len * 1.1,
          },
        ]
      : [
          { op: "moveTo", x: 0, y: 0 },
          { op: "quadTo", cx: -len * 0.3, cy: -len * 0.5, x: len * 0.1, y: -len },
        ];

    canvas.strokePath(path, outline(m.legThickness + m.outlineWidth * 1.4));
    canvas.strokePath(path, { color: s.primaryColor, width: m.legThickness, cap: "round" });

    // Feathered plume
    if (s.breedId === "goldenRetriever" && !s.tailCurledOverBack) {
      canvas.strokePath(path, {
        color: s.primaryColor,
        alpha: 0.55,
        width: m.legThickness * 1.6,
        cap: "round",
      });
    }

    canvas.restore();
  }

  // ---------------------------------------------------------------------------
  // Head
  // ---------------------------------------------------------------------------

  private drawHead(canvas: PainterCanvas, m: DogMetrics): void {
    const s = this.skeleton;
    const r = m.headRadius;

    canvas.save();
    canvas.translate(m.torsoWidth * 0.36, -m.torsoHeight * 0.32);
    canvas.rotate(this.transform.headAngle + HEAD_REST_ANGLE);

    const hc: Point = { x: 0, y: -r * 0.9 };

    this.drawEar(canvas, m, hc, -1);

    const head = ellipseOf(hc.x, hc.y, r * 2, r * 2);
    canvas.strokeEllipse(head, outline(m.outlineWidth));
    canvas.fillEllipse(head, this.bodyFill(hc, r * 2, r * 2));

    if (s.hasPoodleFuzz) {
      const puff = solid(lightenColor(s.primaryColor, 20, 20, 20));
      for (const k of [-1, 0, 1]) {
        canvas.fillCircle(hc.x + k * r * 0.35, hc.y - r * 0.95, r * 0.3, puff);
      }
    }

    this.drawEar(canvas, m, hc, 1);
    this.drawMuzzle(canvas, m, hc);
    this.drawFace(canvas, m, hc);

    canvas.restore();
  }

  /** `side` -1 is the ear behind the head, shaded like the far legs; +1 the one in front. */
  private drawEar(canvas: PainterCanvas, m: DogMetrics, hc: Point, side: -1 | 1): void {
    const s = this.skeleton;
    const ew = m.earWidth;
    const eh = m.earHeight;
    if (eh <= 0) return;
    const depth = side < 0 ? BACK_LAYER_DEPTH : 1;
    const color = side < 0 ? shadeColor(s.primaryColor, depth) : s.primaryColor;
    const outlineWidth = m.outlineWidth * 0.8 * depth;

    canvas.save();
    canvas.translate(hc.x + side * m.headRadius * 0.78, hc.y - m.headRadius * 0.65);

    if (s.earsFloppy) {
      canvas.rotate(side * 0.2);
      const ear = ellipseOf(0, eh * 0.3, ew, eh);
      canvas.strokeEllipse(ear, outline(outlineWidth));
      canvas.fillEllipse(ear, solid(color));
      canvas.fillEllipse(ellipseOf(0, eh * 0.35, ew * 0.55, eh * 0.6), solid(s.accentColor, 0.25));
    } else {
      canvas.rotate(side * 0.08);
      const ear: PathCommand[] = [
        { op: "moveTo", x: 0, y: -eh },
        { op: "lineTo", x: -ew * 0.5, y: 0 },
        { op: "lineTo", x: ew * 0.5, y: 0 },
        { op: "close" },
      ];
      canvas.strokePath(ear, outline(outlineWidth));
      canvas.fillPath(ear, solid(color));
      const inner: PathCommand[] = [
        { op: "moveTo", x: 0, y: -eh * 0.75 },
        { op: "lineTo", x: -ew * 0.3, y: -eh * 0.05 },
        { op: "lineTo", x: ew * 0.3, y: -eh * 0.05 },
        { op: "close" },
      ];
      canvas.fillPath(inner, solid(s.accentColor, 0.3));
    }

    canvas.restore();
  }

  private drawMuzzle(canvas: PainterCanvas, m: DogMetrics, hc: Point): void {
    const s = this.skeleton;
    const r = m.headRadius;
    const center: Point = { x: hc.x + r * 0.52, y: hc.y + r * 0.1 };
    const width = r * (s.hasFlatFace ? 0.6 : 0.8) * (0.75 + 0.5 * s.snoutLengthRatio);
    const height = width * 0.65;

    const muzzle = ellipseOf(center.x, center.y, width, height);
    canvas.strokeEllipse(muzzle, outline(m.outlineWidth * 0.7));
    canvas.fillEllipse(muzzle, solid(s.secondaryColor));

    // Nose
    canvas.fillEllipse(
      ellipseOf(center.x + width * 0.38, center.y - height * 0.15, r * 0.28, r * 0.2),
      solid(s.accentColor),
    );
  }

  // ---------------------------------------------------------------------------
  // Face
  // ---------------------------------------------------------------------------

  private drawFace(canvas: PainterCanvas, m: DogMetrics, hc: Point): void {
    const e = this.expression;
    const r = m.headRadius;
    const eyeR = r * 0.22 * (e.eyesOpen ? e.eyeScale : 1);
    const nearEye: Point = { x: hc.x + r * 0.28, y: hc.y - r * 0.22 };
    const farEye: Point = { x: hc.x - r * 0.08, y: hc.y - r * 0.22 };

    this.drawBrows(canvas, nearEye, farEye, eyeR);

    if (e.eyesOpen) {
      this.drawOpenEye(canvas, nearEye, eyeR, e.name === "curious" ? -0.15 : 0);
      this.drawOpenEye(canvas, farEye, eyeR, e.name === "curious" ? 0.08 : 0);
    } else {
      this.drawClosedEye(canvas, nearEye, eyeR);
      this.drawClosedEye(canvas, farEye, eyeR);
    }

    this.drawMouth(canvas, m, hc);
    if (e.showsTongue) this.drawTongue(canvas, m, hc);
    if (e.showsBlush) this.drawBlush(canvas, m, hc);
  }

  private drawBrows(canvas: PainterCanvas, nearEye: Point, farEye: Point, eyeR: number): void {
    const name = this.expression.name;
    const stroke: StrokeStyle = {
      color: this.skeleton.accentColor,
      width: eyeR * 0.3,
      cap: "round",
    };
    const lift = eyeR * 1.6;
    const half = eyeR * 0.55;

    // One brow raised when curious, both angled when excited.
    const nearTilt = name === "curious" ? 0.25 : name === "excited" ? -0.15 : 0;
    const farTilt = name === "curious" ? -0.1 : name === "excited" ? 0.15 : 0;

    for (const [eye, tilt] of [[nearEye, nearTilt], [farEye, farTilt]] as const) {
      canvas.save();
      canvas.translate(eye.x, eye.y - lift);
      if (tilt !== 0) canvas.rotate(tilt);
      canvas.strokePath(linePath(-half, 0, half, 0), stroke);
      canvas.restore();
    }
  }

  private drawOpenEye(canvas: PainterCanvas, center: Point, radius: number, tilt: number): void {
    canvas.save();
    canvas.translate(center.x, center.y);
    if (tilt !== 0) canvas.rotate(tilt);

    const sclera = ellipseOf(0, 0, radius * 2.1, radius * 2);
    canvas.strokeEllipse(sclera, outline(radius * 0.18));
    canvas.fillEllipse(sclera, solid(WHITE));

    canvas.fillCircle(0, 0, radius * 0.75, solid(IRIS_COLOR));
    canvas.fillCircle(radius * 0.05, radius * 0.05, radius * 0.45, solid(PUPIL_COLOR));
    canvas.fillCircle(-radius * 0.22, -radius * 0.22, radius * 0.18, solid(WHITE));

    if (this.expression.name === "excited") {
      canvas.fillCircle(radius * 0.18, -radius * 0.3, radius * 0.1, solid(WHITE));
    }

    canvas.restore();
  }

  private drawClosedEye(canvas: PainterCanvas, center: Point, radius: number): void {
    canvas.strokePath(
      [
        { op: "moveTo", x: center.x - radius, y: center.y },
        { op: "quadTo", cx: center.x, cy: center.y + radius * 0.8, x: center.x + radius, y: center.y },
      ],
      { color: FACE_LINE_COLOR, width: radius * 0.35, cap: "round" },
    );
  }

  private drawMouth(canvas: PainterCanvas, m: DogMetrics, hc: Point): void {
    const r = m.headRadius;
    const open = this.expression.mouthOpenness;
    const y = hc.y + r * 0.28;
    const front = hc.x + r * 0.48;
    const width = r * 0.55;
    const line: StrokeStyle = { color: FACE_LINE_COLOR, width: r * 0.1, cap: "round" };

    if (open < 0.1) {
      canvas.strokePath(
        [
          { op: "moveTo", x: front, y },
          { op: "quadTo", cx: front - width / 2, cy: y + r * 0.14, x: front - width, y },
        ],
        line,
      );
      return;
    }

    const lowerLip: PathCommand = {
      op: "quadTo",
      cx: front - width / 2,
      cy: y + r * (0.15 + open * 0.4),
      x: front - width,
      y,
    };
    canvas.fillPath(
      [
        { op: "moveTo", x: front, y },
        lowerLip,
        { op: "quadTo", cx: front - width / 2, cy: y + r * (0.05 + open * 0.35), x: front, y },
        { op: "close" },
      ],
      solid(MOUTH_COLOR, 0.85),
    );
    canvas.strokePath([{ op: "moveTo", x: front, y }, lowerLip], line);
  }

  private drawTongue(canvas: PainterCanvas, m: DogMetrics, hc: Point): void {
    const r = m.headRadius;
    const x = hc.x + r * 0.22;
    const y = hc.y + r * 0.38;
    const w = r * 0.32;
    const h = r * 0.3;

    canvas.fillEllipse(ellipseOf(x, y, w, h), solid(TONGUE_COLOR));
    canvas.strokePath(linePath(x, y - h * 0.25, x, y + h * 0.3), {
      color: TONGUE_CREASE_COLOR,
      width: w * 0.12,
      cap: "round",
    });
  }

  private drawBlush(canvas: PainterCanvas, m: DogMetrics, hc: Point): void {
    const r = m.headRadius;
    const blush = solid(BLUSH_COLOR, 0.45);
    canvas.fillCircle(hc.x + r * 0.7, hc.y + r * 0.18, r * 0.28, blush);
    canvas.fillCircle(hc.x - r * 0.3, hc.y + r * 0.18, r * 0.28, blush);
  }

  // ---------------------------------------------------------------------------
  // Legs
  // ---------------------------------------------------------------------------

  private drawLeg(
    canvas: PainterCanvas,
    m: DogMetrics,
    angle: number,
    kneeAngle: number,
    offsetX: number,
    isBack: boolean,
  ): void {
    const s = this.skeleton;
    const depth = isBack ? BACK_LAYER_DEPTH : 1;
    const color = isBack ? shadeColor(s.primaryColor, depth) : s.primaryColor;
    const outlineWidth = m.outlineWidth * depth;
    const thickness = m.legThickness * depth;
    const segment = m.legLength * 0.52;

    canvas.save();
    canvas.translate(offsetX, m.torsoHeight * 0.4);
    canvas.rotate(angle);

    this.drawCapsule(canvas, thickness, segment, color, outlineWidth);

    canvas.translate(0, segment);
    canvas.rotate(kneeAngle);
    this.drawCapsule(canvas, thickness * 0.88, segment, color, outlineWidth);

    canvas.translate(0, segment);
    this.drawPaw(canvas, thickness, outlineWidth);

    canvas.restore();
  }

  private drawCapsule(
    canvas: PainterCanvas,
    width: number,
    length: number,
    color: string,
    outlineWidth: number,
  ): void {
    const rect = { x: -width / 2, y: 0, width, height: length };
    canvas.strokeRoundRect(rect, width / 2, outline(outlineWidth));
    canvas.fillRoundRect(rect, width / 2, solid(color));
  }

  private drawPaw(canvas: PainterCanvas, thickness: number, outlineWidth: number): void {
    const s = this.skeleton;
    const pr = thickness * 0.75;
    const paw = ellipseOf(0, pr * 0.3, pr * 2.2, pr * 1.6);
    canvas.strokeEllipse(paw, outline(outlineWidth));
    canvas.fillEllipse(paw, solid(s.secondaryColor));

    const toe: StrokeStyle = {
      color: s.accentColor,
      alpha: 0.35,
      width: outlineWidth * 0.5,
      cap: "round",
    };
    for (const dx of [-pr * 0.4, 0, pr * 0.4]) {
      canvas.strokePath(linePath(dx, 0, dx, pr * 0.9), toe);
    }
  }
}
