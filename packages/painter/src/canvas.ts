/**
 * PainterCanvas: the drawing surface the painters target.
 *
 * A small retained-transform API modelled on CanvasRenderingContext2D:
 * `save`/`restore` bracket transform changes, and every draw call is either a
 * fill or a stroke of one shape. Colors are CSS hex strings (`#rrggbb`) with
 * a separate alpha.
 *
 * Gradient coordinates are in the local space current at the draw call.
 */

export interface Point {
  readonly x: number;
  readonly y: number;
}

/** Axis-aligned rectangle, top-left origin. */
export interface Rect {
  readonly x: number;
  readonly y: number;
  readonly width: number;
  readonly height: number;
}

/** Axis-aligned ellipse by centre and radii. */
export interface Ellipse {
  readonly cx: number;
  readonly cy: number;
  readonly rx: number;
  readonly ry: number;
}

export interface ColorStop {
  /** Position along the gradient, 0..1. */
  readonly offset: number;
  readonly color: string;
}

export type FillStyle =
  | { readonly kind: "solid"; readonly color: string; readonly alpha?: number }
  | {
      readonly kind: "linear";
      readonly from: Point;
      readonly to: Point;
      readonly stops: readonly ColorStop[];
    }
  | {
      readonly kind: "radial";
      readonly center: Point;
      readonly radius: number;
      readonly stops: readonly ColorStop[];
    };

export type LineCap = "butt" | "round" | "square";
export type LineJoin = "miter" | "round" | "bevel";

export interface StrokeStyle {
  readonly color: string;
  readonly width: number;
  readonly alpha?: number;
  /** Default: "round". */
  readonly cap?: LineCap;
  /** Default: "round". */
  readonly join?: LineJoin;
}

export type PathCommand =
  | { readonly op: "moveTo"; readonly x: number; readonly y: number }
  | { readonly op: "lineTo"; readonly x: number; readonly y: number }
  | {
      readonly op: "quadTo";
      readonly cx: number;
      readonly cy: number;
      readonly x: number;
      readonly y: number;
    }
  | {
      readonly op: "cubicTo";
      readonly c1x: number;
      readonly c1y: number;
      readonly c2x: number;
      readonly c2y: number;
      readonly x: number;
      readonly y: number;
    }
  | { readonly op: "close" };

export interface PainterCanvas {
  /** Erase everything drawn so far. Called by hosts between frames. */
  clear(): void;

  save(): void;
  restore(): void;
  translate(x: number, y: number): void;
  /** Clockwise rotation in radians (y axis points down). */
  rotate(radians: number): void;
  scale(sx: number, sy: number): void;

  fillRoundRect(rect: Rect, radius: number, fill: FillStyle): void;
  strokeRoundRect(rect: Rect, radius: number, stroke: StrokeStyle): void;
  fillEllipse(ellipse: Ellipse, fill: FillStyle): void;
  strokeEllipse(ellipse: Ellipse, stroke: StrokeStyle): void;
  fillCircle(cx: number, cy: number, radius: number, fill: FillStyle): void;
  fillPath(path: readonly PathCommand[], fill: FillStyle): void;
  strokePath(path: readonly PathCommand[], stroke: StrokeStyle): void;
}

/** Drawing area size in logical pixels. */
export interface CanvasSize {
  readonly width: number;
  readonly height: number;
}

// ---------------------------------------------------------------------------
// Builders
// ---------------------------------------------------------------------------

export function solid(color: string, alpha?: number): FillStyle {
  return alpha === undefined ? { kind: "solid", color } : { kind: "solid", color, alpha };
}

/** Rect centred on (cx, cy). */
export function centeredRect(cx: number, cy: number, width: number, height: number): Rect {
  return { x: cx - width / 2, y: cy - height / 2, width, height };
}

/** Ellipse from a centre and full width/height. */
export function ellipseOf(cx: number, cy: number, width: number, height: number): Ellipse {
  return { cx, cy, rx: width / 2, ry: height / 2 };
}

/** Two-point line as a path. */
export function linePath(x1: number, y1: number, x2: number, y2: number): PathCommand[] {
  return [
    { op: "moveTo", x: x1, y: y1 },
    { op: "lineTo", x: x2, y: y2 },
  ];
}
