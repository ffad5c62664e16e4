/**
 * Records every call made to a PainterCanvas.
 *
 * Used by tests and by tooling that wants to inspect what a painter draws
 * without a real surface.
 */

import type {
  Ellipse,
  FillStyle,
  PainterCanvas,
  PathCommand,
  Rect,
  StrokeStyle,
} from "./canvas.js";

export type CanvasCall =
  | { readonly op: "save" }
  | { readonly op: "restore" }
  | { readonly op: "translate"; readonly x: number; readonly y: number }
  | { readonly op: "rotate"; readonly radians: number }
  | { readonly op: "scale"; readonly sx: number; readonly sy: number }
  | { readonly op: "fillRoundRect"; readonly rect: Rect; readonly radius: number; readonly fill: FillStyle }
  | { readonly op: "strokeRoundRect"; readonly rect: Rect; readonly radius: number; readonly stroke: StrokeStyle }
  | { readonly op: "fillEllipse"; readonly ellipse: Ellipse; readonly fill: FillStyle }
  | { readonly op: "strokeEllipse"; readonly ellipse: Ellipse; readonly stroke: StrokeStyle }
  | { readonly op: "fillCircle"; readonly cx: number; readonly cy: number; readonly radius: number; readonly fill: FillStyle }
  | { readonly op: "fillPath"; readonly path: readonly PathCommand[]; readonly fill: FillStyle }
  | { readonly op: "strokePath"; readonly path: readonly PathCommand[]; readonly stroke: StrokeStyle };

export type CanvasOp = CanvasCall["op"];

/** A call narrowed to one operation. */
export type CanvasCallOf<K extends CanvasOp> = Extract<CanvasCall, { op: K }>;

export class RecordingCanvas implements PainterCanvas {
  private readonly recorded: CanvasCall[] = [];
  private depth = 0;
  private maxDepth = 0;

  get calls(): readonly CanvasCall[] {
    return this.recorded;
  }

  /** Current save() nesting. 0 after a balanced paint. */
  get saveDepth(): number {
    return this.depth;
  }

  /** Deepest save() nesting seen since the last clear. */
  get maxSaveDepth(): number {
    return this.maxDepth;
  }

  /** Calls of one operation, in order. */
  callsOf<K extends CanvasOp>(op: K): CanvasCallOf<K>[] {
    return this.recorded.filter((c): c is CanvasCallOf<K> => c.op === op);
  }

  clear(): void {
    this.recorded.length = 0;
    this.depth = 0;
    this.maxDepth = 0;
  }

  save(): void {
    this.depth++;
    this.maxDepth = Math.max(this.maxDepth, this.depth);
    this.recorded.push({ op: "save" });
  }

  restore(): void {
    this.depth--;
    this.recorded.push({ op: "restore" });
  }

  translate(x: number, y: number): void {
    this.recorded.push({ op: "translate", x, y });
  }

  rotate(radians: number): void {
    this.recorded.push({ op: "rotate", radians });
  }

  scale(sx: number, sy: number): void {
    this.recorded.push({ op: "scale", sx, sy });
  }

  fillRoundRect(rect: Rect, radius: number, fill: FillStyle): void {
    this.recorded.push({ op: "fillRoundRect", rect, radius, fill });
  }

  strokeRoundRect(rect: Rect, radius: number, stroke: StrokeStyle): void {
    this.recorded.push({ op: "strokeRoundRect", rect, radius, stroke });
  }

  fillEllipse(ellipse: Ellipse, fill: FillStyle): void {
    this.recorded.push({ op: "fillEllipse", ellipse, fill });
  }

  strokeEllipse(ellipse: Ellipse, stroke: StrokeStyle): void {
    this.recorded.push({ op: "strokeEllipse", ellipse, stroke });
  }

  fillCircle(cx: number, cy: number, radius: number, fill: FillStyle): void {
    this.recorded.push({ op: "fillCircle", cx, cy, radius, fill });
  }

  fillPath(path: readonly PathCommand[], fill: FillStyle): void {
    this.recorded.push({ op: "fillPath", path, fill });
  }

  strokePath(path: readonly PathCommand[], stroke: StrokeStyle): void {
    this.recorded.push({ op: "strokePath", path, stroke });
  }
}
