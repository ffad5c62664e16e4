/**
 * Canvas2DSurface: PainterCanvas over a CanvasRenderingContext2D.
 */

import type {
  CanvasSize,
  Ellipse,
  FillStyle,
  PainterCanvas,
  PathCommand,
  Rect,
  StrokeStyle,
} from "./canvas.js";

/** The part of CanvasRenderingContext2D the surface uses. */
export type Canvas2DContext = Pick<
  CanvasRenderingContext2D,
  | "save"
  | "restore"
  | "translate"
  | "rotate"
  | "scale"
  | "setTransform"
  | "clearRect"
  | "beginPath"
  | "closePath"
  | "moveTo"
  | "lineTo"
  | "quadraticCurveTo"
  | "bezierCurveTo"
  | "arcTo"
  | "ellipse"
  | "fill"
  | "stroke"
  | "createLinearGradient"
  | "createRadialGradient"
  | "fillStyle"
  | "strokeStyle"
  | "globalAlpha"
  | "lineWidth"
  | "lineCap"
  | "lineJoin"
>;

export class Canvas2DSurface implements PainterCanvas {
  private size: CanvasSize;

  constructor(private readonly ctx: Canvas2DContext, size: CanvasSize) {
    this.size = size;
  }

  /** Update the area `clear()` erases. */
  resize(size: CanvasSize): void {
    this.size = size;
  }

  clear(): void {
    this.ctx.save();
    this.ctx.setTransform(1, 0, 0, 1, 0, 0);
    this.ctx.clearRect(0, 0, this.size.width, this.size.height);
    this.ctx.restore();
  }

  save(): void {
    this.ctx.save();
  }

  restore(): void {
    this.ctx.restore();
  }

  translate(x: number, y: number): void {
    this.ctx.translate(x, y);
  }

  rotate(radians: number): void {
    this.ctx.rotate(radians);
  }

  scale(sx: number, sy: number): void {
    this.ctx.scale(sx, sy);
  }

  fillRoundRect(rect: Rect, radius: number, fill: FillStyle): void {
    this.roundRectPath(rect, radius);
    this.applyFill(fill);
  }

  strokeRoundRect(rect: Rect, radius: number, stroke: StrokeStyle): void {
    this.roundRectPath(rect, radius);
    this.applyStroke(stroke);
  }

  fillEllipse(ellipse: Ellipse, fill: FillStyle): void {
    this.ellipsePath(ellipse);
    this.applyFill(fill);
  }

  strokeEllipse(ellipse: Ellipse, stroke: StrokeStyle): void {
    this.ellipsePath(ellipse);
    this.applyStroke(stroke);
  }

  fillCircle(cx: number, cy: number, radius: number, fill: FillStyle): void {
    this.ellipsePath({ cx, cy, rx: radius, ry: radius });
    this.applyFill(fill);
  }

  fillPath(path: readonly PathCommand[], fill: FillStyle): void {
    this.tracePath(path);
    this.applyFill(fill);
  }

  strokePath(path: readonly PathCommand[], stroke: StrokeStyle): void {
    this.tracePath(path);
    this.applyStroke(stroke);
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private roundRectPath(rect: Rect, radius: number): void {
    const { x, y, width, height } = rect;
    const r = Math.max(0, Math.min(radius, width / 2, height / 2));
    const ctx = this.ctx;
    ctx.beginPath();
    ctx.moveTo(x + r, y);
    ctx.arcTo(x + width, y, x + width, y + height, r);
    ctx.arcTo(x + width, y + height, x, y + height, r);
    ctx.arcTo(x, y + height, x, y, r);
    ctx.arcTo(x, y, x + width, y, r);
    ctx.closePath();
  }

  private ellipsePath(e: Ellipse): void {
    this.ctx.beginPath();
    this.ctx.ellipse(e.cx, e.cy, Math.max(0, e.rx), Math.max(0, e.ry), 0, 0, Math.PI * 2);
  }

  private tracePath(path: readonly PathCommand[]): void {
    const ctx = this.ctx;
    ctx.beginPath();
    for (const cmd of path) {
      switch (cmd.op) {
        case "moveTo":
          ctx.moveTo(cmd.x, cmd.y);
          break;
        case "lineTo":
          ctx.lineTo(cmd.x, cmd.y);
          break;
        case "quadTo":
          ctx.quadraticCurveTo(cmd.cx, cmd.cy, cmd.x, cmd.y);
          break;
        case "cubicTo":
          ctx.bezierCurveTo(cmd.c1x, cmd.c1y, cmd.c2x, cmd.c2y, cmd.x, cmd.y);
          break;
        case "close":
          ctx.closePath();
          break;
      }
    }
  }

  private applyFill(fill: FillStyle): void {
    const ctx = this.ctx;
    ctx.save();
    switch (fill.kind) {
      case "solid":
        ctx.fillStyle = fill.color;
        ctx.globalAlpha = fill.alpha ?? 1;
        break;
      case "linear": {
        const gradient = ctx.createLinearGradient(fill.from.x, fill.from.y, fill.to.x, fill.to.y);
        for (const stop of fill.stops) gradient.addColorStop(stop.offset, stop.color);
        ctx.fillStyle = gradient;
        break;
      }
      case "radial": {
        const { center, radius } = fill;
        const gradient = ctx.createRadialGradient(center.x, center.y, 0, center.x, center.y, radius);
        for (const stop of fill.stops) gradient.addColorStop(stop.offset, stop.color);
        ctx.fillStyle = gradient;
        break;
      }
    }
    ctx.fill();
    ctx.restore();
  }

  private applyStroke(stroke: StrokeStyle): void {
    const ctx = this.ctx;
    ctx.save();
    ctx.strokeStyle = stroke.color;
    ctx.globalAlpha = stroke.alpha ?? 1;
    ctx.lineWidth = stroke.width;
    ctx.lineCap = stroke.cap ?? "round";
    ctx.lineJoin = stroke.join ?? "round";
    ctx.stroke();
    ctx.restore();
  }
}
