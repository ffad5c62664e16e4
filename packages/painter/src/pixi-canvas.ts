/**
 * PixiCanvas: PainterCanvas over a PixiJS `Graphics`.
 *
 * Transforms go through the Graphics context's own save/restore stack, so a
 * painter's nested transforms land on the shapes exactly as they would on a
 * 2-D context. Gradients are built in global texture space, which is the
 * local space of the shape being filled.
 */

import { FillGradient, Graphics } from "pixi.js";
import type {
  Ellipse,
  FillStyle,
  PainterCanvas,
  PathCommand,
  Rect,
  StrokeStyle,
} from "./canvas.js";

export class PixiCanvas implements PainterCanvas {
  readonly graphics: Graphics;

  constructor(graphics?: Graphics) {
    this.graphics = graphics ?? new Graphics();
  }

  clear(): void {
    this.graphics.clear();
  }

  save(): void {
    this.graphics.save();
  }

  restore(): void {
    this.graphics.restore();
  }

  translate(x: number, y: number): void {
    this.graphics.translateTransform(x, y);
  }

  rotate(radians: number): void {
    this.graphics.rotateTransform(radians);
  }

  scale(sx: number, sy: number): void {
    this.graphics.scaleTransform(sx, sy);
  }

  fillRoundRect(rect: Rect, radius: number, fill: FillStyle): void {
    this.graphics.roundRect(rect.x, rect.y, rect.width, rect.height, radius);
    this.applyFill(fill);
  }

  strokeRoundRect(rect: Rect, radius: number, stroke: StrokeStyle): void {
    this.graphics.roundRect(rect.x, rect.y, rect.width, rect.height, radius);
    this.applyStroke(stroke);
  }

  fillEllipse(ellipse: Ellipse, fill: FillStyle): void {
    this.graphics.ellipse(ellipse.cx, ellipse.cy, ellipse.rx, ellipse.ry);
    this.applyFill(fill);
  }

  strokeEllipse(ellipse: Ellipse, stroke: StrokeStyle): void {
    this.graphics.ellipse(ellipse.cx, ellipse.cy, ellipse.rx, ellipse.ry);
    this.applyStroke(stroke);
  }

  fillCircle(cx: number, cy: number, radius: number, fill: FillStyle): void {
    this.graphics.circle(cx, cy, radius);
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

  private tracePath(path: readonly PathCommand[]): void {
    const g = this.graphics;
    for (const cmd of path) {
      switch (cmd.op) {
        case "moveTo":
          g.moveTo(cmd.x, cmd.y);
          break;
        case "lineTo":
          g.lineTo(cmd.x, cmd.y);
          break;
        case "quadTo":
          g.quadraticCurveTo(cmd.cx, cmd.cy, cmd.x, cmd.y);
          break;
        case "cubicTo":
          g.bezierCurveTo(cmd.c1x, cmd.c1y, cmd.c2x, cmd.c2y, cmd.x, cmd.y);
          break;
        case "close":
          g.closePath();
          break;
      }
    }
  }

  private applyFill(fill: FillStyle): void {
    switch (fill.kind) {
      case "solid":
        this.graphics.fill({ color: fill.color, alpha: fill.alpha ?? 1 });
        return;
      case "linear":
        this.graphics.fill(
          new FillGradient({
            type: "linear",
            start: fill.from,
            end: fill.to,
            colorStops: fill.stops.map((s) => ({ offset: s.offset, color: s.color })),
            textureSpace: "global",
          }),
        );
        return;
      case "radial":
        this.graphics.fill(
          new FillGradient({
            type: "radial",
            center: fill.center,
            innerRadius: 0,
            outerCenter: fill.center,
            outerRadius: fill.radius,
            colorStops: fill.stops.map((s) => ({ offset: s.offset, color: s.color })),
            textureSpace: "global",
          }),
        );
        return;
    }
  }

  private applyStroke(stroke: StrokeStyle): void {
    this.graphics.stroke({
      color: stroke.color,
      width: stroke.width,
      alpha: stroke.alpha ?? 1,
      cap: stroke.cap ?? "round",
      join: stroke.join ?? "round",
    });
  }
}
