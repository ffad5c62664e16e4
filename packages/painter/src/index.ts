/**
 * @pupkit/painter: draws a companion dog pose onto a 2-D surface.
 *
 * Painters target the PainterCanvas contract; Canvas2DSurface adapts it to a
 * 2-D context and RecordingCanvas records it. The PixiJS adapter lives at
 * `@pupkit/painter/pixi` so that importing the painters never loads PixiJS.
 */

export { solid, centeredRect, ellipseOf, linePath } from "./canvas.js";
export type {
  PainterCanvas,
  CanvasSize,
  Point,
  Rect,
  Ellipse,
  ColorStop,
  FillStyle,
  StrokeStyle,
  LineCap,
  LineJoin,
  PathCommand,
} from "./canvas.js";

export { computeMetrics, isPaintableSize, MIN_OUTLINE_WIDTH, MAX_OUTLINE_WIDTH } from "./metrics.js";
export type { DogMetrics } from "./metrics.js";

export {
  DogBodyPainter,
  OUTLINE_COLOR,
  BACK_LAYER_DEPTH,
  SADDLE_COLOR,
  BODY_CENTER_Y,
} from "./dog-body-painter.js";
export type { DogBodyPainterOptions } from "./dog-body-painter.js";

export { ShadowPainter, liftFactor, SHADOW_ALPHA } from "./shadow-painter.js";
export type { ShadowPainterOptions } from "./shadow-painter.js";

export { RecordingCanvas } from "./recording-canvas.js";
export type { CanvasCall, CanvasCallOf, CanvasOp } from "./recording-canvas.js";

export { Canvas2DSurface } from "./canvas2d-surface.js";
export type { Canvas2DContext } from "./canvas2d-surface.js";
