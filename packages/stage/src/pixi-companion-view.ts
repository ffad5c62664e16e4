/**
 * PixiCompanionView: a CompanionStage drawn into a PixiJS `Graphics`.
 *
 * The Graphics is made interactive over the drawing area and its pointer
 * events are fed to the stage's gesture recognizer. Add `view` to any
 * container of a running Pixi application.
 */

import { Graphics, Rectangle } from "pixi.js";
import type { FederatedPointerEvent } from "pixi.js";
import { BrowserClock } from "@pupkit/core";
import type { Clock } from "@pupkit/core";
import { PixiCanvas } from "@pupkit/painter/pixi";
import { CompanionStage } from "./companion-stage.js";
import type { CompanionStageOptions } from "./companion-stage.js";

/** Configuration for a PixiCompanionView. */
export interface PixiCompanionViewOptions
  extends Omit<CompanionStageOptions, "surface" | "clock"> {
  /** Frame source. Default: a BrowserClock. */
  readonly clock?: Clock;
  /** Graphics to draw into. Default: a new Graphics. */
  readonly graphics?: Graphics;
}

type PointerEventName =
  | "pointerdown"
  | "pointermove"
  | "pointerup"
  | "pointerupoutside"
  | "pointercancel";

/**
 * @example
 * ```ts
 * const view = new PixiCompanionView({ breedId: "pug", size: { width: 240, height: 240 } });
 * app.stage.addChild(view.view);
 * view.stage.start();
 * ```
 */
export class PixiCompanionView {
  readonly view: Graphics;
  readonly stage: CompanionStage;
  private readonly handlers: [PointerEventName, (e: FederatedPointerEvent) => void][];

  constructor(options: PixiCompanionViewOptions) {
    const { clock = new BrowserClock(), graphics, ...stageOptions } = options;

    const canvas = new PixiCanvas(graphics);
    this.view = canvas.graphics;
    this.stage = new CompanionStage({ ...stageOptions, clock, surface: canvas });

    this.view.eventMode = "static";
    this.updateHitArea();

    const pointer = (): CompanionStage["pointer"] => this.stage.pointer;
    this.handlers = [
      ["pointerdown", (e) => pointer().pointerDown(e.global.x, e.global.y)],
      ["pointermove", (e) => pointer().pointerMove(e.global.x, e.global.y)],
      ["pointerup", () => pointer().pointerUp()],
      ["pointerupoutside", () => pointer().pointerUp()],
      ["pointercancel", () => pointer().pointerCancel()],
    ];
    for (const [name, handler] of this.handlers) {
      this.view.on(name, handler);
    }
  }

  /** Resize the stage and the interactive area together. */
  resize(width: number, height: number): void {
    this.stage.resize(width, height);
    this.updateHitArea();
  }

  /** Dispose the stage and detach pointer listeners. The Graphics is destroyed. */
  dispose(): void {
    for (const [name, handler] of this.handlers) {
      this.view.off(name, handler);
    }
    this.stage.dispose();
    this.view.destroy();
  }

  private updateHitArea(): void {
    const { width, height } = this.stage.size;
    this.view.hitArea = new Rectangle(0, 0, width, height);
  }
}
