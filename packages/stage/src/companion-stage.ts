/**
 * CompanionStage: the host frame loop for one companion dog.
 *
 * Resolves the breed through a registry, owns the animation and interaction
 * controllers, and on every clock frame ticks the animation and repaints the
 * shadow and body onto a PainterCanvas when anything visible changed.
 */

import { defaultBreedRegistry } from "@pupkit/breeds";
import type { BreedRegistry } from "@pupkit/breeds";
import {
  DogAnimationController,
  DogInteractionController,
  GestureRecognizer,
  MAX_FRAME_SECONDS,
} from "@pupkit/core";
import type {
  CancelHandle,
  Clock,
  DogAnimationState,
  GestureRecognizerOptions,
} from "@pupkit/core";
import { DogBodyPainter, ShadowPainter } from "@pupkit/painter";
import type { CanvasSize, PainterCanvas } from "@pupkit/painter";
import type { BreedSkeleton } from "@pupkit/schema";

/** Configuration for a CompanionStage. */
export interface CompanionStageOptions {
  /** Frame source. */
  readonly clock: Clock;
  /** Surface the companion is painted onto. */
  readonly surface: PainterCanvas;
  /** Logical drawing size in pixels. */
  readonly size: CanvasSize;
  /** Breed to show first. */
  readonly breedId: string;
  /** Where breeds are looked up. Default: the built-in registry. */
  readonly registry?: BreedRegistry;
  /** Cross-fade between states, in seconds. Default: 0.2. */
  readonly blendSeconds?: number;
  /** Gesture thresholds for the built-in recognizer. */
  readonly gestures?: Pick<GestureRecognizerOptions, "longPressMs" | "panSlop">;
}

/** Frame gaps longer than this are reported as stalls, in ms. */
const STALL_MS = MAX_FRAME_SECONDS * 1000;

/**
 * One companion on one surface.
 *
 * @example
 * ```ts
 * const stage = new CompanionStage({
 *   clock: new BrowserClock(),
 *   surface: new Canvas2DSurface(ctx, { width: 300, height: 300 }),
 *   size: { width: 300, height: 300 },
 *   breedId: "corgi",
 * });
 * stage.start();
 * stage.applyMood("zoomies");
 * ```
 */
export class CompanionStage {
  private readonly clock: Clock;
  private readonly surface: PainterCanvas;
  private readonly registry: BreedRegistry;
  private readonly blendSeconds: number;
  private readonly gestureOptions: Pick<GestureRecognizerOptions, "longPressMs" | "panSlop">;

  private currentSize: CanvasSize;
  private currentSkeleton: BreedSkeleton;
  private animation: DogAnimationController;
  private interaction: DogInteractionController;
  private recognizer: GestureRecognizer;

  private frameHandle: CancelHandle | null = null;
  private lastTimestamp: number | null = null;
  private lastBody: DogBodyPainter | null = null;
  private lastShadow: ShadowPainter | null = null;
  private frames = 0;
  private isDisposed = false;

  constructor(options: CompanionStageOptions) {
    const {
      clock,
      surface,
      size,
      breedId,
      registry = defaultBreedRegistry,
      blendSeconds = 0.2,
      gestures = {},
    } = options;

    this.clock = clock;
    this.surface = surface;
    this.currentSize = size;
    this.registry = registry;
    this.blendSeconds = blendSeconds;
    this.gestureOptions = gestures;

    this.currentSkeleton = registry.configFor(breedId);
    this.animation = this.createAnimation();
    this.interaction = new DogInteractionController(this.animation);
    this.recognizer = this.createRecognizer();
  }

  // -------------------------------------------------------------------------
  // Public API
  // -------------------------------------------------------------------------

  /** Start the frame loop. Calling it again while running does nothing. */
  start(): void {
    if (this.isDisposed || this.frameHandle !== null) return;
    this.lastTimestamp = null;
    this.scheduleFrame();
  }

  /** Stop the frame loop. The last painted frame stays on the surface. */
  stop(): void {
    if (this.frameHandle !== null) {
      this.frameHandle.cancel();
      this.frameHandle = null;
    }
  }

  get running(): boolean {
    return this.frameHandle !== null;
  }

  /**
   * Switch breeds. The old controllers are disposed and replaced, so the
   * new breed starts idle and facing right. Unknown ids throw before
   * anything is torn down.
   */
  setBreed(breedId: string): void {
    if (this.isDisposed) return;
    const skeleton = this.registry.configFor(breedId);

    this.recognizer.dispose();
    this.interaction.dispose();
    this.animation.dispose();

    this.currentSkeleton = skeleton;
    this.animation = this.createAnimation();
    this.interaction = new DogInteractionController(this.animation);
    this.recognizer = this.createRecognizer();
    this.invalidate();
  }

  /** Apply a mood key from the host. Unknown keys fall back to idle. */
  applyMood(key: string): void {
    if (this.isDisposed) return;
    this.interaction.applyMoodState(key);
  }

  /** Resize the drawing area and force a repaint on the next frame. */
  resize(width: number, height: number): void {
    this.currentSize = { width, height };
    this.invalidate();
  }

  /** Gesture callbacks for hosts that classify input themselves. */
  get gestures(): DogInteractionController {
    return this.interaction;
  }

  /** Raw pointer input, classified into taps, long presses and pans. */
  get pointer(): GestureRecognizer {
    return this.recognizer;
  }

  get animationController(): DogAnimationController {
    return this.animation;
  }

  get state(): DogAnimationState {
    return this.animation.state;
  }

  get skeleton(): BreedSkeleton {
    return this.currentSkeleton;
  }

  get size(): CanvasSize {
    return this.currentSize;
  }

  /** Number of frames that actually repainted the surface. */
  get paintedFrames(): number {
    return this.frames;
  }

  /** Stop the loop and release the controllers. Later calls do nothing. */
  dispose(): void {
    if (this.isDisposed) return;
    this.stop();
    this.recognizer.dispose();
    this.interaction.dispose();
    this.animation.dispose();
    this.isDisposed = true;
  }

  // -------------------------------------------------------------------------
  // Private
  // -------------------------------------------------------------------------

  private createAnimation(): DogAnimationController {
    return new DogAnimationController({
      skeleton: this.currentSkeleton,
      blendSeconds: this.blendSeconds,
    });
  }

  private createRecognizer(): GestureRecognizer {
    return new GestureRecognizer({
      clock: this.clock,
      target: this.interaction,
      ...this.gestureOptions,
    });
  }

  private invalidate(): void {
    this.lastBody = null;
    this.lastShadow = null;
  }

  private scheduleFrame(): void {
    this.frameHandle = this.clock.requestFrame((timestamp) => {
      this.scheduleFrame();
      this.frame(timestamp);
    });
  }

  private frame(timestamp: number): void {
    const previous = this.lastTimestamp;
    this.lastTimestamp = timestamp;
    const gapMs = previous === null ? 0 : timestamp - previous;

    if (gapMs > STALL_MS) {
      console.warn(
        `[CompanionStage] Frame gap of ${Math.round(gapMs)}ms clamped to ${STALL_MS}ms`,
      );
    }

    this.animation.tick(gapMs / 1000);
    this.paint();
  }

  private paint(): void {
    const transform = this.animation.transform;
    const shadow = new ShadowPainter({
      skeleton: this.currentSkeleton,
      verticalOffset: transform.verticalOffset,
    });
    const body = new DogBodyPainter({
      skeleton: this.currentSkeleton,
      transform,
      expression: this.animation.expression,
    });

    if (!shadow.shouldRepaint(this.lastShadow) && !body.shouldRepaint(this.lastBody)) {
      return;
    }

    this.surface.clear();
    shadow.paint(this.surface, this.currentSize);
    body.paint(this.surface, this.currentSize);
    this.lastShadow = shadow;
    this.lastBody = body;
    this.frames++;
  }
}
