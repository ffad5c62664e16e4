import { describe, it, expect, vi, beforeEach } from "vitest";
import { TestClock } from "../src/timing/test-clock.js";
import { GestureRecognizer } from "../src/interaction/gesture-recognizer.js";
import type { GestureTarget } from "../src/interaction/interaction-controller.js";
import { DogAnimationController } from "../src/animation/animation-controller.js";
import { DogInteractionController } from "../src/interaction/interaction-controller.js";
import { testSkeleton } from "./helpers.js";

function spyTarget() {
  return {
    onTap: vi.fn<[], void>(),
    onLongPressStart: vi.fn<[], void>(),
    onLongPressEnd: vi.fn<[], void>(),
    onPanUpdate: vi.fn<[number], void>(),
    onPanEnd: vi.fn<[], void>(),
  } satisfies GestureTarget;
}

let clock: TestClock;
let target: ReturnType<typeof spyTarget>;
let recognizer: GestureRecognizer;

beforeEach(() => {
  clock = new TestClock();
  target = spyTarget();
  recognizer = new GestureRecognizer({ clock, target });
});

describe("GestureRecognizer", () => {
  it("classifies a short still press as a tap", () => {
    recognizer.pointerDown(5, 5);
    clock.advanceFrames(10);
    recognizer.pointerUp();

    expect(target.onTap).toHaveBeenCalledTimes(1);
    expect(target.onLongPressStart).not.toHaveBeenCalled();
    expect(clock.pendingCount).toBe(0);
  });

  it("starts a long press once the hold time has elapsed", () => {
    recognizer.pointerDown(0, 0);
    clock.advanceFrames(31); // 496 ms
    expect(target.onLongPressStart).not.toHaveBeenCalled();

    clock.advance(16); // 512 ms
    expect(target.onLongPressStart).toHaveBeenCalledTimes(1);
    expect(recognizer.phase).toBe("longPress");

    recognizer.pointerMove(80, 0);
    recognizer.pointerUp();
    expect(target.onPanUpdate).not.toHaveBeenCalled();
    expect(target.onLongPressEnd).toHaveBeenCalledTimes(1);
    expect(target.onTap).not.toHaveBeenCalled();
  });

  it("turns movement past the slop into a pan", () => {
    recognizer.pointerDown(10, 10);
    recognizer.pointerMove(14, 10);
    expect(recognizer.phase).toBe("pressed");

    recognizer.pointerMove(30, 10);
    recognizer.pointerMove(25, 10);
    recognizer.pointerUp();

    expect(target.onPanUpdate.mock.calls).toEqual([[20], [-5]]);
    expect(target.onPanEnd).toHaveBeenCalledTimes(1);
    expect(target.onTap).not.toHaveBeenCalled();
  });

  it("drops the long-press timer once panning", () => {
    recognizer.pointerDown(0, 0);
    recognizer.pointerMove(0, 20);
    expect(clock.pendingCount).toBe(0);

    clock.advanceFrames(60);
    expect(target.onLongPressStart).not.toHaveBeenCalled();
  });

  it("emits nothing when a pending press is cancelled", () => {
    recognizer.pointerDown(0, 0);
    recognizer.pointerCancel();
    clock.advanceFrames(60);

    expect(target.onTap).not.toHaveBeenCalled();
    expect(target.onLongPressStart).not.toHaveBeenCalled();
    expect(recognizer.phase).toBe("idle");
  });

  it("ends a pan on cancel", () => {
    recognizer.pointerDown(0, 0);
    recognizer.pointerMove(-20, 0);
    recognizer.pointerCancel();

    expect(target.onPanUpdate).toHaveBeenCalledWith(-20);
    expect(target.onPanEnd).toHaveBeenCalledTimes(1);
  });

  it("ignores a second press while one is active", () => {
    recognizer.pointerDown(0, 0);
    clock.advanceFrames(20); // 320 ms
    recognizer.pointerDown(50, 50);
    clock.advanceFrames(12); // 512 ms since the first press

    expect(target.onLongPressStart).toHaveBeenCalledTimes(1);
  });

  it("honours custom thresholds", () => {
    const custom = new GestureRecognizer({ clock, target, longPressMs: 100, panSlop: 2 });
    custom.pointerDown(0, 0);
    custom.pointerMove(3, 0);
    expect(custom.phase).toBe("panning");
    custom.pointerUp();

    custom.pointerDown(0, 0);
    clock.advanceFrames(7); // 112 ms
    expect(target.onLongPressStart).toHaveBeenCalledTimes(1);
  });

  it("drives petting through the interaction controller", () => {
    const animation = new DogAnimationController({ skeleton: testSkeleton() });
    const interaction = new DogInteractionController(animation);
    const wired = new GestureRecognizer({ clock, target: interaction });

    wired.pointerDown(0, 0);
    clock.advanceFrames(32);
    expect(animation.state).toBe("petting");

    wired.pointerUp();
    expect(animation.state).toBe("idle");

    wired.pointerDown(0, 0);
    wired.pointerMove(-40, 0);
    expect(animation.state).toBe("walking");
    expect(animation.isFacingRight).toBe(false);
  });
});
