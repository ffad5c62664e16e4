import { describe, it, expect } from "vitest";
import { shadeColor } from "@pupkit/schema";
import {
  DOG_EXPRESSIONS,
  NEUTRAL_TRANSFORM,
  createTransform,
  synthesizePose,
  DOG_ANIMATION_STATES,
} from "@pupkit/core";
import type { DogBoneTransform, DogExpression } from "@pupkit/core";
import {
  BACK_LAYER_DEPTH,
  DogBodyPainter,
  OUTLINE_COLOR,
  SADDLE_COLOR,
} from "../src/dog-body-painter.js";
import { RecordingCanvas } from "../src/recording-canvas.js";
import type { CanvasCall } from "../src/recording-canvas.js";
import { SIZE, collectNumbers, testSkeleton } from "./helpers.js";

const skeleton = testSkeleton();

function paint(
  options: {
    transform?: DogBoneTransform;
    expression?: DogExpression;
    skeleton?: ReturnType<typeof testSkeleton>;
  } = {},
): RecordingCanvas {
  const canvas = new RecordingCanvas();
  new DogBodyPainter({
    skeleton: options.skeleton ?? skeleton,
    transform: options.transform ?? NEUTRAL_TRANSFORM,
    expression: options.expression ?? DOG_EXPRESSIONS.neutral,
  }).paint(canvas, SIZE);
  return canvas;
}

function fillColor(call: CanvasCall): string | undefined {
  if ("fill" in call && call.fill.kind === "solid") return call.fill.color;
  return undefined;
}

function strokeColor(call: CanvasCall): string | undefined {
  return "stroke" in call ? call.stroke.color : undefined;
}

describe("DogBodyPainter", () => {
  describe("layering", () => {
    it("draws far legs, torso, tail, head, then near legs", () => {
      const calls = paint().calls;
      const farLeg = shadeColor(skeleton.primaryColor, 0.88);

      const firstFarLeg = calls.findIndex(
        (c) => c.op === "fillRoundRect" && fillColor(c) === farLeg,
      );
      const torso = calls.findIndex(
        (c) => c.op === "fillRoundRect" && c.fill.kind === "radial",
      );
      const tail = calls.findIndex(
        (c) => c.op === "strokePath" && strokeColor(c) === skeleton.primaryColor,
      );
      const head = calls.findIndex(
        (c) => c.op === "fillEllipse" && c.fill.kind === "radial",
      );
      const nearLegs = calls
        .map((c, i) => (c.op === "fillRoundRect" && fillColor(c) === skeleton.primaryColor ? i : -1))
        .filter((i) => i >= 0);
      const lastNearLeg = nearLegs[nearLegs.length - 1] ?? -1;

      expect(firstFarLeg).toBeGreaterThanOrEqual(0);
      expect(firstFarLeg).toBeLessThan(torso);
      expect(torso).toBeLessThan(tail);
      expect(tail).toBeLessThan(head);
      expect(head).toBeLessThan(lastNearLeg);
    });

    it("draws two capsules per leg", () => {
      const fills = paint().callsOf("fillRoundRect");
      const farLeg = shadeColor(skeleton.primaryColor, 0.88);

      expect(fills.filter((c) => fillColor(c) === farLeg)).toHaveLength(4);
      expect(fills.filter((c) => fillColor(c) === skeleton.primaryColor)).toHaveLength(4);
    });

    it("outlines every rounded rect right before filling it", () => {
      const calls = paint().calls;
      calls.forEach((call, i) => {
        if (call.op !== "fillRoundRect") return;
        const previous = calls[i - 1];
        expect(previous?.op).toBe("strokeRoundRect");
        if (previous?.op === "strokeRoundRect") {
          expect(previous.rect).toEqual(call.rect);
          expect(previous.stroke.color).toBe(OUTLINE_COLOR);
        }
      });
    });

    it("outlines the head before its gradient fill", () => {
      const calls = paint().calls;
      const head = calls.findIndex((c) => c.op === "fillEllipse" && c.fill.kind === "radial");
      const previous = calls[head - 1];
      expect(previous?.op).toBe("strokeEllipse");
      expect(previous !== undefined && strokeColor(previous)).toBe(OUTLINE_COLOR);
    });

    it("keeps save and restore balanced", () => {
      const canvas = paint();
      expect(canvas.saveDepth).toBe(0);
      expect(canvas.callsOf("save").length).toBe(canvas.callsOf("restore").length);
    });
  });

  describe("placement", () => {
    it("centres the body and lifts it by the vertical offset", () => {
      const calls = paint({ transform: createTransform({ verticalOffset: 10 }) }).calls;
      expect(calls[0]).toEqual({ op: "save" });
      expect(calls[1]).toEqual({ op: "translate", x: 200, y: 230 });
    });

    it("mirrors the surface when facing left", () => {
      const calls = paint({ transform: createTransform({ isFacingRight: false }) }).calls;
      expect(calls.slice(0, 4)).toEqual([
        { op: "save" },
        { op: "translate", x: 400, y: 0 },
        { op: "scale", sx: -1, sy: 1 },
        { op: "translate", x: 200, y: 240 },
      ]);
    });

    it("applies the torso angle to the whole body", () => {
      const calls = paint({ transform: createTransform({ torsoAngle: 0.3 }) }).calls;
      expect(calls[2]).toEqual({ op: "rotate", radians: 0.3 });
    });

    it("draws nothing into an empty canvas", () => {
      const canvas = new RecordingCanvas();
      new DogBodyPainter({
        skeleton,
        transform: NEUTRAL_TRANSFORM,
        expression: DOG_EXPRESSIONS.neutral,
      }).paint(canvas, { width: 0, height: 300 });
      expect(canvas.calls).toHaveLength(0);
    });

    it("emits only finite numbers for every state", () => {
      for (const state of DOG_ANIMATION_STATES) {
        const canvas = paint({ transform: synthesizePose(state, 3.7, false) });
        const numbers = collectNumbers(canvas.calls);
        expect(numbers.every(Number.isFinite)).toBe(true);
      }
    });
  });

  describe("face", () => {
    const IRIS = "#4a2800";
    const FACE_LINE = "#2c1a00";

    it("draws open eyes and a closed smile when neutral", () => {
      const canvas = paint();
      expect(canvas.callsOf("fillCircle").filter((c) => fillColor(c) === IRIS)).toHaveLength(2);
      expect(canvas.callsOf("strokePath").filter((c) => strokeColor(c) === FACE_LINE)).toHaveLength(1);
    });

    it("draws closed arcs instead of eyes when sleepy", () => {
      const canvas = paint({ expression: DOG_EXPRESSIONS.sleepy });
      expect(canvas.callsOf("fillCircle").filter((c) => fillColor(c) === IRIS)).toHaveLength(0);

      const arcs = canvas.callsOf("strokePath").filter((c) => strokeColor(c) === FACE_LINE);
      // Two eye arcs and the resting mouth.
      expect(arcs).toHaveLength(3);
      expect(arcs.every((c) => c.stroke.width > 0)).toBe(true);
    });

    it("adds tongue and blush when happy", () => {
      const canvas = paint({ expression: DOG_EXPRESSIONS.happy });
      expect(canvas.callsOf("fillCircle").filter((c) => fillColor(c) === "#ff9999")).toHaveLength(2);
      expect(canvas.callsOf("fillEllipse").filter((c) => fillColor(c) === "#e8607a")).toHaveLength(1);
      expect(canvas.callsOf("fillPath").filter((c) => fillColor(c) === "#8b1a1a")).toHaveLength(1);
    });

    it("adds a second eye shine when excited", () => {
      const shines = (e: DogExpression): number =>
        paint({ expression: e }).callsOf("fillCircle").filter((c) => fillColor(c) === "#ffffff").length;
      expect(shines(DOG_EXPRESSIONS.neutral)).toBe(2);
      expect(shines(DOG_EXPRESSIONS.excited)).toBe(4);
    });
  });

  describe("breed looks", () => {
    it("paints spots only for spotted breeds", () => {
      const spotted = testSkeleton({ hasSpots: true });
      const spots = (s: ReturnType<typeof testSkeleton>): number =>
        paint({ skeleton: s }).callsOf("fillCircle").filter((c) => fillColor(c) === s.accentColor).length;
      expect(spots(spotted)).toBe(5);
      expect(spots(skeleton)).toBe(0);
    });

    it("overlays the shepherd saddle", () => {
      const shepherd = testSkeleton({ breedId: "germanShepherd" });
      const saddle = paint({ skeleton: shepherd })
        .callsOf("fillEllipse")
        .filter((c) => c.fill.kind === "solid" && c.fill.alpha === 0.7);
      expect(saddle).toHaveLength(1);
      expect(saddle[0] && fillColor(saddle[0])).toBe(SADDLE_COLOR);
    });

    it("draws erect ears as outlined triangles", () => {
      const erect = testSkeleton({ earsFloppy: false });
      const canvas = paint({ skeleton: erect });
      const farEar = shadeColor(erect.primaryColor, BACK_LAYER_DEPTH);
      const fills = canvas.callsOf("fillPath");
      expect(fills.filter((c) => fillColor(c) === erect.primaryColor)).toHaveLength(1);
      expect(fills.filter((c) => fillColor(c) === farEar)).toHaveLength(1);
    });

    it("shades the far ear and thins its outline", () => {
      for (const earsFloppy of [true, false]) {
        const breed = testSkeleton({ earsFloppy });
        const calls = paint({ skeleton: breed }).calls;
        const fillOp = earsFloppy ? "fillEllipse" : "fillPath";
        const farEar = shadeColor(breed.primaryColor, BACK_LAYER_DEPTH);

        const far = calls.findIndex((c) => c.op === fillOp && fillColor(c) === farEar);
        const near = calls.findIndex(
          (c) => c.op === fillOp && fillColor(c) === breed.primaryColor,
        );
        const farOutline = calls[far - 1];
        const nearOutline = calls[near - 1];

        expect(far).toBeGreaterThanOrEqual(0);
        expect(far).toBeLessThan(near);
        expect(farOutline !== undefined && "stroke" in farOutline).toBe(true);
        expect(nearOutline !== undefined && "stroke" in nearOutline).toBe(true);
        if (farOutline && "stroke" in farOutline && nearOutline && "stroke" in nearOutline) {
          expect(farOutline.stroke.width).toBeCloseTo(
            nearOutline.stroke.width * BACK_LAYER_DEPTH,
            10,
          );
        }
      }
    });

    it("curls the tail with a cubic curve", () => {
      const curled = testSkeleton({ tailCurledOverBack: true });
      const tail = paint({ skeleton: curled })
        .callsOf("strokePath")
        .find((c) => strokeColor(c) === curled.primaryColor);
      expect(tail?.path[1]?.op).toBe("cubicTo");
    });

    it("skips the tail for tailless breeds", () => {
      const stub = testSkeleton({ tailLengthRatio: 0 });
      const tail = paint({ skeleton: stub })
        .callsOf("strokePath")
        .filter((c) => strokeColor(c) === stub.primaryColor);
      expect(tail).toHaveLength(0);
    });
  });

  describe("shouldRepaint", () => {
    const base = new DogBodyPainter({
      skeleton,
      transform: createTransform({ headAngle: 0.1 }),
      expression: DOG_EXPRESSIONS.neutral,
    });

    it("is false for equal inputs", () => {
      const same = new DogBodyPainter({
        skeleton,
        transform: createTransform({ headAngle: 0.1 }),
        expression: DOG_EXPRESSIONS.neutral,
      });
      expect(same.shouldRepaint(base)).toBe(false);
    });

    it("is true when any input changes", () => {
      const moved = new DogBodyPainter({
        skeleton,
        transform: createTransform({ headAngle: 0.2 }),
        expression: DOG_EXPRESSIONS.neutral,
      });
      const happier = new DogBodyPainter({
        skeleton,
        transform: base.transform,
        expression: DOG_EXPRESSIONS.happy,
      });
      const otherBreed = new DogBodyPainter({
        skeleton: testSkeleton(),
        transform: base.transform,
        expression: DOG_EXPRESSIONS.neutral,
      });

      expect(moved.shouldRepaint(base)).toBe(true);
      expect(happier.shouldRepaint(base)).toBe(true);
      expect(otherBreed.shouldRepaint(base)).toBe(true);
      expect(base.shouldRepaint(null)).toBe(true);
    });
  });
});
