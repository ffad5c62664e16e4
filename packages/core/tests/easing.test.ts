import { describe, it, expect } from "vitest";
import { easeOut } from "../src/timing/easing.js";

describe("easeOut", () => {
  it("pins the endpoints", () => {
    expect(easeOut(0)).toBe(0);
    expect(easeOut(1)).toBe(1);
  });

  it("lands most of the change early", () => {
    expect(easeOut(0.5)).toBe(0.75);
    expect(easeOut(0.1)).toBeCloseTo(0.19, 10);
  });
});
