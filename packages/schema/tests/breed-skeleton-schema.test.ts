/**
 * Tests for breed skeleton validation.
 *
 * Verifies that well-formed entries parse (with flag defaults applied and the
 * result frozen) and that malformed entries are rejected with one issue line
 * per violation.
 */

import { describe, it, expect } from "vitest";
import {
  parseBreedSkeleton,
  BreedConfigError,
} from "../src/breed-skeleton-types.js";
import type { BreedSkeletonInput } from "../src/breed-skeleton-types.js";

/** Helper to create a minimal valid entry. */
function validEntry(): BreedSkeletonInput {
  return {
    breedId: "testHound",
    displayName: "Test Hound",
    heightScale: 0.8,
    torsoAspectRatio: 1.5,
    legLengthRatio: 0.4,
    legThicknessRatio: 0.2,
    headSizeRatio: 0.45,
    snoutLengthRatio: 0.4,
    earHeightRatio: 0.5,
    tailLengthRatio: 0.4,
    earsFloppy: true,
    tailCurledOverBack: false,
    primaryColor: "#aa7733",
    secondaryColor: "#f0e0c0",
    accentColor: "#221100",
    animationSpeedMultiplier: 1.0,
  };
}

describe("parseBreedSkeleton", () => {
  it("accepts a valid entry and defaults the optional marking flags", () => {
    const skeleton = parseBreedSkeleton(validEntry());
    expect(skeleton.breedId).toBe("testHound");
    expect(skeleton.hasFlatFace).toBe(false);
    expect(skeleton.hasSpots).toBe(false);
    expect(skeleton.hasPoodleFuzz).toBe(false);
  });

  it("keeps explicit marking flags", () => {
    const skeleton = parseBreedSkeleton({ ...validEntry(), hasSpots: true });
    expect(skeleton.hasSpots).toBe(true);
  });

  it("returns a frozen value", () => {
    const skeleton = parseBreedSkeleton(validEntry());
    expect(Object.isFrozen(skeleton)).toBe(true);
  });

  it("rejects heightScale outside [0.4, 1.1]", () => {
    expect(() =>
      parseBreedSkeleton({ ...validEntry(), heightScale: 1.5 }),
    ).toThrow(BreedConfigError);
  });

  it("rejects animationSpeedMultiplier below 0.5", () => {
    expect(() =>
      parseBreedSkeleton({ ...validEntry(), animationSpeedMultiplier: 0.2 }),
    ).toThrow(BreedConfigError);
  });

  it("rejects a non-hex color", () => {
    expect(() =>
      parseBreedSkeleton({ ...validEntry(), primaryColor: "golden" }),
    ).toThrow(BreedConfigError);
  });

  it("rejects unknown fields", () => {
    expect(() =>
      parseBreedSkeleton({ ...validEntry(), wingspan: 2 }),
    ).toThrow(BreedConfigError);
  });

  it("reports one issue per violation with the field path", () => {
    const entry: Record<string, unknown> = { ...validEntry(), heightScale: 3 };
    delete entry["accentColor"];

    try {
      parseBreedSkeleton(entry, "breeds.json#testHound");
      expect.unreachable("parse should have thrown");
    } catch (err) {
      if (!(err instanceof BreedConfigError)) throw err;
      const configError = err;
      expect(configError.issues).toHaveLength(2);
      expect(configError.issues.some((i) => i.startsWith("heightScale:"))).toBe(true);
      expect(configError.issues.some((i) => i.startsWith("accentColor:"))).toBe(true);
      expect(configError.message).toContain("breeds.json#testHound");
    }
  });
});
