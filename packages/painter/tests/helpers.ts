import { parseBreedSkeleton } from "@pupkit/schema";
import type { BreedSkeleton, BreedSkeletonInput } from "@pupkit/schema";

export const SIZE = { width: 400, height: 400 } as const;

export function testSkeleton(overrides: Partial<BreedSkeletonInput> = {}): BreedSkeleton {
  return parseBreedSkeleton({
    breedId: "testMutt",
    displayName: "Test Mutt",
    heightScale: 0.8,
    torsoAspectRatio: 1.6,
    legLengthRatio: 0.4,
    legThicknessRatio: 0.2,
    headSizeRatio: 0.45,
    snoutLengthRatio: 0.4,
    earHeightRatio: 0.5,
    tailLengthRatio: 0.5,
    earsFloppy: true,
    tailCurledOverBack: false,
    primaryColor: "#b07040",
    secondaryColor: "#f2e2c8",
    accentColor: "#2a1a10",
    animationSpeedMultiplier: 1,
    ...overrides,
  });
}

/** Every number reachable from a value. */
export function collectNumbers(value: unknown, out: number[] = []): number[] {
  if (typeof value === "number") {
    out.push(value);
  } else if (Array.isArray(value)) {
    for (const item of value) collectNumbers(item, out);
  } else if (typeof value === "object" && value !== null) {
    for (const item of Object.values(value)) collectNumbers(item, out);
  }
  return out;
}
