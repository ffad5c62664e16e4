import { parseBreedSkeleton } from "@pupkit/schema";
import type { BreedSkeleton } from "@pupkit/schema";

/** A plain mid-sized breed; only the tempo varies between tests. */
export function testSkeleton(animationSpeedMultiplier = 1): BreedSkeleton {
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
    animationSpeedMultiplier,
  });
}
