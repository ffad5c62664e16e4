/**
 * @pupkit/schema: Breed skeleton data model for the companion engine.
 *
 * This package is the shared contract between the registry, the animation
 * controller and the painter. The zod schema is the source of truth; the
 * TypeScript types are inferred from it.
 */

export {
  breedSkeletonSchema,
  hexColorSchema,
  parseBreedSkeleton,
  BreedConfigError,
} from "./breed-skeleton-types.js";

export type {
  BreedSkeleton,
  BreedSkeletonInput,
} from "./breed-skeleton-types.js";

export {
  parseHexColor,
  toHexColor,
  shadeColor,
  lightenColor,
} from "./color.js";

export type { Rgb } from "./color.js";
