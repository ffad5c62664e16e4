/**
 * Breed skeleton data model.
 *
 * A breed skeleton is the flat, immutable table of proportions and colors
 * that drives both the animation controller (tempo) and the body painter
 * (layout and coat). Breeds differ only by data: the controller and painter
 * never branch on a class, only on these fields.
 *
 * The zod schema below is the source of truth. The `BreedSkeleton` type is
 * inferred from it, so the two can never drift apart.
 */

import { z } from "zod";

// ---------------------------------------------------------------------------
// Field schemas
// ---------------------------------------------------------------------------

/** CSS hex color, `#rrggbb`. */
export const hexColorSchema = z
  .string()
  .regex(/^#[0-9a-fA-F]{6}$/, "expected CSS hex color like '#8b4513'");

/** A ratio constrained to a closed range. */
function ratio(min: number, max: number) {
  return z.number().finite().min(min).max(max);
}

/** A strictly positive ratio with an inclusive upper bound. */
function positiveRatio(max: number) {
  return z.number().finite().positive().max(max);
}

/**
 * Schema for one breed skeleton entry.
 *
 * Ranges follow the reference dog (German Shepherd, heightScale 1.0):
 * - `legLengthRatio`: Corgi ≈ 0.20, Poodle ≈ 0.55
 * - `snoutLengthRatio`: Bulldog ≈ 0.05, Collie ≈ 0.55
 * - `animationSpeedMultiplier`: Bulldog ≈ 0.70, Corgi ≈ 1.25
 */
export const breedSkeletonSchema = z
  .object({
    /** Unique registry key, e.g. `"goldenRetriever"`. */
    breedId: z.string().min(1),
    /** Human-readable breed name. */
    displayName: z.string().min(1),

    /** Overall height relative to the reference dog. */
    heightScale: ratio(0.4, 1.1),
    /** Width / height ratio of the torso capsule. */
    torsoAspectRatio: positiveRatio(3.5),
    /** Leg length as a fraction of the reference height. */
    legLengthRatio: ratio(0.15, 0.65),
    /** Leg thickness as a fraction of torso width. */
    legThicknessRatio: positiveRatio(1),
    /** Head size as a fraction of torso height. */
    headSizeRatio: positiveRatio(1),
    /** Snout protrusion as a fraction of head diameter. */
    snoutLengthRatio: ratio(0, 1),
    /** Ear height as a fraction of head diameter. */
    earHeightRatio: ratio(0, 1),
    /** Tail length as a fraction of torso height. */
    tailLengthRatio: ratio(0, 1),

    earsFloppy: z.boolean(),
    tailCurledOverBack: z.boolean(),
    hasFlatFace: z.boolean().default(false),
    hasSpots: z.boolean().default(false),
    hasPoodleFuzz: z.boolean().default(false),

    /** Main coat color. */
    primaryColor: hexColorSchema,
    /** Belly, muzzle and paw color. */
    secondaryColor: hexColorSchema,
    /** Nose, brows and inner-ear color. */
    accentColor: hexColorSchema,

    /** Multiplier applied to every animation frequency. */
    animationSpeedMultiplier: ratio(0.5, 2.0),
  })
  .strict();

/** Input shape accepted by the schema (optional flags may be omitted). */
export type BreedSkeletonInput = z.input<typeof breedSkeletonSchema>;

/** A validated, immutable breed skeleton. */
export type BreedSkeleton = Readonly<z.output<typeof breedSkeletonSchema>>;

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

/**
 * Thrown when breed data does not satisfy the schema.
 *
 * Breed data is configuration: an invalid entry is a setup bug, so this
 * error is meant to surface at load time, not be recovered from.
 */
export class BreedConfigError extends Error {
  /** One line per schema violation, `path: message`. */
  readonly issues: readonly string[];

  constructor(source: string, issues: readonly string[]) {
    super(`Invalid breed config (${source}):\n  ${issues.join("\n  ")}`);
    this.name = "BreedConfigError";
    this.issues = issues;
  }
}

/** Format zod issues as `path: message` lines. */
function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${path}: ${issue.message}`;
  });
}

/**
 * Validate raw data as a breed skeleton and return a frozen value.
 *
 * @param input - Untrusted data (typically one entry of `breeds.json`).
 * @param source - Label used in the error message when validation fails.
 * @throws {BreedConfigError} When any field is missing or out of range.
 */
export function parseBreedSkeleton(
  input: unknown,
  source = "breed",
): BreedSkeleton {
  const result = breedSkeletonSchema.safeParse(input);
  if (!result.success) {
    throw new BreedConfigError(source, formatIssues(result.error));
  }
  return Object.freeze(result.data);
}
