/**
 * Validated breed skeletons indexed by breed id.
 *
 * Every entry is parsed once at construction; afterwards lookups hand out the
 * same frozen instance every time, so the controller and the painter share a
 * single skeleton per breed.
 */

import { BreedConfigError, parseBreedSkeleton } from "@pupkit/schema";
import type { BreedSkeleton } from "@pupkit/schema";
import breedsData from "./breeds.json" with { type: "json" };

/** Thrown when a lookup names a breed the registry does not know. */
export class UnknownBreedError extends Error {
  readonly breedId: string;
  readonly knownIds: readonly string[];

  constructor(breedId: string, knownIds: readonly string[]) {
    super(`Unknown breed "${breedId}". Known breeds: ${knownIds.join(", ")}`);
    this.name = "UnknownBreedError";
    this.breedId = breedId;
    this.knownIds = knownIds;
  }
}

export class BreedRegistry {
  private readonly skeletons = new Map<string, BreedSkeleton>();

  /**
   * @param entries - Raw breed entries, validated here.
   * @param source - Label used in error messages.
   * @throws BreedConfigError on an invalid entry or a duplicate id.
   */
  constructor(entries: readonly unknown[], source = "breeds") {
    entries.forEach((entry, index) => {
      const skeleton = parseBreedSkeleton(entry, `${source}[${index}]`);
      if (this.skeletons.has(skeleton.breedId)) {
        throw new BreedConfigError(`${source}[${index}]`, [
          `breedId: duplicate id "${skeleton.breedId}"`,
        ]);
      }
      this.skeletons.set(skeleton.breedId, skeleton);
    });
  }

  /**
   * Look up a breed skeleton.
   * @throws UnknownBreedError if the id is not registered.
   */
  configFor(breedId: string): BreedSkeleton {
    const skeleton = this.skeletons.get(breedId);
    if (skeleton === undefined) {
      throw new UnknownBreedError(breedId, this.breedIds);
    }
    return skeleton;
  }

  hasBreed(breedId: string): boolean {
    return this.skeletons.has(breedId);
  }

  /** Registered skeletons in data order. */
  listBreeds(): readonly BreedSkeleton[] {
    return [...this.skeletons.values()];
  }

  get breedIds(): readonly string[] {
    return [...this.skeletons.keys()];
  }

  get size(): number {
    return this.skeletons.size;
  }
}

/** Build a registry from raw entries. */
export function createBreedRegistry(
  entries: readonly unknown[],
  source?: string,
): BreedRegistry {
  return new BreedRegistry(entries, source);
}

/** The built-in breeds, validated when this module loads. */
export const defaultBreedRegistry: BreedRegistry = new BreedRegistry(breedsData, "breeds.json");

/** Look up a built-in breed. */
export function configFor(breedId: string): BreedSkeleton {
  return defaultBreedRegistry.configFor(breedId);
}
