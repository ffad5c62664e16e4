import { describe, it, expect } from "vitest";
import { BreedConfigError } from "@pupkit/schema";
import {
  BreedRegistry,
  UnknownBreedError,
  configFor,
  createBreedRegistry,
  defaultBreedRegistry,
} from "../src/registry.js";

function entry(breedId: string, overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    breedId,
    displayName: breedId,
    heightScale: 0.7,
    torsoAspectRatio: 1.5,
    legLengthRatio: 0.4,
    legThicknessRatio: 0.2,
    headSizeRatio: 0.5,
    snoutLengthRatio: 0.4,
    earHeightRatio: 0.5,
    tailLengthRatio: 0.4,
    earsFloppy: false,
    tailCurledOverBack: false,
    primaryColor: "#996633",
    secondaryColor: "#eeddcc",
    accentColor: "#111111",
    animationSpeedMultiplier: 1,
    ...overrides,
  };
}

describe("default registry", () => {
  it("loads every built-in breed", () => {
    expect(defaultBreedRegistry.size).toBe(12);
    expect(defaultBreedRegistry.breedIds.slice(0, 3)).toEqual([
      "goldenRetriever",
      "germanShepherd",
      "dachshund",
    ]);
  });

  it("returns the same frozen instance on every lookup", () => {
    const first = configFor("dachshund");
    expect(configFor("dachshund")).toBe(first);
    expect(Object.isFrozen(first)).toBe(true);
    expect(first.torsoAspectRatio).toBe(3.2);
    expect(first.animationSpeedMultiplier).toBe(1.2);
  });

  it("carries the marking flags", () => {
    expect(configFor("dalmatian").hasSpots).toBe(true);
    expect(configFor("poodle").hasPoodleFuzz).toBe(true);
    expect(configFor("pug").hasFlatFace).toBe(true);
    expect(configFor("goldenRetriever").hasSpots).toBe(false);
  });

  it("throws for an unknown breed and lists the known ones", () => {
    expect(() => configFor("wolf")).toThrow(UnknownBreedError);
    expect(() => configFor("wolf")).toThrow(/Known breeds: goldenRetriever, germanShepherd/);
  });
});

describe("createBreedRegistry", () => {
  it("indexes entries by id", () => {
    const registry = createBreedRegistry([entry("alpha"), entry("beta")]);
    expect(registry).toBeInstanceOf(BreedRegistry);
    expect(registry.hasBreed("beta")).toBe(true);
    expect(registry.hasBreed("gamma")).toBe(false);
    expect(registry.listBreeds().map((b) => b.breedId)).toEqual(["alpha", "beta"]);
  });

  it("rejects invalid entries with their position", () => {
    expect(() =>
      createBreedRegistry([entry("alpha"), entry("beta", { legLengthRatio: 0.9 })], "fixture"),
    ).toThrow(/fixture\[1\]/);
  });

  it("rejects duplicate ids", () => {
    expect(() => createBreedRegistry([entry("alpha"), entry("alpha")])).toThrow(
      BreedConfigError,
    );
  });
});
