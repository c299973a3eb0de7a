import { describe, expect, it } from "vitest";

import { DEFAULT_NOISE_THRESHOLD, ScoringModel } from "../../src/splitter/scoring.js";
import { FrequencyTable } from "../../src/shared/frequencies.js";
import { WordListDictionary } from "../../src/shared/dictionary.js";
import { buildScoring } from "../helpers/fakes.js";

describe("ScoringModel.score", () => {
  const scoring = buildScoring({ get: 400, rare: 29, edge: 30 });

  it("returns the corpus frequency", () => {
    expect(scoring.score("get")).toBe(400);
  });

  it("zeroes frequencies below the noise threshold", () => {
    expect(DEFAULT_NOISE_THRESHOLD).toBe(30);
    expect(scoring.score("rare")).toBe(0);
    expect(scoring.score("edge")).toBe(30);
  });

  it("returns 0 for unknown and empty tokens", () => {
    expect(scoring.score("unknown")).toBe(0);
    expect(scoring.score("")).toBe(0);
  });

  it("is case-insensitive", () => {
    expect(scoring.score("GET")).toBe(400);
    expect(scoring.score("Get")).toBe(400);
  });

  it("honours a custom noise threshold", () => {
    const lenient = new ScoringModel(
      FrequencyTable.fromEntries({ rare: 29 }),
      new WordListDictionary(),
      { noiseThreshold: 10 }
    );
    expect(lenient.score("rare")).toBe(29);
  });
});

describe("ScoringModel.rescale", () => {
  const scoring = buildScoring({}, ["get", "module"]);

  it("never credits single characters or the empty string", () => {
    expect(scoring.rescale("x", 1_000_000)).toBe(0);
    expect(scoring.rescale("", 1_000_000)).toBe(0);
  });

  it("takes the square root for short dictionary words", () => {
    expect(scoring.rescale("get", 400)).toBe(20);
    expect(scoring.rescale("GET", 2500)).toBe(50);
  });

  it("uses the 1/2.5 exponent for short non-words", () => {
    expect(scoring.rescale("xyz", 32)).toBeCloseTo(4, 10);
  });

  it("uses the 1/2.5 exponent for long dictionary words", () => {
    expect(scoring.rescale("module", 32)).toBeCloseTo(4, 10);
  });

  it("keeps a zero score at zero in both branches", () => {
    expect(scoring.rescale("get", 0)).toBe(0);
    expect(scoring.rescale("module", 0)).toBe(0);
  });
});
