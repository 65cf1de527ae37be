import { describe, it, expect } from "vitest";
import { centsInterval, ratioInterval, UNISON } from "../../src/intonation/interval.js";
import { InvalidConfigurationError } from "../../src/tuning/errors.js";
import {
  baseTuningPitch,
  concertPitchTuningReference,
  describeTuningReference,
  standardTuningReference,
} from "../../src/tuning/tuning-reference.js";

describe("standardTuningReference", () => {
  it("places the base on a key", () => {
    const reference = standardTuningReference(2);
    expect(baseTuningPitch(reference)).toEqual({ pitchClass: 2, deviation: 0 });
    expect(standardTuningReference(9, -15.64).baseDeviation).toBe(-15.64);
  });

  it("rejects invalid keys", () => {
    expect(() => standardTuningReference(12)).toThrow(InvalidConfigurationError);
  });

  it("describes itself", () => {
    expect(describeTuningReference(standardTuningReference(2))).toBe("standard, base D +0.00¢");
  });
});

describe("concertPitchTuningReference", () => {
  it("derives the base deviation from the concert pitch", () => {
    const c5 = concertPitchTuningReference(ratioInterval(32, 27), 72);
    expect(c5.basePitchClass).toBe(0);
    expect(c5.baseDeviation).toBeCloseTo(-5.865, 3);

    expect(concertPitchTuningReference(UNISON, 69, 432).baseDeviation).toBeCloseTo(-31.77, 2);
    expect(concertPitchTuningReference(ratioInterval(32, 27), 72, 432).baseDeviation).toBeCloseTo(-37.63, 2);

    const e4 = concertPitchTuningReference(centsInterval(350), 64, 260);
    expect(e4.basePitchClass).toBe(4);
    expect(e4.baseDeviation).toBeCloseTo(-60.79, 2);
  });

  it("rejects invalid notes and frequencies", () => {
    expect(() => concertPitchTuningReference(UNISON, 128)).toThrow(InvalidConfigurationError);
    expect(() => concertPitchTuningReference(UNISON, 69, 0)).toThrow(InvalidConfigurationError);
  });

  it("describes itself", () => {
    expect(describeTuningReference(concertPitchTuningReference(UNISON, 69, 432)))
      .toBe("concert pitch 432 Hz, base A -31.77¢ (MIDI 69)");
  });
});
