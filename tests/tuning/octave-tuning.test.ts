import { describe, it, expect } from "vitest";
import { InvalidConfigurationError } from "../../src/tuning/errors.js";
import { createOctaveTuning } from "../../src/tuning/octave-tuning.js";

const flat = new Array<number>(12).fill(0);

describe("createOctaveTuning", () => {
  it("copies the deviations", () => {
    const deviations = [...flat];
    const tuning = createOctaveTuning("Flat", deviations);
    deviations[0] = 50;
    expect(tuning.deviations[0]).toBe(0);
  });

  it("needs 12 finite deviations", () => {
    expect(() => createOctaveTuning("short", [0, 0])).toThrow(
      'Octave tuning "short" needs 12 deviations, got 2',
    );
    expect(() => createOctaveTuning("nan", [...flat.slice(1), Number.NaN])).toThrow(InvalidConfigurationError);
  });
});
