import { describe, it, expect } from "vitest";
import { ratioInterval } from "../../src/intonation/interval.js";
import {
  centsScale,
  createScale,
  indexOfUnison,
  ratiosScale,
  renameScale,
  transposeScale,
} from "../../src/intonation/scale.js";

describe("scales", () => {
  it("rejects empty scales", () => {
    expect(() => createScale("none", [])).toThrow('Scale "none" must have at least one interval');
  });

  it("transposes every degree", () => {
    const scale = ratiosScale("maj-3", [[1, 1], [9, 8], [5, 4]]);
    const onG = transposeScale(scale, ratioInterval(3, 2));
    expect(onG.name).toBe("maj-3");
    expect(onG.intervals.map((i) => i.ratio)).toEqual([
      { numerator: 3, denominator: 2 },
      { numerator: 27, denominator: 16 },
      { numerator: 15, denominator: 8 },
    ]);
  });

  it("finds the unison", () => {
    expect(indexOfUnison(centsScale("a", [0, 150, 300]))).toBe(0);
    expect(indexOfUnison(ratiosScale("b", [[9, 8], [1, 1]]))).toBe(1);
    expect(indexOfUnison(ratiosScale("c", [[9, 8], [5, 4]]))).toBe(-1);
  });

  it("renames", () => {
    const scale = centsScale("mixed", [0, 150]);
    expect(renameScale(scale, "").name).toBe("");
    expect(renameScale(scale, "").intervals).toBe(scale.intervals);
  });
});
