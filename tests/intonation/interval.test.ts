import { describe, it, expect } from "vitest";
import {
  addIntervals,
  centsInterval,
  edoInterval,
  formatInterval,
  fromHzToCents,
  isUnison,
  mod,
  normalizeInterval,
  parseInterval,
  ratioInterval,
  subtractIntervals,
} from "../../src/intonation/interval.js";

describe("mod", () => {
  it("keeps the sign of the modulus", () => {
    expect(mod(-1, 12)).toBe(11);
    expect(mod(13, 12)).toBe(1);
    expect(mod(-150, 1200)).toBe(1050);
  });

  it("rejects a non-positive modulus", () => {
    expect(() => mod(5, 0)).toThrow(RangeError);
  });
});

describe("interval constructors", () => {
  it("reduces ratios and computes cents", () => {
    const third = ratioInterval(10, 8);
    expect(third.ratio).toEqual({ numerator: 5, denominator: 4 });
    expect(third.cents).toBeCloseTo(386.31, 2);
  });

  it("builds EDO steps", () => {
    expect(edoInterval(72, 4).cents).toBeCloseTo(66.67, 2);
    expect(edoInterval(12, 7).cents).toBeCloseTo(700, 10);
  });

  it("rejects invalid input", () => {
    expect(() => ratioInterval(0, 1)).toThrow(RangeError);
    expect(() => ratioInterval(3, -2)).toThrow(RangeError);
    expect(() => ratioInterval(1.5, 1)).toThrow(RangeError);
    expect(() => edoInterval(0, 1)).toThrow(RangeError);
    expect(() => centsInterval(Number.NaN)).toThrow(RangeError);
  });

  it("measures frequency ratios", () => {
    expect(fromHzToCents(880, 440)).toBeCloseTo(1200, 10);
  });
});

describe("interval arithmetic", () => {
  it("keeps ratio arithmetic exact", () => {
    const octave = addIntervals(ratioInterval(3, 2), ratioInterval(4, 3));
    expect(octave.ratio).toEqual({ numerator: 2, denominator: 1 });
    expect(octave.cents).toBeCloseTo(1200, 10);

    const minorThird = subtractIntervals(ratioInterval(3, 2), ratioInterval(5, 4));
    expect(minorThird.ratio).toEqual({ numerator: 6, denominator: 5 });
  });

  it("falls back to cents when a side is not a ratio", () => {
    const sum = addIntervals(centsInterval(100), ratioInterval(3, 2));
    expect(sum.ratio).toBeUndefined();
    expect(sum.cents).toBeCloseTo(801.955, 3);
  });

  it("normalizes into one octave", () => {
    expect(normalizeInterval(ratioInterval(9, 4)).ratio).toEqual({ numerator: 9, denominator: 8 });
    expect(normalizeInterval(ratioInterval(3, 1)).ratio).toEqual({ numerator: 3, denominator: 2 });
    expect(normalizeInterval(ratioInterval(2, 1)).ratio).toEqual({ numerator: 1, denominator: 1 });
    expect(normalizeInterval(ratioInterval(1, 2)).ratio).toEqual({ numerator: 1, denominator: 1 });
    expect(normalizeInterval(centsInterval(-150)).cents).toBeCloseTo(1050, 10);
    expect(normalizeInterval(centsInterval(2450)).cents).toBeCloseTo(50, 10);
  });

  it("detects unisons", () => {
    expect(isUnison(ratioInterval(1, 1))).toBe(true);
    expect(isUnison(centsInterval(0.005))).toBe(true);
    expect(isUnison(centsInterval(1))).toBe(false);
    expect(isUnison(ratioInterval(2, 1))).toBe(false);
  });
});

describe("parseInterval", () => {
  it("reads cents when there is a decimal point", () => {
    expect(parseInterval("386.31").cents).toBeCloseTo(386.31, 10);
    expect(parseInterval(" -150.0 ").cents).toBeCloseTo(-150, 10);
    expect(parseInterval("386.31").ratio).toBeUndefined();
  });

  it("reads ratios and whole numbers as ratios", () => {
    expect(parseInterval("5/4").ratio).toEqual({ numerator: 5, denominator: 4 });
    expect(parseInterval("2").ratio).toEqual({ numerator: 2, denominator: 1 });
  });

  it("reads EDO steps", () => {
    expect(parseInterval("4\\72").cents).toBeCloseTo(66.67, 2);
  });

  it("rejects anything else", () => {
    expect(() => parseInterval("major third")).toThrow('Invalid interval "major third"');
    expect(() => parseInterval("1.2.3")).toThrow('Invalid interval "1.2.3"');
  });
});

describe("formatInterval", () => {
  it("shows ratios as fractions and the rest in cents", () => {
    expect(formatInterval(ratioInterval(5, 4))).toBe("5/4");
    expect(formatInterval(centsInterval(150))).toBe("150.00¢");
  });
});
