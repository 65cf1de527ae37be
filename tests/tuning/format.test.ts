import { describe, it, expect } from "vitest";
import { formatDeviation, formatPianoKeyboard, formatTuning } from "../../src/tuning/format.js";
import { keys } from "../fixtures/partial-tunings.js";

describe("formatDeviation", () => {
  it("pads to six characters with a sign", () => {
    expect(formatDeviation(3.91)).toBe("+03.91");
    expect(formatDeviation(-13.686)).toBe("-13.69");
    expect(formatDeviation(0)).toBe("+00.00");
    expect(formatDeviation(-150.5)).toBe("-150.50");
    expect(formatDeviation(undefined)).toBe("  --  ");
  });
});

describe("formatTuning", () => {
  it("lists every key", () => {
    const text = formatTuning(keys("Rast", { c: 0, e: -16.67 }));
    expect(text).toBe(
      '"Rast" (C = +00.00, C♯/D♭ = --, D = --, D♯/E♭ = --, E = -16.67, F = --, ' +
        "F♯/G♭ = --, G = --, G♯/A♭ = --, A = --, A♯/B♭ = --, B = --)",
    );
  });
});

describe("formatPianoKeyboard", () => {
  it("draws black keys above white keys", () => {
    const text = formatPianoKeyboard(keys("Hijaz", { c: 0, cSharp: 50, e: -16.67 }));
    const [title, black, white] = text.split("\n");
    expect(title).toBe("Hijaz:");
    expect(black).toBe(
      "      " + "+50.00      " + "  --        " + "      " + "      " +
        "  --        " + "  --        " + "  --        ",
    );
    expect(white).toBe(
      "+00.00      " + "  --        " + "-16.67      " + "  --        " +
        "  --        " + "  --        " + "  --        ",
    );
  });
});
