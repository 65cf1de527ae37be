import { describe, it, expect } from "vitest";
import { createMergeTuningReducer } from "../../src/reducer/merge-reducer.js";
import { expectDeviations, fixtureTuning, keys } from "../fixtures/partial-tunings.js";

const reducer = createMergeTuningReducer();
const customFill = fixtureTuning("customGlobalFill");

describe("createMergeTuningReducer", () => {
  it("has the merge type and a default tolerance", () => {
    expect(reducer.type).toBe("merge");
    expect(reducer.equalityTolerance).toBe(0.01);
  });
});

describe("MergeTuningReducer.reduceTunings", () => {
  it("returns nothing for no tunings", () => {
    expect(reducer.reduceTunings([])).toEqual([]);
  });

  it("completes a single tuning from the global fill", () => {
    const [tuning, ...rest] = reducer.reduceTunings([fixtureTuning("justCMaj")], customFill);
    expect(rest).toHaveLength(0);
    expect(tuning.name).toBe("Just C Major");
    expectDeviations(tuning, [0, 2, 3.91, 4, -13.69, -1.96, 7, 1.96, 9, -15.64, 11, -11.73]);
  });

  it("merges consecutive compatible tunings and fills gaps from the neighbours", () => {
    const tunings = reducer.reduceTunings(
      ["bEvic", "gMaj", "cNihavent5", "eSegah", "eSegahDesc", "eHuzzam"].map(fixtureTuning),
    );

    expect(tunings.map((t) => t.name)).toEqual([
      "Evic + G Major + Nihavent Pentachord",
      "Segah + Segah Descending + Huzzam",
    ]);
    expectDeviations(tunings[0], [0, 0, 0, 0, -16.67, 0, -16.67, 0, 50, 0, -33.33, -16.67]);
    expectDeviations(tunings[1], [0, 0, 0, -33.33, -16.67, 0, -16.67, 0, 50, -16.67, 0, -16.67]);
  });

  it("uses the global fill only for keys no neighbour defines", () => {
    const [tuning] = reducer.reduceTunings([fixtureTuning("eSegah"), fixtureTuning("bEvic")], customFill);
    expect(tuning.name).toBe("Segah + Evic");
    expectDeviations(tuning, [0, 2, 0, -33.33, -16.67, 0, 7, 0, 9, -16.67, -33.33, -16.67]);
  });

  it("fills backwards and forwards between conflicting tunings", () => {
    const tunings = reducer.reduceTunings([fixtureTuning("eSegah"), fixtureTuning("gMaj")], customFill);
    expect(tunings.map((t) => t.name)).toEqual(["Segah", "G Major"]);
    expectDeviations(tunings[0], [0, 2, 0, -33.33, -16.67, 0, -16.67, 0, 9, -16.67, 11, -16.67]);
    expectDeviations(tunings[1], [0, 2, 0, -33.33, -16.67, 0, -16.67, 0, 9, 0, 11, -16.67]);
  });

  it("reduces a longer sequence", () => {
    const tunings = reducer.reduceTunings(
      ["cRast", "cNikriz", "dZengule", "dUssak", "dSaba"].map(fixtureTuning),
      customFill,
    );
    expect(tunings.map((t) => t.name)).toEqual(["Rast + Nikriz", "Zengule", "Ussak + Saba"]);
    expectDeviations(tunings[0], [0, -16.67, 0, 16.67, -16.67, 0, -16.67, 0, 9, 0, 0, -16.67]);
    expectDeviations(tunings[1], [0, -16.67, 0, 16.67, -16.67, 0, -16.67, 0, 9, 0, 16.67, -16.67]);
    expectDeviations(tunings[2], [0, -16.67, 0, 50, -16.67, 0, 33.33, 0, 9, 0, 0, -16.67]);
  });

  it("merges three mutually compatible tunings into one", () => {
    const tunings = reducer.reduceTunings([
      keys("A", { c: 0, d: 10 }),
      keys("B", { d: 10, e: -10 }),
      keys("C", { c: 0, g: 5 }),
    ]);
    expect(tunings).toHaveLength(1);
    expect(tunings[0].name).toBe("A + B + C");
    expectDeviations(tunings[0], [0, 0, 10, 0, -10, 0, 0, 5, 0, 0, 0, 0]);
  });

  it("treats deviations within the tolerance as equal", () => {
    const loose = createMergeTuningReducer({ equalityTolerance: 0.5 });
    const pair = [keys("A", { d: 10 }), keys("B", { d: 10.4 })];
    expect(loose.reduceTunings(pair)).toHaveLength(1);
    expect(reducer.reduceTunings(pair)).toHaveLength(2);
  });
});
