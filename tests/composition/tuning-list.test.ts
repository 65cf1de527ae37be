import { describe, it, expect } from "vitest";
import { ratioInterval, UNISON } from "../../src/intonation/interval.js";
import { centsScale, ratiosScale } from "../../src/intonation/scale.js";
import { createAutoTuningMapper } from "../../src/mapper/auto-mapper.js";
import { createDirectTuningReducer } from "../../src/reducer/direct-reducer.js";
import { createMergeTuningReducer } from "../../src/reducer/merge-reducer.js";
import type { Composition, TuningSpec } from "../../src/composition/types.js";
import { tuningListFromComposition } from "../../src/composition/tuning-list.js";
import { TuningMapperConflictError } from "../../src/tuning/errors.js";
import { standardTuningReference } from "../../src/tuning/tuning-reference.js";
import { expectDeviations } from "../fixtures/partial-tunings.js";

const mapper = createAutoTuningMapper({ mapQuarterTonesLow: true });
const maj4 = ratiosScale("maj-4", [[1, 1], [9, 8], [5, 4], [4, 3]]);

const onC: TuningSpec = { scale: maj4, transposition: UNISON, tuningMapper: mapper };
const onG: TuningSpec = { scale: maj4, transposition: ratioInterval(3, 2), tuningMapper: mapper };

const composition = (overrides: Partial<Composition>): Composition => ({
  tuningReference: standardTuningReference(0),
  tuningSpecs: [onC, onG],
  tuningReducer: createMergeTuningReducer(),
  fill: {},
  ...overrides,
});

describe("tuningListFromComposition", () => {
  it("maps and merges the tuning specs", () => {
    const tunings = tuningListFromComposition(composition({ metadata: { name: "Tetrachords" } }));

    expect(tunings.map((t) => t.name)).toEqual(["C maj-4 + G maj-4"]);
    expectDeviations(tunings[0], [0, 0, 3.91, 0, -13.69, -1.96, 0, 1.96, 0, 5.87, 0, -11.73]);
  });

  it("fills from the global fill spec", () => {
    const fillScale = centsScale("fill", [0, 110, 200, 310, 400, 500, 610, 700, 810, 900, 1010, 1100]);
    const tunings = tuningListFromComposition(composition({
      tuningSpecs: [onC, onG],
      tuningReducer: createDirectTuningReducer(),
      fill: { global: { scale: fillScale, transposition: UNISON, tuningMapper: mapper } },
    }));

    expect(tunings.map((t) => t.name)).toEqual(["C maj-4", "G maj-4"]);
    expectDeviations(tunings[0], [0, 10, 3.91, 10, -13.69, -1.96, 10, 0, 10, 0, 10, 0]);
    expectDeviations(tunings[1], [0, 10, 0, 10, 0, 0, 10, 1.96, 10, 5.87, 10, -11.73]);
  });

  it("returns an empty list for no tuning specs", () => {
    expect(tuningListFromComposition(composition({ tuningSpecs: [] }))).toEqual([]);
  });

  it("lets mapper errors through", () => {
    const comma = ratiosScale("comma", [[1, 1], [9, 8], [5, 4], [81, 64], [4, 3]]);
    expect(() =>
      tuningListFromComposition(composition({
        tuningSpecs: [onC, { scale: comma, transposition: UNISON, tuningMapper: mapper }],
      })),
    ).toThrow(TuningMapperConflictError);
  });
});
