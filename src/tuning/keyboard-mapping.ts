/**
 * Explicit assignment of scale degrees (by index) to keyboard keys.
 */

import { isPitchClass, pitchClassName, type PitchClass } from "../intonation/pitch-class.js";
import { TUNING_SIZE } from "./defaults.js";
import { InvalidConfigurationError } from "./errors.js";

export interface KeyboardMapping {
  /** Scale degree index for each pitch class, C first; `undefined` for unmapped keys. */
  readonly indexesInScale: readonly (number | undefined)[];
}

export const KEY_NAMES = [
  "c", "cSharp", "d", "dSharp", "e", "f", "fSharp", "g", "gSharp", "a", "aSharp", "b",
] as const;

export type KeyName = (typeof KEY_NAMES)[number];

export function createKeyboardMapping(indexesInScale: readonly (number | undefined)[]): KeyboardMapping {
  if (indexesInScale.length !== TUNING_SIZE) {
    throw new InvalidConfigurationError(
      `Keyboard mapping needs ${TUNING_SIZE} keys, got ${indexesInScale.length}`,
    );
  }
  indexesInScale.forEach((index, pc) => {
    if (index !== undefined && (!Number.isInteger(index) || index < 0)) {
      throw new InvalidConfigurationError(
        `Invalid scale index ${index} for key ${pitchClassName(pc)}; expected a non-negative integer`,
      );
    }
  });
  return { indexesInScale: [...indexesInScale] };
}

export function emptyKeyboardMapping(): KeyboardMapping {
  return createKeyboardMapping(new Array<number | undefined>(TUNING_SIZE).fill(undefined));
}

/** `keyboardMappingFromKeys({ c: 0, d: 1, e: 2 })` */
export function keyboardMappingFromKeys(keys: Partial<Record<KeyName, number>>): KeyboardMapping {
  return createKeyboardMapping(KEY_NAMES.map((key) => keys[key]));
}

export function keyboardMappingFromEntries(
  entries: Iterable<readonly [PitchClass, number]>,
): KeyboardMapping {
  const indexes = new Array<number | undefined>(TUNING_SIZE).fill(undefined);
  for (const [pc, index] of entries) {
    if (!isPitchClass(pc)) {
      throw new InvalidConfigurationError(`Invalid pitch class ${pc} in keyboard mapping`);
    }
    indexes[pc] = index;
  }
  return createKeyboardMapping(indexes);
}

export function mappedIndexOf(mapping: KeyboardMapping, pitchClass: PitchClass): number | undefined {
  return mapping.indexesInScale[pitchClass];
}

export function updateKeyboardMapping(
  mapping: KeyboardMapping,
  pitchClass: PitchClass,
  index: number,
): KeyboardMapping {
  return createKeyboardMapping(mapping.indexesInScale.map((old, pc) => (pc === pitchClass ? index : old)));
}

/** Mapped `(pitchClass, scaleIndex)` pairs in pitch class order. */
export function keyboardMappingEntries(mapping: KeyboardMapping): [PitchClass, number][] {
  const entries: [PitchClass, number][] = [];
  mapping.indexesInScale.forEach((index, pc) => {
    if (index !== undefined) entries.push([pc, index]);
  });
  return entries;
}

export function mappedIndexes(mapping: KeyboardMapping): Set<number> {
  return new Set(keyboardMappingEntries(mapping).map(([, index]) => index));
}

export function keyboardMappingSize(mapping: KeyboardMapping): number {
  return keyboardMappingEntries(mapping).length;
}

export function isEmptyKeyboardMapping(mapping: KeyboardMapping): boolean {
  return keyboardMappingSize(mapping) === 0;
}
