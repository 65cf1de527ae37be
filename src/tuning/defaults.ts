/**
 * Numeric defaults shared by mappers, reducers and tool schemas.
 */

/** Number of keys (pitch classes) in one octave of the keyboard. */
export const TUNING_SIZE = 12;

/**
 * Tolerance in cents used when comparing deviations for equality. Absorbs the
 * conversion error between ratio, cents and EDO intervals.
 */
export const DEFAULT_CENTS_TOLERANCE = 0.01;

/**
 * Inclusive tolerance in cents for detecting a quarter tone: a deviation
 * counts as one when its absolute value is within this distance of 50.
 */
export const DEFAULT_QUARTER_TONE_TOLERANCE = 13;

/** Concert pitch frequency in Hz for A4. */
export const CONCERT_PITCH_FREQ = 440;

/** MIDI note number of A4. */
export const CONCERT_PITCH_MIDI_NOTE = 69;

/** Exclusive bounds for deviations computed by the manual mapper. */
export const MIN_EXCLUSIVE_DEVIATION = -100;
export const MAX_EXCLUSIVE_DEVIATION = 100;
