/**
 * Shared types for array literal decoding.
 */

export const TEXT_ENCODER = new TextEncoder();
// ignoreBOM keeps a leading U+FEFF as data
export const TEXT_DECODER = new TextDecoder("utf-8", { ignoreBOM: true });

/** Value tree produced when decoding into a dynamic destination. */
export type DynamicValue = null | boolean | number | string | DynamicValue[];

/** Writable reference to a destination. */
export interface Ref<T> {
  value: T;
}

/** Counters filled in by a decode call when passed in DecodeOptions.stats. */
export interface DecodeStats {
  /** Backing-array reallocations of growable sequences. */
  reallocations: number;
  /** Largest backing-array capacity allocated. */
  peakCapacity: number;
  /** Array elements visited, including discarded ones. */
  elements: number;
  /** Type errors encountered (only the first is returned). */
  typeErrors: number;
}

export interface DecodeOptions {
  /** Log decode events to the console. */
  debug?: boolean;
  stats?: DecodeStats;
}

export function createStats(): DecodeStats {
  return { reallocations: 0, peakCapacity: 0, elements: 0, typeErrors: 0 };
}
