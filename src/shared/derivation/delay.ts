/**
 * Link delay normalization.
 */

import { InvalidDelayError, type TopologyErrorContext } from "../errors";

export type DelayUnit = "ms" | "us" | "s";

export interface NormalizedDelay {
  magnitude: number;
  unit: DelayUnit;
}

// Longest suffix first: "ms" and "us" both end in "s".
const SUFFIXES: readonly DelayUnit[] = ["ms", "us", "s"];

const MAGNITUDE_RE = /^\d+(?:\.\d+)?$/;

/**
 * Splits a delay such as `"10ms"` into magnitude and unit.
 * A value without a unit suffix is taken as milliseconds.
 *
 * @throws InvalidDelayError if the magnitude is not a non-negative number
 */
export function parseDelay(text: string, context?: TopologyErrorContext): NormalizedDelay {
  const value = text.trim();
  let unit: DelayUnit = "ms";
  let magnitudeText = value;

  for (const suffix of SUFFIXES) {
    if (value.endsWith(suffix)) {
      unit = suffix;
      magnitudeText = value.slice(0, -suffix.length).trim();
      break;
    }
  }

  if (!MAGNITUDE_RE.test(magnitudeText)) {
    throw new InvalidDelayError(text, context);
  }
  return { magnitude: Number(magnitudeText), unit };
}

export function formatDelay(delay: NormalizedDelay): string {
  return `${delay.magnitude}${delay.unit}`;
}
