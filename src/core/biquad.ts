/**
 * Biquad coefficient calculation (RBJ Audio EQ Cookbook).
 *
 * Coefficients are normalized by a0 and returned in the order DSP firmware
 * consumes them: b0, b1, b2, -a1, -a2.
 */

import type { FilterType } from "./types.js";

export interface BiquadCoefficients {
  b0: number;
  b1: number;
  b2: number;
  /** -a1 (already negated) */
  a1: number;
  /** -a2 (already negated) */
  a2: number;
}

export type ShapedFilterType = Extract<FilterType, "PK" | "LSQ" | "HSQ">;

/** Identity section: passes the signal unchanged. */
export const IDENTITY_BIQUAD: BiquadCoefficients = { b0: 1, b1: 0, b2: 0, a1: 0, a2: 0 };

/**
 * Compute coefficients for a peaking or shelving section.
 */
export function computeBiquad(
  type: ShapedFilterType,
  freq: number,
  gainDb: number,
  q: number,
  sampleRate: number,
): BiquadCoefficients {
  const A = Math.pow(10, gainDb / 40);
  const w0 = (2 * Math.PI * freq) / sampleRate;
  const cosW0 = Math.cos(w0);
  const alpha = Math.sin(w0) / (2 * q);
  const sqrtA2alpha = 2 * Math.sqrt(A) * alpha;

  let b0: number, b1: number, b2: number, a0: number, a1: number, a2: number;
  switch (type) {
    case "PK":
      b0 = 1 + alpha * A;
      b1 = -2 * cosW0;
      b2 = 1 - alpha * A;
      a0 = 1 + alpha / A;
      a1 = -2 * cosW0;
      a2 = 1 - alpha / A;
      break;
    case "LSQ":
      b0 = A * ((A + 1) - (A - 1) * cosW0 + sqrtA2alpha);
      b1 = 2 * A * ((A - 1) - (A + 1) * cosW0);
      b2 = A * ((A + 1) - (A - 1) * cosW0 - sqrtA2alpha);
      a0 = (A + 1) + (A - 1) * cosW0 + sqrtA2alpha;
      a1 = -2 * ((A - 1) + (A + 1) * cosW0);
      a2 = (A + 1) + (A - 1) * cosW0 - sqrtA2alpha;
      break;
    case "HSQ":
      b0 = A * ((A + 1) + (A - 1) * cosW0 + sqrtA2alpha);
      b1 = -2 * A * ((A - 1) + (A + 1) * cosW0);
      b2 = A * ((A + 1) + (A - 1) * cosW0 - sqrtA2alpha);
      a0 = (A + 1) - (A - 1) * cosW0 + sqrtA2alpha;
      a1 = 2 * ((A - 1) - (A + 1) * cosW0);
      a2 = (A + 1) - (A - 1) * cosW0 - sqrtA2alpha;
      break;
    default: {
      const unknown: never = type;
      throw new Error(`No biquad design for filter type ${String(unknown)}`);
    }
  }

  return {
    b0: b0 / a0,
    b1: b1 / a0,
    b2: b2 / a0,
    a1: -a1 / a0,
    a2: -a2 / a0,
  };
}

/**
 * Scale coefficients to fixed point (value × scale, rounded).
 * Returns null if any scaled value does not fit a signed 32-bit integer.
 */
export function toFixedPoint(coeffs: BiquadCoefficients, scale: number): number[] | null {
  const scaled = [coeffs.b0, coeffs.b1, coeffs.b2, coeffs.a1, coeffs.a2].map((c) => Math.round(c * scale));
  const fits = scaled.every((v) => v >= -0x80000000 && v <= 0x7fffffff);
  return fits ? scaled : null;
}
