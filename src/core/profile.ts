/**
 * FilterDefinition / PEQProfile construction.
 *
 * Values are only built through createFilter/createProfile, which validate
 * the input and return frozen objects.
 */

import { z } from "zod";
import { FILTER_TYPES, type FilterDefinition, type PEQProfile } from "./types.js";
import { InvalidFilterError } from "./errors.js";

export const FilterTypeSchema = z.enum(FILTER_TYPES);

export const FilterDefinitionSchema = z.object({
  freq: z.number().int("freq must be an integer number of Hz").positive("freq must be positive"),
  gain: z.number().finite(),
  q: z.number().finite().positive("q must be positive"),
  type: FilterTypeSchema,
});

export type FilterInput = z.input<typeof FilterDefinitionSchema>;

export const PEQProfileSchema = z.object({
  pregain: z.number().finite().default(0),
  filters: z.array(FilterDefinitionSchema),
});

export type ProfileInput = z.input<typeof PEQProfileSchema>;

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

/**
 * Build a filter.
 * @throws InvalidFilterError when freq/q are not positive or the type is unknown
 */
export function createFilter(input: FilterInput): FilterDefinition {
  const parsed = FilterDefinitionSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidFilterError(`Invalid filter: ${describeIssues(parsed.error)}`);
  }
  return Object.freeze({ ...parsed.data });
}

/**
 * Build a profile. Every filter goes through createFilter; the first
 * invalid filter aborts construction.
 */
export function createProfile(input: { filters: readonly FilterInput[]; pregain?: number }): PEQProfile {
  const filters = input.filters.map((f, i) => {
    try {
      return createFilter(f);
    } catch (err) {
      if (err instanceof InvalidFilterError) {
        throw new InvalidFilterError(`Filter ${i}: ${err.message}`);
      }
      throw err;
    }
  });
  const pregain = input.pregain ?? 0;
  if (!Number.isFinite(pregain)) {
    throw new InvalidFilterError(`Pregain must be a finite number, got ${pregain}`);
  }
  return Object.freeze({ filters: Object.freeze(filters), pregain });
}

/** Plain-object form of a profile, the shape written to JSON files. */
export function serializeProfile(profile: PEQProfile): {
  pregain: number;
  filters: { freq: number; gain: number; q: number; type: FilterDefinition["type"] }[];
} {
  return {
    pregain: profile.pregain,
    filters: profile.filters.map((f) => ({ freq: f.freq, gain: f.gain, q: f.q, type: f.type })),
  };
}
