/**
 * read_peq, write_peq and set_pregain MCP tools.
 */

import type { DeviceRegistry } from "../core/device-registry.js";
import type { DeviceHandler } from "../core/handler.js";
import type { FilterType, PEQProfile, PeqOptions } from "../core/types.js";
import { createProfile } from "../core/profile.js";
import { resolveProfileSource } from "../core/profile-parser.js";
import { ValidationError } from "../core/errors.js";
import { deviceSummary, toJson } from "./format.js";

interface DeviceTarget {
  deviceId?: number;
  group?: string;
}

const peqOptions = (input: DeviceTarget): PeqOptions => (input.group === undefined ? {} : { group: input.group });

// ---------------------------------------------------------------------------
// read_peq
// ---------------------------------------------------------------------------

export async function executeReadPeq(registry: DeviceRegistry, input: DeviceTarget): Promise<string> {
  return registry.withDevice(input.deviceId, async (handler, device) => {
    const profile = await handler.readPeq(peqOptions(input));
    return toJson({
      ...deviceSummary(device, handler),
      ...(input.group !== undefined ? { group: input.group } : {}),
      pregain: profile.pregain,
      filters: profile.filters.map((f, i) => ({ index: i + 1, freq: f.freq, gain: f.gain, q: f.q, type: f.type })),
    });
  });
}

// ---------------------------------------------------------------------------
// write_peq
// ---------------------------------------------------------------------------

export interface WritePeqInput extends DeviceTarget {
  filters?: { freq: number; gain: number; q: number; type: FilterType }[];
  pregain?: number;
  source?: string;
}

/**
 * Build the profile for write_peq from inline filters or a source.
 * Runs before any device is opened.
 */
export async function buildWriteProfile(input: WritePeqInput): Promise<PEQProfile> {
  if (input.filters !== undefined && input.source !== undefined) {
    throw new ValidationError("Provide either `filters` or `source`, not both");
  }
  if (input.source !== undefined) {
    const { profile } = await resolveProfileSource(input.source);
    return input.pregain === undefined ? profile : createProfile({ filters: profile.filters, pregain: input.pregain });
  }
  if (!input.filters || input.filters.length === 0) {
    throw new ValidationError("No filters provided");
  }
  return createProfile({
    filters: input.filters.map((f) => ({ ...f, freq: Math.round(f.freq) })),
    pregain: input.pregain ?? 0,
  });
}

export async function executeWritePeq(registry: DeviceRegistry, input: WritePeqInput): Promise<string> {
  const profile = await buildWriteProfile(input);
  return registry.withDevice(input.deviceId, async (handler, device) => {
    await handler.writePeq(profile, peqOptions(input));
    return toJson({
      ...deviceSummary(device, handler),
      status: "success",
      filtersWritten: profile.filters.length,
      pregain: profile.pregain,
    });
  });
}

// ---------------------------------------------------------------------------
// set_pregain
// ---------------------------------------------------------------------------

export interface SetPregainInput extends DeviceTarget {
  pregain: number;
}

export type PregainMethod = "direct" | "read-modify-write" | "pregain-only";

/**
 * Change pregain, keeping the filters where the device allows it:
 * direct write when supported, else read the current profile and write it
 * back with the new pregain, else write pregain with no filters.
 */
export async function applyPregain(
  handler: DeviceHandler,
  pregain: number,
  options: PeqOptions = {},
): Promise<PregainMethod> {
  const caps = handler.capabilities();
  if (caps.supportsDirectPregainWrite) {
    await handler.setPregain(pregain, options);
    return "direct";
  }
  if (caps.supportsRead) {
    const current = await handler.readPeq(options);
    await handler.writePeq(createProfile({ filters: current.filters, pregain }), options);
    return "read-modify-write";
  }
  await handler.writePeq(createProfile({ filters: [], pregain }), options);
  return "pregain-only";
}

export async function executeSetPregain(registry: DeviceRegistry, input: SetPregainInput): Promise<string> {
  return registry.withDevice(input.deviceId, async (handler, device) => {
    const method = await applyPregain(handler, input.pregain, peqOptions(input));
    return toJson({ ...deviceSummary(device, handler), status: "success", pregain: input.pregain, method });
  });
}
