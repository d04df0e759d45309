/**
 * Profile sources: serialized profile JSON and AutoEQ "ParametricEQ.txt".
 *
 * A source string is either inline content or a path to a file holding
 * either format.
 */

import fs from "node:fs/promises";
import path from "node:path";
import { createProfile, PEQProfileSchema, type FilterInput } from "./profile.js";
import type { FilterType, PEQProfile } from "./types.js";
import { ValidationError } from "./errors.js";

export type ProfileFormat = "json" | "autoeq";

export interface ResolvedProfile {
  profile: PEQProfile;
  format: ProfileFormat;
  filePath?: string;
}

// ---------------------------------------------------------------------------
// JSON
// ---------------------------------------------------------------------------

export function parseProfileJson(text: string): PEQProfile {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err) {
    throw new ValidationError(`Invalid profile JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  const parsed = PEQProfileSchema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    throw new ValidationError(`Invalid profile: ${where}${issue.message}`);
  }
  return createProfile(parsed.data);
}

// ---------------------------------------------------------------------------
// AutoEQ
// ---------------------------------------------------------------------------

const AUTOEQ_TYPES: Record<string, FilterType> = {
  PK: "PK",
  PEQ: "PK",
  LS: "LSQ",
  LSC: "LSQ",
  LSQ: "LSQ",
  HS: "HSQ",
  HSC: "HSQ",
  HSQ: "HSQ",
  LP: "LPF",
  LPQ: "LPF",
  HP: "HPF",
  HPQ: "HPF",
};

const PREAMP_LINE = /^Preamp:\s*([-+]?\d+(?:\.\d+)?)\s*dB/i;
const FILTER_LINE = /^Filter\s*\d*\s*:\s*(ON|OFF)\s+([A-Z]+)\s+Fc\s+([\d.]+)\s*Hz(.*)$/i;
const GAIN_PART = /Gain\s+([-+]?\d+(?:\.\d+)?)\s*dB/i;
const Q_PART = /\bQ\s+(\d+(?:\.\d+)?)/i;

/** Q used for pass filters listed without one (Butterworth). */
const DEFAULT_Q = 0.707;

/**
 * Parse AutoEQ ParametricEQ.txt content.
 *
 *   Preamp: -6.2 dB
 *   Filter 1: ON PK Fc 100 Hz Gain -3.5 dB Q 1.41
 *
 * OFF filters are skipped; frequencies are rounded to whole Hz.
 */
export function parseAutoEq(text: string): PEQProfile {
  let pregain = 0;
  const filters: FilterInput[] = [];

  text.split(/\r?\n/).forEach((raw, lineIndex) => {
    const line = raw.trim();
    const preamp = PREAMP_LINE.exec(line);
    if (preamp) {
      pregain = Number(preamp[1]);
      return;
    }

    const match = FILTER_LINE.exec(line);
    if (!match) return;
    const [, state, code, fc, rest] = match;
    if (state.toUpperCase() === "OFF") return;

    const type = AUTOEQ_TYPES[code.toUpperCase()];
    if (!type) {
      throw new ValidationError(`Line ${lineIndex + 1}: unsupported AutoEQ filter type '${code}'`);
    }
    const gain = GAIN_PART.exec(rest);
    const q = Q_PART.exec(rest);
    filters.push({
      freq: Math.round(Number(fc)),
      gain: gain ? Number(gain[1]) : 0,
      q: q ? Number(q[1]) : DEFAULT_Q,
      type,
    });
  });

  if (filters.length === 0) {
    throw new ValidationError("No valid filters found in AutoEQ text");
  }
  return createProfile({ filters, pregain });
}

// ---------------------------------------------------------------------------
// Source resolution
// ---------------------------------------------------------------------------

function detectFormat(text: string): ProfileFormat | null {
  const trimmed = text.trimStart();
  if (trimmed.startsWith("{")) return "json";
  if (/^(Preamp|Filter)\b/im.test(trimmed)) return "autoeq";
  return null;
}

export function parseProfileText(text: string, format: ProfileFormat): PEQProfile {
  return format === "json" ? parseProfileJson(text) : parseAutoEq(text);
}

/**
 * Resolve a source string to a profile.
 *
 * Inline JSON or AutoEQ text is parsed directly; anything else is treated
 * as a file path and read from disk.
 */
export async function resolveProfileSource(source: string): Promise<ResolvedProfile> {
  const inline = detectFormat(source);
  if (inline) return { profile: parseProfileText(source, inline), format: inline };

  const filePath = path.resolve(source.trim());
  const text = await fs.readFile(filePath, "utf-8");
  const format = detectFormat(text) ?? (path.extname(filePath).toLowerCase() === ".json" ? "json" : "autoeq");
  return { profile: parseProfileText(text, format), format, filePath };
}
