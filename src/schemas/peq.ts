/**
 * Zod schemas for read_peq, write_peq and set_pregain.
 */

import { z } from "zod";
import { FilterTypeSchema } from "../core/profile.js";
import { deviceIdField, groupField } from "./device.js";

export const filterSchema = z.object({
  freq: z.number().describe("Center/corner frequency in Hz (rounded to a whole number)."),
  gain: z.number().describe("Gain in dB."),
  q: z.number().describe("Q factor."),
  type: FilterTypeSchema.describe("Filter type: PK (peaking), LSQ/HSQ (shelves), LPF/HPF (pass)."),
});

export const readPeqSchema = {
  deviceId: deviceIdField,
  group: groupField,
};

export const writePeqSchema = {
  deviceId: deviceIdField,
  group: groupField,
  filters: z
    .array(filterSchema)
    .optional()
    .describe("Filters to write, in band order. Max count depends on the device (see get_device_capabilities)."),
  pregain: z
    .number()
    .optional()
    .describe("Pregain in dB. Overrides the pregain of `source` when both are given. Default: 0."),
  source: z
    .string()
    .min(1)
    .optional()
    .describe(
      "Profile to write instead of `filters`: profile JSON ({ pregain, filters }), " +
        "AutoEQ ParametricEQ.txt content, or an absolute path to either.",
    ),
};

export const setPregainSchema = {
  deviceId: deviceIdField,
  group: groupField,
  pregain: z.number().describe("Pregain in dB."),
};
