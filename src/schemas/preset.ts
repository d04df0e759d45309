/**
 * Zod schemas for on-device preset tools.
 */

import { z } from "zod";
import { deviceIdField } from "./device.js";

const presetGroupField = z
  .enum(["USR", "SPK", "B20"])
  .default("USR")
  .describe('EQ group. Default: "USR".');

const customSlotField = z
  .number()
  .int()
  .describe("Custom preset slot (22-41).");

export const loadPresetSchema = {
  deviceId: deviceIdField,
  group: presetGroupField,
  index: z
    .number()
    .int()
    .describe("Preset slot: 0 = flat, 1-21 = factory, 22-41 = custom, 42-52 = QxOver (SPK only)."),
};

export const savePresetSchema = {
  deviceId: deviceIdField,
  group: presetGroupField,
  index: customSlotField,
};

export const setEqModeSchema = {
  deviceId: deviceIdField,
  mode: z
    .enum(["usr_spk", "b20"])
    .describe('"usr_spk": USR and SPK groups active. "b20": 20-band group active.'),
};

export const getPresetNameSchema = {
  deviceId: deviceIdField,
  group: presetGroupField,
  index: customSlotField,
};

export const setPresetNameSchema = {
  deviceId: deviceIdField,
  group: presetGroupField,
  index: customSlotField,
  name: z.string().describe("Preset name. Truncated to 20 UTF-8 bytes."),
};
