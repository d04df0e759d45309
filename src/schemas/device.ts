/**
 * Zod schemas shared by every device tool.
 */

import { z } from "zod";

export const deviceIdField = z
  .number()
  .int()
  .min(0)
  .optional()
  .describe(
    "Device ID (0-based index from list_devices). " +
      "If omitted, the device is auto-selected when exactly one is connected.",
  );

export const groupField = z
  .enum(["USR", "SPK", "B20"])
  .optional()
  .describe('EQ group for devices with several EQ engines (Qudelix: "USR", "SPK", "B20"). Default: "USR".');

export const deviceSelectionSchema = {
  deviceId: deviceIdField,
};

export const getDeviceCapabilitiesSchema = {
  deviceId: z.number().int().min(0).describe("Device ID (0-based index from list_devices)."),
};
