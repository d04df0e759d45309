/**
 * MCP server: registers the device tools against a caller-owned registry.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";

import type { DeviceRegistry } from "./core/device-registry.js";
import { silentLogger, type Logger } from "./utils/logger.js";
import { formatToolError } from "./tools/format.js";
import { executeDiagnose, executeGetDeviceCapabilities, executeListDevices } from "./tools/devices.js";
import { executeReadPeq, executeSetPregain, executeWritePeq } from "./tools/peq.js";
import {
  executeGetPresetName,
  executeLoadPreset,
  executeSavePreset,
  executeSetEqMode,
  executeSetPresetName,
} from "./tools/presets.js";
import { deviceSelectionSchema, getDeviceCapabilitiesSchema } from "./schemas/device.js";
import { readPeqSchema, setPregainSchema, writePeqSchema } from "./schemas/peq.js";
import {
  getPresetNameSchema,
  loadPresetSchema,
  savePresetSchema,
  setEqModeSchema,
  setPresetNameSchema,
} from "./schemas/preset.js";

export const SERVER_NAME = "dac-eq-mcp";
export const SERVER_VERSION = "0.1.0";

export function createServer(registry: DeviceRegistry, logger: Logger = silentLogger): McpServer {
  const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION });

  async function run(tool: string, execute: () => Promise<string> | string): Promise<CallToolResult> {
    try {
      return { content: [{ type: "text", text: await execute() }] };
    } catch (error) {
      const text = formatToolError(error);
      logger.warn(`${tool}: ${text}`);
      return { content: [{ type: "text", text }], isError: true };
    }
  }

  // -------------------------------------------------------------------------
  // Devices
  // -------------------------------------------------------------------------

  server.tool(
    "list_devices",
    "List all connected DSP devices (Tanchjim, Qudelix, Moondrop) with their capabilities.",
    async () => run("list_devices", () => executeListDevices(registry)),
  );

  server.tool(
    "get_device_capabilities",
    "Get detailed capabilities of one DSP device: max filters, supported filter types, gain/pregain/frequency/Q ranges, EQ groups and preset support.",
    getDeviceCapabilitiesSchema,
    async (input) => run("get_device_capabilities", () => executeGetDeviceCapabilities(registry, input)),
  );

  server.tool(
    "diagnose",
    "Run HID diagnostics on a device. Sends simple read commands and reports each raw exchange, to debug communication issues.",
    deviceSelectionSchema,
    async (input) => run("diagnose", () => executeDiagnose(registry, input)),
  );

  // -------------------------------------------------------------------------
  // PEQ
  // -------------------------------------------------------------------------

  server.tool(
    "read_peq",
    "Read the current PEQ settings (pregain and active filters) from a DSP device.",
    readPeqSchema,
    async (input) => run("read_peq", () => executeReadPeq(registry, input)),
  );

  server.tool(
    "write_peq",
    "Write PEQ settings to a DSP device, replacing all bands. " +
      "Give either `filters` (and optional `pregain`) or a `source` (profile JSON, AutoEQ text, or a file path). " +
      "The profile is validated against the device's capabilities before anything is sent.",
    writePeqSchema,
    async (input) => run("write_peq", () => executeWritePeq(registry, input)),
  );

  server.tool(
    "set_pregain",
    "Set only the pregain of a DSP device. Filters are kept: devices without a direct pregain write " +
      "are read and written back with the new pregain.",
    setPregainSchema,
    async (input) => run("set_pregain", () => executeSetPregain(registry, input)),
  );

  // -------------------------------------------------------------------------
  // Presets (Qudelix)
  // -------------------------------------------------------------------------

  server.tool(
    "load_preset",
    "Load a stored preset into an EQ group's active EQ.",
    loadPresetSchema,
    async (input) => run("load_preset", () => executeLoadPreset(registry, input)),
  );

  server.tool(
    "save_preset",
    "Save an EQ group's active EQ into a custom preset slot (22-41).",
    savePresetSchema,
    async (input) => run("save_preset", () => executeSavePreset(registry, input)),
  );

  server.tool(
    "set_eq_mode",
    "Switch which EQ groups are active: USR+SPK or the 20-band B20 group.",
    setEqModeSchema,
    async (input) => run("set_eq_mode", () => executeSetEqMode(registry, input)),
  );

  server.tool(
    "get_preset_name",
    "Read the name of a custom preset slot (22-41).",
    getPresetNameSchema,
    async (input) => run("get_preset_name", () => executeGetPresetName(registry, input)),
  );

  server.tool(
    "set_preset_name",
    "Name a custom preset slot (22-41). Names are truncated to 20 UTF-8 bytes.",
    setPresetNameSchema,
    async (input) => run("set_preset_name", () => executeSetPresetName(registry, input)),
  );

  return server;
}
