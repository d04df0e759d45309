/**
 * On-device preset tools: load_preset, save_preset, set_eq_mode,
 * get_preset_name, set_preset_name.
 */

import type { DeviceRegistry, DiscoveredDevice } from "../core/device-registry.js";
import type { DeviceHandler, EqMode, PresetController } from "../core/handler.js";
import { NotSupportedError } from "../core/errors.js";
import { deviceSummary, toJson } from "./format.js";

function requirePresets(handler: DeviceHandler): PresetController {
  const presets = handler.capabilities().supportsPresets ? handler.presetController() : undefined;
  if (!presets) throw new NotSupportedError(`${handler.name} does not support on-device presets`);
  return presets;
}

/** Connect, resolve the preset controller, run `fn`, report success. */
async function withPresets(
  registry: DeviceRegistry,
  deviceId: number | undefined,
  fn: (presets: PresetController) => Promise<Record<string, unknown>>,
): Promise<string> {
  return registry.withDevice(deviceId, async (handler: DeviceHandler, device: DiscoveredDevice) => {
    const result = await fn(requirePresets(handler));
    return toJson({ ...deviceSummary(device, handler), status: "success", ...result });
  });
}

export interface PresetSlotInput {
  deviceId?: number;
  group: string;
  index: number;
}

export async function executeLoadPreset(registry: DeviceRegistry, input: PresetSlotInput): Promise<string> {
  return withPresets(registry, input.deviceId, async (presets) => {
    await presets.loadPreset(input.group, input.index);
    return { group: input.group, preset: input.index };
  });
}

export async function executeSavePreset(registry: DeviceRegistry, input: PresetSlotInput): Promise<string> {
  return withPresets(registry, input.deviceId, async (presets) => {
    await presets.savePreset(input.group, input.index);
    return { group: input.group, preset: input.index };
  });
}

export interface SetEqModeInput {
  deviceId?: number;
  mode: EqMode;
}

export async function executeSetEqMode(registry: DeviceRegistry, input: SetEqModeInput): Promise<string> {
  return withPresets(registry, input.deviceId, async (presets) => {
    await presets.setEqMode(input.mode);
    return { mode: input.mode };
  });
}

export async function executeGetPresetName(registry: DeviceRegistry, input: PresetSlotInput): Promise<string> {
  return withPresets(registry, input.deviceId, async (presets) => {
    const name = await presets.getPresetName(input.index, input.group);
    return { group: input.group, preset: input.index, name };
  });
}

export interface SetPresetNameInput extends PresetSlotInput {
  name: string;
}

export async function executeSetPresetName(registry: DeviceRegistry, input: SetPresetNameInput): Promise<string> {
  return withPresets(registry, input.deviceId, async (presets) => {
    await presets.setPresetName(input.index, input.name, input.group);
    return { group: input.group, preset: input.index, name: input.name };
  });
}
