/**
 * list_devices, get_device_capabilities and diagnose MCP tools.
 */

import type { DeviceRegistry } from "../core/device-registry.js";
import type { DeviceCapabilities } from "../core/types.js";
import { deviceSummary, hexId, toJson } from "./format.js";

const NO_DEVICES = "No DSP devices found. Connect a device and try again.";

const sortedTypes = (caps: DeviceCapabilities) => [...caps.supportedFilterTypes].sort();

const range = ([min, max]: readonly [number, number]) => ({ min, max });

/**
 * Execute the list_devices tool.
 * @returns JSON list of matched devices, or a notice when none are attached
 */
export function executeListDevices(registry: DeviceRegistry): string {
  const devices = registry.discoverDevices();
  if (devices.length === 0) return NO_DEVICES;

  return toJson({
    devices: devices.map((d) => {
      const caps = d.handler.capabilities();
      return {
        id: d.id,
        product: d.product,
        handler: d.handler.name,
        vendorId: hexId(d.vendorId),
        productId: hexId(d.productId),
        maxFilters: caps.maxFilters,
        supportedTypes: sortedTypes(caps),
        supportsRead: caps.supportsRead,
        supportsWrite: caps.supportsWrite,
        supportsPresets: caps.supportsPresets,
        groups: caps.groups,
      };
    }),
  });
}

export interface GetDeviceCapabilitiesInput {
  deviceId: number;
}

export function executeGetDeviceCapabilities(registry: DeviceRegistry, input: GetDeviceCapabilitiesInput): string {
  registry.discoverDevices();
  const info = registry.getDeviceInfo(input.deviceId);
  const caps = info.capabilities;

  return toJson({
    device: info.product,
    handler: info.handler.name,
    capabilities: {
      maxFilters: caps.maxFilters,
      gainRange: range(caps.gainRange),
      pregainRange: range(caps.pregainRange),
      freqRange: range(caps.freqRange),
      qRange: range(caps.qRange),
      supportedFilterTypes: sortedTypes(caps),
      supportsRead: caps.supportsRead,
      supportsWrite: caps.supportsWrite,
      supportsDirectPregainWrite: caps.supportsDirectPregainWrite,
      supportsPresets: caps.supportsPresets,
      groups: caps.groups,
    },
  });
}

export interface DiagnoseInput {
  deviceId?: number;
}

/** Execute the diagnose tool: raw probes against the device, failures reported inline. */
export async function executeDiagnose(registry: DeviceRegistry, input: DiagnoseInput): Promise<string> {
  return registry.withDevice(input.deviceId, async (handler, device) => {
    const report = await handler.diagnose();
    return toJson({ ...deviceSummary(device, handler), ...report });
  });
}
