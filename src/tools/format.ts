/**
 * Shared tool output formatting.
 */

import { DeviceError, InvalidFilterError, ValidationError } from "../core/errors.js";
import type { DiscoveredDevice } from "../core/device-registry.js";
import type { DeviceHandler } from "../core/handler.js";

export function toJson(value: unknown): string {
  return JSON.stringify(value, null, 2);
}

/** "0x3302" */
export function hexId(value: number): string {
  return `0x${value.toString(16).toUpperCase().padStart(4, "0")}`;
}

/** Fields every device tool reports about its target. */
export function deviceSummary(device: DiscoveredDevice, handler: DeviceHandler): { device: string; handler: string } {
  return { device: device.product, handler: handler.name };
}

/**
 * Tool error text, prefixed with its category:
 *   "Validation error:" input rejected before any device traffic
 *   "Device error:" discovery, connection or protocol failure
 *   "Error:" anything else
 */
export function formatToolError(error: unknown): string {
  const msg = error instanceof Error ? error.message : String(error);
  if (error instanceof ValidationError || error instanceof InvalidFilterError) return `Validation error: ${msg}`;
  if (error instanceof DeviceError) return `Device error: ${msg}`;
  return `Error: ${msg}`;
}
