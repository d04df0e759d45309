/**
 * Shared types for PEQ profiles, device capabilities, and discovered devices.
 */

// ---------------------------------------------------------------------------
// Filters and profiles
// ---------------------------------------------------------------------------

/** Filter type codes, AutoEQ naming. */
export const FILTER_TYPES = ["PK", "LSQ", "HSQ", "LPF", "HPF"] as const;

export type FilterType = (typeof FILTER_TYPES)[number];

export interface FilterDefinition {
  /** Center / corner frequency in Hz */
  readonly freq: number;
  /** Gain in dB */
  readonly gain: number;
  readonly q: number;
  readonly type: FilterType;
}

export interface PEQProfile {
  readonly filters: readonly FilterDefinition[];
  /** Broadband gain applied before the filter chain, in dB */
  readonly pregain: number;
}

/** Result of reading one filter slot from a device. */
export type SlotReading =
  | { kind: "filter"; filter: FilterDefinition }
  | { kind: "empty" };

// ---------------------------------------------------------------------------
// Capabilities
// ---------------------------------------------------------------------------

/** Inclusive [min, max] range. */
export type Range = readonly [min: number, max: number];

export interface DeviceCapabilities {
  readonly maxFilters: number;
  readonly gainRange: Range;
  readonly pregainRange: Range;
  readonly qRange: Range;
  readonly freqRange: Range;
  readonly supportedFilterTypes: ReadonlySet<FilterType>;
  readonly supportsRead: boolean;
  readonly supportsWrite: boolean;
  /** Pregain can be changed without rewriting the filter chain. */
  readonly supportsDirectPregainWrite: boolean;
  /** Handler exposes a PresetController. */
  readonly supportsPresets: boolean;
  /** Addressable EQ groups. Empty for single-engine devices. */
  readonly groups: readonly string[];
}

// ---------------------------------------------------------------------------
// Devices
// ---------------------------------------------------------------------------

/** Raw description of one enumerated HID interface. */
export interface HidDeviceInfo {
  vendorId: number;
  productId: number;
  /** Transport-specific open path */
  path: string;
  product: string;
  manufacturer: string;
  serialNumber: string;
  usagePage: number;
  interfaceNumber: number;
}

/** Per-call options for read/write operations. */
export interface PeqOptions {
  /** EQ group name, for devices with several groups ("USR", "SPK", "B20") */
  group?: string;
}
