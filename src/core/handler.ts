/**
 * Protocol handler contract.
 *
 * DeviceHandler is the base class of every vendor handler. Public read/write
 * operations are template methods: the base class checks the connection,
 * capability flags and profile validity, then calls the vendor's protected
 * implementation. No wire traffic happens before validation passes.
 */

import type {
  DeviceCapabilities,
  FilterType,
  HidDeviceInfo,
  PEQProfile,
  PeqOptions,
  Range,
} from "./types.js";
import {
  ConnectionError,
  NotConnectedError,
  NotSupportedError,
  ProfileValidationError,
} from "./errors.js";
import { systemClock, type Clock } from "./poll.js";
import type { HidBackend, HidTransport } from "../hid/transport.js";
import { hex, silentLogger, type Logger } from "../utils/logger.js";

// ---------------------------------------------------------------------------
// Optional capability: on-device presets
// ---------------------------------------------------------------------------

export type EqMode = "usr_spk" | "b20";

export interface PresetController {
  /** Recall a stored preset into the group's active EQ. */
  loadPreset(group: string, index: number): Promise<void>;
  /** Store the group's active EQ into a custom slot. */
  savePreset(group: string, index: number): Promise<void>;
  /** Switch which groups are active. */
  setEqMode(mode: EqMode): Promise<void>;
  getPresetName(index: number, group: string): Promise<string>;
  setPresetName(index: number, name: string, group: string): Promise<void>;
}

// ---------------------------------------------------------------------------
// Diagnostics
// ---------------------------------------------------------------------------

export interface DiagnosticProbe {
  name: string;
  ok: boolean;
  detail: string;
}

export interface DiagnosticReport {
  handler: string;
  capabilities: { maxFilters: number; groups: readonly string[] };
  probes: DiagnosticProbe[];
}

/** Run one probe, turning a failure into a failed probe entry. */
export async function probe(name: string, run: () => Promise<string> | string): Promise<DiagnosticProbe> {
  try {
    return { name, ok: true, detail: await run() };
  } catch (err) {
    return { name, ok: false, detail: err instanceof Error ? err.message : String(err) };
  }
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

const inRange = (value: number, [min, max]: Range) => value >= min && value <= max;

/**
 * Check a profile against a capability envelope.
 *
 * Order: filter count, pregain, then per filter (in order) type, gain,
 * freq, q. Throws on the first violation.
 */
export function validateProfile(
  handlerName: string,
  caps: DeviceCapabilities,
  profile: PEQProfile,
): void {
  if (profile.filters.length > caps.maxFilters) {
    throw new ProfileValidationError(
      `${handlerName} supports max ${caps.maxFilters} filters, got ${profile.filters.length}`,
      { field: "filterCount" },
    );
  }

  if (!inRange(profile.pregain, caps.pregainRange)) {
    throw new ProfileValidationError(
      `Pregain ${profile.pregain}dB out of range ${caps.pregainRange[0]}dB to ${caps.pregainRange[1]}dB`,
      { field: "pregain" },
    );
  }

  profile.filters.forEach((f, i) => {
    if (!caps.supportedFilterTypes.has(f.type)) {
      throw new ProfileValidationError(
        `Filter ${i}: ${handlerName} doesn't support type '${f.type}'. ` +
          `Supported types: ${[...caps.supportedFilterTypes].sort().join(", ")}`,
        { field: "type", filterIndex: i },
      );
    }
    if (!inRange(f.gain, caps.gainRange)) {
      throw new ProfileValidationError(
        `Filter ${i}: gain ${f.gain}dB out of range ${caps.gainRange[0]}dB to ${caps.gainRange[1]}dB`,
        { field: "gain", filterIndex: i },
      );
    }
    if (!inRange(f.freq, caps.freqRange)) {
      throw new ProfileValidationError(
        `Filter ${i}: frequency ${f.freq}Hz out of range ${caps.freqRange[0]}Hz to ${caps.freqRange[1]}Hz`,
        { field: "freq", filterIndex: i },
      );
    }
    if (!inRange(f.q, caps.qRange)) {
      throw new ProfileValidationError(
        `Filter ${i}: Q ${f.q} out of range ${caps.qRange[0]} to ${caps.qRange[1]}`,
        { field: "q", filterIndex: i },
      );
    }
  });
}

// ---------------------------------------------------------------------------
// Base handler
// ---------------------------------------------------------------------------

export interface HandlerOptions<T extends object> {
  backend: HidBackend;
  clock?: Clock;
  logger?: Logger;
  /** Overrides for the handler's timing constants (ms). */
  timing?: Partial<T>;
}

/** Constructs fresh handler instances of one type. */
export interface HandlerFactory {
  create(): DeviceHandler;
}

export abstract class DeviceHandler {
  abstract readonly name: string;
  abstract readonly vendorId: number;
  /** Product ids this handler accepts, or null for any product of the vendor. */
  abstract readonly productIds: readonly number[] | null;

  abstract capabilities(): DeviceCapabilities;

  protected readonly backend: HidBackend;
  protected readonly clock: Clock;
  protected readonly logger: Logger;
  protected transport: HidTransport | null = null;

  constructor(options: { backend: HidBackend; clock?: Clock; logger?: Logger }) {
    this.backend = options.backend;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? silentLogger;
  }

  /** Default match: vendor id, plus product id when productIds is set. */
  matchesDevice(device: HidDeviceInfo): boolean {
    if (device.vendorId !== this.vendorId) return false;
    if (this.productIds !== null) return this.productIds.includes(device.productId);
    return true;
  }

  isConnected(): boolean {
    return this.transport !== null;
  }

  /**
   * Open the given interface by path.
   * @throws ConnectionError if the transport cannot be opened
   */
  connect(device: HidDeviceInfo): void {
    if (this.transport) this.disconnect();
    let transport: HidTransport;
    try {
      transport = this.backend.open(device.path);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new ConnectionError(`Failed to open ${device.product || device.path}: ${reason}`, err);
    }
    try {
      transport.setNonBlocking(false);
    } catch (err) {
      closeQuietly(transport, this.logger);
      const reason = err instanceof Error ? err.message : String(err);
      throw new ConnectionError(`Failed to open ${device.product || device.path}: ${reason}`, err);
    }
    this.transport = transport;
    this.onConnected();
    this.logger.debug(`connected to ${device.product || device.path}`);
  }

  /** Release the transport. Safe to call at any time; never throws. */
  disconnect(): void {
    const transport = this.transport;
    this.transport = null;
    if (transport) closeQuietly(transport, this.logger);
  }

  async readPeq(options: PeqOptions = {}): Promise<PEQProfile> {
    this.requireTransport();
    this.checkOptions(options, (caps) => {
      if (!caps.supportsRead) {
        throw new NotSupportedError(`${this.name} does not support reading PEQ settings`);
      }
    });
    return this.readProfile(options);
  }

  async writePeq(profile: PEQProfile, options: PeqOptions = {}): Promise<void> {
    this.requireTransport();
    this.checkOptions(options, (caps) => {
      if (!caps.supportsWrite) {
        throw new NotSupportedError(`${this.name} does not support writing PEQ settings`);
      }
      validateProfile(this.name, caps, profile);
    });
    await this.writeProfile(profile, options);
  }

  /** Change pregain without touching the filter chain. */
  async setPregain(pregain: number, options: PeqOptions = {}): Promise<void> {
    this.requireTransport();
    this.checkOptions(options, (caps) => {
      if (!caps.supportsDirectPregainWrite) {
        throw new NotSupportedError(`${this.name} cannot write pregain on its own`);
      }
      validateProfile(this.name, caps, { filters: [], pregain });
    });
    await this.writePregain(pregain, options);
  }

  /**
   * Exercise the connection and report each exchange instead of throwing.
   * @throws NotConnectedError
   */
  async diagnose(): Promise<DiagnosticReport> {
    this.requireTransport();
    const caps = this.capabilities();
    return {
      handler: this.name,
      capabilities: { maxFilters: caps.maxFilters, groups: caps.groups },
      probes: await this.diagnosticProbes(),
    };
  }

  /** Preset management, for handlers whose capabilities declare supportsPresets. */
  presetController(): PresetController | undefined {
    return undefined;
  }

  protected abstract readProfile(options: PeqOptions): Promise<PEQProfile>;
  protected abstract writeProfile(profile: PEQProfile, options: PeqOptions): Promise<void>;

  protected async writePregain(_pregain: number, _options: PeqOptions): Promise<void> {
    throw new NotSupportedError(`${this.name} cannot write pregain on its own`);
  }

  /** Default probe: a full PEQ read. */
  protected async diagnosticProbes(): Promise<DiagnosticProbe[]> {
    return [
      await probe("read_peq", async () => {
        const profile = await this.readPeq();
        return `${profile.filters.length} active filters, pregain ${profile.pregain} dB`;
      }),
    ];
  }

  /** Hook run after a successful connect. */
  protected onConnected(): void {}

  /**
   * Apply per-call options. Handlers with EQ groups override this and
   * return a function that restores the previous selection; the default
   * rejects a group selection.
   */
  protected applyOptions(options: PeqOptions): (() => void) | undefined {
    if (options.group !== undefined) {
      throw new NotSupportedError(`${this.name} has no selectable EQ groups`);
    }
    return undefined;
  }

  /** Apply options and run the pre-traffic checks; a failed check restores the options. */
  private checkOptions(options: PeqOptions, check: (caps: DeviceCapabilities) => void): void {
    const restore = this.applyOptions(options);
    try {
      check(this.capabilities());
    } catch (err) {
      restore?.();
      throw err;
    }
  }

  protected requireTransport(): HidTransport {
    if (!this.transport) throw new NotConnectedError();
    return this.transport;
  }

  /** Write one report (report ID prepended) and log it at debug level. */
  protected send(reportId: number, packet: readonly number[] | Buffer): void {
    const transport = this.requireTransport();
    const report = [reportId, ...packet];
    transport.write(report);
    this.logger.debug(`→ ${hex(report)}`);
  }

  /** Read one report and log it at debug level. */
  protected receive(maxLength: number, timeoutMs: number): Buffer | null {
    const data = this.requireTransport().read(maxLength, timeoutMs);
    if (data) this.logger.debug(`← ${hex(data)}`);
    return data;
  }
}

function closeQuietly(transport: HidTransport, logger: Logger): void {
  try {
    transport.close();
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    logger.warn(`error while closing transport: ${reason}`);
  }
}

// ---------------------------------------------------------------------------
// Capability helpers
// ---------------------------------------------------------------------------

/** Fill the flags most handlers share. */
export function defineCapabilities(
  caps: Pick<DeviceCapabilities, "maxFilters"> & {
    supportedFilterTypes: readonly FilterType[];
  } & Partial<Omit<DeviceCapabilities, "maxFilters" | "supportedFilterTypes">>,
): DeviceCapabilities {
  return Object.freeze({
    gainRange: [-20, 20] as const,
    pregainRange: [-12, 12] as const,
    freqRange: [20, 20000] as const,
    qRange: [0.1, 10] as const,
    supportsRead: true,
    supportsWrite: true,
    supportsDirectPregainWrite: false,
    supportsPresets: false,
    groups: [],
    ...caps,
    supportedFilterTypes: new Set(caps.supportedFilterTypes),
  });
}
