/**
 * Qudelix 5K handler (V3 protocol).
 *
 * Command protocol with several EQ groups and on-device presets. The active
 * EQ of a group is read back as one preset buffer split across chunked
 * responses; writes go one band at a time.
 *
 * Command report (after report ID 8):
 *   [payloadLen + 3, 0x80, cmdHi, cmdLo, payload…] padded to 64 bytes
 * Preset chunk (report ID 9 stripped):
 *   [len, cmdHi, cmdLo, group, (lastIdx << 4) | idx, sizeHi, sizeLo, offHi, offLo, data…]
 *
 * Only the left channel's frequency table is read back; writes send
 * identical parameters to both channels through the group's channel mask.
 */

import type { FilterDefinition, FilterType, HidDeviceInfo, PEQProfile, PeqOptions } from "../core/types.js";
import { createFilter } from "../core/profile.js";
import { CommunicationError, ValidationError } from "../core/errors.js";
import {
  DeviceHandler,
  defineCapabilities,
  type EqMode,
  type HandlerOptions,
  type PresetController,
} from "../core/handler.js";
import { pollUntil } from "../core/poll.js";
import { HID_REPORT_SIZE } from "../hid/transport.js";

export const QUDELIX_VENDOR_ID = 0x0a12;
export const QUDELIX_PRODUCT_ID = 0x4125;
export const QUDELIX_USAGE_PAGE = 0xff00;
export const REPORT_ID_OUT = 8;
export const REPORT_ID_IN = 9;

export const Command = {
  REQ_INIT_DATA: 0x0100,
  REQ_EQ_PRESET: 0x0123,
  RSP_EQ_PRESET: 0x0128,
  SET_EQ_ENABLE: 0x0700,
  SET_EQ_TYPE: 0x0701,
  SET_EQ_PREGAIN: 0x0703,
  SAVE_EQ_PRESET: 0x0708,
  LOAD_EQ_PRESET: 0x0709,
  SET_EQ_PRESET_NAME: 0x070a,
  REQ_EQ_PRESET_NAME: 0x070b,
  RSP_EQ_PRESET_NAME: 0x070c,
  SET_EQ_MODE: 0x070e,
  SET_EQ_BAND_PARAM: 0x070f,
} as const;

// ---------------------------------------------------------------------------
// Groups, presets, filter codes
// ---------------------------------------------------------------------------

/** "standard" buffers carry an L and an R frequency table; "compact" only one. */
export type PresetLayout = "standard" | "compact";

export interface EqGroup {
  id: number;
  bands: number;
  channelMask: number;
  layout: PresetLayout;
}

export const EQ_GROUPS: Readonly<Record<string, EqGroup>> = {
  USR: { id: 0, bands: 10, channelMask: 0x01, layout: "standard" },
  SPK: { id: 1, bands: 10, channelMask: 0x03, layout: "standard" },
  B20: { id: 2, bands: 20, channelMask: 0x01, layout: "compact" },
};

export const DEFAULT_GROUP = "USR";

export const PRESET_FLAT = 0;
export const PRESET_CUSTOM_START = 22;
export const PRESET_CUSTOM_END = 41;
export const PRESET_QXOVER_START = 42;
export const PRESET_QXOVER_END = 52;

export const MAX_PRESET_NAME_BYTES = 20;

const EQ_MODE_CODES: Record<EqMode, number> = { usr_spk: 0, b20: 1 };

const TYPE_BYPASS = 0;
const TYPE_TO_CODE: Record<FilterType, number> = { LPF: 1, HPF: 2, LSQ: 3, HSQ: 4, PK: 5 };
const CODE_TO_TYPE = new Map<number, FilterType>([
  [0, "PK"],
  [1, "LPF"],
  [2, "HPF"],
  [3, "LSQ"],
  [4, "HSQ"],
  [5, "PK"],
]);

export function resolveGroup(name: string): EqGroup {
  const group = Object.hasOwn(EQ_GROUPS, name) ? EQ_GROUPS[name] : undefined;
  if (!group) {
    throw new ValidationError(`Unknown group '${name}'. Valid: ${Object.keys(EQ_GROUPS).join(", ")}`);
  }
  return group;
}

// ---------------------------------------------------------------------------
// Codecs
// ---------------------------------------------------------------------------

/** Big-endian two's-complement 16-bit value as [hi, lo]. */
export function int16BE(value: number): [number, number] {
  const v = value & 0xffff;
  return [v >> 8, v & 0xff];
}

/** Command report body, excluding the report ID. */
export function buildCommand(cmd: number, payload: readonly number[]): number[] {
  const packet = new Array<number>(HID_REPORT_SIZE).fill(0);
  packet[0] = payload.length + 3;
  packet[1] = 0x80;
  packet[2] = (cmd >> 8) & 0xff;
  packet[3] = cmd & 0xff;
  payload.forEach((b, i) => {
    packet[4 + i] = b & 0xff;
  });
  return packet;
}

export function bandPayload(group: EqGroup, band: number, filter: FilterDefinition | null): number[] {
  if (!filter) return [group.id, group.channelMask, band, TYPE_BYPASS, 0, 0, 0, 0, 0, 0];
  return [
    group.id,
    group.channelMask,
    band,
    TYPE_TO_CODE[filter.type],
    ...int16BE(Math.round(filter.freq)),
    ...int16BE(Math.round(filter.gain * 10)),
    ...int16BE(Math.round(filter.q * 1024)),
  ];
}

/** Strip the inbound report ID, if the transport left it in place. */
function stripReportId(report: Buffer): Buffer {
  return report[0] === REPORT_ID_IN ? report.subarray(1) : report;
}

function commandOf(data: Buffer): number {
  return (data[1] << 8) | data[2];
}

export interface PresetChunk {
  index: number;
  lastIndex: number;
  offset: number;
  data: Buffer;
}

/** Parse one inbound report as a preset chunk of the given group, or null if it is something else. */
export function parsePresetChunk(report: Buffer, groupId: number): PresetChunk | null {
  const data = stripReportId(report);
  if (data.length < 9 || data[0] < 3) return null;
  if (commandOf(data) !== Command.RSP_EQ_PRESET || data[3] !== groupId) return null;

  const size = data.readUInt16BE(5);
  return {
    index: data[4] & 0x0f,
    lastIndex: (data[4] >> 4) & 0x0f,
    offset: data.readUInt16BE(7),
    data: data.subarray(9, 9 + size),
  };
}

/** Place each chunk at its declared offset, in chunk-index order. */
export function reassembleChunks(chunks: Iterable<PresetChunk>): Buffer {
  const sorted = [...chunks].sort((a, b) => a.index - b.index);
  const length = sorted.reduce((max, c) => Math.max(max, c.offset + c.data.length), 0);
  const buffer = Buffer.alloc(length);
  for (const chunk of sorted) chunk.data.copy(buffer, chunk.offset);
  return buffer;
}

/** Indices in 0..lastIndex that none of the chunks carries. */
export function missingChunks(chunks: Iterable<PresetChunk>): number[] {
  const seen = new Set<number>();
  let lastIndex = -1;
  for (const chunk of chunks) {
    seen.add(chunk.index);
    lastIndex = Math.max(lastIndex, chunk.lastIndex);
  }
  const missing: number[] = [];
  for (let i = 0; i <= lastIndex; i++) {
    if (!seen.has(i)) missing.push(i);
  }
  return missing;
}

export interface BandParam {
  typeCode: number;
  /** Gain in tenths of a dB */
  gainTenths: number;
  /** Q × 1024 */
  qRaw: number;
}

/** Packed band word: bits 0-3 type, 4-13 gain×10 (signed), 14-27 Q×1024. */
export function unpackBandParam(word: number): BandParam {
  let gainTenths = (word >>> 4) & 0x3ff;
  if (gainTenths & 0x200) gainTenths -= 0x400;
  return { typeCode: word & 0x0f, gainTenths, qRaw: (word >>> 14) & 0x3fff };
}

const round = (value: number, decimals: number) => {
  const f = 10 ** decimals;
  return Math.round(value * f) / f;
};

/**
 * Decode a preset buffer:
 *   header(4) pregainL/R(2+2) freqL(2×bands) [freqR(2×bands)] params(4×bands)
 */
export function parsePresetBuffer(data: Buffer, bands: number, layout: PresetLayout): PEQProfile {
  if (data.length < 8) {
    throw new CommunicationError(`Preset data too short: ${data.length} bytes`, { length: data.length });
  }

  const pregain = round(data.readInt16LE(4) / 10, 1);
  let offset = 8;

  const freqs: number[] = [];
  for (let i = 0; i < bands; i++) {
    freqs.push(offset + i * 2 + 2 <= data.length ? data.readUInt16LE(offset + i * 2) : 0);
  }
  offset += bands * 2;
  if (layout === "standard") offset += bands * 2;

  const filters: FilterDefinition[] = [];
  for (let i = 0; i < bands && offset + 4 <= data.length; i++, offset += 4) {
    const { typeCode, gainTenths, qRaw } = unpackBandParam(data.readUInt32LE(offset));
    if (typeCode === TYPE_BYPASS && Math.abs(gainTenths) < 1) continue;
    // Slots without a frequency or Q carry no usable filter
    if (freqs[i] === 0 || qRaw === 0) continue;

    filters.push(
      createFilter({
        freq: freqs[i],
        gain: round(gainTenths / 10, 1),
        q: round(qRaw / 1024, 3),
        type: CODE_TO_TYPE.get(typeCode) ?? "PK",
      }),
    );
  }

  return { filters, pregain };
}

/** Truncate to at most maxBytes of UTF-8 without splitting a character. */
export function truncateUtf8(name: string, maxBytes: number): Buffer {
  let out = "";
  let size = 0;
  for (const ch of name) {
    const len = Buffer.byteLength(ch, "utf8");
    if (size + len > maxBytes) break;
    out += ch;
    size += len;
  }
  return Buffer.from(out, "utf8");
}

// ---------------------------------------------------------------------------
// Handler
// ---------------------------------------------------------------------------

export interface QudelixTiming {
  /** Pause after every command */
  commandDelayMs: number;
  /** Pause after a write sequence or preset operation */
  settleDelayMs: number;
  /** Pause after the init handshake */
  initDelayMs: number;
  /** Poll interval while draining or collecting responses */
  pollIntervalMs: number;
  /** Budget for collecting a chunked preset response */
  chunkTimeoutMs: number;
  /** Budget for a preset-name response */
  nameTimeoutMs: number;
}

export const QUDELIX_TIMING: QudelixTiming = {
  commandDelayMs: 50,
  settleDelayMs: 100,
  initDelayMs: 300,
  pollIntervalMs: 10,
  chunkTimeoutMs: 2000,
  nameTimeoutMs: 1000,
};

const DRAIN_LIMIT = 20;

export class QudelixHandler extends DeviceHandler implements PresetController {
  readonly name = "Qudelix";
  readonly vendorId = QUDELIX_VENDOR_ID;
  readonly productIds = [QUDELIX_PRODUCT_ID];
  private readonly timing: QudelixTiming;
  private groupName = DEFAULT_GROUP;
  private initialized = false;

  constructor(options: HandlerOptions<QudelixTiming>) {
    super(options);
    this.timing = { ...QUDELIX_TIMING, ...options.timing };
  }

  /** Group used by the last read/write. */
  get group(): string {
    return this.groupName;
  }

  capabilities() {
    return defineCapabilities({
      maxFilters: resolveGroup(this.groupName).bands,
      supportedFilterTypes: ["PK", "LSQ", "HSQ", "LPF", "HPF"],
      supportsPresets: true,
      groups: Object.keys(EQ_GROUPS),
    });
  }

  override matchesDevice(device: HidDeviceInfo): boolean {
    if (!super.matchesDevice(device)) return false;
    const product = device.product.toUpperCase();
    if (!product.includes("QUDELIX") && !product.includes("5K")) return false;
    // The audio interface (usage page 0x000C) shares VID/PID with the control interface
    if (device.usagePage !== QUDELIX_USAGE_PAGE) {
      this.logger.debug(`skipping interface with usage page 0x${device.usagePage.toString(16).padStart(4, "0")}`);
      return false;
    }
    return true;
  }

  override presetController(): PresetController {
    return this;
  }

  protected override onConnected(): void {
    this.initialized = false;
  }

  protected override applyOptions(options: PeqOptions): () => void {
    const name = options.group ?? DEFAULT_GROUP;
    resolveGroup(name);
    const previous = this.groupName;
    this.groupName = name;
    return () => {
      this.groupName = previous;
    };
  }

  protected async readProfile(): Promise<PEQProfile> {
    const group = resolveGroup(this.groupName);
    await this.ensureInit();

    await this.command(Command.REQ_EQ_PRESET, [1 << group.id], { drain: false });
    await this.clock.sleep(this.timing.settleDelayMs);

    const chunks = await this.collectChunks(group.id);
    if (chunks.length === 0) {
      throw new CommunicationError(`No preset data received for group ${this.groupName}`, { group: this.groupName });
    }
    const missing = missingChunks(chunks);
    if (missing.length > 0) {
      throw new CommunicationError(
        `Incomplete preset data for group ${this.groupName}: missing chunks ${missing.join(", ")}`,
        { group: this.groupName, missing },
      );
    }
    return parsePresetBuffer(reassembleChunks(chunks), group.bands, group.layout);
  }

  protected async writeProfile(profile: PEQProfile): Promise<void> {
    const group = resolveGroup(this.groupName);
    await this.ensureInit();
    this.logger.debug(`writing ${profile.filters.length} filters to ${this.groupName}`);

    await this.command(Command.SET_EQ_ENABLE, [group.id, 1]);
    await this.command(Command.SET_EQ_TYPE, [group.id, 1]);
    await this.command(Command.SET_EQ_PREGAIN, [
      group.id,
      group.channelMask,
      0,
      ...int16BE(Math.round(profile.pregain * 10)),
    ]);

    for (let band = 0; band < group.bands; band++) {
      await this.command(Command.SET_EQ_BAND_PARAM, bandPayload(group, band, profile.filters[band] ?? null));
    }
    await this.clock.sleep(this.timing.settleDelayMs);
  }

  // -------------------------------------------------------------------------
  // Presets
  // -------------------------------------------------------------------------

  async loadPreset(groupName: string, index: number): Promise<void> {
    this.requireTransport();
    const group = resolveGroup(groupName);
    const qxOver = groupName === "SPK" && index >= PRESET_QXOVER_START && index <= PRESET_QXOVER_END;
    if (!Number.isInteger(index) || index < PRESET_FLAT || (index > PRESET_CUSTOM_END && !qxOver)) {
      throw new ValidationError(
        `Preset ${index} not valid for group ${groupName}. Valid: ${PRESET_FLAT}-${PRESET_CUSTOM_END}` +
          (groupName === "SPK" ? `, ${PRESET_QXOVER_START}-${PRESET_QXOVER_END}` : ""),
      );
    }
    await this.ensureInit();
    this.logger.debug(`loading preset ${index} for ${groupName}`);
    await this.command(Command.LOAD_EQ_PRESET, [group.id, index]);
    await this.clock.sleep(this.timing.settleDelayMs);
  }

  async savePreset(groupName: string, index: number): Promise<void> {
    this.requireTransport();
    const group = resolveGroup(groupName);
    requireCustomSlot(index, "save to");
    await this.ensureInit();
    this.logger.debug(`saving ${groupName} to preset ${index}`);
    await this.command(Command.SAVE_EQ_PRESET, [group.id, index]);
    await this.clock.sleep(this.timing.settleDelayMs);
  }

  async setEqMode(mode: EqMode): Promise<void> {
    this.requireTransport();
    if (!Object.hasOwn(EQ_MODE_CODES, mode)) {
      throw new ValidationError(`Invalid mode '${mode}'. Valid: ${Object.keys(EQ_MODE_CODES).join(", ")}`);
    }
    await this.ensureInit();
    await this.command(Command.SET_EQ_MODE, [EQ_MODE_CODES[mode]]);
    await this.clock.sleep(this.timing.settleDelayMs);
  }

  async getPresetName(index: number, groupName: string = DEFAULT_GROUP): Promise<string> {
    this.requireTransport();
    requireCustomSlot(index, "get names for");
    const group = resolveGroup(groupName);
    await this.ensureInit();

    const customIndex = index - PRESET_CUSTOM_START;
    await this.command(Command.REQ_EQ_PRESET_NAME, [group.id, customIndex], { drain: false });
    await this.clock.sleep(this.timing.settleDelayMs);

    this.requireTransport().setNonBlocking(true);
    const found: { name?: string } = {};
    await pollUntil(
      () => {
        const report = this.receive(HID_REPORT_SIZE, 0);
        if (!report) return "idle";
        const data = stripReportId(report);
        if (data.length < 6 || commandOf(data) !== Command.RSP_EQ_PRESET_NAME) return "progress";
        if (data[3] !== group.id || data[4] !== customIndex) return "progress";
        found.name = data.subarray(6, 6 + data[5]).toString("utf8");
        return "done";
      },
      { clock: this.clock, timeoutMs: this.timing.nameTimeoutMs, intervalMs: this.timing.pollIntervalMs },
    );

    if (found.name === undefined) {
      throw new CommunicationError(`No preset name response for index ${index}`, { index, group: groupName });
    }
    return found.name;
  }

  async setPresetName(index: number, name: string, groupName: string = DEFAULT_GROUP): Promise<void> {
    this.requireTransport();
    requireCustomSlot(index, "set names for");
    const group = resolveGroup(groupName);
    await this.ensureInit();

    const bytes = truncateUtf8(name, MAX_PRESET_NAME_BYTES);
    await this.command(Command.SET_EQ_PRESET_NAME, [group.id, index - PRESET_CUSTOM_START, bytes.length, ...bytes]);
    await this.clock.sleep(this.timing.settleDelayMs);
  }

  // -------------------------------------------------------------------------
  // Transport helpers
  // -------------------------------------------------------------------------

  private async ensureInit(): Promise<void> {
    if (this.initialized) return;
    this.logger.debug("sending init handshake");
    await this.command(Command.REQ_INIT_DATA, [0x00, 0x00, 0x04], { drain: false });
    await this.clock.sleep(this.timing.initDelayMs);
    await this.drain();
    this.initialized = true;
  }

  private async command(cmd: number, payload: readonly number[], { drain = true } = {}): Promise<void> {
    this.send(REPORT_ID_OUT, buildCommand(cmd, payload));
    await this.clock.sleep(this.timing.commandDelayMs);
    if (drain) await this.drain();
  }

  /** Discard buffered reports (acks, unsolicited status). */
  private async drain(): Promise<void> {
    this.requireTransport().setNonBlocking(true);
    await pollUntil(() => (this.receive(HID_REPORT_SIZE, 0) ? "progress" : "idle"), {
      clock: this.clock,
      timeoutMs: Number.POSITIVE_INFINITY,
      intervalMs: this.timing.pollIntervalMs,
      maxAttempts: DRAIN_LIMIT,
      pauseOnProgress: true,
      stopWhenIdle: true,
    });
  }

  private async collectChunks(groupId: number): Promise<PresetChunk[]> {
    const chunks = new Map<number, PresetChunk>();
    this.requireTransport().setNonBlocking(true);

    await pollUntil(
      () => {
        const report = this.receive(HID_REPORT_SIZE, 0);
        if (!report) return "idle";
        const chunk = parsePresetChunk(report, groupId);
        if (!chunk) return "progress";
        this.logger.debug(`chunk ${chunk.index}/${chunk.lastIndex}: ${chunk.data.length}B at offset ${chunk.offset}`);
        chunks.set(chunk.index, chunk);
        return chunks.size === chunk.lastIndex + 1 ? "done" : "progress";
      },
      { clock: this.clock, timeoutMs: this.timing.chunkTimeoutMs, intervalMs: this.timing.pollIntervalMs },
    );

    return [...chunks.values()];
  }
}

function requireCustomSlot(index: number, action: string): void {
  if (!Number.isInteger(index) || index < PRESET_CUSTOM_START || index > PRESET_CUSTOM_END) {
    throw new ValidationError(
      `Can only ${action} custom presets (${PRESET_CUSTOM_START}-${PRESET_CUSTOM_END}), got ${index}`,
    );
  }
}
