/**
 * Tanchjim DSP handler (Fission, Bunny, One DSP).
 *
 * Field-addressed protocol: one flat address space of one-byte field IDs,
 * a single EQ buffer, no presets. Every property is read with a
 * request/response exchange and written fire-and-forget; COMMIT persists
 * the buffer to flash.
 *
 * Packet (after report ID 0x4B):
 *   [field, 0, 0, 0, opcode, 0, p0, p1, p2, p3, 0]
 * Response (report ID first):
 *   [0x4B, field, 0, 0, 0, opcode, 0, p0, p1, p2, p3]
 */

import type { FilterDefinition, FilterType, HidDeviceInfo, PEQProfile, SlotReading } from "../core/types.js";
import { createFilter } from "../core/profile.js";
import { CommunicationError } from "../core/errors.js";
import {
  DeviceHandler,
  defineCapabilities,
  probe,
  type DiagnosticProbe,
  type HandlerOptions,
} from "../core/handler.js";
import { hex } from "../utils/logger.js";

export const TANCHJIM_VENDOR_ID = 0x31b2;
export const TANCHJIM_REPORT_ID = 0x4b;
export const TANCHJIM_PACKET_LENGTH = 11;

export const OPCODE_READ = 0x52;
export const OPCODE_WRITE = 0x57;
export const OPCODE_COMMIT = 0x53;

export const FIELD_FILTER_BASE = 0x26;
export const FIELD_PREGAIN = 0x65;

const SLOT_COUNT = 5;

const TYPE_TO_CODE: Partial<Record<FilterType, number>> = { PK: 0x00, LSQ: 0x03, HSQ: 0x04 };
const CODE_TO_TYPE = new Map<number, FilterType>([
  [0x00, "PK"],
  [0x03, "LSQ"],
  [0x04, "HSQ"],
]);

// ---------------------------------------------------------------------------
// Variants
// ---------------------------------------------------------------------------

/**
 * Pregain byte encodings seen across firmware revisions.
 *   - "half-db": int8 of (dB × 2), the vendor app's encoding
 *   - "raw": int8 of whole dB
 */
export type PregainEncoding = "half-db" | "raw";

export interface TanchjimVariant {
  /** Handler display name */
  name: string;
  /** Upper-case product-name keywords identifying this sub-model family */
  keywords: readonly string[];
  pregainEncoding: PregainEncoding;
}

export const TANCHJIM_DSP: TanchjimVariant = {
  name: "Tanchjim",
  keywords: ["FISSION", "TANCHJIM", "BUNNY", "ONE"],
  pregainEncoding: "half-db",
};

export function rawPregainVariant(keywords: readonly string[]): TanchjimVariant {
  return { name: "Tanchjim (raw pregain)", keywords, pregainEncoding: "raw" };
}

// ---------------------------------------------------------------------------
// Codecs
// ---------------------------------------------------------------------------

export function encodePregain(pregain: number, encoding: PregainEncoding): number {
  const value = encoding === "half-db" ? Math.round(pregain * 2) : Math.round(pregain);
  return value & 0xff;
}

export function decodePregain(byte: number, encoding: PregainEncoding): number {
  const signed = byte & 0x80 ? byte - 0x100 : byte;
  return encoding === "half-db" ? signed / 2 : signed;
}

/** Gain in tenths of a dB, as int16. */
export function encodeGainTenths(gain: number): number {
  return Math.round(gain * 10);
}

export function decodeGainTenths(raw: number): number {
  return raw / 10;
}

export function buildReadPacket(fieldId: number): Buffer {
  const packet = Buffer.alloc(TANCHJIM_PACKET_LENGTH);
  packet[0] = fieldId;
  packet[4] = OPCODE_READ;
  return packet;
}

function buildWritePacket(fieldId: number, payload: Buffer): Buffer {
  const packet = Buffer.alloc(TANCHJIM_PACKET_LENGTH);
  packet[0] = fieldId;
  packet[4] = OPCODE_WRITE;
  payload.copy(packet, 6, 0, Math.min(payload.length, 4));
  return packet;
}

export function buildGainFreqPacket(fieldId: number, freq: number, gain: number): Buffer {
  const payload = Buffer.alloc(4);
  payload.writeInt16LE(encodeGainTenths(gain), 0);
  payload.writeUInt16LE(freq, 2);
  return buildWritePacket(fieldId, payload);
}

export function buildQTypePacket(fieldId: number, q: number, type: FilterType): Buffer {
  const payload = Buffer.alloc(4);
  payload.writeUInt16LE(Math.round(q * 1000), 0);
  payload[2] = TYPE_TO_CODE[type] ?? 0x00;
  return buildWritePacket(fieldId, payload);
}

export function buildPregainPacket(pregain: number, encoding: PregainEncoding): Buffer {
  const payload = Buffer.from([encodePregain(pregain, encoding)]);
  return buildWritePacket(FIELD_PREGAIN, payload);
}

export function buildCommitPacket(): Buffer {
  const packet = Buffer.alloc(TANCHJIM_PACKET_LENGTH);
  packet[4] = OPCODE_COMMIT;
  return packet;
}

/** Offset of the first payload byte in a response (report ID included). */
const RESPONSE_PAYLOAD = 7;

/**
 * Decode a slot from its gain/freq and Q/type responses.
 * freq=0 or Q=0 marks a bypassed slot.
 */
export function decodeSlot(gainFreq: Buffer, qType: Buffer): SlotReading {
  const gain = decodeGainTenths(gainFreq.readInt16LE(RESPONSE_PAYLOAD));
  const freq = gainFreq.readUInt16LE(RESPONSE_PAYLOAD + 2);
  const q = qType.readUInt16LE(RESPONSE_PAYLOAD) / 1000;
  const typeCode = qType[RESPONSE_PAYLOAD + 2];

  if (freq === 0 || q === 0) return { kind: "empty" };

  const type = CODE_TO_TYPE.get(typeCode);
  if (!type) {
    throw new CommunicationError(`Unknown filter type code 0x${typeCode.toString(16)}`, { typeCode });
  }
  return { kind: "filter", filter: createFilter({ freq, gain, q, type }) };
}

// ---------------------------------------------------------------------------
// Handler
// ---------------------------------------------------------------------------

export interface TanchjimTiming {
  /** Pause after every write packet */
  writeDelayMs: number;
  /** Pause after COMMIT while the device writes flash */
  commitDelayMs: number;
  /** Blocking read timeout per field */
  readTimeoutMs: number;
}

export const TANCHJIM_TIMING: TanchjimTiming = {
  writeDelayMs: 20,
  commitDelayMs: 1000,
  readTimeoutMs: 1000,
};

export class TanchjimHandler extends DeviceHandler {
  readonly vendorId = TANCHJIM_VENDOR_ID;
  readonly productIds = null;
  readonly variant: TanchjimVariant;
  private readonly timing: TanchjimTiming;

  constructor(options: HandlerOptions<TanchjimTiming> & { variant?: TanchjimVariant }) {
    super(options);
    this.variant = options.variant ?? TANCHJIM_DSP;
    this.timing = { ...TANCHJIM_TIMING, ...options.timing };
  }

  get name(): string {
    return this.variant.name;
  }

  capabilities() {
    return defineCapabilities({
      maxFilters: SLOT_COUNT,
      supportedFilterTypes: ["PK", "LSQ", "HSQ"],
      supportsDirectPregainWrite: true,
    });
  }

  override matchesDevice(device: HidDeviceInfo): boolean {
    if (device.vendorId !== this.vendorId) return false;
    const product = device.product.toUpperCase();
    return this.variant.keywords.some((kw) => product.includes(kw));
  }

  /** Raw read of one field, for diagnostics. */
  readField(fieldId: number): Buffer {
    return this.request(fieldId);
  }

  async readSlot(index: number): Promise<SlotReading> {
    const gainFreqId = FIELD_FILTER_BASE + index * 2;
    const gainFreq = this.request(gainFreqId);
    const qType = this.request(gainFreqId + 1);
    return decodeSlot(gainFreq, qType);
  }

  protected async readProfile(): Promise<PEQProfile> {
    const filters: FilterDefinition[] = [];
    for (let i = 0; i < SLOT_COUNT; i++) {
      const slot = await this.readSlot(i);
      if (slot.kind === "filter") filters.push(slot.filter);
    }
    const pregainResp = this.request(FIELD_PREGAIN);
    const pregain = decodePregain(pregainResp[RESPONSE_PAYLOAD], this.variant.pregainEncoding);
    this.logger.debug(`read ${filters.length} active filters, pregain=${pregain} dB`);
    return { filters, pregain };
  }

  protected async writeProfile(profile: PEQProfile): Promise<void> {
    for (let i = 0; i < SLOT_COUNT; i++) {
      const gainFreqId = FIELD_FILTER_BASE + i * 2;
      const f = profile.filters[i];
      if (f) {
        await this.write(buildGainFreqPacket(gainFreqId, f.freq, f.gain));
        await this.write(buildQTypePacket(gainFreqId + 1, f.q, f.type));
      } else {
        // Stale filters stay active unless the slot is zeroed explicitly
        await this.write(buildGainFreqPacket(gainFreqId, 0, 0));
        await this.write(buildQTypePacket(gainFreqId + 1, 0, "PK"));
      }
    }
    await this.write(this.pregainPacket(profile.pregain));
    await this.commit();
  }

  protected override async writePregain(pregain: number): Promise<void> {
    await this.write(this.pregainPacket(pregain));
    await this.commit();
  }

  /** Raw dumps of the first slot and the pregain field, then a full read. */
  protected override async diagnosticProbes(): Promise<DiagnosticProbe[]> {
    const probes: DiagnosticProbe[] = [];
    for (const fieldId of [FIELD_FILTER_BASE, FIELD_FILTER_BASE + 1, FIELD_PREGAIN]) {
      probes.push(await probe(`field 0x${fieldId.toString(16)}`, () => hex(this.readField(fieldId), 64)));
    }
    probes.push(...(await super.diagnosticProbes()));
    return probes;
  }

  private pregainPacket(pregain: number): Buffer {
    if (this.variant.pregainEncoding === "raw" && !Number.isInteger(pregain)) {
      this.logger.warn(`pregain ${pregain} dB rounded to ${Math.round(pregain)} dB: firmware takes whole dB only`);
    }
    return buildPregainPacket(pregain, this.variant.pregainEncoding);
  }

  private async write(packet: Buffer): Promise<void> {
    this.send(TANCHJIM_REPORT_ID, packet);
    await this.clock.sleep(this.timing.writeDelayMs);
  }

  private async commit(): Promise<void> {
    this.send(TANCHJIM_REPORT_ID, buildCommitPacket());
    this.logger.debug("committing to flash");
    await this.clock.sleep(this.timing.commitDelayMs);
  }

  private request(fieldId: number): Buffer {
    this.send(TANCHJIM_REPORT_ID, buildReadPacket(fieldId));
    const resp = this.receive(64, this.timing.readTimeoutMs);
    if (!resp) {
      throw new CommunicationError(
        `No response for field 0x${fieldId.toString(16)} within ${this.timing.readTimeoutMs} ms`,
        { fieldId },
      );
    }
    if (resp.length < TANCHJIM_PACKET_LENGTH) {
      throw new CommunicationError(`Short response for field 0x${fieldId.toString(16)}: ${resp.length} bytes`, {
        fieldId,
      });
    }
    return resp;
  }
}
