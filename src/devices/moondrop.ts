/**
 * Moondrop handler (Conexant-based DSP: FreeDSP cables, Rays, Marigold,
 * MAY DSP, ddHiFi DSP IEM).
 *
 * The device takes precomputed biquad coefficients rather than filter
 * parameters. Each band is a 63-byte packet carrying five 2^30 fixed-point
 * coefficients plus the display values (freq, Q×256, gain×256, type) it
 * echoes back on read.
 */

import type { FilterDefinition, FilterType, HidDeviceInfo, PEQProfile, SlotReading } from "../core/types.js";
import { createFilter } from "../core/profile.js";
import { CommunicationError, ProfileValidationError } from "../core/errors.js";
import { DeviceHandler, defineCapabilities, type HandlerOptions } from "../core/handler.js";
import { computeBiquad, IDENTITY_BIQUAD, toFixedPoint, type ShapedFilterType } from "../core/biquad.js";

/** Vendor IDs seen on boards built around the same Conexant DSP. The first is the primary. */
export const MOONDROP_VENDOR_IDS: readonly number[] = [
  0x3302, 0x0762, 0x35d8, 0x2fc6, 0x0104, 0xb445, 0x0661, 0x0666, 0x0d8c,
];

export const MOONDROP_KEYWORDS: readonly string[] = ["MOONDROP", "RAYS", "MARIGOLD", "MAY", "FREEDSP", "DDHIFI DSP"];
/** Same vendors, no DSP. */
export const MOONDROP_EXCLUDED: readonly string[] = ["MOONRIVER", "ARIA", "BLESSING", "STARFIELD", "KATO"];

export const MOONDROP_REPORT_ID = 0x4b;
export const MOONDROP_PACKET_LENGTH = 63;

const CMD_READ = 0x80;
const CMD_WRITE = 0x01;
const CMD_UPDATE_EQ = 0x09;
const CMD_UPDATE_EQ_COEFF_TO_REG = 0x0a;
const CMD_SAVE_EQ_TO_FLASH = 0x01;
const CMD_PRE_GAIN = 0x23;
/** Pregain is read back through the DAC offset register. */
const CMD_DAC_OFFSET = 0x03;

export const BAND_COUNT = 8;
export const SAMPLE_RATE = 96000;
export const COEFFICIENT_SCALE = 2 ** 30;
export const VALUE_SCALE = 256;

const TYPE_TO_CODE: Record<ShapedFilterType, number> = { LSQ: 1, PK: 2, HSQ: 3 };
const CODE_TO_TYPE = new Map<number, FilterType>([
  [1, "LSQ"],
  [2, "PK"],
  [3, "HSQ"],
]);

// Byte offsets within a band packet / read response
const OFFSET_COEFFS = 7;
const OFFSET_FREQ = 27;
const OFFSET_Q = 29;
const OFFSET_GAIN = 31;
const OFFSET_TYPE = 33;
const MIN_BAND_RESPONSE = 34;
const OFFSET_PREGAIN = 3;

function isShaped(type: FilterType): type is ShapedFilterType {
  return type === "PK" || type === "LSQ" || type === "HSQ";
}

// ---------------------------------------------------------------------------
// Packets
// ---------------------------------------------------------------------------

/**
 * Fixed-point coefficients for one filter.
 * @throws ProfileValidationError when a coefficient does not fit int32
 */
export function encodeCoefficients(filter: FilterDefinition, filterIndex: number): number[] {
  if (!isShaped(filter.type)) {
    throw new ProfileValidationError(`Filter ${filterIndex}: Moondrop doesn't support type '${filter.type}'`, {
      field: "type",
      filterIndex,
    });
  }
  const fixed = toFixedPoint(
    computeBiquad(filter.type, filter.freq, filter.gain, filter.q, SAMPLE_RATE),
    COEFFICIENT_SCALE,
  );
  if (!fixed) {
    throw new ProfileValidationError(
      `Filter ${filterIndex}: ${filter.type} ${filter.freq}Hz ${filter.gain}dB Q ${filter.q} ` +
        `exceeds the device's fixed-point coefficient range`,
      { field: "gain", filterIndex },
    );
  }
  return fixed;
}

function bandHeader(band: number): Buffer {
  const packet = Buffer.alloc(MOONDROP_PACKET_LENGTH);
  packet[0] = CMD_WRITE;
  packet[1] = CMD_UPDATE_EQ;
  packet[2] = 0x18;
  packet[4] = band;
  packet[34] = 0x00;
  packet[35] = 0x07;
  return packet;
}

/** Coefficient packet for an active band. */
export function buildBandPacket(band: number, filter: FilterDefinition): Buffer {
  const packet = bandHeader(band);
  encodeCoefficients(filter, band).forEach((c, i) => packet.writeInt32LE(c, OFFSET_COEFFS + i * 4));
  packet.writeUInt16LE(filter.freq, OFFSET_FREQ);
  packet.writeUInt16LE(Math.round(filter.q * VALUE_SCALE), OFFSET_Q);
  packet.writeInt16LE(Math.round(filter.gain * VALUE_SCALE), OFFSET_GAIN);
  packet[OFFSET_TYPE] = isShaped(filter.type) ? TYPE_TO_CODE[filter.type] : TYPE_TO_CODE.PK;
  return packet;
}

/** Pass-through band: identity biquad, freq 0, Q 0. */
export function buildIdentityBandPacket(band: number): Buffer {
  const packet = bandHeader(band);
  const identity = toFixedPoint(IDENTITY_BIQUAD, COEFFICIENT_SCALE) ?? [];
  identity.forEach((c, i) => packet.writeInt32LE(c, OFFSET_COEFFS + i * 4));
  packet[OFFSET_TYPE] = TYPE_TO_CODE.PK;
  return packet;
}

/** Latch a band's coefficients into the DSP registers. */
export function buildCommitBandPacket(band: number): Buffer {
  const packet = Buffer.alloc(MOONDROP_PACKET_LENGTH, 0xff);
  packet[0] = CMD_WRITE;
  packet[1] = CMD_UPDATE_EQ_COEFF_TO_REG;
  packet[2] = band;
  return packet;
}

export function buildSavePacket(): Buffer {
  const packet = Buffer.alloc(MOONDROP_PACKET_LENGTH);
  packet[0] = CMD_WRITE;
  packet[1] = CMD_SAVE_EQ_TO_FLASH;
  return packet;
}

export function buildPregainPacket(pregain: number): Buffer {
  const packet = Buffer.alloc(MOONDROP_PACKET_LENGTH);
  packet[0] = CMD_WRITE;
  packet[1] = CMD_PRE_GAIN;
  packet.writeInt16LE(Math.round(pregain * VALUE_SCALE), OFFSET_PREGAIN);
  return packet;
}

export function buildReadBandPacket(band: number): Buffer {
  return Buffer.from([CMD_READ, CMD_UPDATE_EQ, 0x18, 0x00, band, 0x00]);
}

export function buildReadPregainPacket(): Buffer {
  return Buffer.from([CMD_READ, CMD_DAC_OFFSET]);
}

export function decodeBand(response: Buffer): SlotReading {
  if (response.length < MIN_BAND_RESPONSE) {
    throw new CommunicationError(`Short band response: ${response.length} bytes`, { length: response.length });
  }
  const freq = response.readUInt16LE(OFFSET_FREQ);
  const qRaw = response.readUInt16LE(OFFSET_Q);
  if (freq === 0 || qRaw === 0) return { kind: "empty" };

  const typeCode = response[OFFSET_TYPE];
  const type = CODE_TO_TYPE.get(typeCode);
  if (!type) {
    throw new CommunicationError(`Unknown filter type code 0x${typeCode.toString(16)}`, { typeCode });
  }
  return {
    kind: "filter",
    filter: createFilter({
      freq,
      gain: response.readInt16LE(OFFSET_GAIN) / VALUE_SCALE,
      q: qRaw / VALUE_SCALE,
      type,
    }),
  };
}

export function decodePregain(response: Buffer): number {
  if (response.length < OFFSET_PREGAIN + 2) {
    throw new CommunicationError(`Short pregain response: ${response.length} bytes`, { length: response.length });
  }
  return response.readInt16LE(OFFSET_PREGAIN) / VALUE_SCALE;
}

// ---------------------------------------------------------------------------
// Handler
// ---------------------------------------------------------------------------

export interface MoondropTiming {
  /** Pause after every write packet */
  writeDelayMs: number;
  /** Pause after the flash save */
  saveDelayMs: number;
  /** Pause between band reads */
  readDelayMs: number;
  /** Blocking read timeout */
  readTimeoutMs: number;
}

export const MOONDROP_TIMING: MoondropTiming = {
  writeDelayMs: 20,
  saveDelayMs: 1000,
  readDelayMs: 10,
  readTimeoutMs: 1000,
};

export class MoondropHandler extends DeviceHandler {
  readonly name = "Moondrop";
  readonly vendorId = MOONDROP_VENDOR_IDS[0];
  readonly productIds = null;
  private readonly timing: MoondropTiming;

  constructor(options: HandlerOptions<MoondropTiming>) {
    super(options);
    this.timing = { ...MOONDROP_TIMING, ...options.timing };
  }

  capabilities() {
    return defineCapabilities({
      maxFilters: BAND_COUNT,
      supportedFilterTypes: ["PK", "LSQ", "HSQ"],
      supportsDirectPregainWrite: true,
    });
  }

  override matchesDevice(device: HidDeviceInfo): boolean {
    if (!MOONDROP_VENDOR_IDS.includes(device.vendorId)) return false;
    const product = device.product.toUpperCase();
    return (
      MOONDROP_KEYWORDS.some((kw) => product.includes(kw)) && !MOONDROP_EXCLUDED.some((kw) => product.includes(kw))
    );
  }

  protected async readProfile(): Promise<PEQProfile> {
    const filters: FilterDefinition[] = [];
    for (let band = 0; band < BAND_COUNT; band++) {
      const slot = decodeBand(this.request(buildReadBandPacket(band)));
      if (slot.kind === "filter") filters.push(slot.filter);
      await this.clock.sleep(this.timing.readDelayMs);
    }
    const pregain = decodePregain(this.request(buildReadPregainPacket()));
    return { filters, pregain };
  }

  protected async writeProfile(profile: PEQProfile): Promise<void> {
    // Every packet is built up front so a coefficient overflow aborts before any traffic
    const packets: Buffer[] = [buildPregainPacket(profile.pregain)];
    for (let band = 0; band < BAND_COUNT; band++) {
      const filter = profile.filters[band];
      packets.push(filter ? buildBandPacket(band, filter) : buildIdentityBandPacket(band));
      packets.push(buildCommitBandPacket(band));
    }

    for (const packet of packets) {
      this.send(MOONDROP_REPORT_ID, packet);
      await this.clock.sleep(this.timing.writeDelayMs);
    }
    await this.save();
  }

  protected override async writePregain(pregain: number): Promise<void> {
    this.send(MOONDROP_REPORT_ID, buildPregainPacket(pregain));
    await this.clock.sleep(this.timing.writeDelayMs);
    await this.save();
  }

  private async save(): Promise<void> {
    this.send(MOONDROP_REPORT_ID, buildSavePacket());
    this.logger.debug("saving to flash");
    await this.clock.sleep(this.timing.saveDelayMs);
  }

  private request(packet: Buffer): Buffer {
    this.send(MOONDROP_REPORT_ID, packet);
    const resp = this.receive(64, this.timing.readTimeoutMs);
    if (!resp) {
      throw new CommunicationError(`No response to 0x${packet[1].toString(16)} within ${this.timing.readTimeoutMs} ms`);
    }
    return resp;
  }
}
