/**
 * In-process device simulators: fake HID transports that speak each vendor
 * protocol, a fake backend that enumerates them and a virtual clock.
 */

import type { Clock } from "../../src/core/poll.js";
import type { HidDeviceInfo } from "../../src/core/types.js";
import type { HidBackend, HidTransport } from "../../src/hid/transport.js";
import { DeviceRegistry } from "../../src/core/device-registry.js";
import { createDefaultHandlerFactories } from "../../src/devices/index.js";

// ---------------------------------------------------------------------------
// Clock
// ---------------------------------------------------------------------------

export class FakeClock implements Clock {
  time = 0;
  readonly sleeps: number[] = [];

  now(): number {
    return this.time;
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.time += ms;
  }
}

// ---------------------------------------------------------------------------
// Transport / backend
// ---------------------------------------------------------------------------

export abstract class FakeTransport implements HidTransport {
  /** Every report written, report ID first */
  readonly written: number[][] = [];
  /** Reports waiting to be read */
  readonly inbox: Buffer[] = [];
  nonBlocking = false;
  closed = false;
  failOnClose = false;

  write(data: readonly number[] | Buffer): number {
    const report = [...data];
    this.written.push(report);
    this.handle(report);
    return report.length;
  }

  read(maxLength: number, _timeoutMs: number): Buffer | null {
    const next = this.inbox.shift();
    return next ? next.subarray(0, maxLength) : null;
  }

  setNonBlocking(nonBlocking: boolean): void {
    this.nonBlocking = nonBlocking;
  }

  close(): void {
    this.closed = true;
    if (this.failOnClose) throw new Error("close failed");
  }

  protected reply(bytes: readonly number[] | Buffer): void {
    this.inbox.push(Buffer.from(bytes));
  }

  protected abstract handle(report: number[]): void;
}

/** Transport that accepts writes and never answers. */
export class SilentTransport extends FakeTransport {
  protected handle(): void {}
}

export function deviceInfo(overrides: Partial<HidDeviceInfo> = {}): HidDeviceInfo {
  return {
    vendorId: 0,
    productId: 0,
    path: "/dev/hidraw0",
    product: "",
    manufacturer: "",
    serialNumber: "",
    usagePage: 0,
    interfaceNumber: 0,
    ...overrides,
  };
}

export class FakeBackend implements HidBackend {
  readonly opened: string[] = [];
  private readonly transports = new Map<string, () => HidTransport>();

  constructor(readonly devices: HidDeviceInfo[] = []) {}

  /** Attach a device; `create` runs on every open of its path. */
  attach(device: HidDeviceInfo, create: () => HidTransport): this {
    this.devices.push(device);
    this.transports.set(device.path, create);
    return this;
  }

  enumerate(): HidDeviceInfo[] {
    return [...this.devices];
  }

  open(path: string): HidTransport {
    const create = this.transports.get(path);
    if (!create) throw new Error(`cannot open ${path}`);
    this.opened.push(path);
    return create();
  }
}

// ---------------------------------------------------------------------------
// Tanchjim: field-addressed
// ---------------------------------------------------------------------------

export class FakeTanchjim extends FakeTransport {
  /** 4-byte payload per field ID */
  readonly fields = new Map<number, Buffer>();
  commits = 0;
  mute = false;

  setField(fieldId: number, payload: readonly number[]): void {
    const buf = Buffer.alloc(4);
    Buffer.from(payload).copy(buf);
    this.fields.set(fieldId, buf);
  }

  protected handle(report: number[]): void {
    const [, field, , , , opcode] = report;
    if (opcode === 0x52) {
      if (this.mute) return;
      const payload = this.fields.get(field) ?? Buffer.alloc(4);
      this.reply([0x4b, field, 0, 0, 0, 0x52, 0, ...payload]);
    } else if (opcode === 0x57) {
      this.fields.set(field, Buffer.from(report.slice(7, 11)));
    } else if (opcode === 0x53) {
      this.commits++;
    }
  }
}

// ---------------------------------------------------------------------------
// Qudelix: chunked preset protocol
// ---------------------------------------------------------------------------

export interface FakeBand {
  type: number;
  freq: number;
  gainTenths: number;
  qRaw: number;
}

const QUDELIX_GROUP_BANDS = [10, 10, 20];

export interface QudelixCommand {
  cmd: number;
  payload: number[];
}

export class FakeQudelix extends FakeTransport {
  readonly commands: QudelixCommand[] = [];
  readonly bands: FakeBand[][] = QUDELIX_GROUP_BANDS.map((n) =>
    Array.from({ length: n }, () => ({ type: 0, freq: 0, gainTenths: 0, qRaw: 0 })),
  );
  readonly pregainTenths = [0, 0, 0];
  readonly names = new Map<string, string>();
  /** Bytes of preset data per chunk */
  chunkSize = 20;
  /** Deliver chunks last-first */
  reverseChunks = false;
  /** Send every chunk twice */
  duplicateChunks = false;
  /** Never answer preset or name requests */
  mute = false;
  /** Chunk index left out of preset responses */
  dropChunk: number | null = null;

  commandsOf(cmd: number): number[][] {
    return this.commands.filter((c) => c.cmd === cmd).map((c) => c.payload);
  }

  /** Preset buffer as the device lays it out for a group. */
  presetBuffer(groupId: number): Buffer {
    const bands = this.bands[groupId];
    const n = bands.length;
    const standard = groupId !== 2;
    const buf = Buffer.alloc(8 + n * 2 * (standard ? 2 : 1) + n * 4);
    buf.set([0x01, 0x02, 0x03, 0x04], 0);
    buf.writeInt16LE(this.pregainTenths[groupId], 4);
    buf.writeInt16LE(this.pregainTenths[groupId], 6);
    let offset = 8;
    bands.forEach((b, i) => buf.writeUInt16LE(b.freq, offset + i * 2));
    offset += n * 2;
    if (standard) {
      bands.forEach((b, i) => buf.writeUInt16LE(b.freq, offset + i * 2));
      offset += n * 2;
    }
    bands.forEach((b, i) => {
      const word = (b.type & 0x0f) | ((b.gainTenths & 0x3ff) << 4) | ((b.qRaw & 0x3fff) << 14);
      buf.writeUInt32LE(word >>> 0, offset + i * 4);
    });
    return buf;
  }

  protected handle(report: number[]): void {
    const body = report.slice(1);
    const cmd = (body[2] << 8) | body[3];
    const payload = body.slice(4, 4 + body[0] - 3);
    this.commands.push({ cmd, payload });

    switch (cmd) {
      case 0x0100:
        // unsolicited status burst after init
        this.reply([9, 5, 0x01, 0x01, 0xaa, 0xbb]);
        this.reply([9, 5, 0x01, 0x02, 0xcc, 0xdd]);
        break;
      case 0x0700:
      case 0x0701:
        this.reply([9, 3, body[2], body[3]]);
        break;
      case 0x0703: {
        const [group, , , hi, lo] = payload;
        this.pregainTenths[group] = Buffer.from([hi, lo]).readInt16BE(0);
        break;
      }
      case 0x070f: {
        const [group, , band, type, fHi, fLo, gHi, gLo, qHi, qLo] = payload;
        this.bands[group][band] = {
          type,
          freq: Buffer.from([fHi, fLo]).readUInt16BE(0),
          gainTenths: Buffer.from([gHi, gLo]).readInt16BE(0),
          qRaw: Buffer.from([qHi, qLo]).readUInt16BE(0),
        };
        break;
      }
      case 0x0123:
        if (!this.mute) this.sendPreset(Math.log2(payload[0]));
        break;
      case 0x070a: {
        const [group, customIdx, len, ...name] = payload;
        this.names.set(`${group}:${customIdx}`, Buffer.from(name.slice(0, len)).toString("utf8"));
        break;
      }
      case 0x070b: {
        if (this.mute) break;
        const [group, customIdx] = payload;
        // a response for another slot first, which must be ignored
        this.reply([9, 6, 0x07, 0x0c, group, (customIdx + 1) % 20, 1, 0x58]);
        const name = Buffer.from(this.names.get(`${group}:${customIdx}`) ?? "", "utf8");
        this.reply([9, 6 + name.length, 0x07, 0x0c, group, customIdx, name.length, ...name]);
        break;
      }
    }
  }

  private sendPreset(groupId: number): void {
    const data = this.presetBuffer(groupId);
    const count = Math.ceil(data.length / this.chunkSize);
    const chunks: Buffer[] = [];
    for (let i = 0; i < count; i++) {
      const offset = i * this.chunkSize;
      const part = data.subarray(offset, offset + this.chunkSize);
      const header = [9, 8 + part.length, 0x01, 0x28, groupId, ((count - 1) << 4) | i];
      chunks.push(Buffer.from([...header, part.length >> 8, part.length & 0xff, offset >> 8, offset & 0xff, ...part]));
    }
    if (this.reverseChunks) chunks.reverse();
    // unrelated traffic interleaved with the response
    this.reply([9, 3, 0x07, 0x00]);
    for (const chunk of chunks) {
      if ((chunk[5] & 0x0f) === this.dropChunk) continue;
      this.reply(chunk);
      if (this.duplicateChunks) this.reply(chunk);
    }
  }
}

// ---------------------------------------------------------------------------
// Moondrop: coefficient packets
// ---------------------------------------------------------------------------

export class FakeMoondrop extends FakeTransport {
  /** Last band packet per band (report ID stripped) */
  readonly bands = new Map<number, Buffer>();
  readonly committed: number[] = [];
  pregainRaw = 0;
  saves = 0;
  mute = false;

  protected handle(report: number[]): void {
    const body = Buffer.from(report.slice(1));
    if (body[0] === 0x80) {
      if (this.mute) return;
      if (body[1] === 0x09) {
        this.reply(this.bands.get(body[4]) ?? Buffer.alloc(63));
      } else if (body[1] === 0x03) {
        const raw = Buffer.alloc(2);
        raw.writeInt16LE(this.pregainRaw, 0);
        this.reply([0x80, 0x03, 0x00, raw[0], raw[1]]);
      }
      return;
    }
    switch (body[1]) {
      case 0x09:
        this.bands.set(body[4], body);
        break;
      case 0x0a:
        this.committed.push(body[2]);
        break;
      case 0x01:
        this.saves++;
        break;
      case 0x23:
        this.pregainRaw = body.readInt16LE(3);
        break;
    }
  }
}

// ---------------------------------------------------------------------------
// Rig: a registry over a fake backend
// ---------------------------------------------------------------------------

export const FISSION = deviceInfo({ vendorId: 0x31b2, productId: 0x0001, path: "/dev/hidraw3", product: "FISSION" });
export const QUDELIX_5K = deviceInfo({
  vendorId: 0x0a12,
  productId: 0x4125,
  path: "/dev/hidraw1",
  product: "Qudelix-5K",
  usagePage: 0xff00,
});
export const RAYS = deviceInfo({ vendorId: 0x3302, productId: 0x4321, path: "/dev/hidraw2", product: "MOONDROP Rays" });

export interface Rig {
  backend: FakeBackend;
  clock: FakeClock;
  registry: DeviceRegistry;
}

/** Registry with the default handler table over an empty fake backend. */
export function createRig(): Rig {
  const backend = new FakeBackend();
  const clock = new FakeClock();
  const registry = new DeviceRegistry({
    backend,
    factories: createDefaultHandlerFactories({ backend, clock, config: { tanchjimRawPregainModels: [] } }),
  });
  return { backend, clock, registry };
}
