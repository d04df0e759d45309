import { describe, it, expect } from "vitest";
import {
  MoondropHandler,
  buildBandPacket,
  buildCommitBandPacket,
  buildIdentityBandPacket,
  buildPregainPacket,
  buildReadBandPacket,
  buildReadPregainPacket,
  decodeBand,
  decodePregain,
} from "../../src/devices/moondrop.js";
import { computeBiquad, toFixedPoint } from "../../src/core/biquad.js";
import { createFilter, createProfile, serializeProfile } from "../../src/core/profile.js";
import { CommunicationError, ProfileValidationError } from "../../src/core/errors.js";
import { FakeBackend, FakeClock, FakeMoondrop, deviceInfo } from "../helpers/fake-devices.js";

const rays = deviceInfo({ vendorId: 0x3302, productId: 0x4321, path: "/dev/hidraw2", product: "MOONDROP Rays" });

function connect(device = new FakeMoondrop()) {
  const backend = new FakeBackend().attach(rays, () => device);
  const clock = new FakeClock();
  const handler = new MoondropHandler({ backend, clock });
  handler.connect(rays);
  return { handler, clock, device };
}

const peak = createFilter({ freq: 1000, gain: -3.5, q: 1.41, type: "PK" });

describe("band packets", () => {
  it("lays out coefficients and display values", () => {
    const packet = buildBandPacket(3, peak);
    expect(packet).toHaveLength(63);
    expect([...packet.subarray(0, 7)]).toEqual([0x01, 0x09, 0x18, 0x00, 0x03, 0x00, 0x00]);

    const expected = toFixedPoint(computeBiquad("PK", 1000, -3.5, 1.41, 96000), 2 ** 30);
    const coeffs = [0, 1, 2, 3, 4].map((i) => packet.readInt32LE(7 + i * 4));
    expect(coeffs).toEqual(expected);

    expect(packet.readUInt16LE(27)).toBe(1000);
    expect(packet.readUInt16LE(29)).toBe(361);
    expect(packet.readInt16LE(31)).toBe(-896);
    expect(packet[33]).toBe(2);
    expect([packet[34], packet[35]]).toEqual([0x00, 0x07]);
  });

  it("writes an identity section for unused bands", () => {
    const packet = buildIdentityBandPacket(7);
    expect(packet[4]).toBe(7);
    expect(packet.readInt32LE(7)).toBe(2 ** 30);
    expect(packet.readInt32LE(11)).toBe(0);
    expect(packet.readUInt16LE(27)).toBe(0);
    expect(packet.readUInt16LE(29)).toBe(0);
  });

  it("fills commit packets with 0xFF after the band index", () => {
    const packet = buildCommitBandPacket(5);
    expect([...packet.subarray(0, 4)]).toEqual([0x01, 0x0a, 0x05, 0xff]);
    expect(packet[62]).toBe(0xff);
  });

  it("encodes pregain as int16 × 256", () => {
    expect([...buildPregainPacket(-6).subarray(0, 5)]).toEqual([0x01, 0x23, 0x00, 0x00, 0xfa]);
    expect(decodePregain(Buffer.from([0x80, 0x03, 0x00, 0x80, 0xfe]))).toBe(-1.5);
  });

  it("reads pregain back through the DAC offset register", () => {
    expect([...buildReadPregainPacket()]).toEqual([0x80, 0x03]);
  });

  it("rejects coefficients outside the fixed-point range", () => {
    const hot = createFilter({ freq: 10000, gain: 20, q: 0.707, type: "HSQ" });
    expect(() => buildBandPacket(1, hot)).toThrow(ProfileValidationError);
  });
});

describe("decodeBand", () => {
  it("decodes the echoed display values", () => {
    expect(decodeBand(buildBandPacket(0, createFilter({ freq: 200, gain: 2.5, q: 0.5, type: "LSQ" })))).toEqual({
      kind: "filter",
      filter: { freq: 200, gain: 2.5, q: 0.5, type: "LSQ" },
    });
  });

  it("treats freq 0 or Q 0 as empty", () => {
    expect(decodeBand(buildIdentityBandPacket(0))).toEqual({ kind: "empty" });
    expect(decodeBand(Buffer.alloc(63))).toEqual({ kind: "empty" });
  });

  it("rejects short responses and unknown type codes", () => {
    expect(() => decodeBand(Buffer.alloc(10))).toThrow(new CommunicationError("Short band response: 10 bytes"));
    const packet = buildBandPacket(0, peak);
    packet[33] = 9;
    expect(() => decodeBand(packet)).toThrow("Unknown filter type code 0x9");
  });

  it("reads with a six-byte request", () => {
    expect([...buildReadBandPacket(4)]).toEqual([0x80, 0x09, 0x18, 0x00, 0x04, 0x00]);
  });
});

describe("MoondropHandler", () => {
  it("matches DSP products of the known vendors", () => {
    const handler = new MoondropHandler({ backend: new FakeBackend() });
    expect(handler.matchesDevice(rays)).toBe(true);
    expect(handler.matchesDevice({ ...rays, vendorId: 0x0762, product: "FreeDSP Pro" })).toBe(true);
    expect(handler.matchesDevice({ ...rays, product: "MOONDROP Aria" })).toBe(false);
    expect(handler.matchesDevice({ ...rays, vendorId: 0x1234 })).toBe(false);
  });

  it("writes pregain, eight bands with commits, then saves", async () => {
    const { handler, clock, device } = connect();
    await handler.writePeq(createProfile({ filters: [peak], pregain: -2 }));

    expect(device.written).toHaveLength(18);
    expect(device.written[0].slice(0, 6)).toEqual([0x4b, 0x01, 0x23, 0x00, 0x00, 0xfe]);
    expect(device.written[1].slice(0, 6)).toEqual([0x4b, 0x01, 0x09, 0x18, 0x00, 0x00]);
    expect(device.written[2].slice(0, 4)).toEqual([0x4b, 0x01, 0x0a, 0x00]);
    expect(device.written[17].slice(0, 3)).toEqual([0x4b, 0x01, 0x01]);
    expect(device.committed).toEqual([0, 1, 2, 3, 4, 5, 6, 7]);
    expect(device.saves).toBe(1);
    expect(clock.time).toBe(17 * 20 + 1000);
  });

  it("round-trips within the device's resolution", async () => {
    const { handler, device } = connect();
    await handler.writePeq(
      createProfile({
        filters: [peak, { freq: 80, gain: 4, q: 0.707, type: "LSQ" }],
        pregain: -4.5,
      }),
    );
    const read = serializeProfile(await handler.readPeq());
    expect(device.written[device.written.length - 1]).toEqual([0x4b, 0x80, 0x03]);
    expect(read.pregain).toBe(-4.5);
    expect(read.filters.map((f) => [f.freq, f.gain, f.type])).toEqual([
      [1000, -3.5, "PK"],
      [80, 4, "LSQ"],
    ]);
    expect(read.filters[0].q).toBeCloseTo(1.41, 2);
    expect(read.filters[1].q).toBeCloseTo(0.707, 2);
  });

  it("aborts an overflowing profile before any traffic", async () => {
    const { handler, device } = connect();
    const profile = createProfile({
      filters: [peak, { freq: 10000, gain: 20, q: 0.707, type: "HSQ" }],
    });
    const error = await handler.writePeq(profile).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(ProfileValidationError);
    expect(error).toMatchObject({ violation: { field: "gain", filterIndex: 1 } });
    expect(device.written).toEqual([]);
  });

  it("rejects pass filters", async () => {
    const { handler } = connect();
    await expect(
      handler.writePeq(createProfile({ filters: [{ freq: 20000, gain: 0, q: 0.7, type: "LPF" }] })),
    ).rejects.toThrow("Filter 0: Moondrop doesn't support type 'LPF'. Supported types: HSQ, LSQ, PK");
  });

  it("sets pregain directly", async () => {
    const { handler, device } = connect();
    await handler.setPregain(-6);
    expect(device.written).toHaveLength(2);
    expect(device.pregainRaw).toBe(-1536);
    expect(device.saves).toBe(1);
    expect((await handler.readPeq()).pregain).toBe(-6);
  });

  it("times out when the device does not answer", async () => {
    const device = new FakeMoondrop();
    device.mute = true;
    const { handler } = connect(device);
    await expect(handler.readPeq()).rejects.toThrow(new CommunicationError("No response to 0x9 within 1000 ms"));
  });
});
