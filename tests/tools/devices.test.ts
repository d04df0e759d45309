import { describe, it, expect } from "vitest";
import { executeDiagnose, executeGetDeviceCapabilities, executeListDevices } from "../../src/tools/devices.js";
import { DeviceSelectionError } from "../../src/core/errors.js";
import { FISSION, FakeQudelix, FakeTanchjim, QUDELIX_5K, createRig } from "../helpers/fake-devices.js";

function rigWithTwo() {
  const rig = createRig();
  rig.backend.attach(QUDELIX_5K, () => new FakeQudelix()).attach(FISSION, () => new FakeTanchjim());
  return rig;
}

describe("executeListDevices", () => {
  it("returns a notice when nothing is attached", () => {
    const { registry } = createRig();
    expect(executeListDevices(registry)).toBe("No DSP devices found. Connect a device and try again.");
  });

  it("lists devices with their capabilities", () => {
    const { registry } = rigWithTwo();
    const parsed = JSON.parse(executeListDevices(registry));
    expect(parsed.devices).toEqual([
      {
        id: 0,
        product: "FISSION",
        handler: "Tanchjim",
        vendorId: "0x31B2",
        productId: "0x0001",
        maxFilters: 5,
        supportedTypes: ["HSQ", "LSQ", "PK"],
        supportsRead: true,
        supportsWrite: true,
        supportsPresets: false,
        groups: [],
      },
      {
        id: 1,
        product: "Qudelix-5K",
        handler: "Qudelix",
        vendorId: "0x0A12",
        productId: "0x4125",
        maxFilters: 10,
        supportedTypes: ["HPF", "HSQ", "LPF", "LSQ", "PK"],
        supportsRead: true,
        supportsWrite: true,
        supportsPresets: true,
        groups: ["USR", "SPK", "B20"],
      },
    ]);
  });

  it("does not open any device", () => {
    const { registry, backend } = rigWithTwo();
    executeListDevices(registry);
    expect(backend.opened).toEqual([]);
  });
});

describe("executeGetDeviceCapabilities", () => {
  it("reports ranges and flags", () => {
    const { registry } = rigWithTwo();
    expect(JSON.parse(executeGetDeviceCapabilities(registry, { deviceId: 1 }))).toEqual({
      device: "Qudelix-5K",
      handler: "Qudelix",
      capabilities: {
        maxFilters: 10,
        gainRange: { min: -20, max: 20 },
        pregainRange: { min: -12, max: 12 },
        freqRange: { min: 20, max: 20000 },
        qRange: { min: 0.1, max: 10 },
        supportedFilterTypes: ["HPF", "HSQ", "LPF", "LSQ", "PK"],
        supportsRead: true,
        supportsWrite: true,
        supportsDirectPregainWrite: false,
        supportsPresets: true,
        groups: ["USR", "SPK", "B20"],
      },
    });
  });

  it("rejects an out-of-range id", () => {
    const { registry } = rigWithTwo();
    expect(() => executeGetDeviceCapabilities(registry, { deviceId: 5 })).toThrow(
      new DeviceSelectionError("Invalid deviceId 5. Valid range: 0-1", []),
    );
  });
});

describe("executeDiagnose", () => {
  it("returns the probe report for the selected device", async () => {
    const { registry, backend } = rigWithTwo();
    const parsed = JSON.parse(await executeDiagnose(registry, { deviceId: 0 }));
    expect(parsed.device).toBe("FISSION");
    expect(parsed.handler).toBe("Tanchjim");
    expect(parsed.probes.map((p: { name: string }) => p.name)).toEqual([
      "field 0x26",
      "field 0x27",
      "field 0x65",
      "read_peq",
    ]);
    expect(backend.opened).toEqual(["/dev/hidraw3"]);
  });

  it("requires a device id when several are attached", async () => {
    const { registry } = rigWithTwo();
    await expect(executeDiagnose(registry, {})).rejects.toBeInstanceOf(DeviceSelectionError);
  });
});
