/**
 * HidBackend implemented on node-hid.
 *
 * Devices are always opened by path: several interfaces of one device
 * share VID/PID (e.g. audio streaming vs. vendor control interface).
 */

import HID from "node-hid";
import type { HidDeviceInfo } from "../core/types.js";
import type { HidBackend, HidTransport } from "./transport.js";

type NodeHidDevice = ReturnType<typeof HID.devices>[number];

/** Normalize a node-hid enumeration record. Interfaces without a path are skipped. */
export function toDeviceInfo(device: NodeHidDevice): HidDeviceInfo | null {
  if (!device.path) return null;
  return {
    vendorId: device.vendorId,
    productId: device.productId,
    path: device.path,
    product: device.product ?? "",
    manufacturer: device.manufacturer ?? "",
    serialNumber: device.serialNumber ?? "",
    usagePage: device.usagePage ?? 0,
    interfaceNumber: device.interface,
  };
}

class NodeHidTransport implements HidTransport {
  private nonBlocking = false;

  constructor(private readonly device: HID.HID) {}

  write(data: readonly number[] | Buffer): number {
    return this.device.write(Buffer.isBuffer(data) ? data : [...data]);
  }

  read(maxLength: number, timeoutMs: number): Buffer | null {
    const values = this.nonBlocking ? this.device.readSync() : this.device.readTimeout(timeoutMs);
    if (values.length === 0) return null;
    return Buffer.from(values.slice(0, maxLength));
  }

  setNonBlocking(nonBlocking: boolean): void {
    this.device.setNonBlocking(nonBlocking);
    this.nonBlocking = nonBlocking;
  }

  close(): void {
    this.device.close();
  }
}

export class NodeHidBackend implements HidBackend {
  enumerate(): HidDeviceInfo[] {
    const result: HidDeviceInfo[] = [];
    for (const device of HID.devices()) {
      const info = toDeviceInfo(device);
      if (info) result.push(info);
    }
    return result;
  }

  open(path: string): HidTransport {
    return new NodeHidTransport(new HID.HID(path));
  }
}
