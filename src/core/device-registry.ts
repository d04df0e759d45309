/**
 * Device discovery and connection lifecycle.
 *
 * The registry enumerates HID interfaces, pairs each with the first handler
 * prototype that claims it and hands out fresh, connected handler instances.
 * Prototypes are never connected.
 */

import type { DeviceCapabilities, HidDeviceInfo } from "./types.js";
import type { DeviceHandler, HandlerFactory } from "./handler.js";
import { DeviceNotFoundError, DeviceSelectionError, type SelectionCandidate } from "./errors.js";
import type { HidBackend } from "../hid/transport.js";
import { silentLogger, type Logger } from "../utils/logger.js";

export interface DiscoveredDevice {
  /** 0-based ordinal, valid until the next discovery pass */
  id: number;
  vendorId: number;
  productId: number;
  product: string;
  manufacturer: string;
  serialNumber: string;
  path: string;
  usagePage: number;
  /** Matching handler prototype */
  handler: DeviceHandler;
  raw: HidDeviceInfo;
}

export interface DeviceInfo extends Omit<DiscoveredDevice, "raw"> {
  capabilities: DeviceCapabilities;
}

interface Entry {
  prototype: DeviceHandler;
  factory: HandlerFactory;
}

export interface DeviceRegistryOptions {
  backend: HidBackend;
  factories: readonly HandlerFactory[];
  logger?: Logger;
}

const compare = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);

export class DeviceRegistry {
  private readonly backend: HidBackend;
  private readonly entries: Entry[];
  private readonly logger: Logger;
  private discovered: DiscoveredDevice[] = [];
  private readonly factoryOf = new Map<DeviceHandler, HandlerFactory>();

  constructor(options: DeviceRegistryOptions) {
    this.backend = options.backend;
    this.logger = options.logger ?? silentLogger;
    this.entries = options.factories.map((factory) => ({ prototype: factory.create(), factory }));
    for (const { prototype, factory } of this.entries) this.factoryOf.set(prototype, factory);
  }

  /** Devices from the last discovery pass. */
  get devices(): readonly DiscoveredDevice[] {
    return this.discovered;
  }

  /**
   * Enumerate once and match every interface against the handler table.
   * Results are sorted by product string, then path.
   */
  discoverDevices(): DiscoveredDevice[] {
    const matched: { raw: HidDeviceInfo; handler: DeviceHandler }[] = [];
    for (const raw of this.backend.enumerate()) {
      const entry = this.entries.find((e) => e.prototype.matchesDevice(raw));
      if (!entry) continue;
      this.logger.debug(`found ${entry.prototype.name} device: ${raw.product}`);
      matched.push({ raw, handler: entry.prototype });
    }

    matched.sort((a, b) => compare(a.raw.product, b.raw.product) || compare(a.raw.path, b.raw.path));

    this.discovered = matched.map(({ raw, handler }, id) => ({
      id,
      vendorId: raw.vendorId,
      productId: raw.productId,
      product: raw.product,
      manufacturer: raw.manufacturer,
      serialNumber: raw.serialNumber,
      path: raw.path,
      usagePage: raw.usagePage,
      handler,
      raw,
    }));
    return this.discovered;
  }

  /**
   * Pick a discovered device. Without an id, a single device is chosen
   * automatically.
   */
  selectDevice(id?: number): DiscoveredDevice {
    if (this.discovered.length === 0) throw new DeviceNotFoundError();

    if (id === undefined) {
      if (this.discovered.length === 1) return this.discovered[0];
      const candidates = this.candidates();
      const list = candidates.map((c) => `  ${c.id}: ${c.product} (${c.handler})`).join("\n");
      throw new DeviceSelectionError(`Multiple devices found. Specify deviceId:\n${list}`, candidates);
    }

    return this.byId(id);
  }

  /** Select a device and return a fresh handler connected to it. */
  connectDevice(id?: number): DeviceHandler {
    const device = this.selectDevice(id);
    const handler = this.instantiate(device);
    handler.connect(device.raw);
    this.logger.debug(`connected to ${device.product} via ${handler.name}`);
    return handler;
  }

  getDeviceInfo(id: number): DeviceInfo {
    const { raw: _raw, ...info } = this.byId(id);
    return { ...info, capabilities: info.handler.capabilities() };
  }

  /**
   * Discover, connect, run `fn`, and always disconnect before returning or
   * rethrowing.
   */
  async withDevice<T>(
    id: number | undefined,
    fn: (handler: DeviceHandler, device: DiscoveredDevice) => Promise<T>,
  ): Promise<T> {
    this.discoverDevices();
    const device = this.selectDevice(id);
    const handler = this.connectDevice(device.id);
    try {
      return await fn(handler, device);
    } finally {
      handler.disconnect();
    }
  }

  private byId(id: number): DiscoveredDevice {
    const device = Number.isInteger(id) ? this.discovered[id] : undefined;
    if (!device) {
      const range = this.discovered.length > 0 ? `0-${this.discovered.length - 1}` : "none";
      throw new DeviceSelectionError(`Invalid deviceId ${id}. Valid range: ${range}`, this.candidates());
    }
    return device;
  }

  private instantiate(device: DiscoveredDevice): DeviceHandler {
    const factory = this.factoryOf.get(device.handler);
    if (!factory) throw new Error(`No factory registered for handler ${device.handler.name}`);
    return factory.create();
  }

  private candidates(): SelectionCandidate[] {
    return this.discovered.map((d) => ({ id: d.id, product: d.product, handler: d.handler.name }));
  }
}
