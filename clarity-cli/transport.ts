/**
 * HID transport abstraction and its node-hid implementation.
 */

import HID from "node-hid";
import type { HIDAsync } from "node-hid";

/** Enumerated HID device */
export interface DeviceDescriptor {
  path?: string;
  vendorId: number;
  productId: number;
  product?: string;
  manufacturer?: string;
  serialNumber?: string;
}

/** Raw byte-oriented handle on an opened device */
export interface HidHandle {
  /** Resolves with the number of bytes written */
  write(data: Buffer): Promise<number>;
  /** Resolves with the bytes read, or undefined if nothing arrived within timeoutMs */
  read(maxLength: number, timeoutMs: number): Promise<Uint8Array | undefined>;
  close(): Promise<void>;
}

/** Minimal capability set consumed from a HID library */
export interface HidProvider {
  enumerate(vendorId: number, productId: number): Promise<DeviceDescriptor[]>;
  open(path: string): Promise<HidHandle>;
}

class NodeHidHandle implements HidHandle {
  constructor(private device: HIDAsync) {}

  write(data: Buffer): Promise<number> {
    return this.device.write(data);
  }

  async read(maxLength: number, timeoutMs: number): Promise<Uint8Array | undefined> {
    const data = await this.device.read(timeoutMs);
    if (!data || data.length === 0) return undefined;
    return data.subarray(0, maxLength);
  }

  close(): Promise<void> {
    return this.device.close();
  }
}

/**
 * Provider backed by the node-hid native bindings.
 */
export const nodeHidProvider: HidProvider = {
  async enumerate(vendorId, productId) {
    const devices = await HID.devicesAsync(vendorId, productId);
    return devices.map((device) => ({
      path: device.path,
      vendorId: device.vendorId,
      productId: device.productId,
      product: device.product,
      manufacturer: device.manufacturer,
      serialNumber: device.serialNumber,
    }));
  },

  async open(path) {
    const device = await HID.HIDAsync.open(path);
    return new NodeHidHandle(device);
  },
};
