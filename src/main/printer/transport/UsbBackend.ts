/**
 * USB Backend
 *
 * The seam between the printer service and the host's USB stack.
 * NodeUsbBackend talks to real hardware through the `usb` package,
 * which is loaded on first use so that nothing native is touched until
 * a device is actually listed or opened.
 *
 * @module printer/transport/UsbBackend
 */

import type { Device, Interface, OutEndpoint } from 'usb';
import { DeviceDescriptor } from '../types';
import { TIMING, USB } from '../../../shared/constants';
import { debugLogger } from '../../../shared/utils/debug-logger';

/**
 * An open, claimed printer interface
 */
export interface UsbPrinterHandle {
  /** Transfer bytes to the OUT endpoint; resolves with the byte count accepted */
  write(data: Buffer): Promise<number>;
  close(): Promise<void>;
}

export interface UsbBackend {
  listDevices(): Promise<DeviceDescriptor[]>;
  /** Resolves null when no device with these ids is attached */
  open(vendorId: number, productId: number): Promise<UsbPrinterHandle | null>;
}

export interface NodeUsbBackendOptions {
  /** Interface to claim (default: 0) */
  interfaceNumber?: number;
  /** Per-transfer timeout in ms (default: 10000) */
  transferTimeout?: number;
}

type UsbModule = typeof import('usb');

const COMPONENT = 'NodeUsbBackend';

function hex(id: number): string {
  return `0x${id.toString(16).padStart(4, '0')}`;
}

function readStringDescriptor(device: Device, index: number): Promise<string | undefined> {
  if (index === 0) return Promise.resolve(undefined);
  return new Promise((resolve) => {
    device.getStringDescriptor(index, (error, value) => {
      resolve(error ? undefined : value);
    });
  });
}

class NodeUsbPrinterHandle implements UsbPrinterHandle {
  constructor(
    private readonly device: Device,
    private readonly iface: Interface,
    private readonly endpoint: OutEndpoint
  ) {}

  write(data: Buffer): Promise<number> {
    return new Promise((resolve, reject) => {
      this.endpoint.transfer(data, (error, actual) => {
        if (error) {
          reject(error);
        } else {
          resolve(actual);
        }
      });
    });
  }

  async close(): Promise<void> {
    try {
      await new Promise<void>((resolve, reject) => {
        this.iface.release(true, (error) => (error ? reject(error) : resolve()));
      });
    } finally {
      this.device.close();
    }
  }
}

/**
 * UsbBackend over the `usb` package (libusb)
 */
export class NodeUsbBackend implements UsbBackend {
  private usbModule: Promise<UsbModule> | null = null;
  private readonly interfaceNumber: number;
  private readonly transferTimeout: number;

  constructor(options: NodeUsbBackendOptions = {}) {
    this.interfaceNumber = options.interfaceNumber ?? USB.DEFAULT_INTERFACE;
    this.transferTimeout = options.transferTimeout ?? TIMING.TRANSFER_TIMEOUT_MS;
  }

  private load(): Promise<UsbModule> {
    if (!this.usbModule) {
      this.usbModule = import('usb');
    }
    return this.usbModule;
  }

  async listDevices(): Promise<DeviceDescriptor[]> {
    const usb = await this.load();
    const descriptors: DeviceDescriptor[] = [];

    for (const device of usb.getDeviceList()) {
      descriptors.push(await this.describe(device));
    }

    return descriptors;
  }

  /**
   * Ids plus manufacturer/product strings when the device can be opened
   */
  private async describe(device: Device): Promise<DeviceDescriptor> {
    const { idVendor, idProduct, iManufacturer, iProduct } = device.deviceDescriptor;
    const descriptor: DeviceDescriptor = { vendorId: idVendor, productId: idProduct };

    try {
      device.open();
      try {
        descriptor.manufacturer = await readStringDescriptor(device, iManufacturer);
        descriptor.productName = await readStringDescriptor(device, iProduct);
      } finally {
        device.close();
      }
    } catch (error) {
      debugLogger.debug(
        'String descriptors unavailable',
        error,
        COMPONENT,
        `${hex(idVendor)}:${hex(idProduct)}`
      );
    }

    return descriptor;
  }

  async open(vendorId: number, productId: number): Promise<UsbPrinterHandle | null> {
    const usb = await this.load();
    const device = usb.findByIds(vendorId, productId);
    if (!device) return null;

    device.open();
    try {
      const interfaces = device.interfaces ?? [];
      if (interfaces.length <= this.interfaceNumber) {
        throw new Error(`Interface ${this.interfaceNumber} not found on device`);
      }
      const iface = interfaces[this.interfaceNumber];

      if (process.platform !== 'win32' && iface.isKernelDriverActive()) {
        iface.detachKernelDriver();
      }
      iface.claim();

      const endpoint = iface.endpoints.find(
        (candidate): candidate is OutEndpoint => candidate instanceof usb.OutEndpoint
      );
      if (!endpoint) {
        throw new Error('No OUT endpoint found on USB device');
      }
      endpoint.timeout = this.transferTimeout;

      return new NodeUsbPrinterHandle(device, iface, endpoint);
    } catch (error) {
      device.close();
      throw error;
    }
  }
}
