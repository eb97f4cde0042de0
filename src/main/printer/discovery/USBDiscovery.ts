/**
 * USB Printer Discovery Service
 *
 * Enumerates attached USB devices through a UsbBackend.
 *
 * @module printer/discovery
 */

import { DeviceDescriptor } from '../types';
import { UsbBackend } from '../transport/UsbBackend';
import { debugLogger } from '../../../shared/utils/debug-logger';
import { PrinterDiscovery, deviceKey } from './PrinterDiscovery';

/**
 * USB device discovery service
 */
export class USBDiscovery implements PrinterDiscovery {
  private discovering = false;

  constructor(private readonly backend: UsbBackend) {}

  /**
   * List attached devices, one entry per vendor/product pair
   * @throws Error when enumeration fails or is already running
   */
  async discover(): Promise<DeviceDescriptor[]> {
    if (this.discovering) {
      throw new Error('Discovery already in progress');
    }

    this.discovering = true;

    try {
      const found = new Map<string, DeviceDescriptor>();

      for (const device of await this.backend.listDevices()) {
        const key = deviceKey(device);
        if (!found.has(key)) {
          found.set(key, device);
        }
      }

      debugLogger.debug('USB discovery finished', { count: found.size }, 'USBDiscovery');
      return Array.from(found.values());
    } finally {
      this.discovering = false;
    }
  }
}
