/**
 * Printer Discovery Base Interface
 *
 * Defines the common interface for printer discovery services.
 *
 * @module printer/discovery
 */

import { DeviceDescriptor } from '../types';

/**
 * Base interface for printer discovery services
 */
export interface PrinterDiscovery {
  /**
   * Enumerate attached devices
   * @returns Promise resolving to the devices found, in enumeration order
   */
  discover(): Promise<DeviceDescriptor[]>;
}

/**
 * vendorId:productId, the key devices are deduplicated on
 */
export function deviceKey(device: Pick<DeviceDescriptor, 'vendorId' | 'productId'>): string {
  return `${device.vendorId}:${device.productId}`;
}
