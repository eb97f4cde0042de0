/**
 * USB Transport Implementation
 *
 * Holds one open printer handle obtained from a UsbBackend.
 *
 * @module printer/transport/USBTransport
 */

import { BasePrinterTransport, TransportOptions } from './PrinterTransport';
import { UsbBackend, UsbPrinterHandle } from './UsbBackend';
import { DeviceDescriptor } from '../types';

/**
 * USBTransport - USB transport for USB printers
 */
export class USBTransport extends BasePrinterTransport {
  private handle: UsbPrinterHandle | null = null;
  private readonly vendorId: number;
  private readonly productId: number;

  constructor(
    device: Pick<DeviceDescriptor, 'vendorId' | 'productId'>,
    private readonly backend: UsbBackend,
    options?: TransportOptions
  ) {
    super(options);
    this.vendorId = device.vendorId;
    this.productId = device.productId;
  }

  getVendorId(): number {
    return this.vendorId;
  }

  getProductId(): number {
    return this.productId;
  }

  protected async doConnect(): Promise<boolean> {
    await this.closeHandle();
    this.handle = await this.backend.open(this.vendorId, this.productId);
    return this.handle !== null;
  }

  protected async doDisconnect(): Promise<void> {
    await this.closeHandle();
  }

  protected async doSend(data: Buffer): Promise<number> {
    if (!this.handle) {
      throw new Error('USB handle not available');
    }
    return this.handle.write(data);
  }

  private async closeHandle(): Promise<void> {
    const handle = this.handle;
    this.handle = null;
    if (handle) {
      await handle.close();
    }
  }
}
