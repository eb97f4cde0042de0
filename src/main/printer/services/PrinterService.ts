/**
 * Printer Service
 *
 * Device boundary for the encoders: list attached USB devices, hold one
 * connection, and write finalized byte streams to it. Every failure is
 * raised as a PrinterError carrying the underlying cause. Nothing is
 * retried; retry policy belongs to the caller.
 *
 * @module printer/services/PrinterService
 */

import { DeviceDescriptor, PrinterLanguage, PrinterProfile } from '../types';
import { isValidUsbId } from '../types/validation';
import { USBDiscovery } from '../discovery/USBDiscovery';
import { classifyDevice, describeDevice } from '../discovery/DeviceClassifier';
import { TransportOptions } from '../transport/PrinterTransport';
import { USBTransport } from '../transport/USBTransport';
import { NodeUsbBackend, UsbBackend } from '../transport/UsbBackend';
import { PrinterConfigStore } from './PrinterConfigStore';
import {
  EncodableLanguage,
  TemplateRenderOptions,
  renderTemplate,
  toEncodableLanguage,
} from './TemplateLibrary';
import { debugLogger } from '../../../shared/utils/debug-logger';
import { ErrorFactory, PrinterError } from '../../../shared/utils/error-handler';

export interface PrinterServiceOptions {
  /** USB stack (default: NodeUsbBackend) */
  backend?: UsbBackend;
  /** Saved profiles that override the keyword classifier */
  configStore?: PrinterConfigStore;
  transport?: TransportOptions;
}

const COMPONENT = 'PrinterService';

/**
 * PrinterService - single-connection USB printer access
 */
export class PrinterService {
  private readonly backend: UsbBackend;
  private readonly discovery: USBDiscovery;
  private readonly configStore?: PrinterConfigStore;
  private readonly transportOptions?: TransportOptions;
  private transport: USBTransport | null = null;
  private device: DeviceDescriptor | null = null;

  constructor(options: PrinterServiceOptions = {}) {
    this.backend = options.backend ?? new NodeUsbBackend();
    this.discovery = new USBDiscovery(this.backend);
    this.configStore = options.configStore;
    this.transportOptions = options.transport;
  }

  /**
   * Attached USB devices
   * @throws PrinterError when enumeration fails
   */
  async listDevices(): Promise<DeviceDescriptor[]> {
    try {
      return await this.discovery.discover();
    } catch (error) {
      debugLogger.error('Device enumeration failed', error, COMPONENT);
      throw ErrorFactory.wrap('Failed to get device list', error);
    }
  }

  /**
   * Open a device, replacing any current connection
   * @returns false when the device is not attached
   * @throws PrinterError on invalid ids or connection failure
   */
  async connect(descriptor: DeviceDescriptor): Promise<boolean> {
    if (!isValidUsbId(descriptor.vendorId) || !isValidUsbId(descriptor.productId)) {
      throw new PrinterError('Invalid vendor or product ID');
    }

    if (this.transport) {
      await this.disconnect();
    }

    const label = describeDevice(descriptor);
    const transport = new USBTransport(descriptor, this.backend, this.transportOptions);

    let connected: boolean;
    try {
      connected = await transport.connect();
    } catch (error) {
      transport.destroy();
      debugLogger.error('Connect failed', error, COMPONENT, label);
      throw ErrorFactory.wrap('Failed to connect', error);
    }

    if (!connected) {
      transport.destroy();
      debugLogger.warn('Device not found', undefined, COMPONENT, label);
      return false;
    }

    this.transport = transport;
    this.device = descriptor;
    debugLogger.deviceOperation('connected', label);
    return true;
  }

  /**
   * Close the current connection. Succeeds when nothing is connected.
   * @throws PrinterError when closing the device fails
   */
  async disconnect(): Promise<boolean> {
    const transport = this.transport;
    const device = this.device;
    this.transport = null;
    this.device = null;

    if (!transport) {
      return true;
    }

    try {
      await transport.disconnect();
    } catch (error) {
      throw ErrorFactory.wrap('Failed to disconnect', error);
    } finally {
      transport.destroy();
    }

    if (device) {
      debugLogger.deviceOperation('disconnected', describeDevice(device));
    }
    return true;
  }

  get isConnected(): boolean {
    return this.transport !== null && this.transport.isConnected();
  }

  get connectedDevice(): DeviceDescriptor | null {
    return this.device;
  }

  /**
   * Transmit finalized encoder output
   * @returns true when the device accepted every byte
   * @throws PrinterError when nothing is connected or the transfer fails
   */
  async write(bytes: Uint8Array): Promise<boolean> {
    const transport = this.transport;
    const device = this.device;
    if (!transport || !device || !transport.isConnected()) {
      throw new PrinterError('No printer connected');
    }

    const data = Buffer.from(bytes);
    try {
      const accepted = await transport.send(data);
      debugLogger.transferOperation(accepted, describeDevice(device));
      return accepted === data.length;
    } catch (error) {
      debugLogger.error('Write failed', error, COMPONENT, describeDevice(device));
      throw ErrorFactory.wrap('Failed to write', error);
    }
  }

  printEscPos(bytes: Uint8Array): Promise<boolean> {
    return this.write(bytes);
  }

  printTspl(bytes: Uint8Array): Promise<boolean> {
    return this.write(bytes);
  }

  printZpl(bytes: Uint8Array): Promise<boolean> {
    return this.write(bytes);
  }

  /**
   * Language to encode for a device: a saved profile wins over the
   * keyword classifier; unknown devices get ESC/POS
   */
  languageFor(descriptor: DeviceDescriptor): EncodableLanguage {
    const profile = this.profileFor(descriptor);
    if (profile && profile.language !== PrinterLanguage.UNKNOWN) {
      return toEncodableLanguage(profile.language);
    }
    return toEncodableLanguage(classifyDevice(descriptor));
  }

  /**
   * Render a named template in the connected device's language and
   * write it. Unknown names fall back to the language default. Paper
   * size and resolution come from the options, then the saved profile.
   */
  async printTemplate(name: string, options: TemplateRenderOptions = {}): Promise<boolean> {
    const device = this.device;
    if (!device) {
      throw new PrinterError('No printer connected');
    }
    const profile = this.profileFor(device);
    const bytes = renderTemplate(this.languageFor(device), name, {
      shipDate: options.shipDate,
      paperSize: options.paperSize ?? profile?.paperSize,
      dpi: options.dpi ?? profile?.dpi,
    });
    return this.write(bytes);
  }

  private profileFor(descriptor: DeviceDescriptor): PrinterProfile | null {
    return this.configStore?.findByDevice(descriptor.vendorId, descriptor.productId) ?? null;
  }
}
