/**
 * Printer Transport Module
 *
 * - BasePrinterTransport (abstract base class)
 * - USBTransport over a UsbBackend
 * - NodeUsbBackend (libusb via the `usb` package)
 *
 * @module printer/transport
 */

export type {
  IPrinterTransport,
  TransportError,
  TransportOptions,
  StateChange,
} from './PrinterTransport';

export {
  BasePrinterTransport,
  TransportState,
  TransportEvent,
  DEFAULT_TRANSPORT_OPTIONS,
} from './PrinterTransport';

export type { UsbBackend, UsbPrinterHandle, NodeUsbBackendOptions } from './UsbBackend';
export { NodeUsbBackend } from './UsbBackend';

export { USBTransport } from './USBTransport';
