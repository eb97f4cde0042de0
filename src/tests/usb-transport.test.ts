/**
 * Tests for the USB transport state machine
 */

import { TransportState, StateChange, TransportError } from '../main/printer/transport/PrinterTransport';
import { USBTransport } from '../main/printer/transport/USBTransport';
import { UsbBackend, UsbPrinterHandle } from '../main/printer/transport/UsbBackend';

function createHandle(): UsbPrinterHandle & { close: jest.Mock<Promise<void>, []> } {
  return {
    write: jest.fn<Promise<number>, [Buffer]>(async (data) => data.length),
    close: jest.fn<Promise<void>, []>(async () => undefined),
  };
}

function backendOpening(open: () => Promise<UsbPrinterHandle | null>): UsbBackend {
  return {
    listDevices: async () => [],
    open,
  };
}

const DEVICE = { vendorId: 0x0fe6, productId: 0x811e };

describe('USBTransport', () => {
  it('moves through connecting to connected', async () => {
    const transport = new USBTransport(DEVICE, backendOpening(async () => createHandle()));
    const changes: StateChange[] = [];
    transport.onStateChange((change) => changes.push(change));

    await expect(transport.connect()).resolves.toBe(true);

    expect(changes).toEqual([
      { oldState: TransportState.DISCONNECTED, newState: TransportState.CONNECTING },
      { oldState: TransportState.CONNECTING, newState: TransportState.CONNECTED },
    ]);
    expect(transport.getStatus().connected).toBe(true);
    expect(transport.getVendorId()).toBe(0x0fe6);
    expect(transport.getProductId()).toBe(0x811e);
  });

  it('returns to disconnected when the device is absent', async () => {
    const transport = new USBTransport(DEVICE, backendOpening(async () => null));

    await expect(transport.connect()).resolves.toBe(false);
    expect(transport.getState()).toBe(TransportState.DISCONNECTED);
  });

  it('enters the error state and reports failures', async () => {
    const transport = new USBTransport(
      DEVICE,
      backendOpening(async () => {
        throw new Error('LIBUSB_ERROR_BUSY');
      })
    );
    const errors: TransportError[] = [];
    transport.onError((error) => errors.push(error));

    await expect(transport.connect()).rejects.toThrow('LIBUSB_ERROR_BUSY');

    expect(transport.getState()).toBe(TransportState.ERROR);
    expect(errors.map((error) => error.message)).toEqual([
      'Connection failed: LIBUSB_ERROR_BUSY',
    ]);
    expect(transport.getStatus().lastError).toBe('Connection failed: LIBUSB_ERROR_BUSY');
  });

  it('times out a connect that never completes', async () => {
    const transport = new USBTransport(DEVICE, backendOpening(() => new Promise(() => undefined)), {
      connectionTimeout: 10,
    });

    await expect(transport.connect()).rejects.toThrow('Connection timeout after 10ms');
    expect(transport.getState()).toBe(TransportState.ERROR);
  });

  it('closes a handle that opens after the timeout', async () => {
    const handle = createHandle();
    let resolveOpen: (opened: UsbPrinterHandle | null) => void = () => undefined;
    const opening = new Promise<UsbPrinterHandle | null>((resolve) => {
      resolveOpen = resolve;
    });
    const transport = new USBTransport(DEVICE, backendOpening(() => opening), {
      connectionTimeout: 10,
    });

    await expect(transport.connect()).rejects.toThrow('Connection timeout after 10ms');
    resolveOpen(handle);
    await new Promise((resolve) => setImmediate(resolve));

    expect(handle.close).toHaveBeenCalledTimes(1);
    expect(transport.getState()).toBe(TransportState.ERROR);
  });

  it('refuses to send while disconnected', async () => {
    const transport = new USBTransport(DEVICE, backendOpening(async () => createHandle()));
    await expect(transport.send(Buffer.from('SIZE 50 mm,30 mm\r\n'))).rejects.toThrow(
      'Transport is not connected'
    );
  });

  it('sends to the handle and closes it on disconnect', async () => {
    const handle = createHandle();
    const transport = new USBTransport(DEVICE, backendOpening(async () => handle));
    const disconnected = jest.fn();
    transport.onDisconnect(disconnected);

    await transport.connect();
    await expect(transport.send(Buffer.from('PRINT 1\r\n'))).resolves.toBe(9);
    await transport.disconnect();

    expect(handle.close).toHaveBeenCalledTimes(1);
    expect(disconnected).toHaveBeenCalledTimes(1);
    expect(transport.isConnected()).toBe(false);
  });
});
