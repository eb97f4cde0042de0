/**
 * Tests for the device boundary: enumeration, connection and writes
 * against an in-process USB backend.
 */

import Database from 'better-sqlite3';
import { DeviceDescriptor, PaperSize, PrinterLanguage } from '../main/printer/types';
import { UsbBackend, UsbPrinterHandle } from '../main/printer/transport/UsbBackend';
import { PrinterConfigStore } from '../main/printer/services/PrinterConfigStore';
import { PrinterService } from '../main/printer/services/PrinterService';
import { renderTemplate } from '../main/printer/services/TemplateLibrary';
import { PrinterError } from '../shared/utils/error-handler';
import { LogLevel, debugLogger } from '../shared/utils/debug-logger';

const ZEBRA: DeviceDescriptor = {
  vendorId: 0x0a5f,
  productId: 0x0164,
  manufacturer: 'Zebra Technologies',
  productName: 'ZTC ZD420-203dpi',
};

const EPSON: DeviceDescriptor = {
  vendorId: 0x04b8,
  productId: 0x0e15,
  manufacturer: 'EPSON',
  productName: 'TM-T20III Receipt',
};

const NAMELESS: DeviceDescriptor = { vendorId: 0x1234, productId: 0x5678 };

class FakeHandle implements UsbPrinterHandle {
  written: Buffer[] = [];
  closed = false;
  accept?: number;
  writeError?: Error;
  closeError?: Error;

  async write(data: Buffer): Promise<number> {
    if (this.writeError) throw this.writeError;
    this.written.push(data);
    return this.accept ?? data.length;
  }

  async close(): Promise<void> {
    this.closed = true;
    if (this.closeError) throw this.closeError;
  }
}

function createBackend(handle: FakeHandle) {
  const backend = {
    listDevices: jest.fn<Promise<DeviceDescriptor[]>, []>(async () => [ZEBRA, EPSON, { ...ZEBRA }]),
    open: jest.fn<Promise<UsbPrinterHandle | null>, [number, number]>(async () => handle),
  };
  const typed: UsbBackend = backend;
  return { backend, typed };
}

let handle: FakeHandle;
let backend: ReturnType<typeof createBackend>['backend'];
let service: PrinterService;

beforeAll(() => {
  jest.spyOn(console, 'error').mockImplementation(() => undefined);
  jest.spyOn(console, 'warn').mockImplementation(() => undefined);
});

afterAll(() => {
  jest.restoreAllMocks();
});

beforeEach(() => {
  handle = new FakeHandle();
  const created = createBackend(handle);
  backend = created.backend;
  service = new PrinterService({ backend: created.typed });
});

describe('listDevices', () => {
  it('returns one entry per vendor/product pair', async () => {
    await expect(service.listDevices()).resolves.toEqual([ZEBRA, EPSON]);
  });

  it('refuses a second enumeration while one is running', async () => {
    const first = service.listDevices();

    await expect(service.listDevices()).rejects.toThrow(
      'Failed to get device list: Discovery already in progress'
    );
    await expect(first).resolves.toEqual([ZEBRA, EPSON]);
    await expect(service.listDevices()).resolves.toEqual([ZEBRA, EPSON]);
  });

  it('wraps enumeration failures', async () => {
    backend.listDevices.mockRejectedValueOnce(new Error('LIBUSB_ERROR_ACCESS'));

    const attempt = service.listDevices();
    await expect(attempt).rejects.toBeInstanceOf(PrinterError);
    await expect(attempt).rejects.toThrow('Failed to get device list: LIBUSB_ERROR_ACCESS');
  });
});

describe('connect', () => {
  it('opens the device by its ids', async () => {
    await expect(service.connect(ZEBRA)).resolves.toBe(true);

    expect(backend.open).toHaveBeenCalledWith(0x0a5f, 0x0164);
    expect(service.isConnected).toBe(true);
    expect(service.connectedDevice).toEqual(ZEBRA);
  });

  it('resolves false when the device is not attached', async () => {
    backend.open.mockResolvedValueOnce(null);

    debugLogger.clearLogs();

    await expect(service.connect(ZEBRA)).resolves.toBe(false);
    expect(service.isConnected).toBe(false);
    expect(service.connectedDevice).toBeNull();
    expect(debugLogger.getLogs(LogLevel.WARN, 'PrinterService')).toMatchObject([
      {
        level: LogLevel.WARN,
        message: 'Device not found',
        device: 'Zebra Technologies - ZTC ZD420-203dpi (VID: 2655, PID: 356)',
      },
    ]);
  });

  it('rejects ids outside the 16-bit range before touching the device', async () => {
    await expect(service.connect({ vendorId: 0x10000, productId: 1 })).rejects.toThrow(
      'Invalid vendor or product ID'
    );
    expect(backend.open).not.toHaveBeenCalled();
  });

  it('wraps open failures without retrying', async () => {
    backend.open.mockRejectedValueOnce(new Error('LIBUSB_ERROR_BUSY'));

    await expect(service.connect(ZEBRA)).rejects.toThrow('Failed to connect: LIBUSB_ERROR_BUSY');
    expect(backend.open).toHaveBeenCalledTimes(1);
    expect(service.isConnected).toBe(false);
  });

  it('gives up after the connection timeout', async () => {
    const hanging = createBackend(handle);
    hanging.backend.open.mockImplementation(() => new Promise(() => undefined));
    const slow = new PrinterService({
      backend: hanging.typed,
      transport: { connectionTimeout: 20 },
    });

    await expect(slow.connect(ZEBRA)).rejects.toThrow(
      'Failed to connect: Connection timeout after 20ms'
    );
  });

  it('closes the previous connection first', async () => {
    const second = new FakeHandle();
    await service.connect(ZEBRA);
    backend.open.mockResolvedValueOnce(second);

    await service.connect(EPSON);

    expect(handle.closed).toBe(true);
    expect(second.closed).toBe(false);
    expect(service.connectedDevice).toEqual(EPSON);
  });
});

describe('write', () => {
  const bytes = new Uint8Array([0x1b, 0x40, 0x41, 0x0a]);

  it('requires a connection', async () => {
    await expect(service.write(bytes)).rejects.toThrow('No printer connected');
  });

  it('transmits the bytes unchanged', async () => {
    await service.connect(EPSON);

    await expect(service.write(bytes)).resolves.toBe(true);
    expect([...handle.written[0]]).toEqual([0x1b, 0x40, 0x41, 0x0a]);
  });

  it('reports a short transfer as false', async () => {
    await service.connect(EPSON);
    handle.accept = 2;

    await expect(service.write(bytes)).resolves.toBe(false);
  });

  it('wraps transfer failures and stays connected', async () => {
    await service.connect(EPSON);
    handle.writeError = new Error('LIBUSB_ERROR_PIPE');

    await expect(service.write(bytes)).rejects.toThrow('Failed to write: LIBUSB_ERROR_PIPE');
    expect(service.isConnected).toBe(true);
  });

  it('forwards each language entry point to the device', async () => {
    await service.connect(ZEBRA);

    await service.printEscPos(new Uint8Array([1]));
    await service.printTspl(new Uint8Array([2]));
    await service.printZpl(new Uint8Array([3]));

    expect(handle.written.map((chunk) => chunk[0])).toEqual([1, 2, 3]);
  });
});

describe('disconnect', () => {
  it('succeeds when nothing is connected', async () => {
    await expect(service.disconnect()).resolves.toBe(true);
  });

  it('closes the handle', async () => {
    await service.connect(ZEBRA);

    await expect(service.disconnect()).resolves.toBe(true);
    expect(handle.closed).toBe(true);
    expect(service.isConnected).toBe(false);
    expect(service.connectedDevice).toBeNull();
  });

  it('wraps close failures and forgets the device', async () => {
    await service.connect(ZEBRA);
    handle.closeError = new Error('LIBUSB_ERROR_NO_DEVICE');

    await expect(service.disconnect()).rejects.toThrow(
      'Failed to disconnect: LIBUSB_ERROR_NO_DEVICE'
    );
    expect(service.connectedDevice).toBeNull();
  });
});

describe('languageFor', () => {
  it('classifies by manufacturer and product strings', () => {
    expect(service.languageFor(ZEBRA)).toBe(PrinterLanguage.ZPL);
    expect(service.languageFor(EPSON)).toBe(PrinterLanguage.ESC_POS);
  });

  it('uses ESC/POS for unclassified devices', () => {
    expect(service.languageFor(NAMELESS)).toBe(PrinterLanguage.ESC_POS);
  });

  describe('with saved profiles', () => {
    let db: Database.Database;
    let store: PrinterConfigStore;

    beforeEach(() => {
      db = new Database(':memory:');
      store = new PrinterConfigStore(db);
      service = new PrinterService({ backend: createBackend(handle).typed, configStore: store });
    });

    afterEach(() => {
      db.close();
    });

    it('prefers the saved language', () => {
      store.save({
        name: 'Relabelled Epson',
        vendorId: EPSON.vendorId,
        productId: EPSON.productId,
        language: PrinterLanguage.TSPL,
        dpi: 203,
        paperSize: PaperSize.MM_58,
        isDefault: false,
      });

      expect(service.languageFor(EPSON)).toBe(PrinterLanguage.TSPL);
    });

    it('falls back to the classifier when the saved language is unknown', () => {
      store.save({
        name: 'Unsure',
        vendorId: ZEBRA.vendorId,
        productId: ZEBRA.productId,
        language: PrinterLanguage.UNKNOWN,
        dpi: 203,
        paperSize: PaperSize.MM_58,
        isDefault: false,
      });

      expect(service.languageFor(ZEBRA)).toBe(PrinterLanguage.ZPL);
    });
  });
});

describe('printTemplate', () => {
  it('requires a connection', async () => {
    await expect(service.printTemplate('inventory')).rejects.toThrow('No printer connected');
  });

  it('renders in the connected device language', async () => {
    await service.connect(ZEBRA);

    await expect(service.printTemplate('inventory')).resolves.toBe(true);
    expect(handle.written[0].equals(renderTemplate(PrinterLanguage.ZPL, 'inventory'))).toBe(true);
  });

  describe('with a saved profile', () => {
    let db: Database.Database;
    let store: PrinterConfigStore;

    beforeEach(() => {
      db = new Database(':memory:');
      store = new PrinterConfigStore(db);
      service = new PrinterService({ backend: createBackend(handle).typed, configStore: store });
    });

    afterEach(() => {
      db.close();
    });

    it('uses the saved paper width for receipts', async () => {
      store.save({
        name: 'Front counter',
        vendorId: EPSON.vendorId,
        productId: EPSON.productId,
        language: PrinterLanguage.ESC_POS,
        dpi: 203,
        paperSize: PaperSize.MM_80,
        isDefault: true,
      });
      await service.connect(EPSON);

      await service.printTemplate('receipt');

      expect(
        handle.written[0].equals(
          renderTemplate(PrinterLanguage.ESC_POS, 'receipt', { paperSize: PaperSize.MM_80 })
        )
      ).toBe(true);
    });

    it('uses the saved resolution for labels unless one is given', async () => {
      store.save({
        name: 'Warehouse Zebra',
        vendorId: ZEBRA.vendorId,
        productId: ZEBRA.productId,
        language: PrinterLanguage.ZPL,
        dpi: 300,
        paperSize: PaperSize.MM_80,
        isDefault: false,
      });
      await service.connect(ZEBRA);

      await service.printTemplate('inventory');
      await service.printTemplate('inventory', { dpi: 203 });

      expect(handle.written[0].toString('utf8')).toMatch(/^\^XA\^PW600\^LL300\^MUD,200,300\^FX/);
      expect(handle.written[1].equals(renderTemplate(PrinterLanguage.ZPL, 'inventory'))).toBe(true);
    });
  });

  it('falls back to the language default for unknown names', async () => {
    await service.connect(NAMELESS);

    await service.printTemplate('no-such-template');
    expect(handle.written[0].equals(renderTemplate(PrinterLanguage.ESC_POS, 'receipt'))).toBe(
      true
    );
  });
});
