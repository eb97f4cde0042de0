/**
 * Shared Constants
 */

export const PRINTER_DEFAULTS = {
  // Most desktop label and receipt printers ship at 203 dpi
  DPI: 203,
  MM_PER_INCH: 25.4,

  // ESC/POS
  RECEIPT_LINE_WIDTH: 32,
  BARCODE_HEIGHT: 80,
  BARCODE_MODULE_WIDTH: 2,
  QR_MODULE_SIZE: 6,
  FEED_BEFORE_CUT: 3,

  // TSPL
  TSPL_BARCODE_HEIGHT: 50,
  TSPL_QR_CELL_WIDTH: 4,
  TSPL_LINE_THICKNESS: 2,

  // ZPL
  ZPL_BARCODE_HEIGHT: 100,
  ZPL_QR_MAGNIFICATION: 4,
  ZPL_DATAMATRIX_SIZE: 4,
  ZPL_TEXT_BLOCK_MAX_LINES: 10,
  ZPL_LABEL_WIDTH: 406,
  ZPL_LABEL_LENGTH: 305,
} as const;

export const TIMING = {
  CONNECTION_TIMEOUT_MS: 5000,
  TRANSFER_TIMEOUT_MS: 10000,
} as const;

export const USB = {
  // USB device class code for printers
  CLASS_PRINTER: 7,
  DEFAULT_INTERFACE: 0,
} as const;
