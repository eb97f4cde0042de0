/**
 * Thermal Printer Module
 *
 * Byte-exact encoders for ESC/POS receipt printers and TSPL and ZPL
 * label printers, plus USB discovery and transport.
 *
 * @module printer
 */

// Re-export all printer types
export * from './types';

// Re-export discovery services
export * from './discovery';

// Re-export transport layer
export * from './transport';

// Re-export services
export * from './services';

export { PrinterError, PrinterErrorCode, ErrorFactory, getErrorMessage } from '../../shared/utils/error-handler';
export { debugLogger, LogLevel } from '../../shared/utils/debug-logger';
