/**
 * Printer Services Module
 *
 * - Command buffers and unit helpers shared by the encoders
 * - EscPosBuilder, TsplBuilder, ZplBuilder and their templates
 * - TemplateLibrary (named templates per language)
 * - PrinterConfigStore (profile persistence)
 * - PrinterService (device boundary)
 */

// Command buffers and units
export * from './CommandBuffer';
export * from './units';

// Encoders
export * from './escpos';
export * from './tspl';
export * from './zpl';
export * from './sampleLabels';

// Template library
export * from './TemplateLibrary';

// Database schema and profile persistence
export * from './PrinterDatabaseSchema';
export { PrinterConfigStore } from './PrinterConfigStore';
export type { NewPrinterProfile, PrinterProfileUpdate } from './PrinterConfigStore';

// Device boundary
export { PrinterService } from './PrinterService';
export type { PrinterServiceOptions } from './PrinterService';
