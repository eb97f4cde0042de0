/**
 * Printer Types Module
 *
 * Contains the TypeScript interfaces, types, and enums shared by the
 * encoders, the device boundary and profile persistence.
 *
 * @module printer/types
 */

// Re-export serialization functions
export * from './serialization';

// Re-export validation functions
export * from './validation';

// ============================================================================
// Enums
// ============================================================================

/**
 * Printer command languages a device can speak
 */
export enum PrinterLanguage {
  ESC_POS = 'escPos',
  TSPL = 'tspl',
  ZPL = 'zpl',
  UNKNOWN = 'unknown',
}

/**
 * Supported paper sizes for thermal receipt printers
 */
export enum PaperSize {
  MM_58 = '58mm',
  MM_80 = '80mm',
  MM_112 = '112mm',
}

// ============================================================================
// Geometry and Styling
// ============================================================================

/**
 * A point in device dots. Origin and axis direction are protocol-specific.
 */
export interface Position {
  x: number;
  y: number;
}

/**
 * QR code error-correction levels, lowest to highest redundancy
 */
export type QrErrorCorrection = 'L' | 'M' | 'Q' | 'H';

/**
 * Field orientation for the field protocol: N=0°, R=90°, I=180°, B=270°
 */
export type FieldRotation = 'N' | 'R' | 'I' | 'B';

/**
 * Line color for field-protocol graphic boxes
 */
export type LineColor = 'B' | 'W';

/**
 * Justification inside a field block
 */
export type BlockAlignment = 'L' | 'C' | 'R' | 'J';

/**
 * Media handling: T=thermal transfer, D=direct thermal
 */
export type MediaType = 'T' | 'D';

/**
 * Line-protocol barcode HRI placement: 0=none, 1=below, 2=above, 3=both
 */
export type HumanReadable = 0 | 1 | 2 | 3;

// ============================================================================
// Devices
// ============================================================================

/**
 * A USB device as reported by enumeration. Opaque to the encoders.
 */
export interface DeviceDescriptor {
  vendorId: number;
  productId: number;
  manufacturer?: string;
  productName?: string;
}

/**
 * Transport connection status
 */
export interface TransportStatus {
  connected: boolean;
  lastConnected?: Date;
  lastError?: string;
}

// ============================================================================
// Printer Profiles
// ============================================================================

/**
 * Saved printer profile. A profile's language overrides the classifier
 * for the matching vendor/product pair.
 */
export interface PrinterProfile {
  id: string; // UUID
  name: string;
  vendorId: number;
  productId: number;
  language: PrinterLanguage;
  dpi: number;
  paperSize: PaperSize;
  isDefault: boolean;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Serialized profile for database storage
 */
export interface SerializedPrinterProfile {
  id: string;
  name: string;
  vendorId: number;
  productId: number;
  language: string;
  dpi: number;
  paperSize: string;
  isDefault: number; // SQLite boolean
  createdAt: string; // ISO string
  updatedAt: string; // ISO string
}

// ============================================================================
// Label Data
// ============================================================================

/**
 * Postal address block; lines exclude the name
 */
export interface AddressBlock {
  name: string;
  lines: string[];
}

/**
 * Shipping label content
 */
export interface ShippingLabelData {
  carrier: string;
  from: AddressBlock;
  to: AddressBlock;
  trackingNumber: string;
  trackingUrl: string;
  service: string;
  weight: string;
}

/**
 * Retail product label content
 */
export interface ProductLabelData {
  name: string;
  sku: string;
  price: string;
  barcode: string;
  url: string;
  description: string;
}

/**
 * Shelf/bin inventory label content
 */
export interface InventoryLabelData {
  location: string;
  itemCode: string;
  quantity: number;
}

/**
 * Asset tag content
 */
export interface AssetTagData {
  assetId: string;
  owner: string;
  ownerInitials: string;
}

/**
 * Packaged food label with nutrition, claims and allergen sections
 */
export interface NutritionLabelData {
  productName: string;
  tagline: string;
  price: string;
  netWeight: string;
  bestBy: string;
  processedOn?: string;
  barcode: string;
  calories: number;
  /** Short description lines under the product name */
  contents: string[];
  /** "NO MSG" style badges */
  claims: string[];
  allergens: string[];
  /** Full ingredient statement, one entry per printed line */
  ingredients: string[];
}

// ============================================================================
// Type Guards
// ============================================================================

const PRINTER_LANGUAGES: readonly string[] = Object.values(PrinterLanguage);
const PAPER_SIZES: readonly string[] = Object.values(PaperSize);

/**
 * Type guard for PrinterLanguage values
 */
export function isPrinterLanguage(value: unknown): value is PrinterLanguage {
  return typeof value === 'string' && PRINTER_LANGUAGES.includes(value);
}

/**
 * Type guard for PaperSize values
 */
export function isPaperSize(value: unknown): value is PaperSize {
  return typeof value === 'string' && PAPER_SIZES.includes(value);
}
