/**
 * Printer Profile Serialization
 *
 * Functions for serializing and deserializing printer profiles
 * for database storage.
 *
 * @module printer/types/serialization
 */

import {
  PrinterProfile,
  SerializedPrinterProfile,
  PrinterLanguage,
  PaperSize,
  isPrinterLanguage,
  isPaperSize,
} from './index';

/**
 * Serialize a PrinterProfile to a format suitable for SQLite storage
 */
export function serializePrinterProfile(
  profile: PrinterProfile
): SerializedPrinterProfile {
  return {
    id: profile.id,
    name: profile.name,
    vendorId: profile.vendorId,
    productId: profile.productId,
    language: profile.language,
    dpi: profile.dpi,
    paperSize: profile.paperSize,
    isDefault: profile.isDefault ? 1 : 0,
    createdAt: profile.createdAt.toISOString(),
    updatedAt: profile.updatedAt.toISOString(),
  };
}

/**
 * Deserialize a SerializedPrinterProfile from SQLite storage.
 * Unrecognized language or paper size values fall back to
 * unknown and 58mm.
 */
export function deserializePrinterProfile(
  serialized: SerializedPrinterProfile
): PrinterProfile {
  return {
    id: serialized.id,
    name: serialized.name,
    vendorId: serialized.vendorId,
    productId: serialized.productId,
    language: isPrinterLanguage(serialized.language)
      ? serialized.language
      : PrinterLanguage.UNKNOWN,
    dpi: serialized.dpi,
    paperSize: isPaperSize(serialized.paperSize) ? serialized.paperSize : PaperSize.MM_58,
    isDefault: serialized.isDefault === 1,
    createdAt: new Date(serialized.createdAt),
    updatedAt: new Date(serialized.updatedAt),
  };
}

/**
 * Check if two PrinterProfile objects are equivalent
 * (handles Date comparison)
 */
export function arePrinterProfilesEqual(a: PrinterProfile, b: PrinterProfile): boolean {
  return (
    a.id === b.id &&
    a.name === b.name &&
    a.vendorId === b.vendorId &&
    a.productId === b.productId &&
    a.language === b.language &&
    a.dpi === b.dpi &&
    a.paperSize === b.paperSize &&
    a.isDefault === b.isDefault &&
    a.createdAt.toISOString() === b.createdAt.toISOString() &&
    a.updatedAt.toISOString() === b.updatedAt.toISOString()
  );
}
