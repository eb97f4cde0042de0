/**
 * Printer Profile Validation
 *
 * Functions for validating USB identifiers and saved printer profiles.
 *
 * @module printer/types/validation
 */

import { PrinterProfile, isPaperSize, isPrinterLanguage } from './index';

// ============================================================================
// Validation Result Types
// ============================================================================

/**
 * Result of a validation operation
 */
export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

/**
 * Create a successful validation result
 */
function validResult(): ValidationResult {
  return { valid: true, errors: [] };
}

/**
 * Create a failed validation result with errors
 */
function invalidResult(errors: string[]): ValidationResult {
  return { valid: false, errors };
}

// ============================================================================
// USB Identifier Validation
// ============================================================================

const MAX_USB_ID = 0xffff;

/**
 * Validate a USB vendor or product ID (16-bit unsigned integer)
 *
 * @param id - The identifier to validate
 * @returns true if the identifier is an integer between 0 and 0xFFFF
 */
export function isValidUsbId(id: unknown): id is number {
  return typeof id === 'number' && Number.isInteger(id) && id >= 0 && id <= MAX_USB_ID;
}

// ============================================================================
// DPI Validation
// ============================================================================

/**
 * Resolutions offered by common thermal print heads
 */
export const SUPPORTED_DPI: readonly number[] = [152, 203, 300, 600];

/**
 * Validate a print head resolution
 */
export function isValidDpi(dpi: unknown): dpi is number {
  return typeof dpi === 'number' && SUPPORTED_DPI.includes(dpi);
}

// ============================================================================
// Profile Validation
// ============================================================================

/**
 * Validate a printer profile before it is persisted
 *
 * @param profile - Profile fields to validate (id and timestamps are optional)
 * @returns ValidationResult with every problem found
 */
export function validatePrinterProfile(
  profile: Partial<PrinterProfile>
): ValidationResult {
  const errors: string[] = [];

  if (!profile.name || profile.name.trim().length === 0) {
    errors.push('Printer name is required');
  } else if (profile.name.length > 100) {
    errors.push('Printer name must be at most 100 characters');
  }

  if (!isValidUsbId(profile.vendorId)) {
    errors.push('Vendor ID must be an integer between 0 and 65535');
  }

  if (!isValidUsbId(profile.productId)) {
    errors.push('Product ID must be an integer between 0 and 65535');
  }

  if (!isPrinterLanguage(profile.language)) {
    errors.push('Language must be one of escPos, tspl, zpl, unknown');
  }

  if (!isValidDpi(profile.dpi)) {
    errors.push(`DPI must be one of ${SUPPORTED_DPI.join(', ')}`);
  }

  if (!isPaperSize(profile.paperSize)) {
    errors.push('Paper size must be one of 58mm, 80mm, 112mm');
  }

  return errors.length > 0 ? invalidResult(errors) : validResult();
}
