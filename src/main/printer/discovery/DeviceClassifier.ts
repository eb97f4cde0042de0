/**
 * Device Classifier
 *
 * Maps a device's manufacturer and product strings to the command
 * language it most likely speaks.
 *
 * @module printer/discovery
 */

import { DeviceDescriptor, PrinterLanguage } from '../types';

export interface ClassificationRule {
  language: PrinterLanguage;
  keywords: readonly string[];
}

/**
 * Evaluated top to bottom; the first row with a matching keyword wins.
 * Zebra keywords must precede the label tier because "label" and
 * similar words also appear in Zebra product strings.
 */
export const CLASSIFICATION_RULES: readonly ClassificationRule[] = [
  {
    language: PrinterLanguage.ZPL,
    keywords: ['zebra', 'zpl', 'zd', 'zt', 'zq', 'zc', 'zxp'],
  },
  {
    language: PrinterLanguage.TSPL,
    keywords: ['tsc', 'label', 'godex', 'argox', 'sato'],
  },
  {
    language: PrinterLanguage.ESC_POS,
    keywords: ['epson', 'star', 'bixolon', 'citizen', 'pos', 'receipt', 'thermal'],
  },
];

/**
 * Classify a device by substring match on "manufacturer product",
 * lower-cased
 */
export function classifyDevice(
  descriptor: Pick<DeviceDescriptor, 'manufacturer' | 'productName'>,
  rules: readonly ClassificationRule[] = CLASSIFICATION_RULES
): PrinterLanguage {
  const haystack = `${descriptor.manufacturer ?? ''} ${descriptor.productName ?? ''}`.toLowerCase();

  const match = rules.find((rule) => rule.keywords.some((keyword) => haystack.includes(keyword)));
  return match ? match.language : PrinterLanguage.UNKNOWN;
}

/**
 * "Manufacturer - Product (VID: v, PID: p)"
 */
export function describeDevice(descriptor: Partial<DeviceDescriptor>): string {
  const manufacturer = descriptor.manufacturer || 'Unknown';
  const productName = descriptor.productName || 'Unknown';
  const vendorId = descriptor.vendorId ?? 'N/A';
  const productId = descriptor.productId ?? 'N/A';
  return `${manufacturer} - ${productName} (VID: ${vendorId}, PID: ${productId})`;
}
