/**
 * Units and Numeric Helpers
 *
 * Shared conversions between millimetres and device dots, plus the
 * clamping and number formatting every encoder relies on.
 *
 * @module printer/services/units
 */

import { PRINTER_DEFAULTS } from '../../../shared/constants';

/**
 * Clamp a value into [min, max]. Non-finite input clamps to min.
 */
export function clamp(value: number, min: number, max: number): number {
  if (!Number.isFinite(value)) {
    return value === Infinity ? max : min;
  }
  return Math.min(max, Math.max(min, value));
}

/**
 * Round to the nearest integer, halves away from zero (2.5 -> 3, -2.5 -> -3)
 */
export function roundHalfAwayFromZero(value: number): number {
  return Math.sign(value) * Math.round(Math.abs(value));
}

/**
 * Convert millimetres to device dots
 *
 * @example mmToDots(12.7) // 102 at 203 dpi
 */
export function mmToDots(mm: number, dpi: number = PRINTER_DEFAULTS.DPI): number {
  const dots = (mm * dpi) / PRINTER_DEFAULTS.MM_PER_INCH;
  // Settle binary float noise first so exact halves (12.7mm -> 101.5) round up
  return roundHalfAwayFromZero(Number(dots.toFixed(6)));
}

/**
 * Re-express a dot distance laid out at one resolution for another
 *
 * @example scaleDots(203, 300) // 300
 */
export function scaleDots(
  dots: number,
  toDpi: number,
  fromDpi: number = PRINTER_DEFAULTS.DPI
): number {
  if (!Number.isFinite(toDpi) || toDpi <= 0 || toDpi === fromDpi) return dots;
  return roundHalfAwayFromZero(Number(((dots * toDpi) / fromDpi).toFixed(6)));
}

/**
 * Convert device dots back to millimetres (unrounded)
 */
export function dotsToMm(dots: number, dpi: number = PRINTER_DEFAULTS.DPI): number {
  return (dots * PRINTER_DEFAULTS.MM_PER_INCH) / dpi;
}

/**
 * Normalize a coordinate or dimension: integer, never negative
 */
export function toDot(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.max(0, roundHalfAwayFromZero(value));
}

/**
 * Clamp to an integer range
 */
export function clampInt(value: number, min: number, max: number): number {
  return clamp(roundHalfAwayFromZero(value), min, max);
}

/**
 * Decimal rendering for text protocols: shortest form, no exponent,
 * no trailing zeros (100 -> "100", 44.45 -> "44.45")
 */
export function formatNumber(value: number): string {
  if (!Number.isFinite(value)) return '0';
  if (Number.isInteger(value)) return value.toString();
  return Number(value.toFixed(4)).toString();
}

/**
 * Left-pad a non-negative integer with zeros
 */
export function zeroPad(value: number, width: number): string {
  return Math.trunc(value).toString().padStart(width, '0');
}
