/**
 * ESC/POS Module
 *
 * Provides ESC/POS command generation and receipt formatting.
 *
 * @module printer/services/escpos
 */

export * from './EscPosBuilder';
export * from './ReceiptGenerator';
