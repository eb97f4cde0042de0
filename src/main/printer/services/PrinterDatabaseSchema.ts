/**
 * Printer Database Schema
 *
 * SQL schema for saved printer profiles. A profile pins the command
 * language, DPI and paper size for one USB vendor/product pair.
 *
 * @module printer/services/PrinterDatabaseSchema
 */

import type Database from 'better-sqlite3';
import { debugLogger } from '../../../shared/utils/debug-logger';

export const CREATE_PRINTER_PROFILES_TABLE = `
  CREATE TABLE IF NOT EXISTS printer_profiles (
    id TEXT PRIMARY KEY,
    name TEXT NOT NULL,
    vendor_id INTEGER NOT NULL,
    product_id INTEGER NOT NULL,
    language TEXT NOT NULL CHECK (language IN ('escPos', 'tspl', 'zpl', 'unknown')),
    dpi INTEGER NOT NULL DEFAULT 203,
    paper_size TEXT NOT NULL CHECK (paper_size IN ('58mm', '80mm', '112mm')),
    is_default INTEGER NOT NULL DEFAULT 0,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  )
`;

export const CREATE_PRINTER_PROFILE_INDEXES = `
  CREATE INDEX IF NOT EXISTS idx_printer_profiles_device ON printer_profiles(vendor_id, product_id);
  CREATE INDEX IF NOT EXISTS idx_printer_profiles_is_default ON printer_profiles(is_default);
`;

/**
 * All schema creation statements in order
 */
export const ALL_PRINTER_SCHEMA = [CREATE_PRINTER_PROFILES_TABLE, CREATE_PRINTER_PROFILE_INDEXES];

/**
 * Initialize printer tables in the database
 */
export function initializePrinterTables(db: Database.Database): void {
  debugLogger.debug('Initializing printer tables', undefined, 'PrinterDatabaseSchema');

  for (const sql of ALL_PRINTER_SCHEMA) {
    try {
      db.exec(sql);
    } catch (error) {
      debugLogger.error('Failed to execute schema', error, 'PrinterDatabaseSchema');
      throw error;
    }
  }
}

/**
 * Check whether the profiles table exists
 */
export function checkPrinterTablesExist(db: Database.Database): boolean {
  const row = db
    .prepare<[string], { name: string }>(
      `SELECT name FROM sqlite_master WHERE type='table' AND name=?`
    )
    .get('printer_profiles');
  return row !== undefined;
}
