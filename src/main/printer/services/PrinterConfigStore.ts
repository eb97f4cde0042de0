/**
 * Printer Configuration Store Service
 *
 * Persists printer profiles to SQLite. A profile overrides the keyword
 * classifier for its vendor/product pair and records DPI and paper size.
 *
 * @module printer/services/PrinterConfigStore
 */

import type Database from 'better-sqlite3';
import { v4 as uuidv4 } from 'uuid';
import { PrinterProfile, SerializedPrinterProfile } from '../types';
import { deserializePrinterProfile, serializePrinterProfile } from '../types/serialization';
import { validatePrinterProfile } from '../types/validation';
import { debugLogger } from '../../../shared/utils/debug-logger';
import { checkPrinterTablesExist, initializePrinterTables } from './PrinterDatabaseSchema';

/**
 * Database row type for printer_profiles table
 */
interface PrinterProfileRow {
  id: string;
  name: string;
  vendor_id: number;
  product_id: number;
  language: string;
  dpi: number;
  paper_size: string;
  is_default: number;
  created_at: string;
  updated_at: string;
}

export type NewPrinterProfile = Omit<PrinterProfile, 'id' | 'createdAt' | 'updatedAt'> & {
  id?: string;
};

export type PrinterProfileUpdate = Partial<Omit<PrinterProfile, 'id' | 'createdAt' | 'updatedAt'>>;

function rowToSerialized(row: PrinterProfileRow): SerializedPrinterProfile {
  return {
    id: row.id,
    name: row.name,
    vendorId: row.vendor_id,
    productId: row.product_id,
    language: row.language,
    dpi: row.dpi,
    paperSize: row.paper_size,
    isDefault: row.is_default,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function rowToProfile(row: PrinterProfileRow): PrinterProfile {
  return deserializePrinterProfile(rowToSerialized(row));
}

function assertValid(profile: Partial<PrinterProfile>): void {
  const result = validatePrinterProfile(profile);
  if (!result.valid) {
    throw new Error(`Invalid printer profile: ${result.errors.join('; ')}`);
  }
}

/**
 * PrinterConfigStore - Manages printer profile persistence
 */
export class PrinterConfigStore {
  private db: Database.Database;
  private initialized: boolean = false;

  constructor(db: Database.Database) {
    this.db = db;
  }

  /**
   * Create the profiles table if it doesn't exist
   */
  initialize(): void {
    if (this.initialized) return;

    if (!checkPrinterTablesExist(this.db)) {
      initializePrinterTables(this.db);
    }

    this.initialized = true;
  }

  /**
   * Save a new profile. The id is generated when not provided.
   * @throws Error when the profile fails validation
   */
  save(profile: NewPrinterProfile): PrinterProfile {
    this.initialize();
    assertValid(profile);

    const now = new Date();
    const full: PrinterProfile = {
      ...profile,
      id: profile.id || uuidv4(),
      createdAt: now,
      updatedAt: now,
    };

    const s = serializePrinterProfile(full);
    this.db
      .prepare(
        `
      INSERT INTO printer_profiles (
        id, name, vendor_id, product_id, language, dpi, paper_size,
        is_default, created_at, updated_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `
      )
      .run(
        s.id,
        s.name,
        s.vendorId,
        s.productId,
        s.language,
        s.dpi,
        s.paperSize,
        s.isDefault,
        s.createdAt,
        s.updatedAt
      );

    if (full.isDefault) {
      this.unsetOtherDefaults(full.id);
    }

    debugLogger.info('Saved printer profile', { id: full.id, name: full.name }, 'PrinterConfigStore');
    return full;
  }

  /**
   * Load a profile by ID
   * @returns The profile or null if not found
   */
  load(id: string): PrinterProfile | null {
    this.initialize();

    const row = this.db
      .prepare<[string], PrinterProfileRow>(`SELECT * FROM printer_profiles WHERE id = ?`)
      .get(id);

    return row ? rowToProfile(row) : null;
  }

  /**
   * Update an existing profile; id and createdAt never change
   * @returns The updated profile or null if not found
   * @throws Error when the merged profile fails validation
   */
  update(id: string, updates: PrinterProfileUpdate): PrinterProfile | null {
    this.initialize();

    const existing = this.load(id);
    if (!existing) return null;

    const updated: PrinterProfile = {
      ...existing,
      ...updates,
      id: existing.id,
      createdAt: existing.createdAt,
      updatedAt: new Date(),
    };
    assertValid(updated);

    const s = serializePrinterProfile(updated);
    this.db
      .prepare(
        `
      UPDATE printer_profiles SET
        name = ?,
        vendor_id = ?,
        product_id = ?,
        language = ?,
        dpi = ?,
        paper_size = ?,
        is_default = ?,
        updated_at = ?
      WHERE id = ?
    `
      )
      .run(
        s.name,
        s.vendorId,
        s.productId,
        s.language,
        s.dpi,
        s.paperSize,
        s.isDefault,
        s.updatedAt,
        s.id
      );

    if (updated.isDefault) {
      this.unsetOtherDefaults(updated.id);
    }

    return updated;
  }

  /**
   * Delete a profile
   * @returns true if deleted, false if not found
   */
  delete(id: string): boolean {
    this.initialize();

    const result = this.db.prepare(`DELETE FROM printer_profiles WHERE id = ?`).run(id);
    return result.changes > 0;
  }

  /**
   * All profiles ordered by name
   */
  getAll(): PrinterProfile[] {
    this.initialize();

    return this.db
      .prepare<[], PrinterProfileRow>(`SELECT * FROM printer_profiles ORDER BY name ASC`)
      .all()
      .map(rowToProfile);
  }

  /**
   * Profile saved for a vendor/product pair; the default profile wins
   * when several match
   */
  findByDevice(vendorId: number, productId: number): PrinterProfile | null {
    this.initialize();

    const row = this.db
      .prepare<[number, number], PrinterProfileRow>(
        `
      SELECT * FROM printer_profiles
      WHERE vendor_id = ? AND product_id = ?
      ORDER BY is_default DESC, updated_at DESC
      LIMIT 1
    `
      )
      .get(vendorId, productId);

    return row ? rowToProfile(row) : null;
  }

  /**
   * The default profile, or null if none is set
   */
  getDefault(): PrinterProfile | null {
    this.initialize();

    const row = this.db
      .prepare<[], PrinterProfileRow>(
        `SELECT * FROM printer_profiles WHERE is_default = 1 LIMIT 1`
      )
      .get();

    return row ? rowToProfile(row) : null;
  }

  /**
   * Number of saved profiles
   */
  count(): number {
    this.initialize();

    const result = this.db
      .prepare<[], { count: number }>(`SELECT COUNT(*) as count FROM printer_profiles`)
      .get();
    return result ? result.count : 0;
  }

  /**
   * Clear the default flag on every other profile
   */
  private unsetOtherDefaults(keepId: string): void {
    this.db
      .prepare(`UPDATE printer_profiles SET is_default = 0 WHERE id != ? AND is_default = 1`)
      .run(keepId);
  }
}
