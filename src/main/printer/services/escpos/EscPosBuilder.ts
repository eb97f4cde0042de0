/**
 * ESC/POS Command Builder
 *
 * Generates ESC/POS commands for thermal receipt printers.
 * Supports text formatting, alignment, barcodes, QR codes, paper cutting
 * and the cash drawer kick. Every call appends to the byte buffer and
 * returns the builder; out-of-range arguments are clamped, never rejected.
 *
 * @module printer/services/escpos
 */

import * as iconv from 'iconv-lite';
import { PaperSize } from '../../types';
import { ByteCommandBuffer } from '../CommandBuffer';
import { clampInt } from '../units';
import { PRINTER_DEFAULTS } from '../../../../shared/constants';

// ============================================================================
// ESC/POS Command Constants
// ============================================================================

/**
 * ESC/POS command bytes
 */
export const ESC = 0x1b; // Escape
export const GS = 0x1d; // Group Separator
export const FS = 0x1c; // File Separator
export const LF = 0x0a; // Line Feed
export const CR = 0x0d; // Carriage Return

/**
 * Text alignment values
 */
export enum TextAlignment {
  LEFT = 0,
  CENTER = 1,
  RIGHT = 2,
}

/**
 * Underline modes: off, 1-dot, 2-dot
 */
export type UnderlineMode = 0 | 1 | 2;

/**
 * Paper width configurations in characters (Font A)
 */
export const PAPER_WIDTH_CHARS: Record<PaperSize, number> = {
  [PaperSize.MM_58]: 32,
  [PaperSize.MM_80]: 48,
  [PaperSize.MM_112]: 64,
};

// ============================================================================
// Code Pages
// ============================================================================

/**
 * Single-byte code pages the builder can encode text into
 */
export type CodePage =
  | 'latin1'
  | 'pc437'
  | 'pc850'
  | 'pc852'
  | 'pc858'
  | 'pc860'
  | 'pc863'
  | 'pc865'
  | 'pc866'
  | 'wpc1252';

interface CodePageEntry {
  /** Printer character table number for ESC t n */
  table: number;
  /** iconv-lite encoding name */
  encoding: string;
}

/**
 * Epson table numbers. Latin-1 shares table 16 with WPC1252,
 * which agrees with it over the printable range.
 */
export const CODE_PAGES: Record<CodePage, CodePageEntry> = {
  latin1: { table: 16, encoding: 'iso-8859-1' },
  pc437: { table: 0, encoding: 'cp437' },
  pc850: { table: 2, encoding: 'cp850' },
  pc860: { table: 3, encoding: 'cp860' },
  pc863: { table: 4, encoding: 'cp863' },
  pc865: { table: 5, encoding: 'cp865' },
  wpc1252: { table: 16, encoding: 'windows-1252' },
  pc866: { table: 17, encoding: 'cp866' },
  pc852: { table: 18, encoding: 'cp852' },
  pc858: { table: 19, encoding: 'cp858' },
};

/**
 * Constructor options
 */
export interface EscPosBuilderOptions {
  /** Determines the default line width (default: 58mm, 32 chars) */
  paperSize?: PaperSize;
  /** Text encoding used for literal text (default: latin1) */
  codePage?: CodePage;
}

// QR function codes (GS ( k, cn = 49)
const QR_MODEL_2 = [GS, 0x28, 0x6b, 0x04, 0x00, 0x31, 0x41, 0x32, 0x00];
const QR_ECC_LOW = [GS, 0x28, 0x6b, 0x03, 0x00, 0x31, 0x45, 0x30];
const QR_PRINT = [GS, 0x28, 0x6b, 0x03, 0x00, 0x31, 0x51, 0x30];

// Code128 accepts at most 255 - 2 payload bytes behind the {B prefix
const CODE128_MAX_DATA = 253;

// Upper bound for repeat counts and row widths
const MAX_REPEAT = 255;

// ============================================================================
// EscPosBuilder Class
// ============================================================================

export class EscPosBuilder {
  private readonly buffer = new ByteCommandBuffer();
  private readonly lineWidth: number;
  private codePage: CodePage;

  constructor(options: EscPosBuilderOptions = {}) {
    this.lineWidth = PAPER_WIDTH_CHARS[options.paperSize ?? PaperSize.MM_58];
    this.codePage = options.codePage ?? 'latin1';
  }

  // ==========================================================================
  // Initialization Commands
  // ==========================================================================

  /**
   * Initialize printer (ESC @)
   * Clears the print buffer and resets the printer to default settings.
   * Must open every session; without it the printer state is undefined.
   */
  init(): this {
    return this.push(ESC, 0x40);
  }

  /**
   * Select character code page (ESC t n) and encode subsequent text with it
   */
  selectCodePage(codePage: CodePage): this {
    this.codePage = codePage;
    return this.push(ESC, 0x74, CODE_PAGES[codePage].table);
  }

  // ==========================================================================
  // Text Formatting Commands
  // ==========================================================================

  /**
   * Set alignment (ESC a n)
   */
  setAlign(alignment: TextAlignment): this {
    return this.push(ESC, 0x61, alignment);
  }

  alignLeft(): this {
    return this.setAlign(TextAlignment.LEFT);
  }

  alignCenter(): this {
    return this.setAlign(TextAlignment.CENTER);
  }

  alignRight(): this {
    return this.setAlign(TextAlignment.RIGHT);
  }

  /**
   * Set character size (GS ! n)
   * @param width - horizontal magnification 1-8
   * @param height - vertical magnification 1-8
   */
  setTextSize(width: number = 1, height: number = 1): this {
    const w = clampInt(width - 1, 0, 7);
    const h = clampInt(height - 1, 0, 7);
    return this.push(GS, 0x21, (w << 4) | h);
  }

  /**
   * Set bold mode (ESC E n)
   */
  setBold(enabled: boolean): this {
    return this.push(ESC, 0x45, enabled ? 1 : 0);
  }

  /**
   * Set underline mode (ESC - n)
   * @param mode - 0: off, 1: 1-dot, 2: 2-dot; clamped into that range
   */
  setUnderline(mode: UnderlineMode | number): this {
    return this.push(ESC, 0x2d, clampInt(mode, 0, 2));
  }

  /**
   * Restore 1x1 size, bold off, underline off and left alignment,
   * as four separate commands in that order
   */
  resetFormatting(): this {
    return this.setTextSize(1, 1).setBold(false).setUnderline(0).setAlign(TextAlignment.LEFT);
  }

  // ==========================================================================
  // Text Output Commands
  // ==========================================================================

  /**
   * Add literal text encoded in the active code page.
   * Characters the code page lacks print as '?'.
   */
  text(content: string): this {
    return this.pushBytes(this.encode(content));
  }

  /**
   * Add text followed by a line feed
   */
  textLine(content: string): this {
    return this.text(content).lineFeed();
  }

  /**
   * Add line feeds (LF)
   * @param count - number of line feeds, 0-255 (default 1)
   */
  lineFeed(count: number = 1): this {
    return this.pushBytes(new Array<number>(clampInt(count, 0, MAX_REPEAT)).fill(LF));
  }

  /**
   * Add a carriage return and line feed
   */
  newLine(): this {
    return this.push(CR, LF);
  }

  // ==========================================================================
  // Line Drawing and Columns
  // ==========================================================================

  /**
   * Draw a horizontal line by repeating a character
   * @param charCount - line length, 0-255 (default: paper line width)
   * @param char - character to repeat (default '-')
   */
  horizontalLine(charCount: number = this.lineWidth, char: string = '-'): this {
    return this.textLine(char.repeat(clampInt(charCount, 0, MAX_REPEAT)));
  }

  /**
   * Print a two-column row, right column flush to `width`.
   * At least one space always separates the columns, even when that
   * pushes the row past the nominal width.
   */
  twoColumns(left: string, right: string, width: number = this.lineWidth): this {
    const rowWidth = clampInt(width, 0, MAX_REPEAT);
    const spaces = Math.max(1, rowWidth - left.length - right.length);
    return this.textLine(left + ' '.repeat(spaces) + right);
  }

  // ==========================================================================
  // Barcodes
  // ==========================================================================

  /**
   * Print a Code128 barcode (code set B) with HRI text below
   * @param height - bar height in dots, 1-255 (default 80)
   * @param width - module width, 2-6 (default 2)
   */
  barcodeCode128(
    data: string,
    height: number = PRINTER_DEFAULTS.BARCODE_HEIGHT,
    width: number = PRINTER_DEFAULTS.BARCODE_MODULE_WIDTH
  ): this {
    const payload = this.encode(data).slice(0, CODE128_MAX_DATA);

    this.push(GS, 0x68, clampInt(height, 1, 255)); // GS h
    this.push(GS, 0x77, clampInt(width, 2, 6)); // GS w
    this.push(GS, 0x48, 0x02); // GS H - HRI below
    this.push(GS, 0x6b, 73, payload.length + 2, 0x7b, 0x42); // GS k m=73 n {B
    this.pushBytes(payload);
    return this.lineFeed();
  }

  /**
   * Print a QR code (model 2, lowest error correction)
   * @param size - module size in dots, 1-16 (default 6)
   */
  qrCode(data: string, size: number = PRINTER_DEFAULTS.QR_MODULE_SIZE): this {
    const payload = this.encode(data);
    const len = payload.length + 3;
    const pL = len % 256;
    const pH = Math.floor(len / 256);

    this.pushBytes(QR_MODEL_2);
    this.push(GS, 0x28, 0x6b, 0x03, 0x00, 0x31, 0x43, clampInt(size, 1, 16));
    this.pushBytes(QR_ECC_LOW);
    this.push(GS, 0x28, 0x6b, pL, pH, 0x31, 0x50, 0x30);
    this.pushBytes(payload);
    this.pushBytes(QR_PRINT);
    return this.lineFeed();
  }

  // ==========================================================================
  // Paper Cut Commands
  // ==========================================================================

  /**
   * Full paper cut (GS V 0)
   */
  cutPaper(): this {
    return this.push(GS, 0x56, 0x00);
  }

  /**
   * Partial paper cut (GS V 1)
   */
  cutPaperPartial(): this {
    return this.push(GS, 0x56, 0x01);
  }

  /**
   * Feed lines then full cut
   * @param lines - line feeds before the cut (default 3)
   */
  feedAndCut(lines: number = PRINTER_DEFAULTS.FEED_BEFORE_CUT): this {
    return this.lineFeed(lines).cutPaper();
  }

  // ==========================================================================
  // Cash Drawer Commands
  // ==========================================================================

  /**
   * Kick the cash drawer on pin 2 (ESC p 0 25 250)
   */
  openCashDrawer(): this {
    return this.push(ESC, 0x70, 0x00, 0x19, 0xfa);
  }

  // ==========================================================================
  // Build Methods
  // ==========================================================================

  /**
   * Append raw bytes to the buffer
   */
  raw(bytes: readonly number[] | Uint8Array): this {
    return this.pushBytes(Array.from(bytes, (byte) => byte & 0xff));
  }

  /**
   * Finalized byte stream. Does not change the buffer.
   */
  toBytes(): Buffer {
    return this.buffer.finalize();
  }

  /**
   * Number of bytes accumulated so far
   */
  getLength(): number {
    return this.buffer.byteLength;
  }

  getLineWidth(): number {
    return this.lineWidth;
  }

  getCodePage(): CodePage {
    return this.codePage;
  }

  /**
   * Clear the buffer
   */
  clear(): this {
    this.buffer.clear();
    return this;
  }

  private encode(content: string): number[] {
    return Array.from(iconv.encode(content, CODE_PAGES[this.codePage].encoding));
  }

  private push(...bytes: number[]): this {
    return this.pushBytes(bytes);
  }

  private pushBytes(bytes: readonly number[]): this {
    this.buffer.append(bytes);
    return this;
  }
}
