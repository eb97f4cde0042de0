/**
 * TSPL Command Builder
 *
 * Generates TSPL statements for desktop label printers. Each call appends
 * one statement; the finalized text terminates every statement with CRLF.
 *
 * String arguments are wrapped in double quotes as-is. Embedded double
 * quotes are not escaped, so content containing one yields a malformed
 * statement.
 *
 * @module printer/services/tspl
 */

import { HumanReadable, QrErrorCorrection } from '../../types';
import { StatementBuffer } from '../CommandBuffer';
import { clampInt, formatNumber, mmToDots, toDot } from '../units';
import { PRINTER_DEFAULTS } from '../../../../shared/constants';

// ============================================================================
// Statement Model
// ============================================================================

/**
 * A single statement argument
 * - int: whole number (dots, counts, codes)
 * - mm: millimetre value rendered with its unit
 * - string: double-quoted literal
 * - token: bare keyword such as an ECC level
 */
export type TsplArg =
  | { type: 'int'; value: number }
  | { type: 'mm'; value: number }
  | { type: 'string'; value: string }
  | { type: 'token'; value: string };

export type TsplStatement =
  | { kind: 'command'; name: string; args: TsplArg[] }
  | { kind: 'raw'; text: string };

/**
 * Rotation in degrees, clockwise
 */
export type TsplRotation = 0 | 90 | 180 | 270;

/**
 * QR mask mode: A=automatic, M=manual
 */
export type TsplQrMode = 'A' | 'M';

const int = (value: number): TsplArg => ({ type: 'int', value });
const mm = (value: number): TsplArg => ({ type: 'mm', value });
const str = (value: string): TsplArg => ({ type: 'string', value });
const token = (value: string): TsplArg => ({ type: 'token', value });

function renderArg(arg: TsplArg): string {
  switch (arg.type) {
    case 'int':
      return arg.value.toString();
    case 'mm':
      return `${formatNumber(arg.value)} mm`;
    case 'string':
      return `"${arg.value}"`;
    case 'token':
      return arg.value;
  }
}

/**
 * Render one statement without its terminator
 */
export function renderTsplStatement(statement: TsplStatement): string {
  if (statement.kind === 'raw') {
    return statement.text;
  }
  if (statement.args.length === 0) {
    return statement.name;
  }
  return `${statement.name} ${statement.args.map(renderArg).join(', ')}`;
}

/**
 * Snap an angle to the nearest quarter turn
 */
function normalizeRotation(degrees: number): TsplRotation {
  const quarter = ((Math.round(degrees / 90) % 4) + 4) % 4;
  switch (quarter) {
    case 1:
      return 90;
    case 2:
      return 180;
    case 3:
      return 270;
    default:
      return 0;
  }
}

// ============================================================================
// TsplBuilder Class
// ============================================================================

export class TsplBuilder {
  private readonly buffer = new StatementBuffer<TsplStatement>(renderTsplStatement, 'line');

  /**
   * Convert millimetres to dots, rounding halves away from zero
   */
  static mmToDots(mmValue: number, dpi: number = PRINTER_DEFAULTS.DPI): number {
    return mmToDots(mmValue, dpi);
  }

  // ==========================================================================
  // Label Setup
  // ==========================================================================

  /**
   * Label width and height (SIZE)
   */
  size(widthMm: number, heightMm: number): this {
    return this.command('SIZE', mm(Math.max(0, widthMm)), mm(Math.max(0, heightMm)));
  }

  /**
   * Gap between labels and its offset (GAP)
   */
  gap(gapMm: number, offsetMm: number = 0): this {
    return this.command('GAP', mm(Math.max(0, gapMm)), mm(Math.max(0, offsetMm)));
  }

  /**
   * Print speed in inches per second, 1-10
   */
  speed(n: number): this {
    return this.command('SPEED', int(clampInt(n, 1, 10)));
  }

  /**
   * Print darkness, 0-15
   */
  density(n: number): this {
    return this.command('DENSITY', int(clampInt(n, 0, 15)));
  }

  /**
   * Printout direction and mirror image, each 0 or 1
   */
  direction(dir: number, mirror: number = 0): this {
    return this.command('DIRECTION', int(clampInt(dir, 0, 1)), int(clampInt(mirror, 0, 1)));
  }

  /**
   * Reference point of the label origin, in dots
   */
  reference(x: number, y: number): this {
    return this.command('REFERENCE', int(toDot(x)), int(toDot(y)));
  }

  /**
   * Extra feed after printing, for peel-off or cutter positions
   */
  offset(distanceMm: number): this {
    return this.command('OFFSET', mm(distanceMm));
  }

  /**
   * Clear the printer's image buffer. Not to be confused with clear(),
   * which empties this builder.
   */
  cls(): this {
    return this.command('CLS');
  }

  // ==========================================================================
  // Text and Codes
  // ==========================================================================

  /**
   * Print text
   * @param font - font name, e.g. "1" to "8" or a downloaded font file
   * @param rotation - 0, 90, 180 or 270 degrees
   * @param xMulti - horizontal magnification 1-10
   * @param yMulti - vertical magnification 1-10
   */
  text(
    x: number,
    y: number,
    font: string,
    rotation: number,
    xMulti: number,
    yMulti: number,
    content: string
  ): this {
    return this.command(
      'TEXT',
      int(toDot(x)),
      int(toDot(y)),
      str(font),
      int(normalizeRotation(rotation)),
      int(clampInt(xMulti, 1, 10)),
      int(clampInt(yMulti, 1, 10)),
      str(content)
    );
  }

  /**
   * Print a 1D barcode
   * @param codeType - symbology, e.g. "128", "39", "EAN13"
   * @param readable - 0 none, 1 below, 2 above, 3 both
   */
  barcode(
    x: number,
    y: number,
    codeType: string,
    height: number,
    readable: HumanReadable | number,
    rotation: number,
    narrow: number,
    wide: number,
    content: string
  ): this {
    return this.command(
      'BARCODE',
      int(toDot(x)),
      int(toDot(y)),
      str(codeType),
      int(Math.max(1, toDot(height))),
      int(clampInt(readable, 0, 3)),
      int(normalizeRotation(rotation)),
      int(clampInt(narrow, 1, 10)),
      int(clampInt(wide, 1, 10)),
      str(content)
    );
  }

  /**
   * Code128 with text below, unrotated, narrow and wide bars of 2 dots
   */
  barcode128(
    x: number,
    y: number,
    content: string,
    height: number = PRINTER_DEFAULTS.TSPL_BARCODE_HEIGHT
  ): this {
    return this.barcode(x, y, '128', height, 1, 0, 2, 2, content);
  }

  /**
   * Print a QR code
   * @param cellWidth - module size in dots, 1-10
   */
  qrcode(
    x: number,
    y: number,
    eccLevel: QrErrorCorrection,
    cellWidth: number,
    mode: TsplQrMode,
    rotation: number,
    content: string
  ): this {
    return this.command(
      'QRCODE',
      int(toDot(x)),
      int(toDot(y)),
      token(eccLevel),
      int(clampInt(cellWidth, 1, 10)),
      token(mode),
      int(normalizeRotation(rotation)),
      str(content)
    );
  }

  /**
   * QR code with low error correction, automatic mask, no rotation
   */
  qr(
    x: number,
    y: number,
    content: string,
    size: number = PRINTER_DEFAULTS.TSPL_QR_CELL_WIDTH
  ): this {
    return this.qrcode(x, y, 'L', size, 'A', 0, content);
  }

  // ==========================================================================
  // Graphics
  // ==========================================================================

  /**
   * Rectangle outline. The statement takes the far corner, not the size.
   */
  box(x: number, y: number, width: number, height: number, thickness: number): this {
    const x0 = toDot(x);
    const y0 = toDot(y);
    return this.command(
      'BOX',
      int(x0),
      int(y0),
      int(x0 + toDot(width)),
      int(y0 + toDot(height)),
      int(Math.max(1, toDot(thickness)))
    );
  }

  /**
   * Filled bar (BAR x, y, width, height)
   */
  bar(x: number, y: number, width: number, height: number): this {
    return this.command('BAR', int(toDot(x)), int(toDot(y)), int(toDot(width)), int(toDot(height)));
  }

  /**
   * Horizontal bar from x1 to x2 at y; TSPL has no diagonal line
   */
  line(
    x1: number,
    y: number,
    x2: number,
    thickness: number = PRINTER_DEFAULTS.TSPL_LINE_THICKNESS
  ): this {
    return this.bar(Math.min(x1, x2), y, Math.abs(x2 - x1), thickness);
  }

  horizontalLine(
    x: number,
    y: number,
    length: number,
    thickness: number = PRINTER_DEFAULTS.TSPL_LINE_THICKNESS
  ): this {
    return this.bar(x, y, length, thickness);
  }

  verticalLine(
    x: number,
    y: number,
    length: number,
    thickness: number = PRINTER_DEFAULTS.TSPL_LINE_THICKNESS
  ): this {
    return this.bar(x, y, thickness, length);
  }

  // ==========================================================================
  // Printing and Media Control
  // ==========================================================================

  /**
   * Print the image buffer
   * @param sets - number of label sets
   * @param copies - copies of each label
   */
  print(sets: number = 1, copies: number = 1): this {
    return this.command('PRINT', int(Math.max(1, toDot(sets))), int(Math.max(1, toDot(copies))));
  }

  feed(n: number): this {
    return this.command('FEED', int(toDot(n)));
  }

  backfeed(n: number): this {
    return this.command('BACKFEED', int(toDot(n)));
  }

  formfeed(): this {
    return this.command('FORMFEED');
  }

  /**
   * Find the start of the next label
   */
  home(): this {
    return this.command('HOME');
  }

  cut(): this {
    return this.command('CUT');
  }

  /**
   * Append a statement verbatim
   */
  raw(statement: string): this {
    this.buffer.append({ kind: 'raw', text: statement });
    return this;
  }

  // ==========================================================================
  // Build Methods
  // ==========================================================================

  /**
   * Statements in issuance order
   */
  get statements(): readonly TsplStatement[] {
    return this.buffer.items;
  }

  /**
   * Finalized program text, every statement terminated by CRLF
   */
  toText(): string {
    return this.buffer.finalize();
  }

  /**
   * Finalized program as UTF-8 bytes
   */
  toBytes(): Buffer {
    return Buffer.from(this.toText(), 'utf8');
  }

  getLength(): number {
    return this.buffer.length;
  }

  /**
   * Empty the builder
   */
  clear(): this {
    this.buffer.clear();
    return this;
  }

  private command(name: string, ...args: TsplArg[]): this {
    this.buffer.append({ kind: 'command', name, args });
    return this;
  }
}
