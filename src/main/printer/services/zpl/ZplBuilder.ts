/**
 * ZPL Command Builder
 *
 * Generates ZPL II label formats for industrial label printers. Statements
 * are concatenated without separators; a well-formed label is bracketed by
 * startFormat() and endFormat().
 *
 * Fields are position-then-content pairs: fieldOrigin() and any styling
 * apply to the next fieldData(), which closes the field. A missing
 * fieldData() leaves the field open; the builder does not enforce this.
 *
 * @module printer/services/zpl
 */

import {
  BlockAlignment,
  FieldRotation,
  LineColor,
  MediaType,
  QrErrorCorrection,
} from '../../types';
import { StatementBuffer } from '../CommandBuffer';
import { clampInt, toDot, zeroPad } from '../units';
import { PRINTER_DEFAULTS } from '../../../../shared/constants';

// ============================================================================
// Statement Model
// ============================================================================

export type ZplParam = string | number;

/** Format resolutions ^MU converts from (203 dpi heads count as 200) */
export type ZplFormatDpi = 150 | 200 | 300;

/** Head resolutions ^MU converts to */
export type ZplConversionDpi = 300 | 600;

/**
 * - command: a ^ or ~ code followed by comma-separated parameters
 * - field: field data closed by the field separator
 * - comment: non-printing annotation
 * - raw: passthrough text
 */
export type ZplStatement =
  | { kind: 'command'; code: string; params: ZplParam[] }
  | { kind: 'field'; data: string }
  | { kind: 'comment'; text: string }
  | { kind: 'raw'; text: string };

/**
 * Render one statement
 */
export function renderZplStatement(statement: ZplStatement): string {
  switch (statement.kind) {
    case 'command':
      return statement.code + statement.params.join(',');
    case 'field':
      return `^FD${statement.data}^FS`;
    case 'comment':
      return `^FX${statement.text}`;
    case 'raw':
      return statement.text;
  }
}

export interface Code128Options {
  /** Bar height in dots (default 100) */
  height?: number;
  /** Print the interpretation line (default true) */
  printText?: boolean;
  /** Interpretation line above the code (default false) */
  textAbove?: boolean;
  orientation?: FieldRotation;
}

export interface TextBlockOptions {
  alignment?: BlockAlignment;
  maxLines?: number;
  /** Extra dots between lines (default 0) */
  lineSpacing?: number;
}

const yesNo = (flag: boolean): string => (flag ? 'Y' : 'N');

// ============================================================================
// ZplBuilder Class
// ============================================================================

export class ZplBuilder {
  private readonly buffer = new StatementBuffer<ZplStatement>(renderZplStatement, 'field');

  /**
   * Start a label format with its print width and length already set
   */
  static create(
    widthDots: number = PRINTER_DEFAULTS.ZPL_LABEL_WIDTH,
    heightDots: number = PRINTER_DEFAULTS.ZPL_LABEL_LENGTH
  ): ZplBuilder {
    return new ZplBuilder().startFormat().labelWidth(widthDots).labelLength(heightDots);
  }

  // ==========================================================================
  // Format and Label Setup
  // ==========================================================================

  /**
   * Start format (^XA)
   */
  startFormat(): this {
    return this.command('^XA');
  }

  /**
   * End format (^XZ)
   */
  endFormat(): this {
    return this.command('^XZ');
  }

  /**
   * Label home: offset of the label origin (^LH)
   */
  labelHome(x: number, y: number): this {
    return this.command('^LH', toDot(x), toDot(y));
  }

  /**
   * Print width in dots (^PW)
   */
  labelWidth(width: number): this {
    return this.command('^PW', toDot(width));
  }

  /**
   * Label length in dots (^LL)
   */
  labelLength(length: number): this {
    return this.command('^LL', toDot(length));
  }

  /**
   * Scale dot values of the fields that follow from the format's
   * resolution to the head's (^MUD,b,c)
   */
  unitConversion(formatDpi: ZplFormatDpi, printerDpi: ZplConversionDpi): this {
    return this.command('^MU', 'D', formatDpi, printerDpi);
  }

  /**
   * Media type (^MT): T thermal transfer, D direct thermal
   */
  mediaType(type: MediaType): this {
    return this.command(`^MT${type.toUpperCase()}`);
  }

  /**
   * Print, slew and backfeed speed, 2-14 inches per second (^PR)
   */
  printSpeed(speed: number): this {
    const s = clampInt(speed, 2, 14);
    return this.command('^PR', s, s, s);
  }

  /**
   * Media darkness 0-30, two digits (~SD)
   */
  mediaDarkness(darkness: number): this {
    return this.command(`~SD${zeroPad(clampInt(darkness, 0, 30), 2)}`);
  }

  /**
   * Print quantity (^PQ), never overriding pause-and-cut
   * @param quantity - labels to print
   * @param pauseCount - pause after this many labels, 0 for no pause
   * @param replicates - copies of each serial number
   */
  printQuantity(quantity: number, pauseCount: number = 0, replicates: number = 0): this {
    return this.command(
      '^PQ',
      Math.max(1, toDot(quantity)),
      toDot(pauseCount),
      toDot(replicates),
      'N'
    );
  }

  // ==========================================================================
  // Field Primitives
  // ==========================================================================

  /**
   * Position of the next field (^FO)
   */
  fieldOrigin(x: number, y: number): this {
    return this.command('^FO', toDot(x), toDot(y));
  }

  /**
   * Select a built-in font in normal orientation (^A)
   */
  font(font: string, height: number, width: number = 0): this {
    return this.command(`^A${font.toUpperCase()}N`, toDot(height), toDot(width));
  }

  /**
   * Select a scalable font by its identifier, e.g. "0" (^A)
   */
  scalableFont(font: string, height: number, width: number): this {
    return this.command(`^A${font}`, toDot(height), toDot(width));
  }

  /**
   * Default orientation for subsequent fields (^FW)
   */
  fieldOrientation(rotation: FieldRotation): this {
    return this.command(`^FW${rotation.toUpperCase()}`);
  }

  /**
   * Field data; closes the current field (^FD...^FS)
   */
  fieldData(content: string): this {
    this.buffer.append({ kind: 'field', data: content });
    return this;
  }

  /**
   * Field block for wrapped text (^FB)
   */
  fieldBlock(
    width: number,
    maxLines: number,
    lineSpacing: number,
    alignment: BlockAlignment
  ): this {
    return this.command(
      '^FB',
      toDot(width),
      Math.max(1, toDot(maxLines)),
      Math.trunc(lineSpacing),
      alignment.toUpperCase(),
      0
    );
  }

  /**
   * Print the next field white on black (^FR)
   */
  fieldReversePrint(): this {
    return this.command('^FR');
  }

  /**
   * Non-printing comment (^FX)
   */
  comment(text: string): this {
    this.buffer.append({ kind: 'comment', text });
    return this;
  }

  /**
   * Append text verbatim
   */
  raw(text: string): this {
    this.buffer.append({ kind: 'raw', text });
    return this;
  }

  // ==========================================================================
  // Text
  // ==========================================================================

  /**
   * Origin, font and data in one field
   */
  text(x: number, y: number, font: string, height: number, content: string, width: number = 0): this {
    return this.fieldOrigin(x, y).font(font, height, width).fieldData(content);
  }

  /**
   * Text with its own orientation
   */
  rotatedText(
    x: number,
    y: number,
    font: string,
    height: number,
    content: string,
    rotation: FieldRotation,
    width: number = 0
  ): this {
    return this.fieldOrigin(x, y)
      .command(`^A${font.toUpperCase()}${rotation.toUpperCase()}`, toDot(height), toDot(width))
      .fieldData(content);
  }

  /**
   * Wrapped multi-line text inside a block `width` dots wide
   */
  textBlock(
    x: number,
    y: number,
    font: string,
    height: number,
    width: number,
    content: string,
    options: TextBlockOptions = {}
  ): this {
    const {
      alignment = 'L',
      maxLines = PRINTER_DEFAULTS.ZPL_TEXT_BLOCK_MAX_LINES,
      lineSpacing = 0,
    } = options;

    return this.fieldOrigin(x, y)
      .font(font, height)
      .fieldBlock(width, maxLines, lineSpacing, alignment)
      .fieldData(content);
  }

  // ==========================================================================
  // Graphics
  // ==========================================================================

  /**
   * Rectangle, or a line when one side equals the thickness (^GB)
   * @param rounding - corner rounding 0-8
   */
  graphicBox(
    x: number,
    y: number,
    width: number,
    height: number,
    thickness: number,
    color: LineColor = 'B',
    rounding: number = 0
  ): this {
    return this.fieldOrigin(x, y)
      .command(
        '^GB',
        toDot(width),
        toDot(height),
        Math.max(1, toDot(thickness)),
        color,
        clampInt(rounding, 0, 8)
      )
      .command('^FS');
  }

  horizontalLine(x: number, y: number, width: number, thickness: number): this {
    return this.graphicBox(x, y, width, thickness, thickness);
  }

  verticalLine(x: number, y: number, height: number, thickness: number): this {
    return this.graphicBox(x, y, thickness, height, thickness);
  }

  // ==========================================================================
  // Barcodes
  // ==========================================================================

  /**
   * Code 128 (^BC)
   */
  barcode128(x: number, y: number, data: string, options: Code128Options = {}): this {
    const {
      height = PRINTER_DEFAULTS.ZPL_BARCODE_HEIGHT,
      printText = true,
      textAbove = false,
      orientation = 'N',
    } = options;

    return this.fieldOrigin(x, y)
      .command(`^BC${orientation}`, toDot(height), yesNo(printText), yesNo(textAbove), 'N')
      .fieldData(data);
  }

  /**
   * Code 39 without check digit (^B3)
   */
  barcode39(
    x: number,
    y: number,
    data: string,
    height: number = PRINTER_DEFAULTS.ZPL_BARCODE_HEIGHT,
    printText: boolean = true
  ): this {
    return this.fieldOrigin(x, y)
      .command('^B3N', 'N', toDot(height), yesNo(printText), 'N')
      .fieldData(data);
  }

  /**
   * EAN-13 (^BE)
   */
  barcodeEan13(
    x: number,
    y: number,
    data: string,
    height: number = PRINTER_DEFAULTS.ZPL_BARCODE_HEIGHT,
    printText: boolean = true
  ): this {
    return this.fieldOrigin(x, y)
      .command('^BEN', toDot(height), yesNo(printText), 'N')
      .fieldData(data);
  }

  /**
   * QR code, model 2 (^BQ). The error-correction level travels as a
   * prefix of the field data, followed by automatic input mode.
   * @param size - magnification 1-10
   */
  qrCode(
    x: number,
    y: number,
    data: string,
    size: number = PRINTER_DEFAULTS.ZPL_QR_MAGNIFICATION,
    errorCorrection: QrErrorCorrection = 'Q'
  ): this {
    return this.fieldOrigin(x, y)
      .command('^BQN', 2, clampInt(size, 1, 10))
      .fieldData(`${errorCorrection}A,${data}`);
  }

  /**
   * Data Matrix, ECC 200 (^BX)
   */
  dataMatrix(
    x: number,
    y: number,
    data: string,
    size: number = PRINTER_DEFAULTS.ZPL_DATAMATRIX_SIZE
  ): this {
    return this.fieldOrigin(x, y)
      .command('^BXN', Math.max(1, toDot(size)), 200)
      .fieldData(data);
  }

  // ==========================================================================
  // Build Methods
  // ==========================================================================

  get statements(): readonly ZplStatement[] {
    return this.buffer.items;
  }

  /**
   * Finalized ZPL text
   */
  toText(): string {
    return this.buffer.finalize();
  }

  /**
   * Finalized ZPL as UTF-8 bytes
   */
  toBytes(): Buffer {
    return Buffer.from(this.toText(), 'utf8');
  }

  getLength(): number {
    return this.buffer.length;
  }

  clear(): this {
    this.buffer.clear();
    return this;
  }

  private command(code: string, ...params: ZplParam[]): this {
    this.buffer.append({ kind: 'command', code, params });
    return this;
  }
}
