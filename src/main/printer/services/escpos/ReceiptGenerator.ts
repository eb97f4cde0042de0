/**
 * Receipt Generator
 *
 * Builds a formatted customer receipt (store header, line items, total,
 * QR code, cut) as a fixed sequence of EscPosBuilder calls.
 *
 * @module printer/services/escpos
 */

import { PaperSize } from '../../types';
import { EscPosBuilder, CodePage } from './EscPosBuilder';

// ============================================================================
// Receipt Configuration
// ============================================================================

/**
 * Configuration options for receipt generation
 */
export interface ReceiptConfig {
  paperSize: PaperSize;
  currency: string;
  codePage?: CodePage;
}

const DEFAULT_RECEIPT_CONFIG: ReceiptConfig = {
  paperSize: PaperSize.MM_58,
  currency: '$',
};

export interface ReceiptLineItem {
  name: string;
  price: number;
}

export interface ReceiptData {
  storeName: string;
  addressLines: string[];
  items: ReceiptLineItem[];
  footerMessage: string;
  /** Encoded into a QR code above the cut when present */
  qrData?: string;
}

/**
 * Demo receipt used by the template library
 */
export const SAMPLE_RECEIPT: ReceiptData = {
  storeName: 'CORNER MARKET',
  addressLines: ['12 Harbor Street', 'Springfield', 'Tel: 555-0100'],
  items: [
    { name: 'Coffee beans', price: 12.5 },
    { name: 'Oat milk', price: 3.25 },
    { name: 'Croissant', price: 2.75 },
  ],
  footerMessage: 'Thank you for shopping!',
  qrData: 'https://example.com/receipts/1001',
};

// ============================================================================
// ReceiptGenerator Class
// ============================================================================

export class ReceiptGenerator {
  private config: ReceiptConfig;

  constructor(config: Partial<ReceiptConfig> = {}) {
    this.config = { ...DEFAULT_RECEIPT_CONFIG, ...config };
  }

  /**
   * Generate the finalized receipt bytes
   */
  generateReceipt(data: ReceiptData = SAMPLE_RECEIPT): Buffer {
    return this.buildReceipt(data).toBytes();
  }

  /**
   * Issue the receipt's calls on a fresh builder and return it
   */
  buildReceipt(data: ReceiptData): EscPosBuilder {
    const builder = new EscPosBuilder({
      paperSize: this.config.paperSize,
      codePage: this.config.codePage,
    });

    builder.init();
    this.addHeader(builder, data);
    this.addItemsSection(builder, data.items);
    this.addFooter(builder, data);
    builder.feedAndCut();

    return builder;
  }

  private addHeader(builder: EscPosBuilder, data: ReceiptData): void {
    builder
      .alignCenter()
      .setTextSize(2, 2)
      .setBold(true)
      .textLine(data.storeName)
      .resetFormatting()
      .alignCenter();

    for (const line of data.addressLines) {
      builder.textLine(line);
    }

    builder.lineFeed().horizontalLine();
  }

  private addItemsSection(builder: EscPosBuilder, items: ReceiptLineItem[]): void {
    builder.alignLeft();

    for (const item of items) {
      builder.twoColumns(item.name, this.formatCurrency(item.price));
    }

    const total = items.reduce((sum, item) => sum + item.price, 0);

    builder
      .horizontalLine()
      .setBold(true)
      .twoColumns('TOTAL', this.formatCurrency(total))
      .resetFormatting();
  }

  private addFooter(builder: EscPosBuilder, data: ReceiptData): void {
    builder.lineFeed().alignCenter().textLine(data.footerMessage).lineFeed();

    if (data.qrData) {
      builder.qrCode(data.qrData);
    }
  }

  private formatCurrency(amount: number): string {
    return `${this.config.currency}${amount.toFixed(2)}`;
  }
}
