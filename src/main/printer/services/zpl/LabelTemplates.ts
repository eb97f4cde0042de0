/**
 * ZPL Label Templates
 *
 * Fixed label formats built purely from ZplBuilder calls. Coordinates are
 * in dots at 203 dpi; on 300 and 600 dpi heads the width and length are
 * rescaled and ^MU converts the fields. Output order is exactly call order.
 *
 * @module printer/services/zpl
 */

import {
  AssetTagData,
  InventoryLabelData,
  NutritionLabelData,
  ProductLabelData,
  ShippingLabelData,
} from '../../types';
import {
  SAMPLE_ASSET,
  SAMPLE_INVENTORY,
  SAMPLE_NUTRITION,
  SAMPLE_PRODUCT,
  SAMPLE_SHIPMENT,
} from '../sampleLabels';
import { PRINTER_DEFAULTS } from '../../../../shared/constants';
import { scaleDots } from '../units';
import { ZplBuilder, ZplConversionDpi } from './ZplBuilder';

const CONVERSION_TARGETS: Partial<Record<number, ZplConversionDpi>> = { 300: 300, 600: 600 };

/**
 * ^XA with width and length, plus a unit conversion when the head's
 * resolution is one ^MU can reach. Other resolutions print the 203 dpi
 * layout unchanged.
 */
function startLabel(widthDots: number, lengthDots: number, dpi: number): ZplBuilder {
  const target = CONVERSION_TARGETS[dpi];
  if (!target) {
    return ZplBuilder.create(widthDots, lengthDots);
  }
  return new ZplBuilder()
    .startFormat()
    .labelWidth(scaleDots(widthDots, target))
    .labelLength(scaleDots(lengthDots, target))
    .unitConversion(200, target);
}

/**
 * YYYY-MM-DD in UTC; an invalid date prints today's
 */
export function formatShipDate(date: Date): string {
  const printable = Number.isNaN(date.getTime()) ? new Date() : date;
  return printable.toISOString().substring(0, 10);
}

/**
 * 4 x 6 in shipping label
 * @param shipDate - printed ship date (default: now)
 */
export function shippingLabel(
  data: ShippingLabelData = SAMPLE_SHIPMENT,
  shipDate: Date = new Date(),
  dpi: number = PRINTER_DEFAULTS.DPI
): ZplBuilder {
  const zpl = startLabel(812, 1218, dpi)
    .comment('Shipping Label')
    .text(50, 50, 'A', 50, data.carrier)
    .horizontalLine(50, 120, 712, 3)
    .text(50, 150, 'A', 28, 'FROM:')
    .text(50, 190, 'A', 24, data.from.name);

  data.from.lines.slice(0, 2).forEach((line, i) => {
    zpl.text(50, 220 + i * 30, 'A', 24, line);
  });

  zpl
    .horizontalLine(50, 300, 712, 2)
    .text(50, 330, 'A', 35, 'SHIP TO:')
    .text(50, 380, 'A', 40, data.to.name);

  data.to.lines.slice(0, 3).forEach((line, i) => {
    zpl.text(50, 430 + i * 45, 'A', 32, line);
  });

  return zpl
    .horizontalLine(50, 580, 712, 2)
    .barcode128(150, 620, data.trackingNumber, { height: 120 })
    .qrCode(550, 800, data.trackingUrl, 5)
    .text(50, 820, 'A', 24, 'TRACKING #:')
    .text(50, 855, 'A', 28, data.trackingNumber)
    .graphicBox(50, 920, 250, 60, 2)
    .text(70, 935, 'A', 35, data.service)
    .text(350, 935, 'A', 28, `Weight: ${data.weight}`)
    .text(50, 1000, 'A', 20, `Ship Date: ${formatShipDate(shipDate)}`)
    .printQuantity(1)
    .endFormat();
}

/**
 * 2 x 3 in product label with price box, barcode, QR link and
 * a wrapped description
 */
export function productLabel(
  data: ProductLabelData = SAMPLE_PRODUCT,
  dpi: number = PRINTER_DEFAULTS.DPI
): ZplBuilder {
  return startLabel(406, 609, dpi)
    .comment('Product Label')
    .text(20, 30, 'A', 35, data.name)
    .text(20, 80, 'A', 24, `SKU: ${data.sku}`)
    .graphicBox(20, 120, 180, 60, 2)
    .text(40, 135, 'A', 40, data.price)
    .barcode128(20, 200, data.barcode, { height: 80 })
    .qrCode(250, 120, data.url, 4)
    .textBlock(20, 320, 'A', 20, 366, data.description, { maxLines: 3 })
    .printQuantity(1)
    .endFormat();
}

/**
 * 2 x 1 in bin label
 */
export function inventoryLabel(
  data: InventoryLabelData = SAMPLE_INVENTORY,
  dpi: number = PRINTER_DEFAULTS.DPI
): ZplBuilder {
  return startLabel(406, 203, dpi)
    .comment('Inventory Label')
    .text(10, 10, 'A', 28, `LOC: ${data.location}`)
    .barcode128(10, 50, data.itemCode, { height: 50 })
    .text(280, 10, 'A', 24, `QTY: ${data.quantity}`)
    .printQuantity(1)
    .endFormat();
}

/**
 * 2 x 1.5 in asset tag with Code 128 and a Data Matrix copy of the id
 */
export function assetTag(
  data: AssetTagData = SAMPLE_ASSET,
  dpi: number = PRINTER_DEFAULTS.DPI
): ZplBuilder {
  return startLabel(406, 305, dpi)
    .comment('Asset Tag')
    .graphicBox(20, 15, 80, 40, 2)
    .text(35, 25, 'A', 25, data.ownerInitials)
    .text(120, 20, 'A', 35, 'ASSET TAG')
    .barcode128(20, 70, data.assetId, { height: 60 })
    .dataMatrix(300, 70, data.assetId, 4)
    .text(20, 160, 'A', 18, `Property of ${data.owner}`)
    .printQuantity(1)
    .endFormat();
}

/**
 * Outlined rounded badges laid out left to right, wrapping at maxX.
 * Returns the y just below the last row.
 */
function badgeRow(
  zpl: ZplBuilder,
  labels: string[],
  startX: number,
  y: number,
  maxX: number,
  charWidth: number
): number {
  let x = startX;
  let rowY = y;
  for (const label of labels) {
    const width = label.length * charWidth + 8;
    if (x + width > maxX && x > startX) {
      x = startX;
      rowY += 22;
    }
    zpl.graphicBox(x, rowY, width, 18, 1, 'B', 2).text(x + 3, rowY + 4, 'A', 12, label);
    x += width + 5;
  }
  return rowY + 22;
}

const NUTRITION_WIDTH = 355; // 1.75 in
const NUTRITION_LENGTH = 2436; // 12 in

/**
 * 1.75 x 12 in packaged food label: reverse-printed nutrition band,
 * product details, claim badges, allergens, dates, perishable box,
 * rotated barcode and ingredient statement
 */
export function nutritionLabel(
  data: NutritionLabelData = SAMPLE_NUTRITION,
  dpi: number = PRINTER_DEFAULTS.DPI
): ZplBuilder {
  const zpl = startLabel(NUTRITION_WIDTH, NUTRITION_LENGTH, dpi);

  // Nutrition band
  zpl
    .graphicBox(0, 0, 80, NUTRITION_LENGTH, 80)
    .fieldReversePrint()
    .rotatedText(65, 50, 'A', 18, 'Nutrition', 'R')
    .fieldReversePrint()
    .rotatedText(45, 50, 'A', 18, 'Facts', 'R')
    .fieldReversePrint()
    .rotatedText(65, 180, 'A', 16, 'Calories', 'R')
    .fieldReversePrint()
    .rotatedText(40, 180, 'A', 35, data.calories.toString(), 'R');

  // Product details
  zpl
    .text(90, 30, 'A', 20, data.tagline)
    .text(90, 60, 'A', 28, data.productName)
    .text(90, 100, 'A', 14, `Net Wt: ${data.netWeight}`)
    .horizontalLine(90, 130, 260, 1);

  let y = 140;
  for (const line of data.contents) {
    zpl.text(90, y, 'A', 14, line);
    y += 18;
  }

  y = badgeRow(zpl, data.claims, 90, y + 10, 345, 7);

  // Allergens
  zpl
    .horizontalLine(90, y, 260, 1)
    .text(90, y + 5, 'A', 12, 'ALLERGY WARNING')
    .text(90, y + 20, 'A', 10, 'CONTAINS:');
  y = badgeRow(zpl, data.allergens, 150, y + 17, 345, 7);

  // Price and dates
  zpl.fieldOrigin(90, y + 10).font('A', 45).fieldData(data.price);
  y += 70;

  if (data.processedOn) {
    zpl.text(90, y, 'A', 14, 'Processed On').text(90, y + 18, 'A', 12, data.processedOn);
    y += 40;
  }
  zpl.text(90, y, 'A', 14, 'Best if Used By').text(90, y + 18, 'A', 16, data.bestBy);
  y += 45;

  zpl
    .graphicBox(90, y, 200, 60, 2)
    .text(95, y + 5, 'A', 14, 'PERISHABLE:')
    .text(95, y + 22, 'A', 16, 'KEEP')
    .text(95, y + 40, 'A', 12, 'REFRIGERATED');
  y += 80;

  // Barcode and ingredients run along the label length
  zpl.barcode128(340, y, data.barcode, { height: 80, orientation: 'R' });
  y += 260;

  data.ingredients.forEach((line, i) => {
    zpl.rotatedText(340 - i * 10, y, 'A', 10, line, 'R');
  });

  return zpl.printQuantity(1).endFormat();
}
