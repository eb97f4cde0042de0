/**
 * TSPL Label Templates
 *
 * Fixed layouts built purely from TsplBuilder calls. Layouts are drawn
 * in dots at 203 dpi and every position, size, rule thickness and bar
 * height is rescaled for the target head; fonts, multipliers and QR cell
 * widths stay as given. Output order is exactly call order.
 *
 * @module printer/services/tspl
 */

import { NutritionLabelData, ProductLabelData, ShippingLabelData } from '../../types';
import { PRINTER_DEFAULTS } from '../../../../shared/constants';
import { SAMPLE_NUTRITION, SAMPLE_PRODUCT, SAMPLE_SHIPMENT } from '../sampleLabels';
import { scaleDots } from '../units';
import { TsplBuilder } from './TsplBuilder';

// Font "1" cell is 8 x 12 dots
const FONT_1_WIDTH = 8;
const LINE_STEP = 30;
const RULE = PRINTER_DEFAULTS.TSPL_LINE_THICKNESS;

type Scale = (dots: number) => number;

function scaleFor(dpi: number): Scale {
  return (dots) => scaleDots(dots, dpi);
}

/**
 * 100 x 60 mm shipping label: carrier header, sender, recipient,
 * tracking barcode and QR link
 */
export function shippingLabel(
  data: ShippingLabelData = SAMPLE_SHIPMENT,
  dpi: number = PRINTER_DEFAULTS.DPI
): TsplBuilder {
  const d = scaleFor(dpi);
  const cmd = new TsplBuilder()
    .size(100, 60)
    .gap(3)
    .speed(4)
    .density(8)
    .direction(0)
    .cls()
    .text(d(20), d(20), '3', 0, 1, 1, data.carrier)
    .horizontalLine(d(20), d(60), d(360), d(RULE))
    .text(d(20), d(80), '2', 0, 1, 1, `From: ${data.from.name}`);

  data.from.lines.slice(0, 2).forEach((line, i) => {
    cmd.text(d(20), d(110 + i * LINE_STEP), '2', 0, 1, 1, line);
  });

  cmd
    .horizontalLine(d(20), d(170), d(360), d(RULE))
    .text(d(20), d(190), '3', 0, 2, 2, 'TO:')
    .text(d(20), d(240), '3', 0, 1, 1, data.to.name);

  data.to.lines.slice(0, 2).forEach((line, i) => {
    cmd.text(d(20), d(280 + i * LINE_STEP), '2', 0, 1, 1, line);
  });

  return cmd
    .barcode128(d(20), d(360), data.trackingNumber, d(PRINTER_DEFAULTS.TSPL_BARCODE_HEIGHT))
    .qr(d(300), d(200), data.trackingUrl, 5)
    .print(1, 1);
}

/**
 * 50 x 30 mm shelf label: name, SKU, boxed price, barcode and QR link
 */
export function productLabel(
  data: ProductLabelData = SAMPLE_PRODUCT,
  dpi: number = PRINTER_DEFAULTS.DPI
): TsplBuilder {
  const d = scaleFor(dpi);
  return new TsplBuilder()
    .size(50, 30)
    .gap(2)
    .speed(4)
    .density(8)
    .direction(0)
    .cls()
    .text(d(10), d(10), '3', 0, 1, 1, data.name)
    .text(d(10), d(45), '2', 0, 1, 1, `SKU: ${data.sku}`)
    .box(d(10), d(75), d(140), d(45), d(2))
    .text(d(20), d(85), '3', 0, 1, 1, data.price)
    .barcode128(d(10), d(135), data.barcode, d(60))
    .qr(d(260), d(70), data.url, 4)
    .print(1, 1);
}

/**
 * Outlined font-1 badges laid out left to right, wrapping at maxX.
 * Returns the y just below the last row, in 203 dpi layout dots.
 */
function badgeRow(
  cmd: TsplBuilder,
  d: Scale,
  labels: string[],
  startX: number,
  y: number,
  maxX: number
): number {
  let x = startX;
  let rowY = y;
  for (const label of labels) {
    const width = label.length * FONT_1_WIDTH + 10;
    if (x + width > maxX && x > startX) {
      x = startX;
      rowY += 25;
    }
    cmd.box(d(x), d(rowY), d(width), d(20), d(1)).text(d(x + 5), d(rowY + 4), '1', 0, 1, 1, label);
    x += width + 5;
  }
  return rowY + 25;
}

/**
 * 44.45 x 100 mm packaged food label: rotated nutrition band on the
 * left, product details, claim badges, allergen warning, dates and
 * ingredient statement on the right
 */
export function nutritionLabel(
  data: NutritionLabelData = SAMPLE_NUTRITION,
  dpi: number = PRINTER_DEFAULTS.DPI
): TsplBuilder {
  const d = scaleFor(dpi);
  const cmd = new TsplBuilder()
    .size(44.45, 100)
    .gap(2)
    .speed(4)
    .density(10)
    .direction(0)
    .cls();

  // Nutrition band
  cmd
    .box(0, 0, d(80), d(780), d(2))
    .text(d(60), d(40), '2', 90, 1, 1, 'Nutrition')
    .text(d(40), d(40), '2', 90, 1, 1, 'Facts')
    .text(d(60), d(180), '1', 90, 1, 1, 'Calories')
    .text(d(35), d(180), '3', 90, 2, 2, data.calories.toString());

  // Product details
  cmd
    .text(d(90), d(20), '2', 0, 1, 1, data.tagline)
    .text(d(90), d(50), '2', 0, 1, 1, data.productName)
    .text(d(90), d(80), '3', 0, 1, 1, data.price)
    .text(d(90), d(115), '1', 0, 1, 1, `Net Wt: ${data.netWeight}`)
    .horizontalLine(d(90), d(135), d(260), d(1));

  let y = 145;
  for (const line of data.contents) {
    cmd.text(d(90), d(y), '1', 0, 1, 1, line);
    y += 18;
  }

  y = badgeRow(cmd, d, data.claims, 90, y + 10, 350);

  // Allergens
  cmd
    .horizontalLine(d(90), d(y), d(260), d(1))
    .text(d(90), d(y + 5), '2', 0, 1, 1, 'ALLERGY WARNING')
    .text(d(90), d(y + 30), '1', 0, 1, 1, 'CONTAINS:');
  y = badgeRow(cmd, d, data.allergens, 170, y + 27, 350);

  // Dates
  if (data.processedOn) {
    cmd
      .text(d(90), d(y), '1', 0, 1, 1, 'Processed On')
      .text(d(90), d(y + 18), '1', 0, 1, 1, data.processedOn);
    y += 40;
  }
  cmd
    .text(d(90), d(y), '1', 0, 1, 1, 'Best if Used By')
    .text(d(90), d(y + 18), '2', 0, 1, 1, data.bestBy);
  y += 50;

  cmd
    .box(d(90), d(y), d(200), d(50), d(2))
    .text(d(95), d(y + 5), '1', 0, 1, 1, 'PERISHABLE:')
    .text(d(95), d(y + 25), '2', 0, 1, 1, 'KEEP REFRIGERATED');
  y += 65;

  cmd.barcode(d(90), d(y), '128', d(60), 1, 0, 2, 2, data.barcode);
  y += 90;

  for (const line of data.ingredients) {
    cmd.text(d(90), d(y), '1', 0, 1, 1, line);
    y += 16;
  }

  return cmd.print(1, 1);
}
