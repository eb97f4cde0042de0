/**
 * Template Library
 *
 * Named sample layouts per printer language. An unrecognized template
 * name falls back to the language's default template instead of failing.
 *
 * @module printer/services/TemplateLibrary
 */

import { PaperSize, PrinterLanguage } from '../types';
import { ReceiptGenerator } from './escpos';
import * as TsplTemplates from './tspl/LabelTemplates';
import * as ZplTemplates from './zpl/LabelTemplates';

/**
 * Languages that have an encoder
 */
export type EncodableLanguage = Exclude<PrinterLanguage, PrinterLanguage.UNKNOWN>;

export interface TemplateRenderOptions {
  /** Date printed on shipping labels (default: now) */
  shipDate?: Date;
  /** Receipt paper width (default: 58mm) */
  paperSize?: PaperSize;
  /** Label head resolution (default: 203) */
  dpi?: number;
}

interface TemplateEntry {
  name: string;
  description: string;
  render: (options: TemplateRenderOptions) => Buffer;
}

const TEMPLATES: Record<EncodableLanguage, readonly TemplateEntry[]> = {
  [PrinterLanguage.ESC_POS]: [
    {
      name: 'receipt',
      description: 'Store receipt with items, total and QR code',
      render: ({ paperSize }) => new ReceiptGenerator(paperSize ? { paperSize } : {}).generateReceipt(),
    },
  ],
  [PrinterLanguage.TSPL]: [
    {
      name: 'shipping',
      description: '100 x 60 mm shipping label',
      render: ({ dpi }) => TsplTemplates.shippingLabel(undefined, dpi).toBytes(),
    },
    {
      name: 'product',
      description: '50 x 30 mm product label',
      render: ({ dpi }) => TsplTemplates.productLabel(undefined, dpi).toBytes(),
    },
    {
      name: 'nutrition',
      description: '44.45 x 100 mm nutrition label',
      render: ({ dpi }) => TsplTemplates.nutritionLabel(undefined, dpi).toBytes(),
    },
  ],
  [PrinterLanguage.ZPL]: [
    {
      name: 'shipping',
      description: '4 x 6 in shipping label',
      render: ({ shipDate, dpi }) => ZplTemplates.shippingLabel(undefined, shipDate, dpi).toBytes(),
    },
    {
      name: 'product',
      description: '2 x 3 in product label',
      render: ({ dpi }) => ZplTemplates.productLabel(undefined, dpi).toBytes(),
    },
    {
      name: 'inventory',
      description: '2 x 1 in inventory label',
      render: ({ dpi }) => ZplTemplates.inventoryLabel(undefined, dpi).toBytes(),
    },
    {
      name: 'asset',
      description: '2 x 1.5 in asset tag',
      render: ({ dpi }) => ZplTemplates.assetTag(undefined, dpi).toBytes(),
    },
    {
      name: 'nutrition',
      description: '1.75 x 12 in nutrition label',
      render: ({ dpi }) => ZplTemplates.nutritionLabel(undefined, dpi).toBytes(),
    },
  ],
};

export const DEFAULT_TEMPLATES: Record<EncodableLanguage, string> = {
  [PrinterLanguage.ESC_POS]: 'receipt',
  [PrinterLanguage.TSPL]: 'product',
  [PrinterLanguage.ZPL]: 'product',
};

/**
 * Map a language to one with an encoder; unknown devices get ESC/POS
 */
export function toEncodableLanguage(language: PrinterLanguage): EncodableLanguage {
  return language === PrinterLanguage.UNKNOWN ? PrinterLanguage.ESC_POS : language;
}

/**
 * Template names available for a language, default first
 */
export function listTemplates(language: PrinterLanguage): string[] {
  const encodable = toEncodableLanguage(language);
  const names = TEMPLATES[encodable].map((entry) => entry.name);
  const fallback = DEFAULT_TEMPLATES[encodable];
  return [fallback, ...names.filter((name) => name !== fallback)];
}

/**
 * Description of a template, or undefined when the name is unknown
 */
export function describeTemplate(language: PrinterLanguage, name: string): string | undefined {
  return TEMPLATES[toEncodableLanguage(language)].find((entry) => entry.name === name)
    ?.description;
}

/**
 * Resolve a template name, falling back to the language default
 */
export function resolveTemplateName(language: PrinterLanguage, name: string): string {
  const encodable = toEncodableLanguage(language);
  const known = TEMPLATES[encodable].some((entry) => entry.name === name);
  return known ? name : DEFAULT_TEMPLATES[encodable];
}

/**
 * Render a template to its finalized bytes
 */
export function renderTemplate(
  language: PrinterLanguage,
  name: string,
  options: TemplateRenderOptions = {}
): Buffer {
  const encodable = toEncodableLanguage(language);
  const resolved = resolveTemplateName(encodable, name);
  const entries = TEMPLATES[encodable];
  const entry = entries.find((candidate) => candidate.name === resolved) ?? entries[0];
  return entry.render(options);
}
