/**
 * Tests for template lookup, fallback and rendering
 */

import './propertyTestConfig';
import { PaperSize, PrinterLanguage } from '../main/printer/types';
import {
  DEFAULT_TEMPLATES,
  describeTemplate,
  listTemplates,
  renderTemplate,
  resolveTemplateName,
  toEncodableLanguage,
} from '../main/printer/services/TemplateLibrary';
import { ReceiptGenerator } from '../main/printer/services/escpos';
import { TsplTemplates } from '../main/printer/services/tspl';
import { ZplTemplates } from '../main/printer/services/zpl';

const SHIP_DATE = new Date('2026-03-14T12:00:00Z');

describe('TemplateLibrary', () => {
  it('lists templates with the default first', () => {
    expect(listTemplates(PrinterLanguage.ESC_POS)).toEqual(['receipt']);
    expect(listTemplates(PrinterLanguage.TSPL)).toEqual(['product', 'shipping', 'nutrition']);
    expect(listTemplates(PrinterLanguage.ZPL)).toEqual([
      'product',
      'shipping',
      'inventory',
      'asset',
      'nutrition',
    ]);
  });

  it('treats unknown devices as ESC/POS', () => {
    expect(toEncodableLanguage(PrinterLanguage.UNKNOWN)).toBe(PrinterLanguage.ESC_POS);
    expect(toEncodableLanguage(PrinterLanguage.ZPL)).toBe(PrinterLanguage.ZPL);
    expect(listTemplates(PrinterLanguage.UNKNOWN)).toEqual(['receipt']);
  });

  it('resolves unrecognized names to the language default', () => {
    expect(resolveTemplateName(PrinterLanguage.ZPL, 'asset')).toBe('asset');
    expect(resolveTemplateName(PrinterLanguage.ZPL, 'nope')).toBe(DEFAULT_TEMPLATES.zpl);
    expect(resolveTemplateName(PrinterLanguage.ESC_POS, 'shipping')).toBe('receipt');
    expect(resolveTemplateName(PrinterLanguage.TSPL, 'inventory')).toBe('product');
  });

  it('describes known templates only', () => {
    expect(describeTemplate(PrinterLanguage.TSPL, 'nutrition')).toBe(
      '44.45 x 100 mm nutrition label'
    );
    expect(describeTemplate(PrinterLanguage.TSPL, 'asset')).toBeUndefined();
  });

  it('renders the named template', () => {
    expect(renderTemplate(PrinterLanguage.ZPL, 'asset').equals(ZplTemplates.assetTag().toBytes())).toBe(
      true
    );
    expect(
      renderTemplate(PrinterLanguage.TSPL, 'shipping').equals(TsplTemplates.shippingLabel().toBytes())
    ).toBe(true);
  });

  it('falls back to the default template instead of failing', () => {
    expect(
      renderTemplate(PrinterLanguage.TSPL, 'nope').equals(TsplTemplates.productLabel().toBytes())
    ).toBe(true);
    expect(
      renderTemplate(PrinterLanguage.UNKNOWN, 'anything').equals(
        new ReceiptGenerator().generateReceipt()
      )
    ).toBe(true);
  });

  it('passes the ship date through to the ZPL shipping label', () => {
    const bytes = renderTemplate(PrinterLanguage.ZPL, 'shipping', { shipDate: SHIP_DATE });
    expect(bytes.toString('utf8')).toContain('^FDShip Date: 2026-03-14^FS');
  });

  it('renders the receipt for the requested paper width', () => {
    const bytes = renderTemplate(PrinterLanguage.ESC_POS, 'receipt', { paperSize: PaperSize.MM_80 });

    expect(
      bytes.equals(new ReceiptGenerator({ paperSize: PaperSize.MM_80 }).generateReceipt())
    ).toBe(true);
    expect(bytes.equals(new ReceiptGenerator().generateReceipt())).toBe(false);
  });

  it('lays labels out for the requested resolution', () => {
    expect(
      renderTemplate(PrinterLanguage.TSPL, 'product', { dpi: 300 }).equals(
        TsplTemplates.productLabel(undefined, 300).toBytes()
      )
    ).toBe(true);
    expect(
      renderTemplate(PrinterLanguage.ZPL, 'inventory', { dpi: 300 })
        .toString('utf8')
        .startsWith('^XA^PW600^LL300^MUD,200,300^FXInventory Label')
    ).toBe(true);
  });

  it('renders a shipping label for an invalid ship date', () => {
    jest.useFakeTimers().setSystemTime(new Date('2026-05-01T08:00:00Z'));
    try {
      const bytes = renderTemplate(PrinterLanguage.ZPL, 'shipping', { shipDate: new Date(NaN) });
      expect(bytes.toString('utf8')).toContain('^FDShip Date: 2026-05-01^FS');
    } finally {
      jest.useRealTimers();
    }
  });

  it('renders every template deterministically', () => {
    for (const language of [PrinterLanguage.ESC_POS, PrinterLanguage.TSPL, PrinterLanguage.ZPL]) {
      for (const name of listTemplates(language)) {
        const first = renderTemplate(language, name, { shipDate: SHIP_DATE });
        const second = renderTemplate(language, name, { shipDate: SHIP_DATE });

        expect(first.length).toBeGreaterThan(0);
        expect(first.equals(second)).toBe(true);
      }
    }
  });
});
