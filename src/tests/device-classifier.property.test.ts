/**
 * Tests for keyword classification of USB devices
 */

import * as fc from 'fast-check';
import './propertyTestConfig';
import { PrinterLanguage } from '../main/printer/types';
import {
  CLASSIFICATION_RULES,
  classifyDevice,
  describeDevice,
} from '../main/printer/discovery/DeviceClassifier';

describe('classifyDevice', () => {
  it('recognizes each printer family', () => {
    expect(classifyDevice({ manufacturer: 'Zebra Technologies', productName: 'ZTC GK420d' })).toBe(
      PrinterLanguage.ZPL
    );
    expect(classifyDevice({ manufacturer: 'TSC', productName: 'TTP-244 Pro' })).toBe(
      PrinterLanguage.TSPL
    );
    expect(classifyDevice({ manufacturer: 'EPSON', productName: 'TM-T20II' })).toBe(
      PrinterLanguage.ESC_POS
    );
  });

  it('gives the Zebra tier priority over the label tier', () => {
    expect(classifyDevice({ manufacturer: 'Zebra Label Co' })).toBe(PrinterLanguage.ZPL);
  });

  it('gives the label tier priority over the receipt tier', () => {
    expect(classifyDevice({ productName: 'Thermal Label Printer' })).toBe(PrinterLanguage.TSPL);
  });

  it('matches case-insensitively across both strings', () => {
    expect(classifyDevice({ manufacturer: 'GODEX', productName: undefined })).toBe(
      PrinterLanguage.TSPL
    );
    expect(classifyDevice({ productName: 'Mini RECEIPT printer' })).toBe(PrinterLanguage.ESC_POS);
  });

  it('matches keywords as substrings', () => {
    expect(classifyDevice({ productName: 'ZD420' })).toBe(PrinterLanguage.ZPL);
    expect(classifyDevice({ productName: 'Mpos-58' })).toBe(PrinterLanguage.ESC_POS);
  });

  it('returns unknown when nothing matches', () => {
    expect(classifyDevice({ manufacturer: 'Logitech', productName: 'USB Keyboard' })).toBe(
      PrinterLanguage.UNKNOWN
    );
    expect(classifyDevice({})).toBe(PrinterLanguage.UNKNOWN);
  });

  it('accepts extra rule rows', () => {
    const rules = [...CLASSIFICATION_RULES, { language: PrinterLanguage.TSPL, keywords: ['xprinter'] }];
    expect(classifyDevice({ manufacturer: 'Xprinter' }, rules)).toBe(PrinterLanguage.TSPL);
    expect(classifyDevice({ manufacturer: 'Xprinter' })).toBe(PrinterLanguage.UNKNOWN);
  });

  it('never lets a Zebra keyword fall through to a lower tier', () => {
    const zebraKeyword = fc.constantFrom(...CLASSIFICATION_RULES[0].keywords);
    const otherKeyword = fc.constantFrom(
      ...CLASSIFICATION_RULES[1].keywords,
      ...CLASSIFICATION_RULES[2].keywords
    );

    fc.assert(
      fc.property(zebraKeyword, otherKeyword, fc.boolean(), (zebra, other, zebraFirst) => {
        const manufacturer = zebraFirst ? zebra.toUpperCase() : other;
        const productName = zebraFirst ? other : zebra.toUpperCase();
        expect(classifyDevice({ manufacturer, productName })).toBe(PrinterLanguage.ZPL);
      })
    );
  });
});

describe('describeDevice', () => {
  it('formats manufacturer, product and ids', () => {
    expect(
      describeDevice({ manufacturer: 'EPSON', productName: 'TM-T20II', vendorId: 1208, productId: 3605 })
    ).toBe('EPSON - TM-T20II (VID: 1208, PID: 3605)');
  });

  it('uses placeholders for missing fields', () => {
    expect(describeDevice({})).toBe('Unknown - Unknown (VID: N/A, PID: N/A)');
  });
});
