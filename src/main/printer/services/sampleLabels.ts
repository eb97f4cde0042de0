/**
 * Sample label content shared by the TSPL and ZPL templates
 *
 * @module printer/services/sampleLabels
 */

import {
  AssetTagData,
  InventoryLabelData,
  NutritionLabelData,
  ProductLabelData,
  ShippingLabelData,
} from '../types';

export const SAMPLE_SHIPMENT: ShippingLabelData = {
  carrier: 'NORTHWIND FREIGHT',
  from: { name: 'Dana Whitfield', lines: ['88 Mill Lane', 'Portland, OR 97201'] },
  to: {
    name: 'Sam Okafor',
    lines: ['2200 Lakeview Drive', 'Madison, WI 53703', 'United States'],
  },
  trackingNumber: 'NW4821937750',
  trackingUrl: 'https://example.com/track/NW4821937750',
  service: 'EXPRESS',
  weight: '3.2 lbs',
};

export const SAMPLE_PRODUCT: ProductLabelData = {
  name: 'Trail Lantern 300',
  sku: 'TL-300-BLK',
  price: '$24.95',
  barcode: 'TL300BLK',
  url: 'https://example.com/p/TL300BLK',
  description: 'Rechargeable camping lantern with three brightness levels and a folding hook.',
};

export const SAMPLE_INVENTORY: InventoryLabelData = {
  location: 'R04-S2-B07',
  itemCode: 'INV-7730-0415',
  quantity: 48,
};

export const SAMPLE_ASSET: AssetTagData = {
  assetId: 'AT-0098321',
  owner: 'Harbor Analytics Ltd.',
  ownerInitials: 'HA',
};

export const SAMPLE_NUTRITION: NutritionLabelData = {
  productName: 'GARDEN VEGGIE WRAP',
  tagline: 'Made Fresh Daily',
  price: '$7.49',
  netWeight: '9.2 oz (261 g)',
  bestBy: '14 Mar 2026 | 09:00AM',
  barcode: '048213',
  calories: 320,
  contents: [
    'WRAP: SPINACH TORTILLA, HUMMUS,',
    'ROMAINE, CUCUMBER, SHREDDED',
    'CARROT, ROASTED RED PEPPER, FETA.',
  ],
  claims: ['NO MSG', 'VEGETARIAN', 'NUT-FREE', 'NO SUGAR'],
  allergens: ['MILK', 'WHEAT', 'SESAME'],
  ingredients: [
    'Ingredients: SPINACH TORTILLA (Flour,',
    'Spinach, Water, Oil, Salt), HUMMUS',
    '(Chickpeas, Tahini, Lemon, Garlic),',
    'ROMAINE, CUCUMBER, CARROT, RED PEPPER,',
    'FETA CHEESE (Milk, Salt, Cultures).',
  ],
};
