import { z } from 'zod';

/**
 * Raw record shapes reported by each platform. Every field falls back to a
 * default instead of failing, so only a non-object record is rejected here;
 * the SKU check happens in the normalizer.
 */

const lenientNumber = z
  .union([z.number(), z.string()])
  .transform((value) => (typeof value === 'number' ? value : Number(value.trim())))
  .pipe(z.number().finite())
  .catch(0);

const lenientText = z
  .union([z.string(), z.number()])
  .transform((value) => String(value).trim())
  .catch('');

export const WEIGHT_UNITS = ['g', 'kg', 'lb', 'oz'] as const;
export type WeightUnit = (typeof WEIGHT_UNITS)[number];

export const LENGTH_UNITS = ['mm', 'cm', 'in'] as const;
export type LengthUnit = (typeof LENGTH_UNITS)[number];

// Platform A: inventory-management style, prices in major units, stock per sellable
const StockEntrySchema = z.object({
  warehouse_id: lenientText,
  available: lenientNumber,
});

const SellableSchema = z.object({
  stock_entries: z.array(StockEntrySchema.nullable().catch(null)).catch([]),
});

export const PlatformARecordSchema = z.object({
  id: lenientText,
  sku: lenientText,
  title: lenientText,
  description: lenientText,
  product_category: lenientText,
  brand: lenientText,
  selling_price: lenientNumber,
  weight: lenientNumber,
  weight_unit: z.enum(WEIGHT_UNITS).catch('g'),
  dimensions: z
    .object({
      length: lenientNumber,
      width: lenientNumber,
      height: lenientNumber,
      unit: z.enum(LENGTH_UNITS).catch('mm'),
    })
    .catch({ length: 0, width: 0, height: 0, unit: 'mm' }),
  sellables: z.array(SellableSchema.nullable().catch(null)).catch([]),
});

export type PlatformARecord = z.infer<typeof PlatformARecordSchema>;

// Platform B: shipping/fulfilment style, prices in minor units, metric sizes
const StockLevelSchema = z.object({
  location_id: lenientText,
  quantity: lenientNumber,
});

export const PlatformBRecordSchema = z.object({
  id: lenientText,
  sku: lenientText,
  name: lenientText,
  description: lenientText,
  category: lenientText,
  brand: lenientText,
  price_cents: lenientNumber,
  weight_kg: lenientNumber,
  dimensions_cm: z
    .object({
      length: lenientNumber,
      width: lenientNumber,
      height: lenientNumber,
    })
    .catch({ length: 0, width: 0, height: 0 }),
  stock: z.array(StockLevelSchema.nullable().catch(null)).catch([]),
});

export type PlatformBRecord = z.infer<typeof PlatformBRecordSchema>;
