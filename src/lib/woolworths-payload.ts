import { z } from 'zod';
import type { ProductCandidate } from '../types/product.js';
import { createLogger } from './logger.js';

const log = createLogger('woolworths-payload');

export const WOOLWORTHS_SOURCE = 'woolworths';
export const WOOLWORTHS_SITE = 'https://www.woolworths.com.au';

// A malformed field reads as absent instead of failing the whole product.
const optionalString = z.string().optional().catch(undefined);
const optionalNumber = z.number().finite().optional().catch(undefined);
const optionalBoolean = z.boolean().optional().catch(undefined);

export const WoolworthsProductSchema = z.object({
  Stockcode: z.union([z.number().int(), z.string().min(1)]).optional().catch(undefined),
  Name: optionalString,
  DisplayName: optionalString,
  PackageSize: optionalString,
  Price: optionalNumber,
  WasPrice: optionalNumber,
  IsOnSpecial: optionalBoolean,
  IsHalfPrice: optionalBoolean,
  SavingsAmount: optionalNumber,
  UrlFriendlyName: optionalString,
  IsAvailable: optionalBoolean,
  IsInStock: optionalBoolean,
});

export type WoolworthsProduct = z.infer<typeof WoolworthsProductSchema>;

const listOfUnknown = z.array(z.unknown()).optional().catch(undefined);

const ProductGroupSchema = z.object({ Products: listOfUnknown });
const SearchPayloadSchema = z.object({ Products: listOfUnknown });

export function mapWoolworthsProduct(raw: WoolworthsProduct, site = WOOLWORTHS_SITE): ProductCandidate | null {
  const baseName = (raw.DisplayName || raw.Name || '').trim();
  if (!baseName) return null;

  const size = raw.PackageSize?.trim();
  const name = size && !baseName.toLowerCase().includes(size.toLowerCase()) ? `${baseName} ${size}` : baseName;

  const price = raw.Price ?? null;
  const was = raw.WasPrice !== undefined && raw.WasPrice > 0 && raw.WasPrice !== raw.Price ? raw.WasPrice : null;
  const savings = raw.SavingsAmount ?? 0;
  const stockcode = raw.Stockcode !== undefined ? String(raw.Stockcode) : null;

  let url: string | null = null;
  if (stockcode) {
    url = `${site}/shop/productdetails/${stockcode}`;
    if (raw.UrlFriendlyName) url += `/${raw.UrlFriendlyName}`;
  }

  return {
    name,
    price,
    was,
    promoFlag: Boolean(raw.IsOnSpecial || raw.IsHalfPrice),
    promoText: savings > 0 ? `Save $${savings.toFixed(2)}` : null,
    url,
    inStock: raw.IsAvailable ?? raw.IsInStock ?? null,
    source: WOOLWORTHS_SOURCE,
    sku: stockcode ? `${WOOLWORTHS_SOURCE}:${stockcode}` : null,
  };
}

/**
 * Reads `Products[].Products[]` from a search response. Groups or products
 * that are not objects, and products without a name, are skipped.
 */
export function parseWoolworthsSearch(payload: unknown, site = WOOLWORTHS_SITE): ProductCandidate[] {
  const parsed = SearchPayloadSchema.safeParse(payload);
  if (!parsed.success) {
    log.warn('Search payload is not an object', { issues: parsed.error.issues.length });
    return [];
  }

  const candidates: ProductCandidate[] = [];
  let skipped = 0;

  for (const group of parsed.data.Products ?? []) {
    const groupParsed = ProductGroupSchema.safeParse(group);
    if (!groupParsed.success) {
      skipped++;
      continue;
    }
    for (const product of groupParsed.data.Products ?? []) {
      const productParsed = WoolworthsProductSchema.safeParse(product);
      const candidate = productParsed.success ? mapWoolworthsProduct(productParsed.data, site) : null;
      if (candidate) {
        candidates.push(candidate);
      } else {
        skipped++;
      }
    }
  }

  if (skipped > 0) {
    log.warn(`Skipped ${skipped} unparseable products`);
  }
  return candidates;
}
