import type { ResaleStore } from '@/lib/db/store'
import type { PriceListEntry, Product } from '@/lib/db/types'
import { applyDiscount, applySurcharge } from '@/lib/sales/calc'
import { round2 } from '@/lib/utils'
import { isBlank, requireNumber } from '@/lib/validation'

export const DEFAULT_TARGET_MARGIN = 30
export const DEFAULT_DISCOUNT_PERCENT = 10
export const DEFAULT_SURCHARGE_PERCENT = 15

export type PriceListRow = {
  product_id: string
  code: string
  name: string
  category_id: string | null
  cost: number
  target_margin: number
  suggested_price: number
  final_price: number
  has_final_price: boolean
  real_margin: number
  discounted_price: number
  surcharged_price: number
}

export function suggestedPrice(cost: number, margin: number): number {
  return round2(cost * (1 + margin / 100))
}

export function realMargin(cost: number, finalPrice: number): number {
  return cost > 0 ? round2(((finalPrice - cost) / cost) * 100) : 0
}

export function buildPriceListRow(
  product: Pick<Product, 'id' | 'code' | 'name' | 'category_id' | 'purchase_price'>,
  entry: PriceListEntry | undefined,
  adjustments: { discount: number; surcharge: number } = { discount: DEFAULT_DISCOUNT_PERCENT, surcharge: DEFAULT_SURCHARGE_PERCENT }
): PriceListRow {
  const cost = product.purchase_price
  const targetMargin = entry?.target_margin ?? DEFAULT_TARGET_MARGIN
  const suggested = suggestedPrice(cost, targetMargin)
  const stored = entry?.final_price ?? null
  const finalPrice = stored ?? suggested

  return {
    product_id: product.id,
    code: product.code,
    name: product.name,
    category_id: product.category_id,
    cost,
    target_margin: targetMargin,
    suggested_price: suggested,
    final_price: finalPrice,
    has_final_price: stored !== null,
    real_margin: stored !== null ? realMargin(cost, stored) : targetMargin,
    discounted_price: applyDiscount(finalPrice, adjustments.discount),
    surcharged_price: applySurcharge(finalPrice, adjustments.surcharge)
  }
}

export function buildPriceList(
  products: Product[],
  entries: PriceListEntry[],
  adjustments?: { discount: number; surcharge: number }
): PriceListRow[] {
  const byProduct = new Map(entries.map((e) => [e.product_id, e]))
  return products
    .filter((p) => p.is_active)
    .map((p) => buildPriceListRow(p, byProduct.get(p.id), adjustments))
}

export function priceListStats(rows: PriceListRow[]) {
  if (!rows.length) return { averageMargin: 0, highestPrice: 0, lowestPrice: 0, averageDiscounted: 0 }
  const finals = rows.map((r) => r.final_price)
  return {
    averageMargin: round2(rows.reduce((sum, r) => sum + r.real_margin, 0) / rows.length),
    highestPrice: Math.max(...finals),
    lowestPrice: Math.min(...finals),
    averageDiscounted: round2(rows.reduce((sum, r) => sum + r.discounted_price, 0) / rows.length)
  }
}

export function parseAdjustments(input: { discount?: unknown; surcharge?: unknown }) {
  return {
    discount: isBlank(input.discount) ? DEFAULT_DISCOUNT_PERCENT : requireNumber(input.discount, 'Discount', { min: 0, max: 100 }),
    surcharge: isBlank(input.surcharge) ? DEFAULT_SURCHARGE_PERCENT : requireNumber(input.surcharge, 'Surcharge', { min: 0, max: 500 })
  }
}

/** Upserts the product's entry. A blank final price means "use the suggested price". */
export async function savePrice(
  store: ResaleStore,
  input: { product_id: string; target_margin: unknown; final_price?: unknown }
) {
  const targetMargin = requireNumber(input.target_margin, 'Target margin', { min: 0, max: 500 })
  const finalPrice = isBlank(input.final_price) ? null : requireNumber(input.final_price, 'Final price', { min: 0 })
  await store.upsertPriceEntry({ product_id: input.product_id, target_margin: targetMargin, final_price: finalPrice })
}
