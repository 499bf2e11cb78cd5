import { round2 } from '@/lib/utils'

export const REFERENCE_DISCOUNT_PERCENT = 10
export const REFERENCE_SURCHARGE_PERCENT = 15

export type SaleAmounts = {
  subtotal: number
  cost_total: number
  profit: number
  margin_percent: number
}

/** Margin is measured on cost: (price - cost) / cost. */
export function computeSaleAmounts(quantity: number, unitPrice: number, unitCost: number): SaleAmounts {
  const subtotal = round2(quantity * unitPrice)
  const costTotal = round2(quantity * unitCost)
  return {
    subtotal,
    cost_total: costTotal,
    profit: round2(subtotal - costTotal),
    margin_percent: unitCost > 0 ? round2(((unitPrice - unitCost) / unitCost) * 100) : 0
  }
}

export function applyDiscount(price: number, percent: number): number {
  return round2(price * (1 - percent / 100))
}

export function applySurcharge(price: number, percent: number): number {
  return round2(price * (1 + percent / 100))
}

export type ReferencePrices = {
  cost: number
  suggested: number
  final: number
  discounted: number
  surcharged: number
}

export function referencePrices(cost: number, suggested: number, final: number): ReferencePrices {
  return {
    cost,
    suggested,
    final,
    discounted: applyDiscount(final, REFERENCE_DISCOUNT_PERCENT),
    surcharged: applySurcharge(final, REFERENCE_SURCHARGE_PERCENT)
  }
}

export function summarizeSales(sales: { subtotal: number; profit: number; quantity: number }[]) {
  const revenue = round2(sales.reduce((sum, s) => sum + s.subtotal, 0))
  const profit = round2(sales.reduce((sum, s) => sum + s.profit, 0))
  return {
    count: sales.length,
    units: sales.reduce((sum, s) => sum + s.quantity, 0),
    revenue,
    profit,
    averageTicket: sales.length ? round2(revenue / sales.length) : 0
  }
}
