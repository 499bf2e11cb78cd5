import type { ResaleStore } from '@/lib/db/store'
import type { StockAdjustment } from '@/lib/db/types'
import { ValidationError } from '@/lib/errors'
import { nullable, requireDate, requireInteger, requireText } from '@/lib/validation'

export const ADJUSTMENT_REASONS = ['Inventory correction', 'Loss', 'Theft', 'Damage', 'Return', 'Other'] as const

export type AdjustStockInput = {
  productId: string
  newQuantity: unknown
  reason: unknown
  notes?: unknown
  date: unknown
  userId?: string | null
}

export async function adjustStock(store: ResaleStore, input: AdjustStockInput): Promise<StockAdjustment> {
  const product = await store.getProduct(input.productId)
  if (!product || !product.is_active) throw new ValidationError('Product not found')

  const newQuantity = requireInteger(input.newQuantity, 'New stock')
  const reason = requireText(input.reason, 'Reason')
  if (!ADJUSTMENT_REASONS.some((r) => r === reason)) throw new ValidationError('Unknown adjustment reason')
  if (newQuantity === product.stock_current) throw new ValidationError('Stock did not change')

  const adjustment = await store.insertStockAdjustment({
    product_id: product.id,
    previous_quantity: product.stock_current,
    new_quantity: newQuantity,
    difference: newQuantity - product.stock_current,
    reason,
    notes: nullable(input.notes),
    adjusted_on: requireDate(input.date, 'Date'),
    created_by: input.userId ?? null
  })
  await store.updateProduct(product.id, { stock_current: newQuantity })
  return adjustment
}

export async function stockHistory(store: ResaleStore, productId: string, limit = 10) {
  return store.listStockAdjustments(productId, limit)
}
