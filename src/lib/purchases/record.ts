import type { ResaleStore } from '@/lib/db/store'
import type { Product, Purchase, Supplier } from '@/lib/db/types'
import { ValidationError } from '@/lib/errors'
import { round2 } from '@/lib/utils'
import { nullable, requireDate, requireInteger, requireNumber } from '@/lib/validation'

export type PurchaseInput = {
  product_id: unknown
  quantity: unknown
  unit_price: unknown
  purchase_date: unknown
  supplier_id?: unknown
}

export const PURCHASE_DELETED_MESSAGE = 'Purchase deleted. Stock was not changed; adjust it manually if needed.'

export async function requireSellableProduct(store: ResaleStore, productId: unknown): Promise<Product> {
  const id = typeof productId === 'string' ? productId : ''
  const product = id ? await store.getProduct(id) : null
  if (!product || !product.is_active) throw new ValidationError('Select a product')
  if (product.is_paused) throw new ValidationError('Product is paused')
  return product
}

/** Stores the purchase and adds its quantity to the product's stock. */
export async function recordPurchase(store: ResaleStore, input: PurchaseInput): Promise<Purchase> {
  const product = await requireSellableProduct(store, input.product_id)
  const quantity = requireInteger(input.quantity, 'Quantity', 1)
  const unitPrice = requireNumber(input.unit_price, 'Unit price', { exclusiveMin: 0 })

  const purchase = await store.insertPurchase({
    product_id: product.id,
    supplier_id: nullable(input.supplier_id) ?? product.supplier_id,
    quantity,
    unit_price: unitPrice,
    total: round2(quantity * unitPrice),
    purchase_date: requireDate(input.purchase_date, 'Purchase date')
  })
  await store.updateProduct(product.id, { stock_current: product.stock_current + quantity })
  return purchase
}

/** Removes the record only; stock stays as it is. */
export async function deletePurchase(store: ResaleStore, id: string) {
  await store.deletePurchase(id)
  return PURCHASE_DELETED_MESSAGE
}

export function summarizePurchases(purchases: Purchase[]) {
  return {
    count: purchases.length,
    units: purchases.reduce((sum, p) => sum + p.quantity, 0),
    total: round2(purchases.reduce((sum, p) => sum + p.total, 0))
  }
}

export type PurchaseView = Purchase & { product_code: string; product_name: string; supplier_name: string | null }

export function withPurchaseNames(purchases: Purchase[], products: Product[], suppliers: Supplier[]): PurchaseView[] {
  const productById = new Map(products.map((p) => [p.id, p]))
  const supplierById = new Map(suppliers.map((s) => [s.id, s]))
  return purchases.map((purchase) => {
    const product = productById.get(purchase.product_id)
    return {
      ...purchase,
      product_code: product?.code ?? '',
      product_name: product?.name ?? 'Deleted product',
      supplier_name: (purchase.supplier_id && supplierById.get(purchase.supplier_id)?.name) || null
    }
  })
}
