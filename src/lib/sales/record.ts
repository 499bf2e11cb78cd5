import { requireSellableProduct } from '@/lib/purchases/record'
import type { ResaleStore } from '@/lib/db/store'
import type { Customer, Product, Sale } from '@/lib/db/types'
import { ValidationError } from '@/lib/errors'
import { round2 } from '@/lib/utils'
import { nullable, requireDate, requireInteger, requireNumber } from '@/lib/validation'
import { computeSaleAmounts } from './calc'

export type SaleInput = {
  product_id: unknown
  quantity: unknown
  unit_price: unknown
  sale_date: unknown
  customer_document?: unknown
}

export const SALE_DELETED_MESSAGE = 'Sale deleted. Stock was not changed; adjust it manually if needed.'

async function resolveCustomer(store: ResaleStore, document: unknown): Promise<Customer | null> {
  const documentId = nullable(document)
  if (!documentId) return null
  const customer = await store.findCustomerByDocument(documentId)
  if (!customer) throw new ValidationError(`No customer with document ${documentId}`)
  return customer
}

/**
 * Stores the sale with a snapshot of the product's cost, takes the quantity
 * out of stock and adds the sale to the customer's totals.
 */
export async function recordSale(store: ResaleStore, input: SaleInput): Promise<Sale> {
  const product = await requireSellableProduct(store, input.product_id)
  const quantity = requireInteger(input.quantity, 'Quantity', 1)
  const unitPrice = requireNumber(input.unit_price, 'Unit price', { exclusiveMin: 0 })
  const saleDate = requireDate(input.sale_date, 'Sale date')
  if (quantity > product.stock_current) {
    throw new ValidationError(`Only ${product.stock_current} in stock`)
  }
  const customer = await resolveCustomer(store, input.customer_document)

  const amounts = computeSaleAmounts(quantity, unitPrice, product.purchase_price)
  const sale = await store.insertSale({
    product_id: product.id,
    customer_id: customer?.id ?? null,
    quantity,
    unit_price: unitPrice,
    unit_cost: product.purchase_price,
    subtotal: amounts.subtotal,
    profit: amounts.profit,
    margin_percent: amounts.margin_percent,
    sale_date: saleDate
  })

  await store.updateProduct(product.id, { stock_current: product.stock_current - quantity })

  if (customer) {
    const last = customer.last_purchase_at
    await store.updateCustomer(customer.id, {
      total_purchases: customer.total_purchases + 1,
      total_spent: round2(customer.total_spent + amounts.subtotal),
      last_purchase_at: last && last > saleDate ? last : saleDate
    })
  }

  return sale
}

/** Removes the record only; stock and customer totals stay as they are. */
export async function deleteSale(store: ResaleStore, id: string) {
  await store.deleteSale(id)
  return SALE_DELETED_MESSAGE
}

export type SaleView = Sale & { product_code: string; product_name: string; customer_name: string | null }

/** A sale as sent to the browser; the cost figures are null for roles that may not see costs. */
export type SaleRow = Omit<SaleView, 'unit_cost' | 'profit' | 'margin_percent'> & {
  unit_cost: number | null
  profit: number | null
  margin_percent: number | null
}

export function saleRows(sales: SaleView[], seeCosts: boolean): SaleRow[] {
  return seeCosts ? sales : sales.map((s) => ({ ...s, unit_cost: null, profit: null, margin_percent: null }))
}

export function withSaleNames(sales: Sale[], products: Product[], customers: Customer[]): SaleView[] {
  const productById = new Map(products.map((p) => [p.id, p]))
  const customerById = new Map(customers.map((c) => [c.id, c]))
  return sales.map((sale) => {
    const product = productById.get(sale.product_id)
    return {
      ...sale,
      product_code: product?.code ?? '',
      product_name: product?.name ?? 'Deleted product',
      customer_name: (sale.customer_id && customerById.get(sale.customer_id)?.name) || null
    }
  })
}
