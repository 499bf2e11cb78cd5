import { FREQUENCY_LABELS } from '@/lib/costs/fixed-costs'
import { averageTicket, customerTier } from '@/lib/customers/customers'
import type { ResaleStore } from '@/lib/db/store'
import type { DateRange } from '@/lib/db/types'
import { withNames, type ProductWithNames } from '@/lib/inventory/products'
import { exportWorkbook, type SheetColumn } from '@/lib/inventory/spreadsheet'
import type { Permission } from '@/lib/permissions'
import { buildPriceList } from '@/lib/pricing/price-list'
import { withPurchaseNames } from '@/lib/purchases/record'
import { withSaleNames, type SaleView } from '@/lib/sales/record'

export const EXPORT_RESOURCES = ['products', 'purchases', 'sales', 'customers', 'fixed-costs', 'price-list'] as const
export type ExportResource = (typeof EXPORT_RESOURCES)[number]

export const EXPORT_PERMISSIONS: Record<ExportResource, Permission> = {
  products: 'view_stock',
  purchases: 'edit_stock',
  sales: 'view_sales',
  customers: 'view_customers',
  'fixed-costs': 'view_costs',
  'price-list': 'view_costs'
}

export function isExportResource(value: string): value is ExportResource {
  return EXPORT_RESOURCES.some((r) => r === value)
}

export type ExportFile = { filename: string; data: ArrayBuffer }

export type ExportOptions = {
  /** Purchases and sales are limited to this range when given. */
  range?: DateRange
  /** Without it the products and sales sheets leave out their cost columns. */
  seeCosts: boolean
}

const COST_HEADERS = new Set(['Purchase price', 'Unit cost', 'Profit', 'Margin %'])

function costColumns<T>(columns: SheetColumn<T>[], seeCosts: boolean): SheetColumn<T>[] {
  return seeCosts ? columns : columns.filter((c) => !COST_HEADERS.has(c.header))
}

function filename(resource: ExportResource, stamp: string) {
  return `${resource}-${stamp}.xlsx`
}

/** Builds the .xlsx for one resource. */
export async function exportResource(store: ResaleStore, resource: ExportResource, today: string, options: ExportOptions): Promise<ExportFile> {
  const { range, seeCosts } = options
  const name = filename(resource, range ? `${range.from}_${range.to}` : today)

  switch (resource) {
    case 'products': {
      const [products, categories, suppliers] = await Promise.all([store.listProducts(), store.listCategories(), store.listSuppliers()])
      const data = await exportWorkbook({
        name: 'Products',
        rows: withNames(products, categories, suppliers),
        columns: costColumns<ProductWithNames>(
          [
            { header: 'Code', value: (p) => p.code },
            { header: 'Name', value: (p) => p.name, width: 32 },
            { header: 'Brand', value: (p) => p.brand },
            { header: 'Category', value: (p) => p.category_name },
            { header: 'Variant', value: (p) => p.variant },
            { header: 'Packaging', value: (p) => p.packaging },
            { header: 'Unit', value: (p) => p.unit },
            { header: 'Purchase price', value: (p) => p.purchase_price },
            { header: 'Stock', value: (p) => p.stock_current },
            { header: 'Minimum stock', value: (p) => p.stock_minimum },
            { header: 'Supplier', value: (p) => p.supplier_name },
            { header: 'Location', value: (p) => p.location },
            { header: 'Paused', value: (p) => (p.is_paused ? 'Yes' : 'No') }
          ],
          seeCosts
        )
      })
      return { filename: name, data }
    }
    case 'purchases': {
      const [purchases, products, suppliers] = await Promise.all([
        store.listPurchases(range),
        store.listProducts({ includeInactive: true }),
        store.listSuppliers()
      ])
      const data = await exportWorkbook({
        name: 'Purchases',
        rows: withPurchaseNames(purchases, products, suppliers),
        columns: [
          { header: 'Date', value: (p) => p.purchase_date },
          { header: 'Code', value: (p) => p.product_code },
          { header: 'Product', value: (p) => p.product_name, width: 32 },
          { header: 'Supplier', value: (p) => p.supplier_name },
          { header: 'Quantity', value: (p) => p.quantity },
          { header: 'Unit price', value: (p) => p.unit_price },
          { header: 'Total', value: (p) => p.total }
        ]
      })
      return { filename: name, data }
    }
    case 'sales': {
      const [sales, products, customers] = await Promise.all([
        store.listSales(range),
        store.listProducts({ includeInactive: true }),
        store.listCustomers()
      ])
      const data = await exportWorkbook({
        name: 'Sales',
        rows: withSaleNames(sales, products, customers),
        columns: costColumns<SaleView>(
          [
            { header: 'Date', value: (s) => s.sale_date },
            { header: 'Code', value: (s) => s.product_code },
            { header: 'Product', value: (s) => s.product_name, width: 32 },
            { header: 'Customer', value: (s) => s.customer_name },
            { header: 'Quantity', value: (s) => s.quantity },
            { header: 'Unit price', value: (s) => s.unit_price },
            { header: 'Unit cost', value: (s) => s.unit_cost },
            { header: 'Subtotal', value: (s) => s.subtotal },
            { header: 'Profit', value: (s) => s.profit },
            { header: 'Margin %', value: (s) => s.margin_percent }
          ],
          seeCosts
        )
      })
      return { filename: name, data }
    }
    case 'customers': {
      const customers = await store.listCustomers()
      const data = await exportWorkbook({
        name: 'Customers',
        rows: customers,
        columns: [
          { header: 'Document', value: (c) => c.document_id },
          { header: 'Name', value: (c) => c.name, width: 28 },
          { header: 'Phone', value: (c) => c.phone },
          { header: 'Email', value: (c) => c.email },
          { header: 'Address', value: (c) => c.address },
          { header: 'Purchases', value: (c) => c.total_purchases },
          { header: 'Total spent', value: (c) => c.total_spent },
          { header: 'Average ticket', value: (c) => averageTicket(c) },
          { header: 'Tier', value: (c) => customerTier(c.total_purchases) },
          { header: 'Last purchase', value: (c) => c.last_purchase_at }
        ]
      })
      return { filename: name, data }
    }
    case 'fixed-costs': {
      const costs = await store.listFixedCosts()
      const data = await exportWorkbook({
        name: 'Fixed costs',
        rows: costs,
        columns: [
          { header: 'Name', value: (c) => c.name, width: 28 },
          { header: 'Amount', value: (c) => c.amount },
          { header: 'Frequency', value: (c) => FREQUENCY_LABELS[c.frequency] },
          { header: 'Start', value: (c) => c.start_date },
          { header: 'End', value: (c) => c.end_date },
          { header: 'Description', value: (c) => c.description }
        ]
      })
      return { filename: name, data }
    }
    case 'price-list': {
      const [products, entries] = await Promise.all([store.listProducts(), store.listPriceEntries()])
      const data = await exportWorkbook({
        name: 'Price list',
        rows: buildPriceList(products, entries),
        columns: [
          { header: 'Code', value: (r) => r.code },
          { header: 'Product', value: (r) => r.name, width: 32 },
          { header: 'Cost', value: (r) => r.cost },
          { header: 'Target margin %', value: (r) => r.target_margin },
          { header: 'Suggested price', value: (r) => r.suggested_price },
          { header: 'Final price', value: (r) => r.final_price },
          { header: 'Real margin %', value: (r) => r.real_margin },
          { header: 'With discount', value: (r) => r.discounted_price },
          { header: 'With surcharge', value: (r) => r.surcharged_price }
        ]
      })
      return { filename: name, data }
    }
  }
}
