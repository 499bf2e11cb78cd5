import ExcelJS from 'exceljs'
import { ensureCategoryCode } from '@/lib/catalog/categories'
import { generateCategoryCode } from '@/lib/codes/category-code'
import { generateProductCode } from '@/lib/codes/product-code'
import type { ResaleStore } from '@/lib/db/store'
import { UNITS, type Category, type Product, type Supplier } from '@/lib/db/types'
import { toUserMessage } from '@/lib/errors'
import { recordPurchase } from '@/lib/purchases/record'
import { isBlank, isISODate, toNumber } from '@/lib/validation'
import { addSheet, styleHeader, type CellPlain, type SheetRow } from './spreadsheet'

export const IMPORT_COLUMNS = [
  'name',
  'brand',
  'category',
  'variant',
  'packaging',
  'unit',
  'purchase_price',
  'initial_stock',
  'minimum_stock',
  'supplier',
  'location',
  'notes',
  'purchase_date'
] as const

export type ImportColumn = (typeof IMPORT_COLUMNS)[number]

export type ImportProductRow = {
  rowNumber: number
  name: string
  brand: string | null
  category: string
  variant: string | null
  packaging: string | null
  unit: string
  purchase_price: number
  initial_stock: number
  minimum_stock: number
  supplier: string | null
  location: string | null
  notes: string | null
  purchase_date: string | null
}

export type ImportDetail = { row: number; status: 'created' | 'updated' | 'failed'; message: string }

export type ImportResult = {
  created: number
  updated: number
  failed: number
  details: ImportDetail[]
  categoriesCreated: string[]
  suppliersCreated: string[]
}

type Validation = { ok: true; row: ImportProductRow } | { ok: false; reasons: string[] }

function textCell(value: CellPlain): string | null {
  if (value === null) return null
  const text = String(value).trim()
  return text ? text : null
}

function wholeNumber(value: CellPlain, column: string, reasons: string[]): number {
  if (isBlank(value)) return 0
  const n = toNumber(value)
  if (n === null || !Number.isInteger(n) || n < 0) {
    reasons.push(`${column} must be a whole number of 0 or more`)
    return 0
  }
  return n
}

export function validateImportRow({ rowNumber, values }: SheetRow): Validation {
  const reasons: string[] = []
  const cell = (column: ImportColumn) => values[column] ?? null

  const name = textCell(cell('name'))
  if (!name) reasons.push('name is required')
  const category = textCell(cell('category'))
  if (!category) reasons.push('category is required')

  let purchasePrice = 0
  if (isBlank(cell('purchase_price'))) {
    reasons.push('purchase_price is required')
  } else {
    const n = toNumber(cell('purchase_price'))
    if (n === null) reasons.push('purchase_price must be a number')
    else if (n < 0) reasons.push('purchase_price must not be negative')
    else purchasePrice = n
  }

  const initialStock = wholeNumber(cell('initial_stock'), 'initial_stock', reasons)
  const minimumStock = wholeNumber(cell('minimum_stock'), 'minimum_stock', reasons)
  if (initialStock > 0 && purchasePrice === 0 && !reasons.some((r) => r.startsWith('purchase_price'))) {
    reasons.push('purchase_price must be greater than 0 when initial_stock is set')
  }

  const rawUnit = textCell(cell('unit'))
  const unit = rawUnit ? UNITS.find((u) => u.toLowerCase() === rawUnit.toLowerCase()) : 'Unit'
  if (!unit) reasons.push(`unit must be one of ${UNITS.join(', ')}`)

  const purchaseDate = textCell(cell('purchase_date'))
  if (purchaseDate && !isISODate(purchaseDate)) reasons.push('purchase_date must be YYYY-MM-DD')

  if (reasons.length || !name || !category || !unit) return { ok: false, reasons }
  return {
    ok: true,
    row: {
      rowNumber,
      name,
      brand: textCell(cell('brand')),
      category,
      variant: textCell(cell('variant')),
      packaging: textCell(cell('packaging')),
      unit,
      purchase_price: purchasePrice,
      initial_stock: initialStock,
      minimum_stock: minimumStock,
      supplier: textCell(cell('supplier')),
      location: textCell(cell('location')),
      notes: textCell(cell('notes')),
      purchase_date: purchaseDate
    }
  }
}

class Reconciler {
  private readonly categoryByName = new Map<string, Category>()
  private readonly supplierByName = new Map<string, Supplier>()
  private readonly reservedCodes = new Set<string>()
  readonly categoriesCreated: string[] = []
  readonly suppliersCreated: string[] = []

  constructor(
    private readonly store: ResaleStore,
    private readonly categories: Category[],
    suppliers: Supplier[],
    private readonly products: Product[]
  ) {
    categories.forEach((c) => this.categoryByName.set(c.name.toLowerCase(), c))
    suppliers.forEach((s) => this.supplierByName.set(s.name.toLowerCase(), s))
  }

  private async category(name: string): Promise<Category> {
    const known = this.categoryByName.get(name.toLowerCase())
    if (known) return known
    const code = generateCategoryCode(name, this.categories.map((c) => c.code))
    const created = await this.store.insertCategory({ name, description: null, code })
    this.categories.push(created)
    this.categoryByName.set(name.toLowerCase(), created)
    this.categoriesCreated.push(name)
    return created
  }

  private async supplier(name: string | null): Promise<Supplier | null> {
    if (!name) return null
    const known = this.supplierByName.get(name.toLowerCase())
    if (known) return known
    const created = await this.store.insertSupplier({ name, contact: null, phone: null, email: null, notes: null })
    this.supplierByName.set(name.toLowerCase(), created)
    this.suppliersCreated.push(name)
    return created
  }

  async apply(row: ImportProductRow, today: string): Promise<ImportDetail> {
    const category = await this.category(row.category)
    const categoryCode = await ensureCategoryCode(this.store, category, this.categories)
    const supplier = await this.supplier(row.supplier)

    const match = this.products.find(
      (p) => p.category_id === category.id && p.name.toLowerCase() === row.name.toLowerCase()
    )
    const fields = {
      name: row.name,
      brand: row.brand,
      variant: row.variant,
      packaging: row.packaging,
      unit: row.unit,
      location: row.location,
      notes: row.notes,
      category_id: category.id,
      supplier_id: supplier?.id ?? match?.supplier_id ?? null,
      purchase_price: row.purchase_price,
      stock_minimum: row.minimum_stock
    }

    let product: Product
    let status: 'created' | 'updated'
    if (match) {
      await this.store.updateProduct(match.id, { ...fields, is_active: true, is_paused: false })
      product = Object.assign(match, fields, { is_active: true, is_paused: false })
      status = 'updated'
    } else {
      const code = generateProductCode(row.name, categoryCode, this.products.map((p) => p.code), this.reservedCodes)
      product = await this.store.insertProduct({ ...fields, code, stock_current: 0, is_active: true, is_paused: false })
      this.products.push(product)
      status = 'created'
    }

    let message = `Row ${row.rowNumber}: ${status} ${product.code}`
    if (row.initial_stock > 0) {
      const stockBefore = product.stock_current
      await recordPurchase(this.store, {
        product_id: product.id,
        quantity: row.initial_stock,
        unit_price: row.purchase_price,
        purchase_date: row.purchase_date ?? today,
        supplier_id: supplier?.id
      })
      product.stock_current = stockBefore + row.initial_stock
      message += ` (+${row.initial_stock} in stock)`
    }
    return { row: row.rowNumber, status, message }
  }
}

/**
 * Creates or updates products from spreadsheet rows. Rows are independent:
 * a rejected or failing row is reported and the rest still run.
 */
export async function importProducts(store: ResaleStore, rows: SheetRow[], options: { today: string }): Promise<ImportResult> {
  const reconciler = new Reconciler(
    store,
    await store.listCategories(),
    await store.listSuppliers(),
    await store.listProducts({ includeInactive: true })
  )
  const result: ImportResult = { created: 0, updated: 0, failed: 0, details: [], categoriesCreated: [], suppliersCreated: [] }

  for (const sheetRow of rows) {
    const validation = validateImportRow(sheetRow)
    if (!validation.ok) {
      result.failed++
      result.details.push({ row: sheetRow.rowNumber, status: 'failed', message: `Row ${sheetRow.rowNumber}: ${validation.reasons.join(', ')}` })
      continue
    }
    try {
      const detail = await reconciler.apply(validation.row, options.today)
      if (detail.status === 'created') result.created++
      else result.updated++
      result.details.push(detail)
    } catch (error) {
      console.error('importProducts row error:', error)
      result.failed++
      result.details.push({ row: sheetRow.rowNumber, status: 'failed', message: `Row ${sheetRow.rowNumber}: ${toUserMessage(error, 'Product')}` })
    }
  }

  result.categoriesCreated = reconciler.categoriesCreated
  result.suppliersCreated = reconciler.suppliersCreated
  return result
}

const TEMPLATE_NOTES = [
  'Fill one product per row in the Products sheet. Keep the header row as it is.',
  'Required columns: name, category, purchase_price.',
  'Categories and suppliers that do not exist yet are created automatically.',
  'A product with the same name in the same category is updated instead of duplicated.',
  'initial_stock is recorded as a purchase on purchase_date (today when empty).',
  `unit must be one of: ${UNITS.join(', ')}.`,
  'Dates use the YYYY-MM-DD format.'
]

/** Import template: header, one example row and a sheet of instructions. */
export async function buildImportTemplate(exampleDate: string): Promise<ArrayBuffer> {
  const workbook = new ExcelJS.Workbook()
  const example: Record<ImportColumn, CellPlain> = {
    name: 'USB-C Cable 1m',
    brand: 'Generic',
    category: 'Electronics',
    variant: 'Black',
    packaging: 'Bag',
    unit: 'Unit',
    purchase_price: 2.5,
    initial_stock: 10,
    minimum_stock: 3,
    supplier: 'Main Supplier',
    location: 'Shelf A',
    notes: null,
    purchase_date: exampleDate
  }
  addSheet(workbook, {
    name: 'Products',
    columns: IMPORT_COLUMNS.map((column) => ({ header: column, value: (row: Record<ImportColumn, CellPlain>) => row[column] })),
    rows: [example]
  })

  const readme = workbook.addWorksheet('Read me')
  readme.addRow(['Instructions'])
  TEMPLATE_NOTES.forEach((line) => readme.addRow([line]))
  readme.getColumn(1).width = 90
  styleHeader(readme)

  return workbook.xlsx.writeBuffer()
}
