import { ensureCategoryCode } from '@/lib/catalog/categories'
import { generateProductCode } from '@/lib/codes/product-code'
import type { ResaleStore } from '@/lib/db/store'
import { UNITS, type Category, type Product, type Supplier } from '@/lib/db/types'
import { ValidationError } from '@/lib/errors'
import { isBlank, normalizeText, nullable, requireInteger, requireNumber, requireText } from '@/lib/validation'

export const CLEAR_INVENTORY_PHRASE = 'DELETE ALL'

export type ProductInput = Partial<
  Record<
    | 'name'
    | 'brand'
    | 'category_id'
    | 'supplier_id'
    | 'variant'
    | 'packaging'
    | 'unit'
    | 'location'
    | 'notes'
    | 'purchase_price'
    | 'initial_stock'
    | 'stock_minimum'
    | 'is_paused',
    unknown
  >
>

export type ProductWithNames = Product & {
  category_name: string | null
  category_code: string | null
  supplier_name: string | null
}

/** A product row as sent to the stock screen; `purchase_price` is null for roles that may not see costs. */
export type StockRow = Omit<ProductWithNames, 'purchase_price'> & { purchase_price: number | null }

type StockLevels = Pick<Product, 'is_active' | 'is_paused' | 'stock_current' | 'stock_minimum'>

export function parseUnit(value: unknown): string {
  const text = normalizeText(value)
  if (!text) return 'Unit'
  const unit = UNITS.find((u) => u.toLowerCase() === text.toLowerCase())
  if (!unit) throw new ValidationError(`Unit must be one of ${UNITS.join(', ')}`)
  return unit
}

function validateFields(input: ProductInput) {
  return {
    name: requireText(input.name, 'Product name'),
    category_id: requireText(input.category_id, 'Category'),
    supplier_id: nullable(input.supplier_id),
    brand: nullable(input.brand),
    variant: nullable(input.variant),
    packaging: nullable(input.packaging),
    unit: parseUnit(input.unit),
    location: nullable(input.location),
    notes: nullable(input.notes),
    purchase_price: requireNumber(input.purchase_price, 'Purchase price', { min: 0 }),
    stock_minimum: isBlank(input.stock_minimum) ? 0 : requireInteger(input.stock_minimum, 'Minimum stock')
  }
}

function isChecked(value: unknown): boolean {
  return value === true || value === 'on' || value === 'true'
}

async function findCategory(store: ResaleStore, categoryId: string) {
  const categories = await store.listCategories()
  const category = categories.find((c) => c.id === categoryId)
  if (!category) throw new ValidationError('Category not found')
  return { category, categories }
}

async function allProductCodes(store: ResaleStore): Promise<string[]> {
  const products = await store.listProducts({ includeInactive: true })
  return products.map((p) => p.code)
}

export async function createProduct(store: ResaleStore, input: ProductInput): Promise<Product> {
  const fields = validateFields(input)
  const initialStock = isBlank(input.initial_stock) ? 0 : requireInteger(input.initial_stock, 'Initial stock')
  const { category, categories } = await findCategory(store, fields.category_id)
  const categoryCode = await ensureCategoryCode(store, category, categories)
  const code = generateProductCode(fields.name, categoryCode, await allProductCodes(store))

  return store.insertProduct({
    ...fields,
    code,
    stock_current: initialStock,
    is_active: true,
    is_paused: false
  })
}

/** Moving a product to another category gives it a code under the new category. */
export async function updateProduct(store: ResaleStore, id: string, input: ProductInput) {
  const product = await store.getProduct(id)
  if (!product) throw new ValidationError('Product not found')
  const fields = validateFields(input)

  let code = product.code
  if (fields.category_id !== product.category_id) {
    const { category, categories } = await findCategory(store, fields.category_id)
    const categoryCode = await ensureCategoryCode(store, category, categories)
    code = generateProductCode(fields.name, categoryCode, await allProductCodes(store))
  }

  await store.updateProduct(id, { ...fields, code, is_paused: isChecked(input.is_paused) })
  return code
}

export async function setProductPaused(store: ResaleStore, id: string, paused: boolean) {
  await store.updateProduct(id, { is_paused: paused })
}

export async function deactivateProduct(store: ResaleStore, id: string) {
  const product = await store.getProduct(id)
  if (!product) throw new ValidationError('Product not found')
  await store.updateProduct(id, { is_active: false, is_paused: false })
}

export async function clearInventory(store: ResaleStore, confirmation: unknown): Promise<number> {
  if (normalizeText(confirmation) !== CLEAR_INVENTORY_PHRASE) {
    throw new ValidationError(`Type ${CLEAR_INVENTORY_PHRASE} to confirm`)
  }
  return store.deactivateAllProducts()
}

export function withNames(products: Product[], categories: Category[], suppliers: Supplier[]): ProductWithNames[] {
  const categoryById = new Map(categories.map((c) => [c.id, c]))
  const supplierById = new Map(suppliers.map((s) => [s.id, s]))
  return products.map((p) => {
    const category = p.category_id ? categoryById.get(p.category_id) : undefined
    const supplier = p.supplier_id ? supplierById.get(p.supplier_id) : undefined
    return {
      ...p,
      category_name: category?.name ?? null,
      category_code: category?.code ?? null,
      supplier_name: supplier?.name ?? null
    }
  })
}

export function stockRows(products: ProductWithNames[], seeCosts: boolean): StockRow[] {
  return seeCosts ? products : products.map((p) => ({ ...p, purchase_price: null }))
}

export function isLowStock(product: StockLevels): boolean {
  return product.is_active && !product.is_paused && product.stock_current <= product.stock_minimum
}

export function lowStockProducts<T extends StockLevels>(products: T[]): T[] {
  return products.filter(isLowStock).sort((a, b) => a.stock_current - b.stock_current)
}

/** Products that can be picked for a purchase or a sale. */
export function sellableProducts<T extends Product>(products: T[]): T[] {
  return products.filter((p) => p.is_active && !p.is_paused)
}

export type ProductFilterOptions = {
  term?: string
  categoryId?: string
  lowStockOnly?: boolean
  hidePaused?: boolean
}

/** Screen filters: the term matches code, name, brand or location. */
export function filterProducts<T extends StockRow>(products: T[], options: ProductFilterOptions): T[] {
  const term = options.term?.trim().toLowerCase() ?? ''
  return products.filter((p) => {
    if (options.categoryId && p.category_id !== options.categoryId) return false
    if (options.hidePaused && p.is_paused) return false
    if (options.lowStockOnly && !isLowStock(p)) return false
    if (!term) return true
    return [p.code, p.name, p.brand, p.location].some((field) => field?.toLowerCase().includes(term))
  })
}
