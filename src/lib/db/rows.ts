import {
  COST_FREQUENCIES,
  ROLES,
  type Business,
  type BusinessMember,
  type Category,
  type CostFrequency,
  type Customer,
  type FixedCost,
  type PriceListEntry,
  type Product,
  type Profile,
  type Purchase,
  type Role,
  type Sale,
  type StockAdjustment,
  type Supplier
} from './types'

// PostgREST hands back untyped JSON; these readers turn it into row types.

type Raw = Record<string, unknown>

function asRecord(value: unknown): Raw {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new Error('Expected a row object')
  }
  return Object.fromEntries(Object.entries(value))
}

function text(row: Raw, key: string): string {
  const value = row[key]
  if (value === null || value === undefined) return ''
  return String(value)
}

function nullableText(row: Raw, key: string): string | null {
  const value = row[key]
  if (value === null || value === undefined) return null
  const s = String(value)
  return s === '' ? null : s
}

function num(row: Raw, key: string): number {
  const value = row[key]
  const n = typeof value === 'number' ? value : Number(value ?? 0)
  return Number.isFinite(n) ? n : 0
}

function nullableNum(row: Raw, key: string): number | null {
  const value = row[key]
  if (value === null || value === undefined || value === '') return null
  const n = typeof value === 'number' ? value : Number(value)
  return Number.isFinite(n) ? n : null
}

function bool(row: Raw, key: string, fallback: boolean): boolean {
  const value = row[key]
  return typeof value === 'boolean' ? value : fallback
}

export function parseRole(value: unknown): Role {
  return ROLES.find((role) => role === value) ?? 'viewer'
}

function parseFrequency(value: unknown): CostFrequency {
  return COST_FREQUENCIES.find((f) => f === value) ?? 'monthly'
}

export function parseRows<T>(data: unknown, parse: (value: unknown) => T): T[] {
  if (!Array.isArray(data)) return []
  return data.map(parse)
}

export function parseBusiness(value: unknown): Business {
  const row = asRecord(value)
  return {
    id: text(row, 'id'),
    name: text(row, 'name'),
    owner_id: text(row, 'owner_id'),
    created_at: text(row, 'created_at')
  }
}

export function parseProfile(value: unknown): Profile {
  const row = asRecord(value)
  return {
    id: text(row, 'id'),
    email: nullableText(row, 'email'),
    display_name: nullableText(row, 'display_name'),
    business_id: nullableText(row, 'business_id'),
    role: parseRole(row.role)
  }
}

/** Tenant column of any business-owned row. */
export function parseBusinessId(value: unknown): string {
  return text(asRecord(value), 'business_id')
}

export function parseMember(value: unknown): BusinessMember {
  const row = asRecord(value)
  return {
    id: text(row, 'id'),
    user_id: nullableText(row, 'user_id'),
    email: text(row, 'email'),
    display_name: text(row, 'display_name'),
    role: parseRole(row.role),
    is_active: bool(row, 'is_active', true),
    created_at: text(row, 'created_at')
  }
}

export function parseCategory(value: unknown): Category {
  const row = asRecord(value)
  return {
    id: text(row, 'id'),
    name: text(row, 'name'),
    description: nullableText(row, 'description'),
    code: nullableText(row, 'code'),
    created_at: text(row, 'created_at')
  }
}

export function parseSupplier(value: unknown): Supplier {
  const row = asRecord(value)
  return {
    id: text(row, 'id'),
    name: text(row, 'name'),
    contact: nullableText(row, 'contact'),
    phone: nullableText(row, 'phone'),
    email: nullableText(row, 'email'),
    notes: nullableText(row, 'notes')
  }
}

export function parseProduct(value: unknown): Product {
  const row = asRecord(value)
  return {
    id: text(row, 'id'),
    code: text(row, 'code'),
    name: text(row, 'name'),
    brand: nullableText(row, 'brand'),
    variant: nullableText(row, 'variant'),
    packaging: nullableText(row, 'packaging'),
    unit: text(row, 'unit') || 'Unit',
    location: nullableText(row, 'location'),
    notes: nullableText(row, 'notes'),
    category_id: nullableText(row, 'category_id'),
    supplier_id: nullableText(row, 'supplier_id'),
    purchase_price: num(row, 'purchase_price'),
    stock_current: num(row, 'stock_current'),
    stock_minimum: num(row, 'stock_minimum'),
    is_active: bool(row, 'is_active', true),
    is_paused: bool(row, 'is_paused', false),
    created_at: text(row, 'created_at')
  }
}

export function parsePurchase(value: unknown): Purchase {
  const row = asRecord(value)
  return {
    id: text(row, 'id'),
    product_id: text(row, 'product_id'),
    supplier_id: nullableText(row, 'supplier_id'),
    quantity: num(row, 'quantity'),
    unit_price: num(row, 'unit_price'),
    total: num(row, 'total'),
    purchase_date: text(row, 'purchase_date'),
    created_at: text(row, 'created_at')
  }
}

export function parseSale(value: unknown): Sale {
  const row = asRecord(value)
  return {
    id: text(row, 'id'),
    product_id: text(row, 'product_id'),
    customer_id: nullableText(row, 'customer_id'),
    quantity: num(row, 'quantity'),
    unit_price: num(row, 'unit_price'),
    unit_cost: num(row, 'unit_cost'),
    subtotal: num(row, 'subtotal'),
    profit: num(row, 'profit'),
    margin_percent: num(row, 'margin_percent'),
    sale_date: text(row, 'sale_date'),
    created_at: text(row, 'created_at')
  }
}

export function parseCustomer(value: unknown): Customer {
  const row = asRecord(value)
  return {
    id: text(row, 'id'),
    document_id: text(row, 'document_id'),
    name: text(row, 'name'),
    phone: nullableText(row, 'phone'),
    email: nullableText(row, 'email'),
    address: nullableText(row, 'address'),
    notes: nullableText(row, 'notes'),
    total_purchases: num(row, 'total_purchases'),
    total_spent: num(row, 'total_spent'),
    last_purchase_at: nullableText(row, 'last_purchase_at'),
    created_at: text(row, 'created_at')
  }
}

export function parseFixedCost(value: unknown): FixedCost {
  const row = asRecord(value)
  return {
    id: text(row, 'id'),
    name: text(row, 'name'),
    amount: num(row, 'amount'),
    frequency: parseFrequency(row.frequency),
    start_date: text(row, 'start_date'),
    end_date: nullableText(row, 'end_date'),
    description: nullableText(row, 'description'),
    is_active: bool(row, 'is_active', true)
  }
}

export function parsePriceEntry(value: unknown): PriceListEntry {
  const row = asRecord(value)
  return {
    id: text(row, 'id'),
    product_id: text(row, 'product_id'),
    target_margin: num(row, 'target_margin'),
    final_price: nullableNum(row, 'final_price')
  }
}

export function parseStockAdjustment(value: unknown): StockAdjustment {
  const row = asRecord(value)
  return {
    id: text(row, 'id'),
    product_id: text(row, 'product_id'),
    previous_quantity: num(row, 'previous_quantity'),
    new_quantity: num(row, 'new_quantity'),
    difference: num(row, 'difference'),
    reason: text(row, 'reason'),
    notes: nullableText(row, 'notes'),
    adjusted_on: text(row, 'adjusted_on'),
    created_by: nullableText(row, 'created_by'),
    created_at: text(row, 'created_at')
  }
}
