export type Role = 'admin' | 'seller' | 'viewer' | 'stocker'

export const ROLES: readonly Role[] = ['admin', 'seller', 'viewer', 'stocker']

export const UNITS = ['Unit', 'kg', 'g', 'l', 'ml', 'pack', 'box', 'dozen'] as const
export type Unit = (typeof UNITS)[number]

export type CostFrequency = 'monthly' | 'yearly' | 'one_time'

export const COST_FREQUENCIES: readonly CostFrequency[] = ['monthly', 'yearly', 'one_time']

/** Calendar date as stored in `date` columns: YYYY-MM-DD. */
export type ISODate = string

export type Business = {
  id: string
  name: string
  owner_id: string
  created_at: string
}

export type Profile = {
  id: string
  email: string | null
  display_name: string | null
  business_id: string | null
  role: Role
}

export type BusinessMember = {
  id: string
  user_id: string | null
  email: string
  display_name: string
  role: Role
  is_active: boolean
  created_at: string
}

export type Category = {
  id: string
  name: string
  description: string | null
  code: string | null
  created_at: string
}

export type Supplier = {
  id: string
  name: string
  contact: string | null
  phone: string | null
  email: string | null
  notes: string | null
}

export type Product = {
  id: string
  code: string
  name: string
  brand: string | null
  variant: string | null
  packaging: string | null
  unit: string
  location: string | null
  notes: string | null
  category_id: string | null
  supplier_id: string | null
  purchase_price: number
  stock_current: number
  stock_minimum: number
  is_active: boolean
  is_paused: boolean
  created_at: string
}

export type Purchase = {
  id: string
  product_id: string
  supplier_id: string | null
  quantity: number
  unit_price: number
  total: number
  purchase_date: ISODate
  created_at: string
}

export type Sale = {
  id: string
  product_id: string
  customer_id: string | null
  quantity: number
  unit_price: number
  unit_cost: number
  subtotal: number
  profit: number
  margin_percent: number
  sale_date: ISODate
  created_at: string
}

export type Customer = {
  id: string
  document_id: string
  name: string
  phone: string | null
  email: string | null
  address: string | null
  notes: string | null
  total_purchases: number
  total_spent: number
  last_purchase_at: ISODate | null
  created_at: string
}

export type FixedCost = {
  id: string
  name: string
  amount: number
  frequency: CostFrequency
  start_date: ISODate
  end_date: ISODate | null
  description: string | null
  is_active: boolean
}

export type PriceListEntry = {
  id: string
  product_id: string
  target_margin: number
  final_price: number | null
}

export type StockAdjustment = {
  id: string
  product_id: string
  previous_quantity: number
  new_quantity: number
  difference: number
  reason: string
  notes: string | null
  adjusted_on: ISODate
  created_by: string | null
  created_at: string
}

type Generated = 'id' | 'created_at'

export type NewCategory = Omit<Category, Generated>
export type NewSupplier = Omit<Supplier, 'id'>
export type NewProduct = Omit<Product, Generated>
export type NewPurchase = Omit<Purchase, Generated>
export type NewSale = Omit<Sale, Generated>
export type NewCustomer = Omit<Customer, Generated>
export type NewFixedCost = Omit<FixedCost, 'id'>
export type NewStockAdjustment = Omit<StockAdjustment, Generated>
export type NewBusinessMember = Omit<BusinessMember, Generated>

export type DateRange = { from: ISODate; to: ISODate }
