import type { PostgrestError, SupabaseClient } from '@supabase/supabase-js'
import { StoreError } from '@/lib/errors'
import {
  parseCategory,
  parseCustomer,
  parseFixedCost,
  parseMember,
  parsePriceEntry,
  parseProduct,
  parsePurchase,
  parseRows,
  parseSale,
  parseStockAdjustment,
  parseSupplier
} from './rows'
import { fetchAllPages } from './paging'
import type { ProductFilter, ResaleStore } from './store'
import type {
  DateRange,
  NewBusinessMember,
  NewCategory,
  NewCustomer,
  NewFixedCost,
  NewProduct,
  NewPurchase,
  NewSale,
  NewStockAdjustment,
  NewSupplier,
  PriceListEntry
} from './types'

function check(error: PostgrestError | null): void {
  if (error) throw new StoreError(error.code, error.message)
}

function single<T>(result: { data: unknown; error: PostgrestError | null }, parse: (value: unknown) => T): T {
  check(result.error)
  return parse(result.data)
}

export class SupabaseStore implements ResaleStore {
  constructor(
    private readonly supabase: SupabaseClient,
    readonly businessId: string
  ) {}

  private table(name: string) {
    return this.supabase.from(name)
  }

  // --- Categories ---

  async listCategories() {
    const rows = await fetchAllPages((from, to) =>
      this.table('categories')
        .select('id, name, description, code, created_at')
        .eq('business_id', this.businessId)
        .order('name', { ascending: true })
        .order('id', { ascending: true })
        .range(from, to)
    )
    return parseRows(rows, parseCategory)
  }

  async insertCategory(input: NewCategory) {
    const result = await this.table('categories')
      .insert({ ...input, business_id: this.businessId })
      .select()
      .single()
    return single(result, parseCategory)
  }

  async updateCategory(id: string, patch: Partial<NewCategory>) {
    const { error } = await this.table('categories').update(patch).eq('id', id).eq('business_id', this.businessId)
    check(error)
  }

  async deleteCategory(id: string) {
    const { error } = await this.table('categories').delete().eq('id', id).eq('business_id', this.businessId)
    check(error)
  }

  // --- Suppliers ---

  async listSuppliers() {
    const rows = await fetchAllPages((from, to) =>
      this.table('suppliers')
        .select('id, name, contact, phone, email, notes')
        .eq('business_id', this.businessId)
        .order('name', { ascending: true })
        .order('id', { ascending: true })
        .range(from, to)
    )
    return parseRows(rows, parseSupplier)
  }

  async insertSupplier(input: NewSupplier) {
    const result = await this.table('suppliers')
      .insert({ ...input, business_id: this.businessId })
      .select()
      .single()
    return single(result, parseSupplier)
  }

  async updateSupplier(id: string, patch: Partial<NewSupplier>) {
    const { error } = await this.table('suppliers').update(patch).eq('id', id).eq('business_id', this.businessId)
    check(error)
  }

  async deleteSupplier(id: string) {
    const { error } = await this.table('suppliers').delete().eq('id', id).eq('business_id', this.businessId)
    check(error)
  }

  // --- Products ---

  async listProducts(filter: ProductFilter = {}) {
    const rows = await fetchAllPages((from, to) => {
      let query = this.table('products').select('*').eq('business_id', this.businessId)
      if (!filter.includeInactive) query = query.eq('is_active', true)
      if (filter.excludePaused) query = query.eq('is_paused', false)
      return query.order('name', { ascending: true }).order('id', { ascending: true }).range(from, to)
    })
    return parseRows(rows, parseProduct)
  }

  async getProduct(id: string) {
    const { data, error } = await this.table('products')
      .select('*')
      .eq('id', id)
      .eq('business_id', this.businessId)
      .maybeSingle()
    check(error)
    return data ? parseProduct(data) : null
  }

  async insertProduct(input: NewProduct) {
    const result = await this.table('products')
      .insert({ ...input, business_id: this.businessId })
      .select()
      .single()
    return single(result, parseProduct)
  }

  async updateProduct(id: string, patch: Partial<NewProduct>) {
    const { error } = await this.table('products').update(patch).eq('id', id).eq('business_id', this.businessId)
    check(error)
  }

  async deactivateAllProducts() {
    const { data, error } = await this.table('products')
      .update({ is_active: false, is_paused: false })
      .eq('business_id', this.businessId)
      .eq('is_active', true)
      .select('id')
    check(error)
    return Array.isArray(data) ? data.length : 0
  }

  // --- Stock adjustments ---

  async listStockAdjustments(productId: string, limit: number) {
    const { data, error } = await this.table('stock_adjustments')
      .select('*')
      .eq('business_id', this.businessId)
      .eq('product_id', productId)
      .order('created_at', { ascending: false })
      .limit(limit)
    check(error)
    return parseRows(data, parseStockAdjustment)
  }

  async insertStockAdjustment(input: NewStockAdjustment) {
    const result = await this.table('stock_adjustments')
      .insert({ ...input, business_id: this.businessId })
      .select()
      .single()
    return single(result, parseStockAdjustment)
  }

  // --- Purchases ---

  async listPurchases(range?: DateRange) {
    const rows = await fetchAllPages((from, to) => {
      let query = this.table('purchases').select('*').eq('business_id', this.businessId)
      if (range) query = query.gte('purchase_date', range.from).lte('purchase_date', range.to)
      return query
        .order('purchase_date', { ascending: false })
        .order('created_at', { ascending: false })
        .order('id', { ascending: true })
        .range(from, to)
    })
    return parseRows(rows, parsePurchase)
  }

  async insertPurchase(input: NewPurchase) {
    const result = await this.table('purchases')
      .insert({ ...input, business_id: this.businessId })
      .select()
      .single()
    return single(result, parsePurchase)
  }

  async deletePurchase(id: string) {
    const { error } = await this.table('purchases').delete().eq('id', id).eq('business_id', this.businessId)
    check(error)
  }

  // --- Sales ---

  async listSales(range?: DateRange) {
    const rows = await fetchAllPages((from, to) => {
      let query = this.table('sales').select('*').eq('business_id', this.businessId)
      if (range) query = query.gte('sale_date', range.from).lte('sale_date', range.to)
      return query
        .order('sale_date', { ascending: false })
        .order('created_at', { ascending: false })
        .order('id', { ascending: true })
        .range(from, to)
    })
    return parseRows(rows, parseSale)
  }

  async listSalesForCustomer(customerId: string) {
    const rows = await fetchAllPages((from, to) =>
      this.table('sales')
        .select('*')
        .eq('business_id', this.businessId)
        .eq('customer_id', customerId)
        .order('sale_date', { ascending: false })
        .order('id', { ascending: true })
        .range(from, to)
    )
    return parseRows(rows, parseSale)
  }

  async insertSale(input: NewSale) {
    const result = await this.table('sales')
      .insert({ ...input, business_id: this.businessId })
      .select()
      .single()
    return single(result, parseSale)
  }

  async deleteSale(id: string) {
    const { error } = await this.table('sales').delete().eq('id', id).eq('business_id', this.businessId)
    check(error)
  }

  // --- Customers ---

  async listCustomers() {
    const rows = await fetchAllPages((from, to) =>
      this.table('customers')
        .select('*')
        .eq('business_id', this.businessId)
        .order('name', { ascending: true })
        .order('id', { ascending: true })
        .range(from, to)
    )
    return parseRows(rows, parseCustomer)
  }

  async getCustomer(id: string) {
    const { data, error } = await this.table('customers')
      .select('*')
      .eq('id', id)
      .eq('business_id', this.businessId)
      .maybeSingle()
    check(error)
    return data ? parseCustomer(data) : null
  }

  async findCustomerByDocument(documentId: string) {
    const { data, error } = await this.table('customers')
      .select('*')
      .eq('business_id', this.businessId)
      .eq('document_id', documentId)
      .maybeSingle()
    check(error)
    return data ? parseCustomer(data) : null
  }

  async insertCustomer(input: NewCustomer) {
    const result = await this.table('customers')
      .insert({ ...input, business_id: this.businessId })
      .select()
      .single()
    return single(result, parseCustomer)
  }

  async updateCustomer(id: string, patch: Partial<NewCustomer>) {
    const { error } = await this.table('customers').update(patch).eq('id', id).eq('business_id', this.businessId)
    check(error)
  }

  // --- Fixed costs ---

  async listFixedCosts(includeInactive = false) {
    let query = this.table('fixed_costs').select('*').eq('business_id', this.businessId)
    if (!includeInactive) query = query.eq('is_active', true)
    const { data, error } = await query.order('start_date', { ascending: false })
    check(error)
    return parseRows(data, parseFixedCost)
  }

  async insertFixedCost(input: NewFixedCost) {
    const result = await this.table('fixed_costs')
      .insert({ ...input, business_id: this.businessId })
      .select()
      .single()
    return single(result, parseFixedCost)
  }

  async updateFixedCost(id: string, patch: Partial<NewFixedCost>) {
    const { error } = await this.table('fixed_costs').update(patch).eq('id', id).eq('business_id', this.businessId)
    check(error)
  }

  // --- Price list ---

  async listPriceEntries() {
    const rows = await fetchAllPages((from, to) =>
      this.table('price_list')
        .select('id, product_id, target_margin, final_price')
        .eq('business_id', this.businessId)
        .order('id', { ascending: true })
        .range(from, to)
    )
    return parseRows(rows, parsePriceEntry)
  }

  async upsertPriceEntry(input: Omit<PriceListEntry, 'id'>) {
    const { error } = await this.table('price_list').upsert(
      { ...input, business_id: this.businessId, updated_at: new Date().toISOString() },
      { onConflict: 'business_id,product_id' }
    )
    check(error)
  }

  // --- Team ---

  async listMembers() {
    const { data, error } = await this.table('business_members')
      .select('id, user_id, email, display_name, role, is_active, created_at')
      .eq('business_id', this.businessId)
      .order('created_at', { ascending: true })
    check(error)
    return parseRows(data, parseMember)
  }

  async insertMember(input: NewBusinessMember) {
    const result = await this.table('business_members')
      .insert({ ...input, business_id: this.businessId })
      .select()
      .single()
    return single(result, parseMember)
  }

  async updateMember(id: string, patch: Partial<NewBusinessMember>) {
    const { error } = await this.table('business_members').update(patch).eq('id', id).eq('business_id', this.businessId)
    check(error)
  }
}
