import type {
  BusinessMember,
  Category,
  Customer,
  DateRange,
  FixedCost,
  NewBusinessMember,
  NewCategory,
  NewCustomer,
  NewFixedCost,
  NewProduct,
  NewPurchase,
  NewSale,
  NewStockAdjustment,
  NewSupplier,
  PriceListEntry,
  Product,
  Purchase,
  Sale,
  StockAdjustment,
  Supplier
} from './types'

export type ProductFilter = {
  includeInactive?: boolean
  excludePaused?: boolean
}

/**
 * Data access for one business. Every read and write is scoped to the
 * business the store was opened for.
 */
export interface ResaleStore {
  readonly businessId: string

  listCategories(): Promise<Category[]>
  insertCategory(input: NewCategory): Promise<Category>
  updateCategory(id: string, patch: Partial<NewCategory>): Promise<void>
  deleteCategory(id: string): Promise<void>

  listSuppliers(): Promise<Supplier[]>
  insertSupplier(input: NewSupplier): Promise<Supplier>
  updateSupplier(id: string, patch: Partial<NewSupplier>): Promise<void>
  deleteSupplier(id: string): Promise<void>

  listProducts(filter?: ProductFilter): Promise<Product[]>
  getProduct(id: string): Promise<Product | null>
  insertProduct(input: NewProduct): Promise<Product>
  updateProduct(id: string, patch: Partial<NewProduct>): Promise<void>
  deactivateAllProducts(): Promise<number>

  listStockAdjustments(productId: string, limit: number): Promise<StockAdjustment[]>
  insertStockAdjustment(input: NewStockAdjustment): Promise<StockAdjustment>

  listPurchases(range?: DateRange): Promise<Purchase[]>
  insertPurchase(input: NewPurchase): Promise<Purchase>
  deletePurchase(id: string): Promise<void>

  listSales(range?: DateRange): Promise<Sale[]>
  listSalesForCustomer(customerId: string): Promise<Sale[]>
  insertSale(input: NewSale): Promise<Sale>
  deleteSale(id: string): Promise<void>

  listCustomers(): Promise<Customer[]>
  getCustomer(id: string): Promise<Customer | null>
  findCustomerByDocument(documentId: string): Promise<Customer | null>
  insertCustomer(input: NewCustomer): Promise<Customer>
  updateCustomer(id: string, patch: Partial<NewCustomer>): Promise<void>

  listFixedCosts(includeInactive?: boolean): Promise<FixedCost[]>
  insertFixedCost(input: NewFixedCost): Promise<FixedCost>
  updateFixedCost(id: string, patch: Partial<NewFixedCost>): Promise<void>

  listPriceEntries(): Promise<PriceListEntry[]>
  upsertPriceEntry(input: Omit<PriceListEntry, 'id'>): Promise<void>

  listMembers(): Promise<BusinessMember[]>
  insertMember(input: NewBusinessMember): Promise<BusinessMember>
  updateMember(id: string, patch: Partial<NewBusinessMember>): Promise<void>
}
