import type { Category, Customer, DateRange, FixedCost, Product, Sale } from '@/lib/db/types'
import { monthlyFixedCosts, proratedFixedCosts } from '@/lib/costs/fixed-costs'
import { isLowStock } from '@/lib/inventory/products'
import { summarizeSales } from '@/lib/sales/calc'
import { round2 } from '@/lib/utils'
import { calcVariation } from './calc'
import { periodDays } from './period'

export const UNCATEGORIZED = 'Uncategorized'

export function inventoryMetrics(products: Product[]) {
  const active = products.filter((p) => p.is_active)
  const stocked = active.filter((p) => p.stock_current > 0)
  return {
    totalProducts: active.length,
    withStock: stocked.length,
    stockValue: round2(stocked.reduce((sum, p) => sum + p.purchase_price * p.stock_current, 0)),
    lowStock: active.filter(isLowStock).length
  }
}

export function periodPerformance(sales: Sale[], monthlyFixed: number, days: number) {
  const summary = summarizeSales(sales)
  const fixedCosts = proratedFixedCosts(monthlyFixed, days)
  return {
    revenue: summary.revenue,
    grossProfit: summary.profit,
    fixedCosts,
    netProfit: round2(summary.profit - fixedCosts),
    count: summary.count,
    averageTicket: summary.averageTicket
  }
}

export type DailySales = { date: string; revenue: number; profit: number; count: number }

export function salesByDay(sales: Sale[]): DailySales[] {
  const byDate = new Map<string, DailySales>()
  for (const sale of sales) {
    const day = byDate.get(sale.sale_date) ?? { date: sale.sale_date, revenue: 0, profit: 0, count: 0 }
    day.revenue = round2(day.revenue + sale.subtotal)
    day.profit = round2(day.profit + sale.profit)
    day.count += 1
    byDate.set(sale.sale_date, day)
  }
  return [...byDate.values()].sort((a, b) => a.date.localeCompare(b.date))
}

export type ProductSales = { product_id: string; code: string; name: string; quantity: number; revenue: number; profit: number }

export function topProducts(sales: Sale[], products: Product[], limit = 5): ProductSales[] {
  const productById = new Map(products.map((p) => [p.id, p]))
  const totals = new Map<string, ProductSales>()
  for (const sale of sales) {
    const product = productById.get(sale.product_id)
    const row = totals.get(sale.product_id) ?? {
      product_id: sale.product_id,
      code: product?.code ?? '',
      name: product?.name ?? 'Unknown product',
      quantity: 0,
      revenue: 0,
      profit: 0
    }
    row.quantity += sale.quantity
    row.revenue = round2(row.revenue + sale.subtotal)
    row.profit = round2(row.profit + sale.profit)
    totals.set(sale.product_id, row)
  }
  return [...totals.values()]
    .sort((a, b) => b.quantity - a.quantity || b.revenue - a.revenue)
    .slice(0, limit)
}

export type CategorySales = { category: string; quantity: number; revenue: number; profit: number }

export function salesByCategory(sales: Sale[], products: Product[], categories: Category[]): CategorySales[] {
  const productById = new Map(products.map((p) => [p.id, p]))
  const categoryById = new Map(categories.map((c) => [c.id, c]))
  const totals = new Map<string, CategorySales>()
  for (const sale of sales) {
    const categoryId = productById.get(sale.product_id)?.category_id
    const name = (categoryId && categoryById.get(categoryId)?.name) || UNCATEGORIZED
    const row = totals.get(name) ?? { category: name, quantity: 0, revenue: 0, profit: 0 }
    row.quantity += sale.quantity
    row.revenue = round2(row.revenue + sale.subtotal)
    row.profit = round2(row.profit + sale.profit)
    totals.set(name, row)
  }
  return [...totals.values()].sort((a, b) => b.revenue - a.revenue)
}

export function productsWithoutMovement(products: Product[], sales: Sale[]): Product[] {
  const sold = new Set(sales.map((s) => s.product_id))
  return products
    .filter((p) => p.is_active && !sold.has(p.id))
    .sort((a, b) => a.name.localeCompare(b.name))
}

export function monthOverMonth(current: Sale[], previous: Sale[]) {
  const now = summarizeSales(current)
  const before = summarizeSales(previous)
  return {
    revenue: { current: now.revenue, previous: before.revenue, variation: round2(calcVariation(now.revenue, before.revenue)) },
    profit: { current: now.profit, previous: before.profit, variation: round2(calcVariation(now.profit, before.profit)) },
    count: { current: now.count, previous: before.count, variation: round2(calcVariation(now.count, before.count)) }
  }
}

export function customerMetrics(customers: Customer[], monthStart: string) {
  const purchases = customers.reduce((sum, c) => sum + c.total_purchases, 0)
  const spent = customers.reduce((sum, c) => sum + c.total_spent, 0)
  return {
    total: customers.length,
    withPurchases: customers.filter((c) => c.total_purchases > 0).length,
    newThisMonth: customers.filter((c) => c.created_at.slice(0, 10) >= monthStart).length,
    averageTicket: purchases > 0 ? round2(spent / purchases) : 0
  }
}

export type DashboardInput = {
  range: DateRange
  today: string
  products: Product[]
  categories: Category[]
  customers: Customer[]
  fixedCosts: FixedCost[]
  periodSales: Sale[]
  currentMonthSales: Sale[]
  previousMonthSales: Sale[]
  monthStart: string
}

export function buildDashboard(input: DashboardInput) {
  const monthlyFixed = monthlyFixedCosts(input.fixedCosts, input.today)
  return {
    range: input.range,
    inventory: inventoryMetrics(input.products),
    monthlyFixedCosts: monthlyFixed,
    performance: periodPerformance(input.periodSales, monthlyFixed, periodDays(input.range)),
    comparison: monthOverMonth(input.currentMonthSales, input.previousMonthSales),
    salesByDay: salesByDay(input.periodSales),
    topProducts: topProducts(input.periodSales, input.products),
    salesByCategory: salesByCategory(input.periodSales, input.products, input.categories),
    withoutMovement: productsWithoutMovement(input.products, input.periodSales),
    customers: customerMetrics(input.customers, input.monthStart)
  }
}

export type Dashboard = ReturnType<typeof buildDashboard>
