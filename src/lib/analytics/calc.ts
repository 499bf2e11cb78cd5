import { getDisplayConfig } from '@/lib/env'

const display = getDisplayConfig()

function currencyFormatter(options: Intl.NumberFormatOptions = {}) {
  return new Intl.NumberFormat(display.locale, { style: 'currency', currency: display.currency, ...options })
}

/**
 * Safe currency formatter
 */
export function formatMoney(amount: number | null | undefined): string {
  const value = amount === null || amount === undefined || isNaN(amount) ? 0 : amount
  return currencyFormatter().format(value)
}

/**
 * KPI-friendly compact currency formatter.
 * Examples: $33,879.34, $33.9K, $33.9M
 */
export function formatCurrencyCompact(amount: number | null | undefined): string {
  if (amount === null || amount === undefined || isNaN(amount)) return formatMoney(0)

  const absAmount = Math.abs(amount)
  if (absAmount < 1_000) return formatMoney(amount)

  return currencyFormatter({ notation: 'compact', maximumFractionDigits: 1 }).format(amount)
}

/**
 * Safe percentage formatter
 */
export function formatPercent(value: number | null | undefined): string {
  if (value === null || value === undefined || isNaN(value)) return '0%'
  return new Intl.NumberFormat(display.locale, {
    style: 'percent',
    minimumFractionDigits: 1,
    maximumFractionDigits: 1
  }).format(value / 100)
}

/**
 * Profit / revenue, 0 when there is no revenue.
 */
export function calcMargin(profit: number, revenue: number): number {
  if (!revenue) return 0
  return (profit / revenue) * 100
}

/**
 * Percent change from `previous` to `current`. With nothing to compare
 * against it is 100 when something happened and 0 otherwise.
 */
export function calcVariation(current: number, previous: number): number {
  if (previous === 0) return current > 0 ? 100 : 0
  return ((current - previous) / previous) * 100
}
