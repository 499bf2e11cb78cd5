import {
  differenceInCalendarDays,
  endOfMonth,
  format,
  parseISO,
  startOfMonth,
  startOfYear,
  subDays,
  subMonths
} from 'date-fns'
import type { DateRange } from '@/lib/db/types'
import { isISODate } from '@/lib/validation'

export type PeriodPreset = 'last_7_days' | 'last_30_days' | 'this_month' | 'last_month' | 'last_90_days' | 'this_year' | 'custom'

export const PERIOD_PRESETS: { value: PeriodPreset; label: string }[] = [
  { value: 'last_7_days', label: 'Last 7 days' },
  { value: 'last_30_days', label: 'Last 30 days' },
  { value: 'this_month', label: 'This month' },
  { value: 'last_month', label: 'Last month' },
  { value: 'last_90_days', label: 'Last 3 months' },
  { value: 'this_year', label: 'This year' },
  { value: 'custom', label: 'Custom' }
]

export const DEFAULT_PRESET: PeriodPreset = 'this_month'

export function toISODate(date: Date): string {
  return format(date, 'yyyy-MM-dd')
}

export function todayISO(now: Date = new Date()): string {
  return toISODate(now)
}

export function resolvePeriod(preset: PeriodPreset, today: Date, custom: { from?: string; to?: string } = {}): DateRange {
  const to = toISODate(today)
  switch (preset) {
    case 'last_7_days':
      return { from: toISODate(subDays(today, 7)), to }
    case 'last_30_days':
      return { from: toISODate(subDays(today, 30)), to }
    case 'last_90_days':
      return { from: toISODate(subDays(today, 90)), to }
    case 'this_month':
      return { from: toISODate(startOfMonth(today)), to }
    case 'last_month': {
      const previous = subMonths(today, 1)
      return { from: toISODate(startOfMonth(previous)), to: toISODate(endOfMonth(previous)) }
    }
    case 'this_year':
      return { from: toISODate(startOfYear(today)), to }
    case 'custom': {
      const from = custom.from && isISODate(custom.from) ? custom.from : null
      const end = custom.to && isISODate(custom.to) ? custom.to : to
      if (!from) return resolvePeriod(DEFAULT_PRESET, today)
      return from <= end ? { from, to: end } : { from: end, to: from }
    }
  }
}

/** Inclusive number of days in the range. */
export function periodDays(range: DateRange): number {
  return differenceInCalendarDays(parseISO(range.to), parseISO(range.from)) + 1
}

export function isPeriodPreset(value: unknown): value is PeriodPreset {
  return PERIOD_PRESETS.some((p) => p.value === value)
}

/** Reads `preset`, `from` and `to` from URL search params. */
export function periodFromParams(params: Record<string, string | string[] | undefined>, today: Date) {
  const first = (key: string) => {
    const value = params[key]
    return Array.isArray(value) ? value[0] : value
  }
  const rawPreset = first('preset')
  const hasCustomDates = Boolean(first('from'))
  const preset: PeriodPreset = isPeriodPreset(rawPreset) ? rawPreset : hasCustomDates ? 'custom' : DEFAULT_PRESET
  return { preset, range: resolvePeriod(preset, today, { from: first('from'), to: first('to') }) }
}

/** Current month to date and the whole previous month. */
export function monthComparisonRanges(today: Date): { current: DateRange; previous: DateRange } {
  const previous = subMonths(today, 1)
  return {
    current: { from: toISODate(startOfMonth(today)), to: toISODate(today) },
    previous: { from: toISODate(startOfMonth(previous)), to: toISODate(endOfMonth(previous)) }
  }
}
