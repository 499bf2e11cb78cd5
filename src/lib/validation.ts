import { isValid, parseISO } from 'date-fns'
import { ValidationError } from '@/lib/errors'

export const EMAIL_REGEX = /^[^\s@]+@[^\s@]+\.[^\s@]+$/

export function normalizeText(value: unknown): string {
  return typeof value === 'string' ? value.trim() : ''
}

export function isBlank(value: unknown): boolean {
  return value === null || value === undefined || (typeof value === 'string' && value.trim() === '')
}

export function nullable(value: unknown): string | null {
  const text = normalizeText(value)
  return text.length > 0 ? text : null
}

export function requireText(value: unknown, label: string): string {
  const text = normalizeText(value)
  if (!text) throw new ValidationError(`${label} is required`)
  return text
}

const DECIMAL_COMMA = /^-?\d+,\d{1,2}$/

/**
 * Parses "12.5" or "12,5"; null for blanks and non-numbers. A comma is only
 * read as the decimal mark when it is the sole separator with at most two
 * decimals, so "1,250" and "1.234,5" are rejected rather than misread.
 */
export function toNumber(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null
  let text = normalizeText(value)
  if (!text) return null
  if (text.includes(',')) {
    if (!DECIMAL_COMMA.test(text)) return null
    text = text.replace(',', '.')
  }
  const n = Number(text)
  return Number.isFinite(n) ? n : null
}

export function requireNumber(value: unknown, label: string, options: { min?: number; exclusiveMin?: number; max?: number } = {}): number {
  const n = toNumber(value)
  if (n === null) throw new ValidationError(`${label} must be a number`)
  if (options.min !== undefined && n < options.min) throw new ValidationError(`${label} must be at least ${options.min}`)
  if (options.exclusiveMin !== undefined && n <= options.exclusiveMin) {
    throw new ValidationError(`${label} must be greater than ${options.exclusiveMin}`)
  }
  if (options.max !== undefined && n > options.max) throw new ValidationError(`${label} must be at most ${options.max}`)
  return n
}

export function requireInteger(value: unknown, label: string, min = 0): number {
  const n = requireNumber(value, label, { min })
  if (!Number.isInteger(n)) throw new ValidationError(`${label} must be a whole number`)
  return n
}

export function isISODate(value: string): boolean {
  return /^\d{4}-\d{2}-\d{2}$/.test(value) && isValid(parseISO(value))
}

export function requireDate(value: unknown, label: string): string {
  const text = requireText(value, label)
  if (!isISODate(text)) throw new ValidationError(`${label} must be a date (YYYY-MM-DD)`)
  return text
}

export function formValues(formData: FormData): Record<string, unknown> {
  const values: Record<string, unknown> = {}
  formData.forEach((value, key) => {
    if (typeof value === 'string') values[key] = value
  })
  return values
}
