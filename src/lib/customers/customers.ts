import { differenceInCalendarDays, parseISO } from 'date-fns'
import type { ResaleStore } from '@/lib/db/store'
import type { Customer, NewCustomer } from '@/lib/db/types'
import { ValidationError, isUniqueViolation } from '@/lib/errors'
import { round2 } from '@/lib/utils'
import { EMAIL_REGEX, nullable, requireText } from '@/lib/validation'

export type CustomerTier = 'VIP' | 'Frequent' | 'Occasional' | 'New'

export const INACTIVE_AFTER_DAYS = 30

export type CustomerInput = Partial<Record<'document_id' | 'name' | 'phone' | 'email' | 'address' | 'notes', unknown>>

type CustomerFields = Omit<NewCustomer, 'total_purchases' | 'total_spent' | 'last_purchase_at'>

function validateCustomer(input: CustomerInput): CustomerFields {
  const email = nullable(input.email)
  if (email && !EMAIL_REGEX.test(email)) throw new ValidationError('Customer email is not valid')
  return {
    document_id: requireText(input.document_id, 'Document'),
    name: requireText(input.name, 'Customer name'),
    phone: nullable(input.phone),
    email,
    address: nullable(input.address),
    notes: nullable(input.notes)
  }
}

export async function createCustomer(store: ResaleStore, input: CustomerInput): Promise<Customer> {
  const fields = validateCustomer(input)
  if (await store.findCustomerByDocument(fields.document_id)) {
    throw new ValidationError('A customer with that document already exists')
  }
  try {
    return await store.insertCustomer({ ...fields, total_purchases: 0, total_spent: 0, last_purchase_at: null })
  } catch (error) {
    if (isUniqueViolation(error)) throw new ValidationError('A customer with that document already exists')
    throw error
  }
}

export async function updateCustomer(store: ResaleStore, id: string, input: CustomerInput) {
  const fields = validateCustomer(input)
  const other = await store.findCustomerByDocument(fields.document_id)
  if (other && other.id !== id) throw new ValidationError('A customer with that document already exists')
  await store.updateCustomer(id, fields)
}

/** Case-insensitive substring match on document, name or phone. */
export function searchCustomers(customers: Customer[], term: string): Customer[] {
  const needle = term.trim().toLowerCase()
  if (!needle) return customers
  return customers.filter((c) =>
    [c.document_id, c.name, c.phone ?? ''].some((field) => field.toLowerCase().includes(needle))
  )
}

export function customerTier(totalPurchases: number): CustomerTier {
  if (totalPurchases >= 10) return 'VIP'
  if (totalPurchases >= 5) return 'Frequent'
  if (totalPurchases >= 2) return 'Occasional'
  return 'New'
}

export function averageTicket(customer: Pick<Customer, 'total_purchases' | 'total_spent'>): number {
  return customer.total_purchases > 0 ? round2(customer.total_spent / customer.total_purchases) : 0
}

export function frequentCustomers(customers: Customer[], limit = 10) {
  return customers
    .filter((c) => c.total_purchases > 0)
    .sort((a, b) => b.total_spent - a.total_spent)
    .slice(0, limit)
    .map((c) => ({ ...c, tier: customerTier(c.total_purchases), average_ticket: averageTicket(c) }))
}

export function inactiveCustomers(customers: Customer[], today: string, days = INACTIVE_AFTER_DAYS) {
  const now = parseISO(today)
  return customers
    .flatMap((c) => {
      if (!c.last_purchase_at) return []
      const idle = differenceInCalendarDays(now, parseISO(c.last_purchase_at))
      return idle > days ? [{ ...c, days_without_purchase: idle }] : []
    })
    .sort((a, b) => b.days_without_purchase - a.days_without_purchase)
}
