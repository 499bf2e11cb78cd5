import type { ResaleStore } from '@/lib/db/store'
import type { NewSupplier, Supplier } from '@/lib/db/types'
import { ValidationError, isForeignKeyViolation } from '@/lib/errors'
import { EMAIL_REGEX, nullable, requireText } from '@/lib/validation'

export type SupplierInput = Record<'name' | 'contact' | 'phone' | 'email' | 'notes', unknown>

export function validateSupplier(input: Partial<SupplierInput>): NewSupplier {
  const email = nullable(input.email)
  if (email && !EMAIL_REGEX.test(email)) throw new ValidationError('Supplier email is not valid')
  return {
    name: requireText(input.name, 'Supplier name'),
    contact: nullable(input.contact),
    phone: nullable(input.phone),
    email,
    notes: nullable(input.notes)
  }
}

export async function createSupplier(store: ResaleStore, input: Partial<SupplierInput>): Promise<Supplier> {
  return store.insertSupplier(validateSupplier(input))
}

export async function updateSupplier(store: ResaleStore, id: string, input: Partial<SupplierInput>) {
  await store.updateSupplier(id, validateSupplier(input))
}

export async function deleteSupplier(store: ResaleStore, id: string) {
  try {
    await store.deleteSupplier(id)
  } catch (error) {
    if (isForeignKeyViolation(error)) throw new ValidationError('Supplier still has products')
    throw error
  }
}
