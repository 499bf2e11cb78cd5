import { redirect } from 'next/navigation'
import { requireProfile } from '@/lib/auth'
import { createClient } from '@/lib/supabase/server'
import { SupabaseStore } from '@/lib/db/supabase-store'
import { parseBusiness } from '@/lib/db/rows'
import type { Business } from '@/lib/db/types'
import { PermissionError } from '@/lib/errors'
import { hasPermission, type Permission } from '@/lib/permissions'

export async function getBusinessContext() {
  const profile = await requireProfile()
  const supabase = await createClient()
  const store = new SupabaseStore(supabase, profile.business_id)
  return { businessId: profile.business_id, profile, role: profile.role, store }
}

export async function getBusiness(businessId: string): Promise<Business | null> {
  const supabase = await createClient()
  const { data, error } = await supabase
    .from('businesses')
    .select('id, name, owner_id, created_at')
    .eq('id', businessId)
    .maybeSingle()
  if (error) console.error('getBusiness error:', error)
  return data ? parseBusiness(data) : null
}

export type BusinessContext = Awaited<ReturnType<typeof getBusinessContext>>

/** For server actions: throws PermissionError so the action can return it as an error. */
export async function requirePermission(permission: Permission): Promise<BusinessContext> {
  const context = await getBusinessContext()
  if (!hasPermission(context.role, permission)) throw new PermissionError(permission)
  return context
}

/** For pages: sends the user home when the role lacks the permission. */
export async function requirePagePermission(permission: Permission): Promise<BusinessContext> {
  const context = await getBusinessContext()
  if (!hasPermission(context.role, permission)) redirect('/')
  return context
}
