'use server'

import { requireUser } from '@/lib/auth'
import { seedDefaultCategories } from '@/lib/catalog/categories'
import { SupabaseStore } from '@/lib/db/supabase-store'
import { parseBusiness, parseBusinessId, parseMember } from '@/lib/db/rows'
import { toUserMessage, type ActionResult } from '@/lib/errors'
import { createClient } from '@/lib/supabase/server'
import { nullable, requireText } from '@/lib/validation'

export async function createBusiness(formData: FormData): Promise<ActionResult> {
  try {
    const user = await requireUser()
    const name = requireText(formData.get('business_name'), 'Business name')
    const displayName = nullable(formData.get('display_name'))
    const email = user.email?.toLowerCase() ?? ''
    const supabase = await createClient()

    const { data, error } = await supabase
      .from('businesses')
      .insert({ name, owner_id: user.id })
      .select('id, name, owner_id, created_at')
      .single()
    if (error) throw error
    const business = parseBusiness(data)

    const { error: profileError } = await supabase.from('profiles').upsert({
      id: user.id,
      email,
      display_name: displayName,
      business_id: business.id,
      role: 'admin'
    })
    if (profileError) throw profileError

    const store = new SupabaseStore(supabase, business.id)
    await store.insertMember({ user_id: user.id, email, display_name: displayName ?? email, role: 'admin', is_active: true })
    await seedDefaultCategories(store)

    return { ok: true }
  } catch (e) {
    console.error('createBusiness error:', e)
    return { ok: false, error: toUserMessage(e, 'Business') }
  }
}

export async function joinBusiness(memberId: string): Promise<ActionResult> {
  try {
    const user = await requireUser()
    const email = user.email?.toLowerCase() ?? ''
    const supabase = await createClient()

    const { data, error } = await supabase
      .from('business_members')
      .select('id, business_id, user_id, email, display_name, role, is_active, created_at')
      .eq('id', memberId)
      .eq('email', email)
      .eq('is_active', true)
      .maybeSingle()
    if (error) throw error
    if (!data) return { ok: false, error: 'That invitation is no longer available' }

    const member = parseMember(data)
    const businessId = parseBusinessId(data)
    if (!businessId) return { ok: false, error: 'That invitation is no longer available' }

    const { error: profileError } = await supabase.from('profiles').upsert({
      id: user.id,
      email,
      display_name: member.display_name,
      business_id: businessId,
      role: member.role
    })
    if (profileError) throw profileError

    const { error: claimError } = await supabase.from('business_members').update({ user_id: user.id }).eq('id', member.id)
    if (claimError) throw claimError

    return { ok: true }
  } catch (e) {
    console.error('joinBusiness error:', e)
    return { ok: false, error: toUserMessage(e, 'Membership') }
  }
}
