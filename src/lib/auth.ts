import { redirect } from 'next/navigation'
import { createClient } from '@/lib/supabase/server'
import { parseProfile } from '@/lib/db/rows'
import type { Profile } from '@/lib/db/types'

export async function requireUser() {
  const supabase = await createClient()
  const { data, error } = await supabase.auth.getUser()
  if (error || !data.user) redirect('/login')
  return data.user
}

/** Signed-in user's profile, or a redirect to onboarding while they have no business. */
export async function requireProfile(): Promise<Profile & { business_id: string }> {
  const user = await requireUser()
  const supabase = await createClient()
  const { data } = await supabase
    .from('profiles')
    .select('id, email, display_name, business_id, role')
    .eq('id', user.id)
    .maybeSingle()

  if (!data) redirect('/onboarding')
  const profile = parseProfile(data)
  const businessId = profile.business_id
  if (!businessId) redirect('/onboarding')
  return { ...profile, business_id: businessId }
}
