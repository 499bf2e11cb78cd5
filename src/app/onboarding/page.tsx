import { redirect } from 'next/navigation'
import { requireUser } from '@/lib/auth'
import { createClient } from '@/lib/supabase/server'
import { ROLE_LABELS } from '@/lib/permissions'
import { parseBusiness, parseBusinessId, parseMember, parseProfile, parseRows } from '@/lib/db/rows'
import { OnboardingClient, type Invitation } from './client'

export default async function OnboardingPage() {
  const user = await requireUser()
  const supabase = await createClient()

  const { data: profileRow } = await supabase
    .from('profiles')
    .select('id, email, display_name, business_id, role')
    .eq('id', user.id)
    .maybeSingle()
  if (profileRow && parseProfile(profileRow).business_id) redirect('/')

  const email = user.email?.toLowerCase() ?? ''
  const { data: inviteRows } = await supabase
    .from('business_members')
    .select('id, business_id, user_id, email, display_name, role, is_active, created_at')
    .eq('email', email)
    .eq('is_active', true)

  const invites = parseRows(inviteRows, (row) => ({ member: parseMember(row), businessId: parseBusinessId(row) }))
  const businessIds = invites.map((i) => i.businessId).filter((id) => id !== '')
  const { data: businessRows } = businessIds.length
    ? await supabase.from('businesses').select('id, name, owner_id, created_at').in('id', businessIds)
    : { data: [] }
  const businesses = new Map(parseRows(businessRows, parseBusiness).map((b) => [b.id, b.name]))

  const invitations: Invitation[] = invites.map(({ member, businessId }) => ({
    id: member.id,
    businessName: businesses.get(businessId) ?? 'A business',
    roleLabel: ROLE_LABELS[member.role]
  }))

  const metadataName = user.user_metadata.display_name
  const suggestedName = typeof metadataName === 'string' ? metadataName : ''

  return (
    <div className="dashboard-shell flex min-h-dvh items-center justify-center p-6">
      <div className="dashboard-surface w-full max-w-xl p-6 md:p-8">
        <h1 className="text-2xl font-bold tracking-tight">Set up your workspace</h1>
        <p className="mt-2 text-sm text-slate-600 dark:text-slate-300">
          Create a business to manage, or join one that invited {email || 'you'}.
        </p>
        <OnboardingClient invitations={invitations} suggestedName={suggestedName} />
      </div>
    </div>
  )
}

