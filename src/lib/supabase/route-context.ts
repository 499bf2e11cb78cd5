import { NextResponse, type NextRequest } from 'next/server'
import { createRouteClient } from '@/lib/supabase/route'
import { SupabaseStore } from '@/lib/db/supabase-store'
import { parseProfile } from '@/lib/db/rows'
import type { Role } from '@/lib/db/types'
import { hasPermission, type Permission } from '@/lib/permissions'

type RouteContext = { ok: true; store: SupabaseStore; role: Role } | { ok: false; response: NextResponse }

/** Business store for a route handler, or the 401/403 response to send instead. */
export async function routeStore(request: NextRequest, permission: Permission): Promise<RouteContext> {
  const { supabase } = createRouteClient(request)

  const { data: auth } = await supabase.auth.getUser()
  if (!auth.user) return { ok: false, response: NextResponse.json({ error: 'Unauthorized' }, { status: 401 }) }

  const { data, error } = await supabase
    .from('profiles')
    .select('id, email, display_name, business_id, role')
    .eq('id', auth.user.id)
    .maybeSingle()
  if (error) {
    console.error('routeStore profile error:', error)
    return { ok: false, response: NextResponse.json({ error: 'Could not load your profile' }, { status: 500 }) }
  }

  const profile = data ? parseProfile(data) : null
  if (!profile?.business_id || !hasPermission(profile.role, permission)) {
    return { ok: false, response: NextResponse.json({ error: 'Forbidden' }, { status: 403 }) }
  }
  return { ok: true, store: new SupabaseStore(supabase, profile.business_id), role: profile.role }
}

export function xlsxResponse(data: ArrayBuffer, filename: string, contentType: string) {
  return new NextResponse(data, {
    headers: {
      'Content-Type': contentType,
      'Content-Disposition': `attachment; filename="${filename}"`,
      'Cache-Control': 'no-store'
    }
  })
}
