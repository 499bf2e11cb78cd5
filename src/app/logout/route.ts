import { NextResponse, type NextRequest } from 'next/server'
import { createClient } from '@/lib/supabase/server'

export async function POST(request: NextRequest) {
  const supabase = await createClient()
  const { error } = await supabase.auth.signOut()
  if (error) console.error('logout error:', error)
  return NextResponse.redirect(new URL('/login', request.url), { status: 303 })
}
