import { NextResponse, type NextRequest } from 'next/server'
import { createRouteClient } from '@/lib/supabase/route'

const PUBLIC_PATHS = ['/login']

export async function middleware(request: NextRequest) {
  const { supabase, getResponse } = createRouteClient(request)

  // Refreshes the session cookie; must run before anything reads the user.
  const { data } = await supabase.auth.getUser()

  const { pathname } = request.nextUrl
  const isPublic = PUBLIC_PATHS.some((path) => pathname === path || pathname.startsWith(`${path}/`))

  if (!data.user && !isPublic) {
    const url = request.nextUrl.clone()
    url.pathname = '/login'
    url.search = ''
    return NextResponse.redirect(url)
  }

  return getResponse()
}

export const config = {
  // Everything except static assets and files with an extension.
  matcher: ['/((?!_next/static|_next/image|favicon.ico|.*\\..*).*)']
}
