import { createBrowserClient } from '@supabase/ssr'
import type { SupabaseClient } from '@supabase/supabase-js'
import { getSupabaseConfig } from '@/lib/env'

let _client: SupabaseClient | null = null

export function createClient(): SupabaseClient {
  if (_client) return _client
  const { url, anonKey } = getSupabaseConfig()
  _client = createBrowserClient(url, anonKey)
  return _client
}
