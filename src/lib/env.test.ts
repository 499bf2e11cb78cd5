import assert from 'node:assert/strict'
import test from 'node:test'
import { getDisplayConfig, getSupabaseConfig } from './env'

test('getSupabaseConfig reads url and anon key', () => {
  const config = getSupabaseConfig({
    NEXT_PUBLIC_SUPABASE_URL: ' http://localhost:54321 ',
    NEXT_PUBLIC_SUPABASE_ANON_KEY: 'test-anon-key'
  })
  assert.deepEqual(config, { url: 'http://localhost:54321', anonKey: 'test-anon-key' })
})

test('getSupabaseConfig names the missing variable', () => {
  assert.throws(
    () => getSupabaseConfig({ NEXT_PUBLIC_SUPABASE_URL: 'http://localhost:54321' }),
    /Missing environment variable NEXT_PUBLIC_SUPABASE_ANON_KEY/
  )
})

test('getDisplayConfig falls back to USD and en-US', () => {
  assert.deepEqual(getDisplayConfig({}), { currency: 'USD', locale: 'en-US' })
  assert.deepEqual(getDisplayConfig({ NEXT_PUBLIC_CURRENCY: 'ARS', NEXT_PUBLIC_LOCALE: 'es-AR' }), {
    currency: 'ARS',
    locale: 'es-AR'
  })
})
