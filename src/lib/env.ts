type EnvSource = Record<string, string | undefined>

export interface SupabaseConfig {
  url: string
  anonKey: string
}

export interface DisplayConfig {
  currency: string
  locale: string
}

function required(source: EnvSource, name: string): string {
  const value = source[name]?.trim()
  if (!value) throw new Error(`Missing environment variable ${name}`)
  return value
}

// NEXT_PUBLIC_* values must be read with literal property access so Next.js can inline them in client bundles.
function publicEnv(): EnvSource {
  return {
    NEXT_PUBLIC_SUPABASE_URL: process.env.NEXT_PUBLIC_SUPABASE_URL,
    NEXT_PUBLIC_SUPABASE_ANON_KEY: process.env.NEXT_PUBLIC_SUPABASE_ANON_KEY,
    NEXT_PUBLIC_CURRENCY: process.env.NEXT_PUBLIC_CURRENCY,
    NEXT_PUBLIC_LOCALE: process.env.NEXT_PUBLIC_LOCALE
  }
}

export function getSupabaseConfig(source: EnvSource = publicEnv()): SupabaseConfig {
  return {
    url: required(source, 'NEXT_PUBLIC_SUPABASE_URL'),
    anonKey: required(source, 'NEXT_PUBLIC_SUPABASE_ANON_KEY')
  }
}

export function getDisplayConfig(source: EnvSource = publicEnv()): DisplayConfig {
  return {
    currency: source.NEXT_PUBLIC_CURRENCY?.trim() || 'USD',
    locale: source.NEXT_PUBLIC_LOCALE?.trim() || 'en-US'
  }
}
