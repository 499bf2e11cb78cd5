'use client'

import { createContext, useCallback, useContext, useEffect, useState } from 'react'
import { createClient } from '@/lib/supabase/client'

export type Theme = 'light' | 'dark' | 'system'

function parseTheme(value: unknown): Theme | null {
  return value === 'light' || value === 'dark' || value === 'system' ? value : null
}

interface ThemeContextValue {
  theme: Theme
  setTheme: (theme: Theme) => void
}

const ThemeContext = createContext<ThemeContextValue | undefined>(undefined)

async function saveThemePreference(theme: Theme) {
  const supabase = createClient()
  const { data } = await supabase.auth.getUser()
  if (!data.user) return
  const { error } = await supabase.from('profiles').update({ theme_preference: theme }).eq('id', data.user.id)
  if (error) throw error
}

async function loadThemePreference(): Promise<Theme | null> {
  const supabase = createClient()
  const { data } = await supabase.auth.getUser()
  if (!data.user) return null
  const { data: profile } = await supabase.from('profiles').select('theme_preference').eq('id', data.user.id).maybeSingle()
  return parseTheme(profile?.theme_preference)
}

function applyTheme(theme: Theme) {
  const dark = theme === 'dark' || (theme === 'system' && window.matchMedia('(prefers-color-scheme: dark)').matches)
  document.documentElement.classList.toggle('dark', dark)
}

export function ThemeProvider({ children }: { children: React.ReactNode }) {
  const [theme, setThemeState] = useState<Theme>('system')

  const setTheme = useCallback((next: Theme, persist = true) => {
    setThemeState(next)
    localStorage.setItem('theme', next)
    applyTheme(next)
    if (persist) saveThemePreference(next).catch((error: unknown) => console.error('saveThemePreference error:', error))
  }, [])

  // Local choice wins; the profile only fills in when this browser has none.
  useEffect(() => {
    const saved = parseTheme(localStorage.getItem('theme'))
    if (saved) {
      setThemeState(saved)
      return
    }
    loadThemePreference()
      .then((stored) => {
        if (stored) setTheme(stored, false)
      })
      .catch((error: unknown) => console.error('loadThemePreference error:', error))
  }, [setTheme])

  useEffect(() => {
    if (theme !== 'system') return
    const media = window.matchMedia('(prefers-color-scheme: dark)')
    const onChange = () => applyTheme('system')
    media.addEventListener('change', onChange)
    return () => media.removeEventListener('change', onChange)
  }, [theme])

  return <ThemeContext.Provider value={{ theme, setTheme }}>{children}</ThemeContext.Provider>
}

export function useTheme() {
  const context = useContext(ThemeContext)
  if (!context) throw new Error('useTheme must be used within a ThemeProvider')
  return context
}
