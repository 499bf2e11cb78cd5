'use client'

import { useState } from 'react'
import { toast } from 'sonner'
import { AuthCard, type AuthCredentials, type AuthTab } from '@/components/auth/AuthCard'
import { AuthShell } from '@/components/auth/AuthShell'
import { checkCredentials } from '@/lib/auth-form'
import { createClient } from '@/lib/supabase/client'

export default function LoginPage() {
  const [loading, setLoading] = useState(false)

  async function handleSubmit(tab: AuthTab, { email, password, displayName }: AuthCredentials) {
    const problem = checkCredentials({ email, password, displayName }, tab === 'sign-up')
    if (problem) {
      toast.error(problem)
      return
    }

    const supabase = createClient()
    setLoading(true)

    if (tab === 'sign-in') {
      const { error } = await supabase.auth.signInWithPassword({ email: email.trim(), password })
      setLoading(false)
      if (error) {
        toast.error(error.message)
        return
      }
      window.location.href = '/'
      return
    }

    const { data, error } = await supabase.auth.signUp({
      email: email.trim(),
      password,
      options: { data: { display_name: displayName.trim() } }
    })
    setLoading(false)
    if (error) {
      toast.error(error.message)
      return
    }
    if (data.session) {
      window.location.href = '/onboarding'
      return
    }
    toast.success('Account created. Check your email to confirm it, then sign in.')
  }

  return (
    <AuthShell>
      <AuthCard loading={loading} onSubmit={handleSubmit} />
    </AuthShell>
  )
}
