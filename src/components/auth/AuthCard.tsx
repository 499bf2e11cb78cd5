'use client'

import { useState, type FormEvent } from 'react'
import { Loader2 } from 'lucide-react'
import { motion } from 'framer-motion'
import { useReducedMotion } from '@/components/auth/use-reduced-motion'
import { Button } from '@/components/ui/button'
import { Card, CardContent, CardDescription, CardHeader, CardTitle } from '@/components/ui/card'
import { Input } from '@/components/ui/input'
import { cn } from '@/lib/utils'

export type AuthTab = 'sign-in' | 'sign-up'

export type AuthCredentials = {
  email: string
  password: string
  displayName: string
}

interface AuthCardProps {
  loading: boolean
  onSubmit: (tab: AuthTab, credentials: AuthCredentials) => Promise<void>
}

const TABS: { id: AuthTab; label: string }[] = [
  { id: 'sign-in', label: 'Sign in' },
  { id: 'sign-up', label: 'Sign up' }
]

const darkInput = 'h-11 border-white/20 bg-white/10 text-white placeholder:text-white/45 focus:ring-white/35'

export function AuthCard({ loading, onSubmit }: AuthCardProps) {
  const animate = !useReducedMotion()
  const [tab, setTab] = useState<AuthTab>('sign-in')
  const [email, setEmail] = useState('')
  const [password, setPassword] = useState('')
  const [displayName, setDisplayName] = useState('')

  async function handleSubmit(event: FormEvent<HTMLFormElement>) {
    event.preventDefault()
    await onSubmit(tab, { email, password, displayName })
  }

  return (
    <motion.div
      initial={animate ? { opacity: 0, y: 18 } : false}
      animate={{ opacity: 1, y: 0 }}
      transition={{ duration: animate ? 0.35 : 0, ease: [0.22, 1, 0.36, 1] }}
    >
      <Card className="rounded-[24px] border-white/20 bg-white/[0.12] text-white backdrop-blur-[18px] dark:bg-white/[0.12]">
        <CardHeader className="space-y-4">
          <div role="tablist" aria-label="Authentication" className="grid grid-cols-2 rounded-xl border border-white/10 bg-white/5 p-1">
            {TABS.map(({ id, label }) => (
              <button
                key={id}
                type="button"
                role="tab"
                aria-selected={tab === id}
                onClick={() => setTab(id)}
                className={cn('relative h-10 rounded-lg text-sm font-semibold', tab === id ? 'text-white' : 'text-white/70 hover:text-white/90')}
              >
                {tab === id && (
                  <motion.span
                    layoutId="auth-tab"
                    className="absolute inset-0 rounded-lg border border-white/20 bg-white/15"
                    transition={{ duration: animate ? 0.22 : 0 }}
                  />
                )}
                <span className="relative z-10">{label}</span>
              </button>
            ))}
          </div>
          <div>
            <CardTitle className="text-white">{tab === 'sign-in' ? 'Welcome back' : 'Create your account'}</CardTitle>
            <CardDescription className="mt-1 text-white/70">
              {tab === 'sign-in' ? 'Sign in to your business dashboard.' : 'You will set up or join a business next.'}
            </CardDescription>
          </div>
        </CardHeader>

        <CardContent>
          <form onSubmit={handleSubmit} className="space-y-4">
            {tab === 'sign-up' && (
              <label className="grid gap-1.5 text-sm font-medium text-white/85">
                Your name
                <Input className={darkInput} autoComplete="name" required value={displayName} onChange={(e) => setDisplayName(e.target.value)} />
              </label>
            )}
            <label className="grid gap-1.5 text-sm font-medium text-white/85">
              Email
              <Input
                className={darkInput}
                type="email"
                autoComplete="email"
                placeholder="you@example.com"
                required
                value={email}
                onChange={(e) => setEmail(e.target.value)}
              />
            </label>
            <label className="grid gap-1.5 text-sm font-medium text-white/85">
              Password
              <Input
                className={darkInput}
                type="password"
                autoComplete={tab === 'sign-in' ? 'current-password' : 'new-password'}
                minLength={6}
                required
                value={password}
                onChange={(e) => setPassword(e.target.value)}
              />
            </label>
            <Button type="submit" className="h-11 w-full" disabled={loading}>
              {loading && <Loader2 className="h-4 w-4 animate-spin" aria-hidden />}
              {tab === 'sign-in' ? 'Sign in' : 'Create account'}
            </Button>
          </form>
        </CardContent>
      </Card>
    </motion.div>
  )
}
