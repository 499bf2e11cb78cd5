'use client'

import type { ReactNode } from 'react'
import { motion } from 'framer-motion'
import { useReducedMotion } from '@/components/auth/use-reduced-motion'

const HIGHLIGHTS = [
  'Stock, purchases and sales in one place, with margins worked out for you.',
  'Each teammate sees only what their role allows.'
]

export function AuthShell({ children }: { children: ReactNode }) {
  const animate = !useReducedMotion()

  return (
    <main className="relative min-h-[100dvh] overflow-hidden bg-slate-950">
      <motion.div
        aria-hidden
        className="absolute inset-0 bg-[radial-gradient(circle_at_12%_22%,rgba(14,165,233,0.28),transparent_44%),radial-gradient(circle_at_82%_16%,rgba(16,185,129,0.22),transparent_40%),linear-gradient(145deg,#020617_2%,#0f172a_38%,#111827_100%)]"
        initial={{ opacity: animate ? 0.85 : 1 }}
        animate={{ opacity: 1 }}
        transition={{ duration: animate ? 0.45 : 0 }}
      />

      <div className="relative z-10 mx-auto grid min-h-[100dvh] w-full max-w-6xl items-center gap-10 px-5 py-10 lg:grid-cols-2 lg:px-10">
        <div className="max-w-md text-white">
          <p className="inline-flex rounded-full border border-white/20 bg-white/10 px-3 py-1 text-[11px] font-semibold uppercase tracking-[0.18em]">
            Resale Dashboard
          </p>
          <h1 className="mt-4 text-4xl font-bold tracking-tight sm:text-5xl">Know what sells and what it earns.</h1>
          <div className="mt-6 grid gap-2.5 text-sm text-slate-200/90">
            {HIGHLIGHTS.map((line) => (
              <p key={line} className="w-fit rounded-xl border border-white/15 bg-white/5 px-3 py-2">
                {line}
              </p>
            ))}
          </div>
        </div>
        <div className="w-full max-w-[520px] justify-self-center lg:justify-self-end">{children}</div>
      </div>
    </main>
  )
}
