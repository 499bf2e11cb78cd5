'use client'

import { usePathname, useRouter, useSearchParams } from 'next/navigation'
import { PERIOD_PRESETS, isPeriodPreset, type PeriodPreset } from '@/lib/analytics/period'
import type { DateRange } from '@/lib/db/types'
import { cn } from '@/lib/utils'

interface PeriodPickerProps {
  preset: PeriodPreset
  range: DateRange
  className?: string
}

/** Keeps the chosen period in the URL so server pages can read it. */
export function PeriodPicker({ preset, range, className }: PeriodPickerProps) {
  const router = useRouter()
  const pathname = usePathname()
  const searchParams = useSearchParams()

  const push = (next: Record<string, string>) => {
    const params = new URLSearchParams(searchParams.toString())
    params.delete('preset')
    params.delete('from')
    params.delete('to')
    Object.entries(next).forEach(([key, value]) => params.set(key, value))
    router.push(`${pathname}?${params.toString()}`)
  }

  const handlePreset = (value: string) => {
    if (!isPeriodPreset(value)) return
    if (value === 'custom') push({ preset: value, from: range.from, to: range.to })
    else push({ preset: value })
  }

  // keep from <= to while the user edits either end
  const handleFrom = (from: string) => {
    if (from) push({ preset: 'custom', from, to: from > range.to ? from : range.to })
  }
  const handleTo = (to: string) => {
    if (to) push({ preset: 'custom', from: to < range.from ? to : range.from, to })
  }

  return (
    <div className={cn('flex flex-wrap items-center gap-2', className)}>
      <select className="field h-9 w-auto py-1 text-xs" value={preset} onChange={(e) => handlePreset(e.target.value)} aria-label="Period">
        {PERIOD_PRESETS.map((p) => (
          <option key={p.value} value={p.value}>
            {p.label}
          </option>
        ))}
      </select>
      {preset === 'custom' && (
        <>
          <input type="date" className="field h-9 w-auto py-1 text-xs" value={range.from} onChange={(e) => handleFrom(e.target.value)} aria-label="From" />
          <span className="text-slate-400">-</span>
          <input type="date" className="field h-9 w-auto py-1 text-xs" value={range.to} onChange={(e) => handleTo(e.target.value)} aria-label="To" />
        </>
      )}
    </div>
  )
}
