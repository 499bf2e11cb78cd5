import type React from 'react'
import { formatMoney } from '@/lib/analytics/calc'
import { cn } from '@/lib/utils'

interface MoneyProps extends React.HTMLAttributes<HTMLSpanElement> {
  amount: number | null | undefined
  fallback?: string
}

export function Money({ amount, fallback = '—', className, ...props }: MoneyProps) {
  const formatted = amount === null || amount === undefined || !Number.isFinite(amount) ? fallback : formatMoney(amount)
  return (
    <span className={cn('truncate tabular-nums', className)} title={formatted} {...props}>
      {formatted}
    </span>
  )
}
