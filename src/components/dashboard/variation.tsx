import { ArrowDownRight, ArrowUpRight } from 'lucide-react'
import { formatPercent } from '@/lib/analytics/calc'
import { cn } from '@/lib/utils'

export function Variation({ value }: { value: number }) {
  const up = value >= 0
  const Icon = up ? ArrowUpRight : ArrowDownRight
  return (
    <span className={cn('inline-flex items-center gap-0.5 font-semibold', up ? 'text-emerald-600' : 'text-red-600')}>
      <Icon className="h-3.5 w-3.5" />
      {formatPercent(Math.abs(value))}
    </span>
  )
}
