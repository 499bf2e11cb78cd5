import type { ReactNode } from 'react'
import type { LucideIcon } from 'lucide-react'
import { Card, CardContent, CardHeader, CardTitle } from '@/components/ui/card'
import { cn } from '@/lib/utils'

interface KpiCardProps {
  title: string
  icon: LucideIcon
  displayValue: string
  fullValue?: string
  toneClassName?: string
  footer?: ReactNode
}

export function KpiCard({ title, icon: Icon, displayValue, fullValue = displayValue, toneClassName, footer }: KpiCardProps) {
  return (
    <Card className="min-w-0 overflow-hidden">
      <CardHeader className="flex flex-row items-center justify-between space-y-0 pb-2">
        <CardTitle className="text-sm font-medium">{title}</CardTitle>
        <Icon className="h-4 w-4 text-slate-400" />
      </CardHeader>
      <CardContent className="min-w-0">
        <p
          title={fullValue}
          className={cn('min-w-0 overflow-hidden text-ellipsis whitespace-nowrap text-right font-bold leading-tight tabular-nums [font-size:clamp(18px,2.2vw,30px)]', toneClassName)}
        >
          {displayValue}
        </p>
        {displayValue !== fullValue && <p className="mt-1 break-all text-right text-[11px] text-slate-500 sm:hidden">{fullValue}</p>}
        {footer && <div className="mt-1 text-right text-xs text-slate-500">{footer}</div>}
      </CardContent>
    </Card>
  )
}
