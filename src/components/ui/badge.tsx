import * as React from 'react'
import { cn } from '@/lib/utils'

export type BadgeVariant = 'default' | 'secondary' | 'destructive' | 'outline' | 'success' | 'warning'

const variantClasses: Record<BadgeVariant, string> = {
  default: 'border-transparent brand-gradient text-white',
  secondary: 'border-transparent bg-[hsl(var(--surface-muted))] text-slate-700 dark:text-slate-200',
  destructive: 'border-red-200 bg-red-50 text-red-700',
  outline: 'border-[hsl(var(--surface-border))] bg-white/85 text-slate-700',
  success: 'border-emerald-200 bg-emerald-50 text-emerald-700',
  warning: 'border-amber-200 bg-amber-50 text-amber-700'
}

export interface BadgeProps extends React.HTMLAttributes<HTMLSpanElement> {
  variant?: BadgeVariant
}

export function Badge({ className, variant = 'default', ...props }: BadgeProps) {
  return (
    <span
      className={cn('inline-flex items-center rounded-full border px-2.5 py-0.5 text-xs font-semibold', variantClasses[variant], className)}
      {...props}
    />
  )
}
