import * as React from 'react'
import { cn } from '@/lib/utils'

type ButtonVariant = 'default' | 'destructive' | 'outline' | 'secondary' | 'ghost'
type ButtonSize = 'default' | 'sm' | 'icon'

const variantClasses: Record<ButtonVariant, string> = {
  default: 'brand-gradient text-white shadow-[0_12px_24px_-16px_rgba(15,23,42,0.85)] hover:-translate-y-0.5 active:translate-y-0',
  destructive: 'bg-gradient-to-r from-red-500 to-rose-500 text-white hover:-translate-y-0.5',
  outline: 'border border-[hsl(var(--surface-border))] bg-white/80 text-slate-700 shadow-sm hover:bg-white hover:text-slate-900 dark:bg-slate-900/60 dark:text-slate-200',
  secondary: 'bg-slate-100/90 text-slate-700 hover:bg-slate-100 hover:text-slate-900',
  ghost: 'text-slate-600 hover:bg-slate-100/90 hover:text-slate-900 dark:text-slate-300 dark:hover:bg-slate-800'
}

const sizeClasses: Record<ButtonSize, string> = {
  default: 'h-10 px-4 py-2',
  sm: 'h-9 px-3.5 text-xs',
  icon: 'h-9 w-9'
}

export interface ButtonProps extends React.ButtonHTMLAttributes<HTMLButtonElement> {
  variant?: ButtonVariant
  size?: ButtonSize
}

const Button = React.forwardRef<HTMLButtonElement, ButtonProps>(
  ({ className, variant = 'default', size = 'default', type = 'button', ...props }, ref) => (
    <button
      ref={ref}
      type={type}
      className={cn(
        'focus-ring-brand inline-flex items-center justify-center gap-2 whitespace-nowrap rounded-xl text-sm font-semibold transition-all duration-200 disabled:pointer-events-none disabled:opacity-50',
        variantClasses[variant],
        sizeClasses[size],
        className
      )}
      {...props}
    />
  )
)
Button.displayName = 'Button'

export { Button }
