'use client'

import { useState, type ReactNode } from 'react'
import { useRouter } from 'next/navigation'
import { Loader2 } from 'lucide-react'
import { toast } from 'sonner'
import { Button, type ButtonProps } from '@/components/ui/button'
import type { ActionResult } from '@/lib/errors'

interface ConfirmActionButtonProps {
  action: () => Promise<ActionResult>
  confirmText?: string
  successText: string
  children: ReactNode
  variant?: ButtonProps['variant']
  size?: ButtonProps['size']
  className?: string
  title?: string
}

/** Runs a server action after an optional browser confirm, then toasts the outcome. */
export function ConfirmActionButton({
  action,
  confirmText,
  successText,
  children,
  variant = 'ghost',
  size = 'sm',
  className,
  title
}: ConfirmActionButtonProps) {
  const [loading, setLoading] = useState(false)
  const router = useRouter()

  async function handleClick() {
    if (confirmText && !confirm(confirmText)) return
    setLoading(true)
    try {
      const result = await action()
      if (!result.ok) {
        toast.error(result.error)
        return
      }
      toast.success(result.message ?? successText)
      router.refresh()
    } catch (err) {
      console.error(err)
      toast.error('An unexpected error occurred')
    } finally {
      setLoading(false)
    }
  }

  return (
    <Button variant={variant} size={size} onClick={handleClick} disabled={loading} className={className} title={title}>
      {loading ? <Loader2 className="h-4 w-4 animate-spin" /> : children}
    </Button>
  )
}
