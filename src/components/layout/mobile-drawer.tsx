'use client'

import { useEffect, useState } from 'react'
import { usePathname } from 'next/navigation'
import { Menu, X } from 'lucide-react'
import { Button } from '@/components/ui/button'
import { LogoutButton, NavList } from '@/components/layout/nav-list'
import type { Role } from '@/lib/db/types'
import { cn } from '@/lib/utils'

export function MobileDrawer({ role }: { role: Role }) {
  const [open, setOpen] = useState(false)
  const pathname = usePathname()

  useEffect(() => {
    setOpen(false)
  }, [pathname])

  useEffect(() => {
    document.body.style.overflow = open ? 'hidden' : ''
    return () => {
      document.body.style.overflow = ''
    }
  }, [open])

  return (
    <div className="md:hidden">
      <Button variant="ghost" size="icon" onClick={() => setOpen(true)} aria-label="Open menu">
        <Menu className="h-5 w-5" />
      </Button>

      {open && <div className="fixed inset-0 z-50 bg-slate-950/35 backdrop-blur-sm" onClick={() => setOpen(false)} />}

      <div
        className={cn(
          'fixed inset-y-0 left-0 z-50 flex w-[82%] max-w-xs flex-col border-r border-white/70 bg-white/90 shadow-2xl backdrop-blur-xl transition-transform duration-300 dark:border-slate-800 dark:bg-slate-950/90',
          open ? 'translate-x-0' : '-translate-x-full'
        )}
      >
        <div className="flex h-16 items-center justify-between border-b border-white/70 px-5 dark:border-slate-800">
          <span className="text-base font-semibold">Navigation</span>
          <Button variant="ghost" size="icon" onClick={() => setOpen(false)} aria-label="Close menu">
            <X className="h-5 w-5" />
          </Button>
        </div>
        <div className="flex-1 overflow-y-auto px-3 py-4">
          <NavList role={role} />
        </div>
        <div className="border-t border-white/70 p-4 dark:border-slate-800">
          <LogoutButton />
        </div>
      </div>
    </div>
  )
}
