'use client'

import Link from 'next/link'
import { usePathname } from 'next/navigation'
import { iconMap } from '@/config/icons'
import { isLinkActive, linksForRole } from '@/config/nav'
import type { Role } from '@/lib/db/types'
import { cn } from '@/lib/utils'

// The drawer carries the full list; the bar only has room for the first few sections.
const QUICK_LINKS = 5

export function MobileBottomNav({ role }: { role: Role }) {
  const pathname = usePathname()
  const links = linksForRole(role).slice(0, QUICK_LINKS)

  return (
    <nav className="fixed bottom-0 left-0 right-0 z-40 border-t border-white/70 bg-white/85 backdrop-blur-xl md:hidden dark:border-slate-800 dark:bg-slate-950/85">
      <div className="mx-2 my-2 flex h-16 items-center justify-around gap-1">
        {links.map((link) => {
          const Icon = iconMap[link.icon]
          const active = isLinkActive(link, pathname)
          return (
            <Link
              key={link.href}
              href={link.href}
              aria-current={active ? 'page' : undefined}
              className={cn(
                'flex min-w-0 flex-1 flex-col items-center justify-center gap-1 rounded-xl py-1 text-[10px] font-semibold transition-all',
                active ? 'bg-sky-50 text-primary dark:bg-slate-800' : 'text-slate-500 hover:text-slate-900'
              )}
            >
              <Icon className="h-5 w-5" />
              <span className="truncate">{link.label}</span>
            </Link>
          )
        })}
      </div>
    </nav>
  )
}
