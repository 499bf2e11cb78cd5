'use client'

import Link from 'next/link'
import { usePathname } from 'next/navigation'
import { iconMap } from '@/config/icons'
import { isLinkActive, linksForRole } from '@/config/nav'
import type { Role } from '@/lib/db/types'
import { cn } from '@/lib/utils'

export function NavList({ role }: { role: Role }) {
  const pathname = usePathname()

  return (
    <nav className="grid gap-1.5 text-sm font-medium">
      {linksForRole(role).map((link) => {
        const Icon = iconMap[link.icon]
        const active = isLinkActive(link, pathname)
        return (
          <Link
            key={link.href}
            href={link.href}
            aria-current={active ? 'page' : undefined}
            className={cn(
              'group flex items-center gap-3 rounded-xl px-3.5 py-2.5 transition-all duration-200',
              active
                ? 'brand-gradient text-white shadow-[0_10px_22px_-16px_rgba(15,23,42,0.9)]'
                : 'text-slate-600 hover:bg-white/70 hover:text-slate-900 dark:text-slate-300 dark:hover:bg-slate-800/70'
            )}
          >
            <Icon className={cn('h-4 w-4 shrink-0', active ? 'text-white' : 'text-slate-500 group-hover:text-slate-700')} />
            {link.label}
          </Link>
        )
      })}
    </nav>
  )
}

export function LogoutButton() {
  return (
    <form action="/logout" method="post">
      <button
        type="submit"
        className="focus-ring-brand flex w-full items-center justify-center rounded-xl border border-white/70 bg-white/70 px-3.5 py-2.5 text-sm font-medium text-slate-600 transition-all hover:border-red-200 hover:bg-red-50 hover:text-red-700 dark:border-slate-700 dark:bg-slate-900/60 dark:text-slate-300"
      >
        Log out
      </button>
    </form>
  )
}
