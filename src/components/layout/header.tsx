import { MobileDrawer } from '@/components/layout/mobile-drawer'
import { ThemeToggle } from '@/components/theme-toggle'
import type { Role } from '@/lib/db/types'
import { ROLE_LABELS } from '@/lib/permissions'

interface HeaderProps {
  name: string
  role: Role
}

export function Header({ name, role }: HeaderProps) {
  return (
    <div className="flex min-h-14 items-center gap-3 px-4 py-2 md:px-5">
      <MobileDrawer role={role} />

      <div className="ml-auto flex items-center gap-2 sm:gap-3">
        <ThemeToggle />
        <div className="hidden text-right sm:block">
          <div className="text-sm font-medium">{name}</div>
          <div className="text-[11px] font-medium uppercase tracking-wide text-slate-500">{ROLE_LABELS[role]}</div>
        </div>
        <div className="brand-gradient flex h-9 w-9 items-center justify-center rounded-full text-xs font-semibold text-white shadow-sm">
          {(name[0] ?? '?').toUpperCase()}
        </div>
      </div>
    </div>
  )
}
