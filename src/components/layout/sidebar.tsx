import { LogoutButton, NavList } from '@/components/layout/nav-list'
import type { Role } from '@/lib/db/types'
import { ROLE_LABELS } from '@/lib/permissions'

interface SidebarProps {
  role: Role
  businessName: string
}

export function Sidebar({ role, businessName }: SidebarProps) {
  return (
    <div className="flex h-full w-full flex-col">
      <div className="px-6 pb-4 pt-6">
        <div className="rounded-2xl border border-white/70 bg-white/75 px-4 py-3 shadow-[0_12px_24px_-20px_rgba(15,23,42,0.6)] dark:border-slate-800 dark:bg-slate-900/70">
          <p className="text-[11px] font-semibold uppercase tracking-[0.16em] text-slate-500">Resale</p>
          <p className="truncate text-lg font-semibold">{businessName}</p>
          <p className="mt-0.5 text-xs text-slate-500">{ROLE_LABELS[role]}</p>
        </div>
      </div>
      <div className="flex-1 overflow-auto px-4 pb-4">
        <NavList role={role} />
      </div>
      <div className="mt-auto border-t border-white/70 p-4 dark:border-slate-800">
        <LogoutButton />
      </div>
    </div>
  )
}
