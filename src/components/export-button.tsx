import { Download } from 'lucide-react'
import type { ExportResource } from '@/lib/exports'
import type { DateRange } from '@/lib/db/types'

/** Plain link so the browser handles the .xlsx download from the route handler. */
export function ExportButton({ resource, range }: { resource: ExportResource; range?: DateRange }) {
  const query = range ? `?${new URLSearchParams({ from: range.from, to: range.to }).toString()}` : ''
  return (
    <a
      href={`/api/export/${resource}${query}`}
      className="focus-ring-brand inline-flex h-9 items-center gap-2 rounded-xl border border-[hsl(var(--surface-border))] bg-white/80 px-3.5 text-xs font-semibold text-slate-700 shadow-sm hover:bg-white dark:bg-slate-900/60 dark:text-slate-200"
    >
      <Download className="h-4 w-4" />
      Export
    </a>
  )
}
