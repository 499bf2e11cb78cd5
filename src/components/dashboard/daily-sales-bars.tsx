import { formatCurrencyCompact, formatMoney } from '@/lib/analytics/calc'
import type { DailySales } from '@/lib/analytics/dashboard'

/** Revenue per day as plain CSS bars, scaled to the best day. */
export function DailySalesBars({ days }: { days: DailySales[] }) {
  if (days.length === 0) return <p className="text-sm italic text-slate-500">No sales in this period.</p>
  const max = Math.max(...days.map((d) => d.revenue), 1)

  return (
    <div className="flex h-48 items-end gap-1 overflow-x-auto [scrollbar-width:none] [&::-webkit-scrollbar]:hidden">
      {days.map((day) => (
        <div key={day.date} className="flex h-full min-w-[18px] flex-1 flex-col justify-end" title={`${day.date}: ${formatMoney(day.revenue)} (${day.count} sales)`}>
          <div className="brand-gradient rounded-t-md" style={{ height: `${Math.max((day.revenue / max) * 100, 2)}%` }} />
          <span className="mt-1 hidden text-center text-[10px] text-slate-500 sm:block">{day.date.slice(8)}</span>
        </div>
      ))}
      <span className="sr-only">Best day {formatCurrencyCompact(max)}</span>
    </div>
  )
}
