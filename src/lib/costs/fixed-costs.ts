import type { ResaleStore } from '@/lib/db/store'
import { COST_FREQUENCIES, type CostFrequency, type FixedCost, type NewFixedCost } from '@/lib/db/types'
import { ValidationError } from '@/lib/errors'
import { round2 } from '@/lib/utils'
import { isBlank, nullable, requireDate, requireNumber, requireText } from '@/lib/validation'

export const FREQUENCY_LABELS: Record<CostFrequency, string> = {
  monthly: 'Monthly',
  yearly: 'Yearly',
  one_time: 'One-time'
}

export type FixedCostInput = Partial<Record<'name' | 'amount' | 'frequency' | 'start_date' | 'end_date' | 'description', unknown>>

function validateFixedCost(input: FixedCostInput): Omit<NewFixedCost, 'is_active'> {
  const frequency = COST_FREQUENCIES.find((f) => f === input.frequency)
  if (!frequency) throw new ValidationError('Choose a frequency')
  const startDate = requireDate(input.start_date, 'Start date')
  const endDate = isBlank(input.end_date) ? null : requireDate(input.end_date, 'End date')
  if (endDate && endDate < startDate) throw new ValidationError('End date must be after the start date')

  return {
    name: requireText(input.name, 'Cost name'),
    amount: requireNumber(input.amount, 'Amount', { exclusiveMin: 0 }),
    frequency,
    start_date: startDate,
    end_date: endDate,
    description: nullable(input.description)
  }
}

export async function createFixedCost(store: ResaleStore, input: FixedCostInput): Promise<FixedCost> {
  return store.insertFixedCost({ ...validateFixedCost(input), is_active: true })
}

export async function updateFixedCost(store: ResaleStore, id: string, input: FixedCostInput) {
  await store.updateFixedCost(id, validateFixedCost(input))
}

export async function deactivateFixedCost(store: ResaleStore, id: string) {
  await store.updateFixedCost(id, { is_active: false })
}

export function isCostInEffect(cost: FixedCost, date: string): boolean {
  return cost.is_active && cost.start_date <= date && (!cost.end_date || cost.end_date >= date)
}

/** Monthly equivalent of one cost: yearly costs are spread over 12 months, one-time costs are left out. */
export function monthlyAmount(cost: Pick<FixedCost, 'amount' | 'frequency'>): number {
  switch (cost.frequency) {
    case 'monthly':
      return cost.amount
    case 'yearly':
      return cost.amount / 12
    case 'one_time':
      return 0
  }
}

export function monthlyFixedCosts(costs: FixedCost[], date: string): number {
  return round2(costs.filter((c) => isCostInEffect(c, date)).reduce((sum, c) => sum + monthlyAmount(c), 0))
}

export function proratedFixedCosts(monthlyTotal: number, days: number): number {
  return round2((monthlyTotal / 30) * days)
}
