import assert from 'node:assert/strict'
import test from 'node:test'
import { MemoryStore } from '@/test/memory-store'
import type { FixedCost } from '@/lib/db/types'
import {
  createFixedCost,
  deactivateFixedCost,
  isCostInEffect,
  monthlyFixedCosts,
  proratedFixedCosts
} from './fixed-costs'

function cost(overrides: Partial<FixedCost>): FixedCost {
  return {
    id: 'x',
    name: 'Rent',
    amount: 100,
    frequency: 'monthly',
    start_date: '2024-01-01',
    end_date: null,
    description: null,
    is_active: true,
    ...overrides
  }
}

test('monthly total adds monthly costs, spreads yearly ones and skips one-time costs', () => {
  const costs = [
    cost({ id: 'rent', amount: 1000 }),
    cost({ id: 'insurance', amount: 1200, frequency: 'yearly' }),
    cost({ id: 'sign', amount: 500, frequency: 'one_time' })
  ]
  assert.equal(monthlyFixedCosts(costs, '2024-06-15'), 1100)
})

test('costs count only between their start and end dates', () => {
  const ended = cost({ end_date: '2024-05-31' })
  const future = cost({ start_date: '2024-07-01' })
  const inactive = cost({ is_active: false })
  assert.equal(isCostInEffect(ended, '2024-06-15'), false)
  assert.equal(isCostInEffect(ended, '2024-05-31'), true)
  assert.equal(isCostInEffect(future, '2024-06-15'), false)
  assert.equal(isCostInEffect(inactive, '2024-06-15'), false)
  assert.equal(monthlyFixedCosts([ended, future, inactive], '2024-06-15'), 0)
})

test('proratedFixedCosts spreads the monthly total per day', () => {
  assert.equal(proratedFixedCosts(900, 7), 210)
  assert.equal(proratedFixedCosts(1000, 30), 1000)
})

test('createFixedCost validates and deactivate is a soft delete', async () => {
  const store = new MemoryStore()
  await assert.rejects(createFixedCost(store, { name: 'Rent', amount: 0, frequency: 'monthly', start_date: '2024-01-01' }), /Amount must be greater than 0/)
  await assert.rejects(createFixedCost(store, { name: 'Rent', amount: 10, frequency: 'weekly', start_date: '2024-01-01' }), /Choose a frequency/)
  await assert.rejects(
    createFixedCost(store, { name: 'Rent', amount: 10, frequency: 'monthly', start_date: '2024-02-01', end_date: '2024-01-01' }),
    /End date must be after the start date/
  )

  const created = await createFixedCost(store, { name: 'Rent', amount: '850', frequency: 'monthly', start_date: '2024-01-01', end_date: '' })
  assert.equal(created.amount, 850)
  assert.equal(created.end_date, null)
  await deactivateFixedCost(store, created.id)
  assert.deepEqual(await store.listFixedCosts(), [])
  assert.equal((await store.listFixedCosts(true)).length, 1)
})
