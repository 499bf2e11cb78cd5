import assert from 'node:assert/strict'
import test from 'node:test'
import { applyDiscount, applySurcharge, computeSaleAmounts, referencePrices, summarizeSales } from './calc'

test('computeSaleAmounts derives subtotal, profit and cost-based margin', () => {
  assert.deepEqual(computeSaleAmounts(3, 15, 10), {
    subtotal: 45,
    cost_total: 30,
    profit: 15,
    margin_percent: 50
  })
})

test('margin is zero when the unit cost is zero', () => {
  assert.equal(computeSaleAmounts(2, 10, 0).margin_percent, 0)
  assert.equal(computeSaleAmounts(2, 10, 0).profit, 20)
})

test('selling under cost gives a negative profit', () => {
  const amounts = computeSaleAmounts(2, 8, 10)
  assert.equal(amounts.profit, -4)
  assert.equal(amounts.margin_percent, -20)
})

test('reference prices use a 10% discount and a 15% surcharge', () => {
  assert.equal(applyDiscount(100, 10), 90)
  assert.equal(applySurcharge(100, 15), 115)
  assert.deepEqual(referencePrices(50, 65, 70), {
    cost: 50,
    suggested: 65,
    final: 70,
    discounted: 63,
    surcharged: 80.5
  })
})

test('summarizeSales totals revenue and profit with an average ticket', () => {
  const summary = summarizeSales([
    { subtotal: 45, profit: 15, quantity: 3 },
    { subtotal: 20, profit: 5.5, quantity: 1 }
  ])
  assert.deepEqual(summary, { count: 2, units: 4, revenue: 65, profit: 20.5, averageTicket: 32.5 })
  assert.equal(summarizeSales([]).averageTicket, 0)
})
