import assert from 'node:assert/strict'
import test from 'node:test'
import { MemoryStore } from '@/test/memory-store'
import type { Product } from '@/lib/db/types'
import { buildPriceList, buildPriceListRow, parseAdjustments, priceListStats, savePrice } from './price-list'

function product(id: string, cost: number): Product {
  return {
    id,
    code: `GEN-${id}`,
    name: `Product ${id}`,
    brand: null,
    variant: null,
    packaging: null,
    unit: 'Unit',
    location: null,
    notes: null,
    category_id: null,
    supplier_id: null,
    purchase_price: cost,
    stock_current: 0,
    stock_minimum: 0,
    is_active: true,
    is_paused: false,
    created_at: ''
  }
}

test('a product without an entry uses the 30% default margin', () => {
  const row = buildPriceListRow(product('1', 100), undefined)
  assert.equal(row.target_margin, 30)
  assert.equal(row.suggested_price, 130)
  assert.equal(row.final_price, 130)
  assert.equal(row.real_margin, 30)
  assert.equal(row.has_final_price, false)
  assert.equal(row.discounted_price, 117)
  assert.equal(row.surcharged_price, 149.5)
})

test('a stored final price drives the real margin', () => {
  const row = buildPriceListRow(product('1', 80), { id: 'e', product_id: '1', target_margin: 25, final_price: 110 })
  assert.equal(row.suggested_price, 100)
  assert.equal(row.final_price, 110)
  assert.equal(row.real_margin, 37.5)
})

test('real margin is zero when the cost is zero', () => {
  const row = buildPriceListRow(product('1', 0), { id: 'e', product_id: '1', target_margin: 25, final_price: 10 })
  assert.equal(row.real_margin, 0)
})

test('custom discount and surcharge percentages apply to the final price', () => {
  const row = buildPriceListRow(product('1', 100), undefined, { discount: 20, surcharge: 50 })
  assert.equal(row.discounted_price, 104)
  assert.equal(row.surcharged_price, 195)
})

test('buildPriceList skips inactive products and priceListStats summarises', () => {
  const inactive = { ...product('3', 10), is_active: false }
  const rows = buildPriceList(
    [product('1', 100), product('2', 50), inactive],
    [{ id: 'e', product_id: '2', target_margin: 40, final_price: null }]
  )
  assert.deepEqual(rows.map((r) => r.final_price), [130, 70])
  assert.deepEqual(priceListStats(rows), {
    averageMargin: 35,
    highestPrice: 130,
    lowestPrice: 70,
    averageDiscounted: 90
  })
  assert.deepEqual(priceListStats([]), { averageMargin: 0, highestPrice: 0, lowestPrice: 0, averageDiscounted: 0 })
})

test('savePrice upserts one entry per product and validates ranges', async () => {
  const store = new MemoryStore()
  await savePrice(store, { product_id: 'p1', target_margin: '40', final_price: '' })
  await savePrice(store, { product_id: 'p1', target_margin: '45', final_price: '19.99' })
  assert.deepEqual(store.priceEntries.map((e) => [e.product_id, e.target_margin, e.final_price]), [['p1', 45, 19.99]])

  await assert.rejects(savePrice(store, { product_id: 'p1', target_margin: 501 }), /Target margin must be at most 500/)
  await assert.rejects(savePrice(store, { product_id: 'p1', target_margin: 10, final_price: -1 }), /Final price must be at least 0/)
})

test('parseAdjustments defaults and bounds', () => {
  assert.deepEqual(parseAdjustments({}), { discount: 10, surcharge: 15 })
  assert.throws(() => parseAdjustments({ discount: '101' }), /Discount must be at most 100/)
})
