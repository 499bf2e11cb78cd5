import assert from 'node:assert/strict'
import test from 'node:test'
import { MemoryStore } from '@/test/memory-store'
import { createProduct } from './products'
import { adjustStock, stockHistory } from './stock'

async function setup() {
  const store = new MemoryStore()
  const category = await store.insertCategory({ name: 'Electronics', description: null, code: 'ELECTR' })
  const product = await createProduct(store, { name: 'Cable', category_id: category.id, purchase_price: 1, initial_stock: 10 })
  return { store, product }
}

test('adjustStock records the difference and sets the new stock', async () => {
  const { store, product } = await setup()
  const adjustment = await adjustStock(store, {
    productId: product.id,
    newQuantity: '7',
    reason: 'Damage',
    notes: 'Water damage',
    date: '2024-05-02',
    userId: 'user-1'
  })

  assert.equal(adjustment.previous_quantity, 10)
  assert.equal(adjustment.new_quantity, 7)
  assert.equal(adjustment.difference, -3)
  assert.equal(adjustment.created_by, 'user-1')
  assert.equal((await store.getProduct(product.id))?.stock_current, 7)
})

test('adjustStock rejects unchanged, negative and unknown-reason adjustments', async () => {
  const { store, product } = await setup()
  const base = { productId: product.id, reason: 'Loss', date: '2024-05-02' }
  await assert.rejects(adjustStock(store, { ...base, newQuantity: 10 }), /Stock did not change/)
  await assert.rejects(adjustStock(store, { ...base, newQuantity: -1 }), /New stock must be at least 0/)
  await assert.rejects(adjustStock(store, { ...base, newQuantity: 3, reason: 'Gift' }), /Unknown adjustment reason/)
  assert.equal(store.adjustments.length, 0)
})

test('stockHistory returns the newest adjustments first', async () => {
  const { store, product } = await setup()
  await adjustStock(store, { productId: product.id, newQuantity: 8, reason: 'Loss', date: '2024-05-01' })
  await adjustStock(store, { productId: product.id, newQuantity: 12, reason: 'Return', date: '2024-05-02' })

  const history = await stockHistory(store, product.id)
  assert.deepEqual(history.map((a) => a.new_quantity), [12, 8])
  assert.deepEqual((await stockHistory(store, product.id, 1)).map((a) => a.reason), ['Return'])
})
