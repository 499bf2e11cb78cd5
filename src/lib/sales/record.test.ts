import assert from 'node:assert/strict'
import test from 'node:test'
import { MemoryStore } from '@/test/memory-store'
import { createProduct } from '@/lib/inventory/products'
import { SALE_DELETED_MESSAGE, deleteSale, recordSale, saleRows, withSaleNames } from './record'

async function setup() {
  const store = new MemoryStore()
  const category = await store.insertCategory({ name: 'Electronics', description: null, code: 'ELECTR' })
  const product = await createProduct(store, { name: 'Cable', category_id: category.id, purchase_price: 10, initial_stock: 5 })
  const customer = await store.insertCustomer({
    document_id: '30111222',
    name: 'Ana Gomez',
    phone: null,
    email: null,
    address: null,
    notes: null,
    total_purchases: 1,
    total_spent: 20,
    last_purchase_at: '2024-01-05'
  })
  return { store, product, customer }
}

test('recordSale snapshots cost, computes profit and takes stock out', async () => {
  const { store, product } = await setup()
  const sale = await recordSale(store, { product_id: product.id, quantity: '2', unit_price: '15', sale_date: '2024-02-01' })

  assert.equal(sale.unit_cost, 10)
  assert.equal(sale.subtotal, 30)
  assert.equal(sale.profit, 10)
  assert.equal(sale.margin_percent, 50)
  assert.equal(sale.customer_id, null)
  assert.equal((await store.getProduct(product.id))?.stock_current, 3)
})

test('recordSale updates the customer found by document', async () => {
  const { store, product, customer } = await setup()
  const sale = await recordSale(store, {
    product_id: product.id,
    quantity: 1,
    unit_price: 12.5,
    sale_date: '2024-02-01',
    customer_document: ' 30111222 '
  })

  assert.equal(sale.customer_id, customer.id)
  const updated = await store.getCustomer(customer.id)
  assert.equal(updated?.total_purchases, 2)
  assert.equal(updated?.total_spent, 32.5)
  assert.equal(updated?.last_purchase_at, '2024-02-01')
})

test('a back-dated sale keeps the later last purchase date', async () => {
  const { store, product, customer } = await setup()
  await recordSale(store, { product_id: product.id, quantity: 1, unit_price: 12, sale_date: '2023-12-01', customer_document: '30111222' })
  assert.equal((await store.getCustomer(customer.id))?.last_purchase_at, '2024-01-05')
})

test('recordSale rejects bad input without touching stock', async () => {
  const { store, product } = await setup()
  const base = { product_id: product.id, quantity: 1, unit_price: 15, sale_date: '2024-02-01' }
  await assert.rejects(recordSale(store, { ...base, unit_price: 0 }), /Unit price must be greater than 0/)
  await assert.rejects(recordSale(store, { ...base, quantity: 6 }), /Only 5 in stock/)
  await assert.rejects(recordSale(store, { ...base, customer_document: '999' }), /No customer with document 999/)
  assert.equal(store.sales.length, 0)
  assert.equal((await store.getProduct(product.id))?.stock_current, 5)
})

test('deleteSale keeps stock and customer totals', async () => {
  const { store, product, customer } = await setup()
  const sale = await recordSale(store, { product_id: product.id, quantity: 2, unit_price: 15, sale_date: '2024-02-01', customer_document: '30111222' })
  assert.equal(await deleteSale(store, sale.id), SALE_DELETED_MESSAGE)
  assert.equal(store.sales.length, 0)
  assert.equal((await store.getProduct(product.id))?.stock_current, 3)
  assert.equal((await store.getCustomer(customer.id))?.total_purchases, 2)
})

test('withSaleNames joins product and customer names', async () => {
  const { store, product, customer } = await setup()
  await recordSale(store, { product_id: product.id, quantity: 1, unit_price: 15, sale_date: '2024-02-01', customer_document: '30111222' })

  const [view] = withSaleNames(store.sales, store.products, store.customers)
  assert.equal(view.product_name, 'Cable')
  assert.equal(view.product_code, product.code)
  assert.equal(view.customer_name, customer.name)
})

test('saleRows withholds cost figures from roles that may not see costs', async () => {
  const { store, product } = await setup()
  await recordSale(store, { product_id: product.id, quantity: 2, unit_price: 15, sale_date: '2024-02-01' })
  const views = withSaleNames(store.sales, store.products, store.customers)

  const [hidden] = saleRows(views, false)
  assert.equal(hidden.unit_cost, null)
  assert.equal(hidden.profit, null)
  assert.equal(hidden.margin_percent, null)
  assert.equal(hidden.subtotal, 30)

  const [shown] = saleRows(views, true)
  assert.equal(shown.unit_cost, views[0].unit_cost)
  assert.equal(shown.profit, views[0].profit)
})
