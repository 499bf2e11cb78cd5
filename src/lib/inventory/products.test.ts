import assert from 'node:assert/strict'
import test from 'node:test'
import { MemoryStore } from '@/test/memory-store'
import {
  clearInventory,
  createProduct,
  deactivateProduct,
  filterProducts,
  lowStockProducts,
  parseUnit,
  stockRows,
  updateProduct,
  withNames
} from './products'

async function setup() {
  const store = new MemoryStore()
  const electronics = await store.insertCategory({ name: 'Electronics', description: null, code: 'ELECTR' })
  const home = await store.insertCategory({ name: 'Home', description: null, code: null })
  return { store, electronics, home }
}

test('createProduct assigns the next code under the category and sets initial stock', async () => {
  const { store, electronics } = await setup()
  const first = await createProduct(store, { name: 'Cable', category_id: electronics.id, purchase_price: '2.5', initial_stock: '4' })
  const second = await createProduct(store, { name: 'Plug', category_id: electronics.id, purchase_price: '1' })

  assert.equal(first.code, 'ELECTR-0001')
  assert.equal(first.stock_current, 4)
  assert.equal(first.purchase_price, 2.5)
  assert.equal(first.unit, 'Unit')
  assert.equal(second.code, 'ELECTR-0002')
  assert.equal(second.stock_current, 0)
})

test('createProduct generates the category code when it is missing', async () => {
  const { store, home } = await setup()
  const product = await createProduct(store, { name: 'Lamp', category_id: home.id, purchase_price: 10 })
  assert.equal(product.code, 'HOME-0001')
  assert.equal(store.categories.find((c) => c.id === home.id)?.code, 'HOME')
})

test('createProduct validates required fields', async () => {
  const { store, electronics } = await setup()
  await assert.rejects(createProduct(store, { name: '', category_id: electronics.id, purchase_price: 1 }), /Product name is required/)
  await assert.rejects(createProduct(store, { name: 'Cable', purchase_price: 1 }), /Category is required/)
  await assert.rejects(createProduct(store, { name: 'Cable', category_id: electronics.id, purchase_price: '-1' }), /Purchase price must be at least 0/)
  await assert.rejects(createProduct(store, { name: 'Cable', category_id: 'missing', purchase_price: 1 }), /Category not found/)
})

test('codes of deactivated products are not reused', async () => {
  const { store, electronics } = await setup()
  const first = await createProduct(store, { name: 'Cable', category_id: electronics.id, purchase_price: 1 })
  await deactivateProduct(store, first.id)
  const next = await createProduct(store, { name: 'Plug', category_id: electronics.id, purchase_price: 1 })
  assert.equal(next.code, 'ELECTR-0002')
})

test('codes stay unique when a category holds more than a thousand products', async () => {
  const { store, electronics } = await setup()
  const base = await createProduct(store, { name: 'Item', category_id: electronics.id, purchase_price: 1 })
  for (let seq = 2; seq <= 1200; seq++) {
    store.products.push({ ...base, id: `seed-${seq}`, name: `Item ${seq}`, code: `ELECTR-${String(seq).padStart(4, '0')}` })
  }
  const next = await createProduct(store, { name: 'Plug', category_id: electronics.id, purchase_price: 1 })
  assert.equal(next.code, 'ELECTR-1201')
})

test('changing category regenerates the code', async () => {
  const { store, electronics, home } = await setup()
  const product = await createProduct(store, { name: 'Lamp', category_id: electronics.id, purchase_price: 10 })
  const code = await updateProduct(store, product.id, { name: 'Lamp', category_id: home.id, purchase_price: 12, is_paused: 'on' })

  assert.equal(code, 'HOME-0001')
  const stored = await store.getProduct(product.id)
  assert.equal(stored?.code, 'HOME-0001')
  assert.equal(stored?.purchase_price, 12)
  assert.equal(stored?.is_paused, true)
})

test('updating within the same category keeps the code', async () => {
  const { store, electronics } = await setup()
  const product = await createProduct(store, { name: 'Cable', category_id: electronics.id, purchase_price: 1 })
  const code = await updateProduct(store, product.id, { name: 'USB Cable', category_id: electronics.id, purchase_price: 1 })
  assert.equal(code, 'ELECTR-0001')
})

test('deactivateProduct is a soft delete that also clears the pause flag', async () => {
  const { store, electronics } = await setup()
  const product = await createProduct(store, { name: 'Cable', category_id: electronics.id, purchase_price: 1 })
  await store.updateProduct(product.id, { is_paused: true })
  await deactivateProduct(store, product.id)

  assert.equal(store.products.length, 1)
  assert.equal(store.products[0].is_active, false)
  assert.equal(store.products[0].is_paused, false)
  assert.deepEqual(await store.listProducts(), [])
})

test('clearInventory requires the confirmation phrase', async () => {
  const { store, electronics } = await setup()
  await createProduct(store, { name: 'Cable', category_id: electronics.id, purchase_price: 1 })
  await createProduct(store, { name: 'Plug', category_id: electronics.id, purchase_price: 1 })

  await assert.rejects(clearInventory(store, 'delete all'), /Type DELETE ALL to confirm/)
  assert.equal(await clearInventory(store, ' DELETE ALL '), 2)
  assert.equal(store.products.every((p) => !p.is_active), true)
})

test('parseUnit accepts known units case-insensitively', () => {
  assert.equal(parseUnit('KG'), 'kg')
  assert.equal(parseUnit(''), 'Unit')
  assert.throws(() => parseUnit('barrel'), /Unit must be one of/)
})

test('lowStockProducts lists active unpaused products at or under their minimum', async () => {
  const { store, electronics } = await setup()
  const a = await createProduct(store, { name: 'A', category_id: electronics.id, purchase_price: 1, initial_stock: 5, stock_minimum: 2 })
  const b = await createProduct(store, { name: 'B', category_id: electronics.id, purchase_price: 1, initial_stock: 2, stock_minimum: 2 })
  const c = await createProduct(store, { name: 'C', category_id: electronics.id, purchase_price: 1, initial_stock: 0, stock_minimum: 3 })
  const d = await createProduct(store, { name: 'D', category_id: electronics.id, purchase_price: 1, initial_stock: 0, stock_minimum: 1 })
  await store.updateProduct(d.id, { is_paused: true })

  assert.deepEqual(lowStockProducts(store.products).map((p) => p.id), [c.id, b.id])
  assert.notEqual(a.id, b.id)
})

test('withNames joins category and supplier names', async () => {
  const { store, electronics } = await setup()
  const supplier = await store.insertSupplier({ name: 'Acme', contact: null, phone: null, email: null, notes: null })
  await createProduct(store, { name: 'Cable', category_id: electronics.id, supplier_id: supplier.id, purchase_price: 1 })
  const [row] = withNames(store.products, store.categories, store.suppliers)
  assert.equal(row.category_name, 'Electronics')
  assert.equal(row.category_code, 'ELECTR')
  assert.equal(row.supplier_name, 'Acme')
})

test('filterProducts combines search term, category and stock filters', async () => {
  const { store, electronics, home } = await setup()
  await createProduct(store, { name: 'USB Cable', category_id: electronics.id, purchase_price: 1, initial_stock: 1, stock_minimum: 2 })
  await createProduct(store, { name: 'Lamp', brand: 'Lumo', category_id: home.id, purchase_price: 1, initial_stock: 9, location: 'Shelf B' })
  const rows = withNames(store.products, store.categories, store.suppliers)

  assert.deepEqual(filterProducts(rows, { term: 'cable' }).map((p) => p.name), ['USB Cable'])
  assert.deepEqual(filterProducts(rows, { term: 'shelf b' }).map((p) => p.name), ['Lamp'])
  assert.deepEqual(filterProducts(rows, { term: 'lumo', categoryId: electronics.id }), [])
  assert.deepEqual(filterProducts(rows, { lowStockOnly: true }).map((p) => p.name), ['USB Cable'])
  assert.equal(filterProducts(rows, {}).length, 2)
})

test('stockRows withholds the purchase price from roles that may not see costs', async () => {
  const { store, electronics } = await setup()
  await createProduct(store, { name: 'Cable', category_id: electronics.id, purchase_price: 2.5 })
  const rows = withNames(store.products, store.categories, store.suppliers)

  const [hidden] = stockRows(rows, false)
  assert.equal(hidden.purchase_price, null)
  assert.equal(hidden.code, 'ELECTR-0001')
  assert.equal(stockRows(rows, true)[0].purchase_price, 2.5)
})
