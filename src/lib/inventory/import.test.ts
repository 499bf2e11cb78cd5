import assert from 'node:assert/strict'
import test from 'node:test'
import { MemoryStore } from '@/test/memory-store'
import type { NewSupplier } from '@/lib/db/types'
import type { SheetRow } from './spreadsheet'
import { importProducts, validateImportRow } from './import'

function row(rowNumber: number, values: SheetRow['values']): SheetRow {
  return { rowNumber, values }
}

async function setup() {
  const store = new MemoryStore()
  const electronics = await store.insertCategory({ name: 'Electronics', description: null, code: 'ELECTR' })
  const cable = await store.insertProduct({
    code: 'ELECTR-0001', name: 'Cable', brand: null, variant: null, packaging: null, unit: 'Unit', location: null,
    notes: null, category_id: electronics.id, supplier_id: null, purchase_price: 2, stock_current: 2,
    stock_minimum: 0, is_active: false, is_paused: false
  })
  return { store, electronics, cable }
}

test('importProducts creates, updates and reports rows in order', async () => {
  const { store, cable } = await setup()
  const result = await importProducts(
    store,
    [
      row(2, { name: 'cable', category: 'electronics', purchase_price: 3, initial_stock: 5, supplier: 'Acme', purchase_date: '2024-04-01' }),
      row(3, { name: 'Lamp', category: 'Home Decor', purchase_price: '12,5', minimum_stock: 2 }),
      row(4, { name: 'Lamp Shade', category: 'home decor', purchase_price: 4, initial_stock: 1 }),
      row(5, { name: null, category: 'Home', purchase_price: 'abc', initial_stock: '1.5' }),
      row(6, { name: 'Plug', category: 'Electronics', purchase_price: 1, unit: 'barrel', purchase_date: '2024/01/01' }),
      row(7, { name: 'Cable', category: 'Electronics', purchase_price: 3, initial_stock: 2 })
    ],
    { today: '2024-05-01' }
  )

  assert.equal(result.created, 2)
  assert.equal(result.updated, 2)
  assert.equal(result.failed, 2)
  assert.deepEqual(result.categoriesCreated, ['Home Decor'])
  assert.deepEqual(result.suppliersCreated, ['Acme'])
  assert.deepEqual(result.details.map((d) => d.message), [
    'Row 2: updated ELECTR-0001 (+5 in stock)',
    'Row 3: created HOMDEC-0001',
    'Row 4: created HOMDEC-0002 (+1 in stock)',
    'Row 5: name is required, purchase_price must be a number, initial_stock must be a whole number of 0 or more',
    'Row 6: unit must be one of Unit, kg, g, l, ml, pack, box, dozen, purchase_date must be YYYY-MM-DD',
    'Row 7: updated ELECTR-0001 (+2 in stock)'
  ])

  const updated = await store.getProduct(cable.id)
  assert.equal(updated?.is_active, true)
  assert.equal(updated?.purchase_price, 3)
  assert.equal(updated?.stock_current, 9)
  assert.equal(updated?.supplier_id, store.suppliers[0].id)

  const lamp = store.products.find((p) => p.name === 'Lamp')
  assert.equal(lamp?.purchase_price, 12.5)
  assert.equal(lamp?.stock_minimum, 2)
  assert.equal(lamp?.stock_current, 0)

  assert.deepEqual(
    store.purchases.map((p) => [p.quantity, p.unit_price, p.purchase_date]),
    [
      [5, 3, '2024-04-01'],
      [1, 4, '2024-05-01'],
      [2, 3, '2024-05-01']
    ]
  )
  assert.equal(store.categories.length, 2)
})

test('a row that fails while reconciling does not stop the import', async () => {
  class FlakyStore extends MemoryStore {
    async insertSupplier(input: NewSupplier) {
      if (input.name === 'Broken') throw new Error('supplier offline')
      return super.insertSupplier(input)
    }
  }
  const store = new FlakyStore()
  const result = await importProducts(
    store,
    [
      row(2, { name: 'Ball', category: 'Toys', purchase_price: 1, supplier: 'Broken' }),
      row(3, { name: 'Kite', category: 'Toys', purchase_price: 2 })
    ],
    { today: '2024-05-01' }
  )

  assert.equal(result.failed, 1)
  assert.equal(result.created, 1)
  assert.deepEqual(result.details.map((d) => d.message), ['Row 2: Something went wrong. Please try again.', 'Row 3: created TOYS-0001'])
})

test('validateImportRow requires a price when initial stock is given', () => {
  const validation = validateImportRow(row(2, { name: 'Ball', category: 'Toys', purchase_price: 0, initial_stock: 3 }))
  assert.deepEqual(validation, { ok: false, reasons: ['purchase_price must be greater than 0 when initial_stock is set'] })
})

test('validateImportRow fills defaults for optional columns', () => {
  const validation = validateImportRow(row(9, { name: 'Ball', category: 'Toys', purchase_price: '2', unit: 'PACK' }))
  assert.equal(validation.ok, true)
  if (!validation.ok) return
  assert.equal(validation.row.unit, 'pack')
  assert.equal(validation.row.initial_stock, 0)
  assert.equal(validation.row.minimum_stock, 0)
  assert.equal(validation.row.purchase_date, null)
  assert.equal(validation.row.brand, null)
})

test('validateImportRow rejects thousands separators instead of misreading them', () => {
  const grouped = validateImportRow(row(2, { name: 'Ball', category: 'Toys', purchase_price: '1,250' }))
  assert.deepEqual(grouped, { ok: false, reasons: ['purchase_price must be a number'] })
  const european = validateImportRow(row(3, { name: 'Ball', category: 'Toys', purchase_price: '1.234,5' }))
  assert.deepEqual(european, { ok: false, reasons: ['purchase_price must be a number'] })
  const stock = validateImportRow(row(4, { name: 'Ball', category: 'Toys', purchase_price: 2, initial_stock: '1,000' }))
  assert.deepEqual(stock, { ok: false, reasons: ['initial_stock must be a whole number of 0 or more'] })
})

test('validateImportRow reads a decimal comma with up to two decimals', () => {
  const validation = validateImportRow(row(2, { name: 'Ball', category: 'Toys', purchase_price: '12,50' }))
  assert.equal(validation.ok, true)
  if (!validation.ok) return
  assert.equal(validation.row.purchase_price, 12.5)
})
