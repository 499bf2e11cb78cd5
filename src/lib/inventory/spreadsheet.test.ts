import assert from 'node:assert/strict'
import test from 'node:test'
import { buildImportTemplate, IMPORT_COLUMNS, validateImportRow } from './import'
import { cellToPlain, exportWorkbook, headerKey, readSheetRows } from './spreadsheet'

test('the import template reads back as one valid example row', async () => {
  const rows = await readSheetRows(await buildImportTemplate('2024-01-15'))

  assert.equal(rows.length, 1)
  assert.equal(rows[0].rowNumber, 2)
  assert.deepEqual(Object.keys(rows[0].values), [...IMPORT_COLUMNS])
  assert.equal(rows[0].values.name, 'USB-C Cable 1m')
  assert.equal(rows[0].values.purchase_price, 2.5)
  assert.equal(rows[0].values.notes, null)
  assert.equal(rows[0].values.purchase_date, '2024-01-15')
  assert.equal(validateImportRow(rows[0]).ok, true)
})

test('exportWorkbook writes a header row and one row per record', async () => {
  const data = await exportWorkbook({
    name: 'Products',
    columns: [
      { header: 'Code', value: (p: { code: string; stock: number }) => p.code },
      { header: 'Stock now', value: (p: { code: string; stock: number }) => p.stock }
    ],
    rows: [
      { code: 'ELECTR-0001', stock: 4 },
      { code: 'HOME-0001', stock: 0 }
    ]
  })

  const rows = await readSheetRows(data)
  assert.deepEqual(rows.map((r) => r.values), [
    { code: 'ELECTR-0001', stock_now: 4 },
    { code: 'HOME-0001', stock_now: 0 }
  ])
})

test('readSheetRows rejects files that are not workbooks', async () => {
  await assert.rejects(readSheetRows(new ArrayBuffer(16)), /not a valid .xlsx workbook/)
})

test('cellToPlain flattens rich values', () => {
  assert.equal(cellToPlain(new Date(Date.UTC(2024, 1, 3))), '2024-02-03')
  assert.equal(cellToPlain({ formula: 'A1*2', result: 8, date1904: false }), 8)
  assert.equal(cellToPlain({ richText: [{ text: 'Blue ' }, { text: 'Pen' }] }), 'Blue Pen')
  assert.equal(cellToPlain({ text: 'Site', hyperlink: 'https://example.com' }), 'Site')
  assert.equal(cellToPlain('   '), null)
  assert.equal(cellToPlain(undefined), null)
})

test('headerKey lower-cases and joins words', () => {
  assert.equal(headerKey(' Purchase Price '), 'purchase_price')
})
