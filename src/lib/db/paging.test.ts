import assert from 'node:assert/strict'
import test from 'node:test'
import { StoreError } from '@/lib/errors'
import { fetchAllPages } from './paging'

function cappedTable(total: number, cap: number) {
  const rows = Array.from({ length: total }, (_, i) => ({ id: i }))
  const calls: [number, number][] = []
  const fetchPage = async (from: number, to: number) => {
    calls.push([from, to])
    return { data: rows.slice(from, Math.min(to + 1, from + cap)), error: null }
  }
  return { fetchPage, calls }
}

test('fetchAllPages reads past the server row cap', async () => {
  const table = cappedTable(2501, 1000)
  const rows = await fetchAllPages(table.fetchPage)
  assert.equal(rows.length, 2501)
  assert.deepEqual(table.calls, [
    [0, 999],
    [1000, 1999],
    [2000, 2999]
  ])
})

test('fetchAllPages asks once more when the last page is exactly full', async () => {
  const table = cappedTable(4, 2)
  const rows = await fetchAllPages(table.fetchPage, 2)
  assert.equal(rows.length, 4)
  assert.equal(table.calls.length, 3)
})

test('fetchAllPages raises the query error as a StoreError', async () => {
  const error = { code: '42501', message: 'permission denied' }
  await assert.rejects(
    fetchAllPages(async () => ({ data: null, error })),
    (e: unknown) => e instanceof StoreError && e.code === '42501'
  )
})
