import test from 'node:test'
import assert from 'node:assert/strict'
import { isLinkActive, linksForRole, navLinks } from './nav'

test('stockers only see the stock sections', () => {
  assert.deepEqual(
    linksForRole('stocker').map((l) => l.href),
    ['/stock', '/purchases', '/categories', '/suppliers']
  )
})

test('sellers see sales and customers but no costs', () => {
  assert.deepEqual(
    linksForRole('seller').map((l) => l.href),
    ['/dashboard', '/stock', '/sales', '/customers']
  )
})

test('admins see every section', () => {
  assert.equal(linksForRole('admin').length, navLinks.length)
})

test('nested routes keep their section active', () => {
  const stock = navLinks[1]
  assert.equal(isLinkActive(stock, '/stock/import'), true)
  assert.equal(isLinkActive(stock, '/stockroom'), false)
  assert.equal(isLinkActive({ ...stock, exact: true }, '/stock/import'), false)
})
