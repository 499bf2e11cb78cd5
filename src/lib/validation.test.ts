import assert from 'node:assert/strict'
import test from 'node:test'
import { requireNumber, toNumber } from './validation'

test('toNumber reads a dot or a lone decimal comma', () => {
  assert.equal(toNumber('12.5'), 12.5)
  assert.equal(toNumber('12,5'), 12.5)
  assert.equal(toNumber('-0,75'), -0.75)
  assert.equal(toNumber(' 3 '), 3)
  assert.equal(toNumber(''), null)
})

test('toNumber rejects grouped thousands', () => {
  assert.equal(toNumber('1,250'), null)
  assert.equal(toNumber('1.234,5'), null)
  assert.equal(toNumber('1,234.5'), null)
  assert.equal(toNumber('1,2,3'), null)
})

test('requireNumber reports a grouped amount as not a number', () => {
  assert.throws(() => requireNumber('1,250', 'Unit price'), /Unit price must be a number/)
})
