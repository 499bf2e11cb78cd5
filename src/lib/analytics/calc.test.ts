import assert from 'node:assert/strict'
import test from 'node:test'
import { calcMargin, calcVariation, formatCurrencyCompact, formatMoney, formatPercent } from './calc'

// Default display config: USD, en-US.

test('formatMoney formats and treats missing values as zero', () => {
  assert.equal(formatMoney(10.5), '$10.50')
  assert.equal(formatMoney(null), '$0.00')
  assert.equal(formatMoney(Number.NaN), '$0.00')
})

test('formatCurrencyCompact shortens thousands and millions', () => {
  assert.equal(formatCurrencyCompact(10.5), '$10.50')
  assert.equal(formatCurrencyCompact(33879.34), '$33.9K')
  assert.equal(formatCurrencyCompact(33879340), '$33.9M')
})

test('formatPercent keeps one decimal', () => {
  assert.equal(formatPercent(12.5), '12.5%')
  assert.equal(formatPercent(undefined), '0%')
})

test('calcMargin guards against zero revenue', () => {
  assert.equal(calcMargin(40, 100), 40)
  assert.equal(calcMargin(40, 0), 0)
})

test('calcVariation against an empty previous period', () => {
  assert.equal(calcVariation(150, 100), 50)
  assert.equal(calcVariation(50, 100), -50)
  assert.equal(calcVariation(10, 0), 100)
  assert.equal(calcVariation(0, 0), 0)
})
