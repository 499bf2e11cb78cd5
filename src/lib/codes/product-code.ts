import { ValidationError } from '@/lib/errors'

export const MAX_PRODUCT_SEQUENCE = 9999

// 32-bit FNV-1a
export function hashName(text: string): number {
  let hash = 0x811c9dc5
  for (const ch of text) {
    hash ^= ch.codePointAt(0) ?? 0
    hash = Math.imul(hash, 0x01000193) >>> 0
  }
  return hash >>> 0
}

function pad(seq: number): string {
  return String(seq).padStart(4, '0')
}

/**
 * Next `{CATEGORY}-{NNNN}` code. Sequences only move forward: the next one is
 * past both the number of codes under the prefix and the highest sequence in
 * use. The code is added to `reserved` so one batch never hands it out twice.
 */
export function generateProductCode(
  productName: string,
  categoryCode: string,
  existingCodes: Iterable<string>,
  reserved: Set<string> = new Set()
): string {
  const prefix = `${categoryCode.toUpperCase()}-`
  const used = new Set<string>()
  for (const code of existingCodes) used.add(code.toUpperCase())
  for (const code of reserved) used.add(code.toUpperCase())

  let count = 0
  let highest = 0
  for (const code of used) {
    if (!code.startsWith(prefix)) continue
    count++
    const tail = code.slice(prefix.length)
    if (/^\d+$/.test(tail)) highest = Math.max(highest, Number(tail))
  }

  for (let seq = Math.max(count, highest) + 1; seq <= MAX_PRODUCT_SEQUENCE; seq++) {
    const candidate = prefix + pad(seq)
    if (!used.has(candidate)) {
      reserved.add(candidate)
      return candidate
    }
  }

  // Sequence space exhausted: start at a hash of the name and walk to the next free code.
  const start = hashName(productName) % 10000
  for (let step = 0; step < 10000; step++) {
    const candidate = prefix + pad((start + step) % 10000)
    if (!used.has(candidate)) {
      reserved.add(candidate)
      return candidate
    }
  }
  throw new ValidationError(`No product codes left under ${prefix}`)
}
