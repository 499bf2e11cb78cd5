export const MAX_CATEGORY_CODE_LENGTH = 8

const STOPWORDS = new Set([
  'PARA', 'DE', 'DEL', 'LA', 'EL', 'LOS', 'LAS', 'Y', 'A', 'EN', 'CON', 'POR',
  'THE', 'OF', 'AND', 'FOR', 'AN', 'WITH'
])

/** Upper-case alphanumeric words of a category name, accents removed. */
export function codeWords(name: string): string[] {
  return name
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .toUpperCase()
    .replace(/[-_]/g, ' ')
    .replace(/[^A-Z0-9\s]/g, '')
    .split(/\s+/)
    .filter(Boolean)
}

function significantWords(words: string[]): string[] {
  const significant = words.filter((w) => !STOPWORDS.has(w) && w.length > 1)
  return significant.length ? significant : words
}

function baseCode(words: string[]): string {
  if (words.length >= 2) return words[0].slice(0, 3) + words[1].slice(0, 3)
  if (words.length === 1) return words[0].slice(0, 6)
  return 'CAT'
}

/**
 * Short upper-case code for a category, unique (case-insensitively) among
 * `existingCodes` and at most 8 characters long.
 */
export function generateCategoryCode(name: string, existingCodes: Iterable<string | null>): string {
  const taken = new Set<string>()
  for (const code of existingCodes) {
    if (code) taken.add(code.toUpperCase())
  }

  const words = significantWords(codeWords(name))
  const base = baseCode(words)
  if (!taken.has(base)) return base

  const joined = words.join('')
  for (let length = base.length + 1; length <= Math.min(joined.length, MAX_CATEGORY_CODE_LENGTH); length++) {
    const candidate = joined.slice(0, length)
    if (!taken.has(candidate)) return candidate
  }

  for (let n = 1; ; n++) {
    const suffix = String(n)
    const candidate = base.slice(0, MAX_CATEGORY_CODE_LENGTH - suffix.length) + suffix
    if (!taken.has(candidate)) return candidate
  }
}
