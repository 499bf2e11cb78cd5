import { StoreError } from '@/lib/errors'

/** PostgREST's default `max-rows`; a page shorter than this is the last one. */
export const PAGE_SIZE = 1000

type PageResult = { data: unknown[] | null; error: { code: string; message: string } | null }

/**
 * Reads every row of a query by requesting `[from, to]` windows until a short
 * page comes back. The query must have a total order so windows do not overlap.
 */
export async function fetchAllPages(
  fetchPage: (from: number, to: number) => PromiseLike<PageResult>,
  pageSize = PAGE_SIZE
): Promise<unknown[]> {
  const rows: unknown[] = []
  for (let from = 0; ; from += pageSize) {
    const { data, error } = await fetchPage(from, from + pageSize - 1)
    if (error) throw new StoreError(error.code, error.message)
    const page = data ?? []
    rows.push(...page)
    if (page.length < pageSize) return rows
  }
}
