/**
 * Paged reads for Supabase queries.
 * PostgREST caps every response at the project's max rows (1000 by default),
 * so a read that must see every row walks `.range()` pages until a short one.
 */

import { RepositoryUnavailableError } from '../errors.js';

export const PAGE_SIZE = 1000;

export interface PageResponse<Row> {
  data: Row[] | null;
  error: { message: string } | null;
}

/** `page(from, to)` must run an ordered query limited to `.range(from, to)`. */
export async function fetchAllPages<Row>(
  operation: string,
  page: (from: number, to: number) => PromiseLike<PageResponse<Row>>,
  pageSize = PAGE_SIZE
): Promise<Row[]> {
  const rows: Row[] = [];
  for (let from = 0; ; from += pageSize) {
    const { data, error } = await page(from, from + pageSize - 1);
    if (error) throw new RepositoryUnavailableError(operation, error.message);
    const batch = data ?? [];
    rows.push(...batch);
    if (batch.length < pageSize) return rows;
  }
}
