/**
 * Page bounds and navigation metadata
 */

import type { PaginatedResult } from "../types/database";
import { validation } from "./errors";

export const MAX_PAGE_SIZE = 100;

export interface Pagination {
  offset: number;
  limit: number;
  total_pages: number;
  has_next: boolean;
  has_previous: boolean;
  next_page: number | null;
  previous_page: number | null;
}

/**
 * Compute page bounds for `page` (1-based) of `size` rows out of `totalCount`.
 * A page past the last one is not an error; it simply has no rows.
 */
export function paginate(totalCount: number, page: number, size: number): Pagination {
  if (!Number.isInteger(totalCount) || totalCount < 0) {
    throw validation("total count must be a non-negative integer");
  }
  if (!Number.isInteger(page) || page < 1) {
    throw validation("page must be an integer >= 1");
  }
  if (!Number.isInteger(size) || size < 1 || size > MAX_PAGE_SIZE) {
    throw validation(`size must be an integer between 1 and ${MAX_PAGE_SIZE}`);
  }

  const totalPages = totalCount === 0 ? 0 : Math.ceil(totalCount / size);
  const hasNext = page < totalPages;
  const hasPrevious = page > 1;

  return {
    offset: (page - 1) * size,
    limit: size,
    total_pages: totalPages,
    has_next: hasNext,
    has_previous: hasPrevious,
    next_page: hasNext ? page + 1 : null,
    previous_page: hasPrevious ? page - 1 : null,
  };
}

export function toPaginatedResult<T>(
  items: T[],
  total: number,
  page: number,
  size: number,
  pagination: Pagination
): PaginatedResult<T> {
  return {
    items,
    total,
    page,
    size,
    total_pages: pagination.total_pages,
    has_next: pagination.has_next,
    has_previous: pagination.has_previous,
    next_page: pagination.next_page,
    previous_page: pagination.previous_page,
  };
}
