import { z } from "zod";

/**
 * Schema for pagination information attached to paged post lists
 */
export const paginationInfoSchema = z.object({
  currentPage: z.number(),
  totalPages: z.number(),
  totalItems: z.number(),
  pageSize: z.number(),
  hasNextPage: z.boolean(),
  hasPrevPage: z.boolean(),
});

export type PaginationInfo = z.infer<typeof paginationInfoSchema>;

export interface PaginateResult<T> {
  items: T[];
  pagination: PaginationInfo;
}

/**
 * Slice one page out of an already sorted list.
 * Pages are 1-based; a page past the end yields no items. An empty list
 * still reports one (empty) page.
 */
export function paginateItems<T>(
  items: T[],
  page: number,
  pageSize: number,
): PaginateResult<T> {
  if (!Number.isInteger(page) || page < 1) {
    throw new RangeError(`Page must be a positive integer, got ${page}`);
  }
  if (!Number.isInteger(pageSize) || pageSize < 1) {
    throw new RangeError(`Page size must be a positive integer, got ${pageSize}`);
  }

  const totalItems = items.length;
  const totalPages = Math.max(1, Math.ceil(totalItems / pageSize));
  const startIndex = (page - 1) * pageSize;

  return {
    items: items.slice(startIndex, startIndex + pageSize),
    pagination: {
      currentPage: page,
      totalPages,
      totalItems,
      pageSize,
      hasNextPage: page < totalPages,
      hasPrevPage: page > 1,
    },
  };
}
