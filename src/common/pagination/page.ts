import { BadRequestException } from '@nestjs/common';
import { z } from 'zod';

export type PageRequest = {
  /** 1-indexed. */
  page: number;
  pageSize: number;
};

export type Page<T> = {
  items: T[];
  page: number;
  pageSize: number;
  totalItems: number;
  totalPages: number;
  hasNext: boolean;
  hasPrevious: boolean;
};

export type PaginationMeta = Omit<Page<unknown>, 'items'>;

/**
 * Slice an already filtered and ordered sequence.
 *
 * Pages past the end are empty rather than an error; only a page below 1 (or a
 * non-integer page / page size) is rejected.
 */
export function paginate<T>(items: readonly T[], req: PageRequest): Page<T> {
  const { page, pageSize } = req;
  if (!Number.isInteger(page) || page < 1) throw new BadRequestException('Page must be a positive integer.');
  if (!Number.isInteger(pageSize) || pageSize < 1) throw new BadRequestException('Page size must be a positive integer.');

  const totalItems = items.length;
  const totalPages = Math.max(1, Math.ceil(totalItems / pageSize));
  const start = (page - 1) * pageSize;
  return {
    items: items.slice(start, start + pageSize),
    page,
    pageSize,
    totalItems,
    totalPages,
    hasNext: start + pageSize < totalItems,
    hasPrevious: page > 1,
  };
}

export function paginationMeta(page: Page<unknown>): PaginationMeta {
  const { items: _items, ...meta } = page;
  return meta;
}

const pageQuerySchema = z.object({
  page: z.coerce.number().int().optional(),
});

/** `?page=` from a query string; the size is server configuration, not client input. */
export function pageRequestFromQuery(query: unknown, pageSize: number): PageRequest {
  const parsed = pageQuerySchema.parse(query);
  return { page: parsed.page ?? 1, pageSize };
}
