import type { PageQuery } from '../../shared/types';
import type { WireObject } from '../../shared/wire';
import type { Page } from './store';

export interface Pagination {
  page: number;
  limit: number;
  total: number;
  totalPages: number;
}

export interface PaginatedResponse {
  data: WireObject[];
  pagination: Pagination;
}

export const paginate = <T>(
  { items, total }: Page<T>,
  { page, limit }: PageQuery,
  serialize: (item: T) => WireObject
): PaginatedResponse => ({
  data: items.map(serialize),
  pagination: {
    page,
    limit,
    total,
    totalPages: Math.ceil(total / limit)
  }
});
