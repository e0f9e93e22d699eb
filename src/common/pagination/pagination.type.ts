export type PageSize = number | 'all';

export interface PageRequest {
  page: number;
  pageSize: PageSize;
}

export interface PaginationQuery {
  page?: string;
  page_size?: string;
}

export interface Paginated<T> {
  count: number;
  page: number;
  pageSize: PageSize;
  totalPages: number;
  next: number | null;
  previous: number | null;
  results: T[];
}
