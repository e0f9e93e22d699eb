import {
  InvalidParameterException,
  ResourceNotFoundException,
} from '@/common/exceptions/domain.exception';
import { parseStrictInt } from '@/common/utils/integers';
import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { I18nService } from 'nestjs-i18n';
import {
  PageRequest,
  PageSize,
  Paginated,
  PaginationQuery,
} from './pagination.type';

@Injectable()
export class PaginationService {
  private readonly defaultPageSize: number;
  private readonly maxPageSize: number;

  constructor(
    private readonly i18n: I18nService,
    config: ConfigService,
  ) {
    this.defaultPageSize = config.get<number>('pagination.defaultPageSize', 10);
    this.maxPageSize = config.get<number>('pagination.maxPageSize', 100);
  }

  /**
   * Reads `page` and `page_size` from a query string.
   *
   * @throws InvalidParameterException  page_size is neither a positive integer nor 'all'.
   * @throws ResourceNotFoundException  page is not a positive integer.
   */
  resolve(query: PaginationQuery): PageRequest {
    return {
      page: this.resolvePage(query.page),
      pageSize: this.resolvePageSize(query.page_size),
    };
  }

  /** Offset window for a query builder; null means "no limit". */
  window(request: PageRequest): { skip: number; take: number } | null {
    if (request.pageSize === 'all') return null;

    return {
      skip: (request.page - 1) * request.pageSize,
      take: request.pageSize,
    };
  }

  /**
   * Wraps one already-fetched page of results.
   *
   * @throws ResourceNotFoundException  page lies past the last page.
   */
  build<T>(request: PageRequest, count: number, results: T[]): Paginated<T> {
    const totalPages =
      request.pageSize === 'all'
        ? 1
        : Math.max(1, Math.ceil(count / request.pageSize));

    if (request.page > totalPages) {
      throw new ResourceNotFoundException(
        this.i18n.translate('common.errors.invalidPage'),
      );
    }

    return {
      count,
      page: request.page,
      pageSize: request.pageSize,
      totalPages,
      next: request.page < totalPages ? request.page + 1 : null,
      previous: request.page > 1 ? request.page - 1 : null,
      results,
    };
  }

  /** Paginates a list held in memory (used after in-process ranking). */
  slice<T>(request: PageRequest, items: T[]): Paginated<T> {
    const window = this.window(request);
    const page = window
      ? items.slice(window.skip, window.skip + window.take)
      : items;

    return this.build(request, items.length, page);
  }

  private resolvePage(raw: string | undefined): number {
    if (raw === undefined || raw === '') return 1;

    const page = parseStrictInt(raw);
    if (page === null || page < 1) {
      throw new ResourceNotFoundException(
        this.i18n.translate('common.errors.invalidPage'),
      );
    }
    return page;
  }

  private resolvePageSize(raw: string | undefined): PageSize {
    if (raw === undefined || raw === '') return this.defaultPageSize;
    if (raw.trim().toLowerCase() === 'all') return 'all';

    const size = parseStrictInt(raw);
    if (size === null || size < 1) {
      throw new InvalidParameterException(
        this.i18n.translate('common.errors.invalidPageSize'),
      );
    }
    return Math.min(size, this.maxPageSize);
  }
}
