import {
  InvalidOrderingFieldException,
  InvalidParameterException,
} from '@/common/exceptions/domain.exception';
import { PaginationService } from '@/common/pagination/pagination.service';
import { PageRequest, Paginated } from '@/common/pagination/pagination.type';
import { MovieOrTv, Title } from '@/database/entities';
import { Inject, Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { I18nService } from 'nestjs-i18n';
import { Repository, SelectQueryBuilder } from 'typeorm';
import { rankByBestMatch } from './best-match';
import {
  FilterError,
  IntegerRange,
  Ordering,
  OrderField,
  parseCategory,
  parseGenreIds,
  parseOrdering,
  parseRatingRange,
  parseYearRange,
  ParseResult,
  RatingBounds,
  YearBounds,
  yearRangeToDates,
} from './title-filters';

export const TITLE_QUERY_OPTIONS = Symbol('TITLE_QUERY_OPTIONS');

export type TitleQueryOptions = {
  yearRange: YearBounds;
  ratingRange: RatingBounds;
};

/** Raw query-string parameters understood by the engine. */
export type TitleQuery = {
  search?: string;
  movie_or_tv?: string;
  genres?: string;
  year_range?: string;
  rating_range?: string;
  order_by?: string;
};

export type CompiledTitleQuery = {
  searchTerm: string | null;
  category: MovieOrTv | null;
  genreIds: number[] | null;
  years: IntegerRange | null;
  ratings: IntegerRange | null;
  ordering: Ordering;
};

const ORDER_COLUMNS: Record<OrderField, string> = {
  id: 'title.id',
  title: 'title.title',
  release_date: 'title.releaseDate',
  rating: 'title.rating',
  movie_or_tv: 'title.movieOrTv',
};

const escapeLike = (value: string): string => value.replace(/[\\%_]/g, '\\$&');

const present = (value: string | undefined): value is string =>
  value !== undefined && value.trim() !== '';

/**
 * Filter/ranking engine for the title catalogue.
 *
 * compile() validates every parameter up front and turns it into typed
 * predicates; execute() ANDs them into one query, then orders the filtered
 * set by a column or by best-match score and cuts out the requested page.
 */
@Injectable()
export class TitleQueryEngine {
  constructor(
    @InjectRepository(Title) private readonly titles: Repository<Title>,
    @Inject(TITLE_QUERY_OPTIONS) private readonly options: TitleQueryOptions,
    private readonly pagination: PaginationService,
    private readonly i18n: I18nService,
  ) {}

  /**
   * @throws InvalidParameterException     A filter fails to parse or is out of bounds.
   * @throws InvalidOrderingFieldException  `order_by` names an unsupported field.
   */
  compile(query: TitleQuery, now: Date = new Date()): CompiledTitleQuery {
    const searchTerm = present(query.search) ? query.search.trim() : null;

    const category = present(query.movie_or_tv)
      ? this.unwrap(parseCategory(query.movie_or_tv))
      : null;

    const genreIds = present(query.genres)
      ? this.unwrap(parseGenreIds(query.genres))
      : null;

    const years = present(query.year_range)
      ? this.unwrap(
          parseYearRange(
            query.year_range,
            this.options.yearRange,
            now.getFullYear(),
          ),
        )
      : null;

    const ratings = present(query.rating_range)
      ? this.unwrap(
          parseRatingRange(query.rating_range, this.options.ratingRange),
        )
      : null;

    const ordering = parseOrdering(query.order_by, searchTerm !== null);
    if (!ordering.ok) {
      throw new InvalidOrderingFieldException(this.translate(ordering.error));
    }

    return {
      searchTerm,
      category,
      genreIds,
      years,
      ratings,
      ordering: ordering.value,
    };
  }

  async execute(
    query: TitleQuery,
    page: PageRequest,
  ): Promise<Paginated<Title>> {
    const compiled = this.compile(query);
    const qb = this.titles.createQueryBuilder('title');
    this.applyFilters(qb, compiled);

    if (compiled.ordering.kind === 'best_match' && compiled.searchTerm) {
      // Ranking happens in process; ascending id is the tie-break.
      const candidates = await qb.orderBy('title.id', 'ASC').getMany();
      const ranked = rankByBestMatch(
        candidates,
        compiled.searchTerm,
        compiled.ordering.direction,
      );
      return this.pagination.slice(page, ranked);
    }

    if (compiled.ordering.kind === 'field') {
      const { field, direction } = compiled.ordering;
      qb.orderBy(ORDER_COLUMNS[field], direction);
      if (field !== 'id') qb.addOrderBy('title.id', 'ASC');
    }

    const window = this.pagination.window(page);
    if (window) qb.skip(window.skip).take(window.take);

    const [titles, count] = await qb.getManyAndCount();
    return this.pagination.build(page, count, titles);
  }

  applyFilters(
    qb: SelectQueryBuilder<Title>,
    compiled: CompiledTitleQuery,
  ): void {
    if (compiled.searchTerm) {
      qb.andWhere("LOWER(title.title) LIKE :search ESCAPE '\\'", {
        search: `%${escapeLike(compiled.searchTerm.toLowerCase())}%`,
      });
    }

    if (compiled.category) {
      qb.andWhere('title.movieOrTv = :category', {
        category: compiled.category,
      });
    }

    if (compiled.genreIds) {
      qb.andWhere(
        'title.id IN (SELECT tg.title_id FROM title_genres tg WHERE tg.genre_id IN (:...genreIds))',
        { genreIds: compiled.genreIds },
      );
    }

    if (compiled.years) {
      const { from, to } = yearRangeToDates(compiled.years);
      qb.andWhere('title.releaseDate >= :releasedFrom', { releasedFrom: from });
      qb.andWhere('title.releaseDate <= :releasedTo', { releasedTo: to });
    }

    if (compiled.ratings) {
      qb.andWhere('title.rating >= :ratingFrom', {
        ratingFrom: compiled.ratings.start,
      });
      qb.andWhere('title.rating <= :ratingTo', {
        ratingTo: compiled.ratings.end,
      });
    }
  }

  private unwrap<T>(result: ParseResult<T>): T {
    if (result.ok) return result.value;
    throw new InvalidParameterException(this.translate(result.error));
  }

  private translate(error: FilterError): string {
    return this.i18n.translate(error.key, { args: error.args });
  }
}
