import {
  InvalidOrderingFieldException,
  InvalidParameterException,
  ResourceNotFoundException,
} from '@/common/exceptions/domain.exception';
import { PaginationService } from '@/common/pagination/pagination.service';
import { MovieOrTv } from '@/database/entities';
import { Test, TestingModule } from '@nestjs/testing';
import { DataSource } from 'typeorm';
import { configProvider } from '../../../../test/helpers/config';
import { sqliteTestingModules } from '../../../../test/helpers/database';
import { createGenre, createTitle } from '../../../../test/helpers/fixtures';
import { i18nStub } from '../../../../test/helpers/i18n';
import {
  TITLE_QUERY_OPTIONS,
  TitleQuery,
  TitleQueryEngine,
} from './title-query.engine';

describe('TitleQueryEngine', () => {
  let module: TestingModule;
  let engine: TitleQueryEngine;

  const firstPage = { page: 1, pageSize: 10 };

  const ids = async (query: TitleQuery): Promise<number[]> => {
    const page = await engine.execute(query, firstPage);
    return page.results.map((title) => title.id);
  };

  beforeEach(async () => {
    module = await Test.createTestingModule({
      imports: [...sqliteTestingModules()],
      providers: [
        TitleQueryEngine,
        PaginationService,
        {
          provide: TITLE_QUERY_OPTIONS,
          useValue: {
            yearRange: { min: null, max: null },
            ratingRange: { min: 0, max: 10 },
          },
        },
        configProvider(),
        i18nStub(),
      ],
    }).compile();

    engine = module.get(TitleQueryEngine);

    const dataSource = module.get(DataSource);
    const action = await createGenre(dataSource, 28, 'Action');
    const comedy = await createGenre(dataSource, 35, 'Comedy');

    await createTitle(dataSource, 1, {
      title: 'Action',
      releaseDate: '1995-06-01',
      rating: 7.5,
      genres: [action],
    });
    await createTitle(dataSource, 2, {
      title: 'The Action Hero',
      movieOrTv: MovieOrTv.TV,
      releaseDate: '2005-03-01',
      rating: 9,
      genres: [action, comedy],
    });
    await createTitle(dataSource, 3, {
      title: 'Comedy Night',
      releaseDate: '2010-01-01',
      rating: 5,
      genres: [comedy],
    });
    await createTitle(dataSource, 4, {
      title: 'Action Movie',
      releaseDate: '2020-12-31',
      rating: 8,
    });
    await createTitle(dataSource, 5, {
      title: '100%_Pure',
      releaseDate: '2000-01-01',
      rating: 6,
    });
  });

  afterEach(async () => {
    await module.close();
  });

  it('orders by rating descending by default', async () => {
    expect(await ids({})).toEqual([2, 4, 1, 5, 3]);
  });

  it('searches titles case-insensitively', async () => {
    expect(await ids({ search: 'ACTION', order_by: 'id' })).toEqual([1, 2, 4]);
  });

  it('treats LIKE wildcards in the search term literally', async () => {
    expect(await ids({ search: '%' })).toEqual([5]);
    expect(await ids({ search: '_' })).toEqual([5]);
  });

  it('ranks search results by best match with id as tie-break', async () => {
    expect(await ids({ search: 'action', order_by: '-best_match' })).toEqual([
      1, 4, 2,
    ]);
  });

  it('filters by category', async () => {
    expect(await ids({ movie_or_tv: 'tv' })).toEqual([2]);
    expect(await ids({ movie_or_tv: 'all', order_by: 'id' })).toEqual([
      1, 2, 3, 4, 5,
    ]);
  });

  it('keeps titles in any of the given genres', async () => {
    expect(await ids({ genres: '35' })).toEqual([2, 3]);
    expect(await ids({ genres: '28, 35' })).toEqual([2, 1, 3]);
  });

  it('filters by release year, both ends inclusive', async () => {
    expect(await ids({ year_range: '2000,2010', order_by: 'id' })).toEqual([
      2, 3, 5,
    ]);
  });

  it('accepts a range starting at year 0', async () => {
    expect(await ids({ year_range: '0,2000', order_by: 'id' })).toEqual([
      1, 5,
    ]);
  });

  it('filters by rating range', async () => {
    expect(await ids({ rating_range: '6,8', order_by: 'rating' })).toEqual([
      5, 1, 4,
    ]);
  });

  it('combines filters with AND', async () => {
    expect(
      await ids({ search: 'action', movie_or_tv: 'movie', rating_range: '8,10' }),
    ).toEqual([4]);
  });

  it('paginates the ordered result', async () => {
    const page = await engine.execute({}, { page: 2, pageSize: 2 });

    expect(page.results.map((title) => title.id)).toEqual([1, 5]);
    expect(page).toMatchObject({
      count: 5,
      page: 2,
      pageSize: 2,
      totalPages: 3,
      next: 3,
      previous: 1,
    });
  });

  it('paginates best-match results after ranking', async () => {
    const page = await engine.execute(
      { search: 'action', order_by: '-best_match' },
      { page: 2, pageSize: 1 },
    );

    expect(page.results.map((title) => title.id)).toEqual([4]);
    expect(page.count).toBe(3);
  });

  it('returns every row for page_size=all', async () => {
    const page = await engine.execute({}, { page: 1, pageSize: 'all' });

    expect(page.results).toHaveLength(5);
    expect(page.count).toBe(5);
    expect(page.totalPages).toBe(1);
  });

  it('rejects a page past the end', async () => {
    await expect(
      engine.execute({}, { page: 4, pageSize: 2 }),
    ).rejects.toBeInstanceOf(ResourceNotFoundException);
  });

  it('exposes genre and review ids on each title', async () => {
    const page = await engine.execute({ genres: '28', order_by: 'id' }, firstPage);
    expect(page.results[1]?.genreIds.sort()).toEqual([28, 35]);
    expect(page.results[1]?.reviewIds).toEqual([]);
  });

  describe('compile', () => {
    it('rejects an unknown ordering field', () => {
      expect(() => engine.compile({ order_by: 'popularity' })).toThrow(
        InvalidOrderingFieldException,
      );
    });

    it('reports the failing filter by message', () => {
      expect(() => engine.compile({ year_range: '2001,2000' })).toThrow(
        new InvalidParameterException('catalog.errors.yearRangeOrder'),
      );
    });

    it('measures year bounds against the given clock', () => {
      const now = new Date('2024-06-01T00:00:00Z');
      expect(() => engine.compile({ year_range: '2000,2025' }, now)).toThrow(
        InvalidParameterException,
      );
      expect(engine.compile({ year_range: '2000,2024' }, now).years).toEqual({
        start: 2000,
        end: 2024,
      });
    });

    it('rejects an unknown category', () => {
      expect(() => engine.compile({ movie_or_tv: 'film' })).toThrow(
        new InvalidParameterException('catalog.errors.invalidCategory'),
      );
    });

    it('ignores blank parameters', () => {
      expect(engine.compile({ search: '  ', genres: '' })).toMatchObject({
        searchTerm: null,
        genreIds: null,
      });
    });
  });
});
