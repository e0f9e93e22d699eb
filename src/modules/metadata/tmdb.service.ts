import { CACHE_KEYS } from '@/common/constants/auth.constants';
import { MetadataUnavailableException } from '@/common/exceptions/domain.exception';
import { MovieOrTv } from '@/database/entities';
import { AppCacheService } from '@/cache/cache.service';
import { HttpService } from '@nestjs/axios';
import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { I18nService } from 'nestjs-i18n';
import { lastValueFrom, map } from 'rxjs';
import {
  ProviderTitle,
  TmdbGenre,
  TmdbGenreListResponse,
  TmdbSearchItem,
  TmdbSearchResponse,
} from './types/tmdb.type';

/**
 * Thin client for The Movie Database v3 API. Responses are cached through
 * AppCacheService for `tmdb.cacheTtl` seconds.
 */
@Injectable()
export class TmdbService {
  private readonly logger = new Logger(TmdbService.name);
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly imageBaseUrl: string;
  private readonly cacheTtl: number;

  constructor(
    private readonly httpService: HttpService,
    private readonly cache: AppCacheService,
    private readonly i18n: I18nService,
    config: ConfigService,
  ) {
    this.apiKey = config.get<string>('tmdb.apiKey', '');
    this.baseUrl = config.get<string>(
      'tmdb.baseUrl',
      'https://api.themoviedb.org/3',
    );
    this.imageBaseUrl = config.get<string>('tmdb.imageBaseUrl', '');
    this.cacheTtl = config.get<number>('tmdb.cacheTtl', 3600);
  }

  isConfigured(): boolean {
    return this.apiKey !== '';
  }

  /**
   * First page of provider results for `term`, normalized.
   *
   * @throws MetadataUnavailableException  No API key, or the request failed.
   */
  async searchTitles(
    term: string,
    movieOrTv: MovieOrTv,
  ): Promise<ProviderTitle[]> {
    const query = term.trim();

    return this.cache.getOrSet(
      CACHE_KEYS.TMDB_SEARCH(movieOrTv, query),
      async () => {
        const response = await this.request<TmdbSearchResponse>(
          `/search/${movieOrTv}`,
          {
            query,
            include_adult: 'false',
            language: 'en-US',
            page: '1',
          },
        );
        return response.results.map((item) =>
          this.normalize(item, movieOrTv),
        );
      },
      this.cacheTtl,
    );
  }

  /**
   * Movie and TV genre lists merged, one entry per id, ascending.
   *
   * @throws MetadataUnavailableException
   */
  async fetchGenres(): Promise<TmdbGenre[]> {
    return this.cache.getOrSet(
      CACHE_KEYS.TMDB_GENRES,
      async () => {
        const [movie, tv] = await Promise.all([
          this.request<TmdbGenreListResponse>('/genre/movie/list', {
            language: 'en',
          }),
          this.request<TmdbGenreListResponse>('/genre/tv/list', {
            language: 'en',
          }),
        ]);

        const byId = new Map<number, TmdbGenre>();
        for (const genre of [...movie.genres, ...tv.genres]) {
          if (!byId.has(genre.id)) byId.set(genre.id, genre);
        }
        return [...byId.values()].sort((a, b) => a.id - b.id);
      },
      this.cacheTtl,
    );
  }

  normalize(item: TmdbSearchItem, movieOrTv: MovieOrTv): ProviderTitle {
    const isTv = movieOrTv === MovieOrTv.TV;
    return {
      id: item.id,
      title: (isTv ? item.name : item.title) ?? '',
      releaseDate: (isTv ? item.first_air_date : item.release_date) ?? '',
      overview: item.overview ?? '',
      imgUrl: item.poster_path ? `${this.imageBaseUrl}${item.poster_path}` : '',
      genreIds: item.genre_ids ?? [],
      movieOrTv,
    };
  }

  private async request<T>(
    path: string,
    params: Record<string, string>,
  ): Promise<T> {
    if (!this.isConfigured()) {
      throw new MetadataUnavailableException(
        this.i18n.translate('catalog.errors.metadataUnavailable'),
      );
    }

    try {
      return await lastValueFrom(
        this.httpService
          .get<T>(`${this.baseUrl}${path}`, {
            params: { ...params, api_key: this.apiKey },
            headers: { accept: 'application/json' },
          })
          .pipe(map((res) => res.data)),
      );
    } catch (error) {
      this.logger.error(
        `TMDB request ${path} failed: ${error instanceof Error ? error.message : String(error)}`,
      );
      throw new MetadataUnavailableException(
        this.i18n.translate('catalog.errors.metadataRequestFailed'),
      );
    }
  }
}
