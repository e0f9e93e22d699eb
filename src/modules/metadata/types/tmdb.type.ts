import { MovieOrTv } from '@/database/entities';

/* ================= Provider payloads ================= */

/** A movie result carries `title`/`release_date`, a TV result `name`/`first_air_date`. */
export interface TmdbSearchItem {
  id: number;
  title?: string;
  name?: string;
  release_date?: string;
  first_air_date?: string;
  overview?: string;
  poster_path?: string | null;
  genre_ids?: number[];
}

export interface TmdbSearchResponse {
  page: number;
  results: TmdbSearchItem[];
  total_results: number;
}

export interface TmdbGenre {
  id: number;
  name: string;
}

export interface TmdbGenreListResponse {
  genres: TmdbGenre[];
}

/* ================= Normalized ================= */

/** Shaped so it can be posted to /titles as-is. */
export type ProviderTitle = {
  id: number;
  title: string;
  releaseDate: string;
  overview: string;
  imgUrl: string;
  genreIds: number[];
  movieOrTv: MovieOrTv;
};
