import { MovieOrTv, Title } from '@/database/entities';

export type TitleResponse = {
  id: number;
  title: string;
  releaseDate: string;
  overview: string;
  imgUrl: string;
  movieOrTv: MovieOrTv;
  rating: number;
  genres: number[];
  reviews: number[];
};

export const toTitleResponse = (title: Title): TitleResponse => ({
  id: title.id,
  title: title.title,
  releaseDate: title.releaseDate,
  overview: title.overview,
  imgUrl: title.imgUrl,
  movieOrTv: title.movieOrTv,
  rating: title.rating,
  genres: [...(title.genreIds ?? [])].sort((a, b) => a - b),
  reviews: [...(title.reviewIds ?? [])].sort((a, b) => a - b),
});
