import { Genre } from '@/database/entities';

export type GenreResponse = {
  id: number;
  name: string;
};

export type GenreSyncResult = {
  synced: number;
  skipped: number;
};

export const toGenreResponse = (genre: Genre): GenreResponse => ({
  id: genre.id,
  name: genre.name,
});
