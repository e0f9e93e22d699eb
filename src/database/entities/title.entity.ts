import {
  Column,
  Entity,
  JoinTable,
  ManyToMany,
  OneToMany,
  PrimaryColumn,
  RelationId,
} from 'typeorm';
import { Genre } from './genre.entity';
import { Review } from './review.entity';

export enum MovieOrTv {
  MOVIE = 'movie',
  TV = 'tv',
}

@Entity({ name: 'titles' })
export class Title {
  /** Lowest unused positive integer, or the provider id when imported. */
  @PrimaryColumn({ type: 'int' })
  id!: number;

  @Column({ type: 'varchar', length: 255 })
  title!: string;

  /** ISO date, 'YYYY-MM-DD'. */
  @Column({ name: 'release_date', type: 'date' })
  releaseDate!: string;

  @Column({ type: 'text', default: '' })
  overview!: string;

  @Column({ name: 'img_url', type: 'varchar', length: 500, default: '' })
  imgUrl!: string;

  @Column({ name: 'movie_or_tv', type: 'varchar', length: 5 })
  movieOrTv!: MovieOrTv;

  /** Mean review rating to one decimal place; written by ReviewInvariantsService only. */
  @Column({ type: 'float', default: 0 })
  rating!: number;

  @ManyToMany(() => Genre, (genre) => genre.titles)
  @JoinTable({
    name: 'title_genres',
    joinColumn: { name: 'title_id', referencedColumnName: 'id' },
    inverseJoinColumn: { name: 'genre_id', referencedColumnName: 'id' },
  })
  genres!: Genre[];

  @RelationId((title: Title) => title.genres)
  genreIds!: number[];

  @OneToMany(() => Review, (review) => review.title)
  reviews!: Review[];

  @RelationId((title: Title) => title.reviews)
  reviewIds!: number[];
}
