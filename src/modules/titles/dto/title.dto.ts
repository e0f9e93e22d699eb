import { MovieOrTv } from '@/database/entities';
import { Transform } from 'class-transformer';
import {
  ArrayUnique,
  IsArray,
  IsDateString,
  IsEnum,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Matches,
  MaxLength,
  Min,
} from 'class-validator';

const trim = ({ value }: { value: unknown }): unknown =>
  typeof value === 'string' ? value.trim() : value;

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

/**
 * DTO for POST /titles
 */
export class CreateTitleDto {
  /**
   * Optional explicit id (typically the provider id). When omitted the
   * lowest unused positive integer is assigned.
   */
  @IsOptional()
  @Min(1)
  @IsInt()
  id?: number;

  @MaxLength(255)
  @IsNotEmpty()
  @IsString()
  @Transform(trim)
  title!: string;

  @Matches(ISO_DATE, { message: 'releaseDate must be formatted YYYY-MM-DD' })
  @IsDateString()
  releaseDate!: string;

  @IsOptional()
  @IsString()
  overview?: string;

  @IsOptional()
  @MaxLength(500)
  @IsString()
  imgUrl?: string;

  @IsEnum(MovieOrTv)
  movieOrTv!: MovieOrTv;

  @IsOptional()
  @ArrayUnique()
  @IsInt({ each: true })
  @IsArray()
  genres?: number[];
}

/**
 * DTO for PATCH /titles/:id. `id` and `rating` are not writable.
 */
export class UpdateTitleDto {
  @IsOptional()
  @MaxLength(255)
  @IsNotEmpty()
  @IsString()
  @Transform(trim)
  title?: string;

  @IsOptional()
  @Matches(ISO_DATE, { message: 'releaseDate must be formatted YYYY-MM-DD' })
  @IsDateString()
  releaseDate?: string;

  @IsOptional()
  @IsString()
  overview?: string;

  @IsOptional()
  @MaxLength(500)
  @IsString()
  imgUrl?: string;

  @IsOptional()
  @IsEnum(MovieOrTv)
  movieOrTv?: MovieOrTv;

  @IsOptional()
  @ArrayUnique()
  @IsInt({ each: true })
  @IsArray()
  genres?: number[];
}

/**
 * Query for GET /titles. Values stay raw strings; TitleQueryEngine parses
 * them so each violation gets its own message.
 */
export class ListTitlesQueryDto {
  @IsOptional()
  @IsString()
  search?: string;

  @IsOptional()
  @IsString()
  movie_or_tv?: string;

  @IsOptional()
  @IsString()
  genres?: string;

  @IsOptional()
  @IsString()
  year_range?: string;

  @IsOptional()
  @IsString()
  rating_range?: string;

  @IsOptional()
  @IsString()
  order_by?: string;

  @IsOptional()
  @IsString()
  page?: string;

  @IsOptional()
  @IsString()
  page_size?: string;
}
