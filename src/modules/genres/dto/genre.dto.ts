import { Transform } from 'class-transformer';
import {
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  MaxLength,
  Min,
} from 'class-validator';

const trim = ({ value }: { value: unknown }): unknown =>
  typeof value === 'string' ? value.trim() : value;

/**
 * DTO for POST /genres
 */
export class CreateGenreDto {
  /** Provider genre id; the next id after the current maximum when omitted. */
  @IsOptional()
  @Min(1)
  @IsInt()
  id?: number;

  @MaxLength(100)
  @IsNotEmpty()
  @IsString()
  @Transform(trim)
  name!: string;
}

/**
 * DTO for PATCH /genres/:id
 */
export class UpdateGenreDto {
  @MaxLength(100)
  @IsNotEmpty()
  @IsString()
  @Transform(trim)
  name!: string;
}

/**
 * Query for GET /genres
 */
export class ListGenresQueryDto {
  /** Comma-separated genre ids, e.g. `28,12`. */
  @IsOptional()
  @IsString()
  ids?: string;

  @IsOptional()
  @IsString()
  page?: string;

  @IsOptional()
  @IsString()
  page_size?: string;
}
