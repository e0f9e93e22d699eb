import { Transform, Type } from 'class-transformer';
import {
  IsInt,
  IsNumber,
  IsOptional,
  IsString,
  Max,
  MaxLength,
  Min,
} from 'class-validator';

const trim = ({ value }: { value: unknown }): unknown =>
  typeof value === 'string' ? value.trim() : value;

/**
 * DTO for POST /reviews
 */
export class CreateReviewDto {
  /** Title id. */
  @Min(1)
  @IsInt()
  title!: number;

  @Max(10)
  @Min(0)
  @IsNumber({ allowNaN: false, allowInfinity: false, maxDecimalPlaces: 1 })
  rating!: number;

  @IsOptional()
  @MaxLength(200)
  @IsString()
  @Transform(trim)
  comment?: string;
}

/**
 * DTO for PATCH /reviews/:id. `title`, `author` and the timestamp are
 * read-only; the global whitelist drops them if sent.
 */
export class UpdateReviewDto {
  @IsOptional()
  @Max(10)
  @Min(0)
  @IsNumber({ allowNaN: false, allowInfinity: false, maxDecimalPlaces: 1 })
  rating?: number;

  @IsOptional()
  @MaxLength(200)
  @IsString()
  @Transform(trim)
  comment?: string;
}

/**
 * Query for GET /reviews
 */
export class ListReviewsQueryDto {
  @IsOptional()
  @Min(1)
  @IsInt()
  @Type(() => Number)
  title?: number;

  @IsOptional()
  @IsString()
  page?: string;

  @IsOptional()
  @IsString()
  page_size?: string;
}
