import { MovieOrTv } from '@/database/entities';
import { IsEnum, IsNotEmpty, IsOptional, IsString } from 'class-validator';

/**
 * Query for GET /metadata/search
 */
export class SearchMetadataQueryDto {
  @IsNotEmpty()
  @IsString()
  search_term!: string;

  @IsOptional()
  @IsEnum(MovieOrTv)
  movie_or_tv?: MovieOrTv;
}
