import { Policy } from '@/common/decorators/policy.decorator';
import { MovieOrTv } from '@/database/entities';
import { Controller, Get, Query } from '@nestjs/common';
import { SearchMetadataQueryDto } from './dto/metadata.dto';
import { TmdbService } from './tmdb.service';
import { ProviderTitle } from './types/tmdb.type';

/**
 *  GET /metadata/search?search_term=&movie_or_tv=   ← staff
 */
@Controller('metadata')
export class MetadataController {
  constructor(private readonly tmdbService: TmdbService) {}

  @Get('search')
  @Policy('metadata:search')
  search(@Query() query: SearchMetadataQueryDto): Promise<ProviderTitle[]> {
    return this.tmdbService.searchTitles(
      query.search_term,
      query.movie_or_tv ?? MovieOrTv.MOVIE,
    );
  }
}
