import { Genre, Review, Title } from '@/database/entities';
import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import {
  TITLE_QUERY_OPTIONS,
  TitleQueryEngine,
  TitleQueryOptions,
} from './query/title-query.engine';
import { RatingBounds, YearBounds } from './query/title-filters';
import { TitlesController } from './titles.controller';
import { TitlesService } from './titles.service';

@Module({
  imports: [TypeOrmModule.forFeature([Title, Genre, Review])],
  controllers: [TitlesController],
  providers: [
    {
      provide: TITLE_QUERY_OPTIONS,
      inject: [ConfigService],
      useFactory: (config: ConfigService): TitleQueryOptions => ({
        yearRange: config.get<YearBounds>('catalog.yearRange', {
          min: null,
          max: null,
        }),
        ratingRange: config.get<RatingBounds>('catalog.ratingRange', {
          min: 0,
          max: 10,
        }),
      }),
    },
    TitleQueryEngine,
    TitlesService,
  ],
  exports: [TitlesService],
})
export class TitlesModule {}
