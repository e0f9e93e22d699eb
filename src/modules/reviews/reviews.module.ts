import { Review } from '@/database/entities';
import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ReviewInvariantsService } from './review-invariants.service';
import { ReviewsController } from './reviews.controller';
import { ReviewsService } from './reviews.service';

@Module({
  imports: [TypeOrmModule.forFeature([Review])],
  controllers: [ReviewsController],
  providers: [ReviewInvariantsService, ReviewsService],
  exports: [ReviewInvariantsService],
})
export class ReviewsModule {}
