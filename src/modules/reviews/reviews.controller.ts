import { CurrentUser } from '@/common/decorators/current-user.decorator';
import { Policy } from '@/common/decorators/policy.decorator';
import { Public } from '@/common/decorators/public.decorator';
import { Paginated } from '@/common/pagination/pagination.type';
import { AuthUser } from '@/common/types/jwt.type';
import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseIntPipe,
  Patch,
  Post,
  Query,
} from '@nestjs/common';
import {
  CreateReviewDto,
  ListReviewsQueryDto,
  UpdateReviewDto,
} from './dto/review.dto';
import { ReviewsService } from './reviews.service';
import { ReviewResponse } from './types/review.type';

/**
 *  GET    /reviews?title=<id>   ← public, paginated
 *  GET    /reviews/:id          ← public
 *  POST   /reviews              ← any authenticated user, one per title
 *  PATCH  /reviews/:id          ← author only
 *  DELETE /reviews/:id          ← author or staff
 */
@Controller('reviews')
export class ReviewsController {
  constructor(private readonly reviewsService: ReviewsService) {}

  @Public()
  @Get()
  findAll(
    @Query() query: ListReviewsQueryDto,
  ): Promise<Paginated<ReviewResponse>> {
    return this.reviewsService.findAll(query);
  }

  @Public()
  @Get(':id')
  findOne(@Param('id', ParseIntPipe) id: number): Promise<ReviewResponse> {
    return this.reviewsService.findOne(id);
  }

  @Post()
  @Policy('review:create')
  @HttpCode(HttpStatus.CREATED)
  create(
    @CurrentUser() actor: AuthUser,
    @Body() dto: CreateReviewDto,
  ): Promise<ReviewResponse> {
    return this.reviewsService.create(actor, dto);
  }

  @Patch(':id')
  update(
    @CurrentUser() actor: AuthUser,
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: UpdateReviewDto,
  ): Promise<ReviewResponse> {
    return this.reviewsService.update(actor, id, dto);
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  remove(
    @CurrentUser() actor: AuthUser,
    @Param('id', ParseIntPipe) id: number,
  ): Promise<void> {
    return this.reviewsService.remove(actor, id);
  }
}
