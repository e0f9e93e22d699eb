import { ResourceNotFoundException } from '@/common/exceptions/domain.exception';
import { PaginationService } from '@/common/pagination/pagination.service';
import { Paginated } from '@/common/pagination/pagination.type';
import { AuthUser } from '@/common/types/jwt.type';
import { Review } from '@/database/entities';
import { PolicyService } from '@/modules/policy/policy.service';
import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { I18nService } from 'nestjs-i18n';
import { Repository } from 'typeorm';
import {
  CreateReviewDto,
  ListReviewsQueryDto,
  UpdateReviewDto,
} from './dto/review.dto';
import { ReviewInvariantsService } from './review-invariants.service';
import { ReviewResponse, toReviewResponse } from './types/review.type';

@Injectable()
export class ReviewsService {
  constructor(
    @InjectRepository(Review) private readonly reviews: Repository<Review>,
    private readonly invariants: ReviewInvariantsService,
    private readonly policy: PolicyService,
    private readonly pagination: PaginationService,
    private readonly i18n: I18nService,
  ) {}

  async findAll(
    query: ListReviewsQueryDto,
  ): Promise<Paginated<ReviewResponse>> {
    const request = this.pagination.resolve(query);
    const window = this.pagination.window(request);

    const [reviews, count] = await this.reviews.findAndCount({
      where: query.title === undefined ? {} : { titleId: query.title },
      relations: { author: true },
      order: { datePosted: 'DESC', id: 'DESC' },
      skip: window?.skip,
      take: window?.take,
    });

    return this.pagination.build(
      request,
      count,
      reviews.map(toReviewResponse),
    );
  }

  async findOne(id: number): Promise<ReviewResponse> {
    return toReviewResponse(await this.getOrFail(id));
  }

  /**
   * @throws ResourceNotFoundException  Title does not exist.
   * @throws DuplicateReviewException
   */
  async create(
    actor: AuthUser,
    dto: CreateReviewDto,
  ): Promise<ReviewResponse> {
    this.policy.assert(actor, 'review:create');

    const review = await this.invariants.create(actor.id, {
      titleId: dto.title,
      rating: dto.rating,
      comment: dto.comment ?? '',
    });

    return this.findOne(review.id);
  }

  /**
   * @throws PermissionDeniedException  Caller is not the author.
   */
  async update(
    actor: AuthUser,
    id: number,
    dto: UpdateReviewDto,
  ): Promise<ReviewResponse> {
    const review = await this.getOrFail(id);
    this.policy.assert(actor, 'review:update', { ownerId: review.authorId });

    const updated = await this.invariants.update(review, {
      rating: dto.rating,
      comment: dto.comment,
    });

    return toReviewResponse(updated);
  }

  /**
   * @throws PermissionDeniedException  Caller is neither the author nor staff.
   */
  async remove(actor: AuthUser, id: number): Promise<void> {
    const review = await this.getOrFail(id);
    this.policy.assert(actor, 'review:delete', { ownerId: review.authorId });

    await this.invariants.remove(review);
  }

  private async getOrFail(id: number): Promise<Review> {
    const review = await this.reviews.findOne({
      where: { id },
      relations: { author: true },
    });

    if (!review) {
      throw new ResourceNotFoundException(
        this.i18n.translate('catalog.errors.reviewNotFound'),
      );
    }
    return review;
  }
}
