import {
  DuplicateReviewException,
  ResourceNotFoundException,
} from '@/common/exceptions/domain.exception';
import { isUniqueViolation } from '@/common/exceptions/database-errors';
import { Review, Title } from '@/database/entities';
import { lockRowForUpdate } from '@/database/locking';
import { Injectable, Logger } from '@nestjs/common';
import { I18nService } from 'nestjs-i18n';
import { DataSource, EntityManager } from 'typeorm';

export type ReviewInput = {
  titleId: number;
  rating: number;
  comment: string;
};

export type ReviewChanges = Partial<Pick<ReviewInput, 'rating' | 'comment'>>;

const TIE_EPSILON = 1e-9;

/**
 * Mean rounded to one decimal place, ties to the even digit; 0 when there is
 * nothing to average. A tie is detected within TIE_EPSILON so binary noise
 * (0.15 * 10 = 1.5000000000000002) still counts as one.
 */
export const roundRating = (mean: number | null): number => {
  if (mean === null) return 0;

  const scaled = mean * 10;
  const lower = Math.floor(scaled);
  if (Math.abs(scaled - lower - 0.5) < TIE_EPSILON) {
    return (lower % 2 === 0 ? lower : lower + 1) / 10;
  }
  return Math.round(scaled) / 10;
};

/**
 * Owns every write to `reviews` and keeps `titles.rating` in step with it.
 *
 * Each write runs in one transaction that first locks the owning title row,
 * then changes the review, then recomputes the title's rating from the
 * committed review set. Concurrent writes to reviews of the same title are
 * therefore serialised and no reader sees a rating for a stale review set.
 */
@Injectable()
export class ReviewInvariantsService {
  private readonly logger = new Logger(ReviewInvariantsService.name);

  constructor(
    private readonly dataSource: DataSource,
    private readonly i18n: I18nService,
  ) {}

  /**
   * @throws ResourceNotFoundException  Title does not exist.
   * @throws DuplicateReviewException   Author already reviewed this title.
   */
  async create(authorId: number, input: ReviewInput): Promise<Review> {
    try {
      return await this.dataSource.transaction(async (manager) => {
        await this.lockTitle(manager, input.titleId);

        const reviews = manager.getRepository(Review);
        if (await reviews.existsBy({ authorId, titleId: input.titleId })) {
          throw this.duplicate();
        }

        const review = await reviews.save(
          reviews.create({
            authorId,
            titleId: input.titleId,
            rating: input.rating,
            comment: input.comment,
          }),
        );

        await this.recomputeRating(manager, input.titleId);
        return review;
      });
    } catch (error) {
      // Lost a race against a concurrent create for the same pair.
      if (isUniqueViolation(error)) throw this.duplicate();
      throw error;
    }
  }

  /**
   * Applies rating/comment changes. Author and title never change.
   */
  async update(review: Review, changes: ReviewChanges): Promise<Review> {
    return this.dataSource.transaction(async (manager) => {
      await this.lockTitle(manager, review.titleId);

      const patch: ReviewChanges = {};
      if (changes.rating !== undefined) patch.rating = changes.rating;
      if (changes.comment !== undefined) patch.comment = changes.comment;

      if (Object.keys(patch).length > 0) {
        await manager.getRepository(Review).update(review.id, patch);
        Object.assign(review, patch);
      }

      await this.recomputeRating(manager, review.titleId);
      return review;
    });
  }

  async remove(review: Review): Promise<void> {
    await this.dataSource.transaction(async (manager) => {
      await this.lockTitle(manager, review.titleId);
      await manager.getRepository(Review).delete(review.id);
      await this.recomputeRating(manager, review.titleId);
    });
  }

  /**
   * Deletes every review by `authorId` inside the caller's transaction and
   * recomputes each affected title.
   */
  async removeAllByAuthor(
    manager: EntityManager,
    authorId: number,
  ): Promise<void> {
    const reviews = manager.getRepository(Review);
    const owned = await reviews.find({
      select: { id: true, titleId: true },
      where: { authorId },
    });
    const titleIds = [...new Set(owned.map((review) => review.titleId))].sort(
      (a, b) => a - b,
    );

    // Ascending order keeps lock acquisition consistent across transactions.
    for (const titleId of titleIds) {
      await this.lockTitle(manager, titleId);
    }

    await reviews.delete({ authorId });

    for (const titleId of titleIds) {
      await this.recomputeRating(manager, titleId);
    }

    if (owned.length > 0) {
      this.logger.log(
        `Removed ${owned.length} review(s) by user ${authorId} across ${titleIds.length} title(s)`,
      );
    }
  }

  /**
   * Writes round(mean(review ratings), 1) to the title, or 0 when it has no
   * reviews. Must run inside the transaction of the triggering write.
   */
  async recomputeRating(
    manager: EntityManager,
    titleId: number,
  ): Promise<number> {
    const raw = await manager
      .getRepository(Review)
      .createQueryBuilder('review')
      .select('AVG(review.rating)', 'average')
      .where('review.titleId = :titleId', { titleId })
      .getRawOne<{ average: number | string | null }>();

    const average =
      raw?.average === null || raw?.average === undefined
        ? null
        : Number(raw.average);
    const rating = roundRating(average);

    await manager.getRepository(Title).update(titleId, { rating });
    return rating;
  }

  private async lockTitle(
    manager: EntityManager,
    titleId: number,
  ): Promise<Title> {
    const title = await lockRowForUpdate(manager, Title, titleId);
    if (!title) {
      throw new ResourceNotFoundException(
        this.i18n.translate('catalog.errors.titleNotFound'),
      );
    }
    return title;
  }

  private duplicate(): DuplicateReviewException {
    return new DuplicateReviewException(
      this.i18n.translate('catalog.errors.duplicateReview'),
    );
  }
}
