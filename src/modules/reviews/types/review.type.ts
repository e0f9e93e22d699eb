import { Review, User } from '@/database/entities';

export type ReviewResponse = {
  id: number;
  title: number;
  author: number;
  authorName: string;
  authorInitials: string;
  rating: number;
  comment: string;
  datePosted: string;
};

export const initialsOf = (
  author: Pick<User, 'firstName' | 'lastName' | 'username'>,
): string => {
  const initials = `${author.firstName.charAt(0)}${author.lastName.charAt(0)}`;
  return (initials || author.username.charAt(0)).toUpperCase();
};

/** Expects `review.author` to be loaded. */
export const toReviewResponse = (review: Review): ReviewResponse => ({
  id: review.id,
  title: review.titleId,
  author: review.authorId,
  authorName: review.author.username,
  authorInitials: initialsOf(review.author),
  rating: review.rating,
  comment: review.comment,
  datePosted: review.datePosted.toISOString(),
});
