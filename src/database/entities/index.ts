import { Genre } from './genre.entity';
import { Review } from './review.entity';
import { Title } from './title.entity';
import { User } from './user.entity';
import { ValidationToken } from './validation-token.entity';

export { Genre, Review, Title, User, ValidationToken };
export { MovieOrTv } from './title.entity';

export const ENTITIES = [User, Genre, Title, Review, ValidationToken];
