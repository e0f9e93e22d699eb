import { AuthUser } from '@/common/types/jwt.type';
import {
  Genre,
  MovieOrTv,
  Review,
  Title,
  User,
} from '@/database/entities';
import { hash } from 'argon2';
import { DataSource } from 'typeorm';

export const TEST_PASSWORD = 'test-password';

let passwordHash: Promise<string> | null = null;
let sequence = 0;

const testPasswordHash = (): Promise<string> => {
  passwordHash ??= hash(TEST_PASSWORD);
  return passwordHash;
};

export const createUser = async (
  dataSource: DataSource,
  overrides: Partial<User> = {},
): Promise<User> => {
  const n = ++sequence;
  const repo = dataSource.getRepository(User);

  return repo.save(
    repo.create({
      email: `user${n}@example.com`,
      username: `user${n}`,
      password: await testPasswordHash(),
      ...overrides,
    }),
  );
};

export const createGenre = (
  dataSource: DataSource,
  id: number,
  name: string,
): Promise<Genre> => {
  const repo = dataSource.getRepository(Genre);
  return repo.save(repo.create({ id, name }));
};

export const createTitle = (
  dataSource: DataSource,
  id: number,
  overrides: Partial<Title> = {},
): Promise<Title> => {
  const repo = dataSource.getRepository(Title);

  return repo.save(
    repo.create({
      id,
      title: `Title ${id}`,
      releaseDate: '2000-01-01',
      overview: '',
      imgUrl: '',
      movieOrTv: MovieOrTv.MOVIE,
      rating: 0,
      ...overrides,
    }),
  );
};

export const createReview = (
  dataSource: DataSource,
  authorId: number,
  titleId: number,
  rating: number,
): Promise<Review> => {
  const repo = dataSource.getRepository(Review);
  return repo.save(repo.create({ authorId, titleId, rating, comment: '' }));
};

/** The `request.user` shape JwtStrategy would attach for `user`. */
export const actorOf = (user: User): AuthUser => ({
  id: user.id,
  email: user.email,
  username: user.username,
  isStaff: user.isStaff,
});
