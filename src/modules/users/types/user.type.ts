import { User } from '@/database/entities';

export type UserResponse = {
  id: number;
  email: string;
  username: string;
  firstName: string;
  lastName: string;
  isStaff: boolean;
  dateJoined: string;
};

/** Identity asserted by an external provider (Google). */
export type ExternalIdentity = {
  email: string;
  firstName: string;
  lastName: string;
};

export const toUserResponse = (user: User): UserResponse => ({
  id: user.id,
  email: user.email,
  username: user.username,
  firstName: user.firstName,
  lastName: user.lastName,
  isStaff: user.isStaff,
  dateJoined: user.dateJoined.toISOString(),
});
