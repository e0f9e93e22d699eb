/**
 * Every guarded action in the API. Adding a route that needs a check means
 * adding an action here and a rule below.
 */
export type PolicyAction =
  | 'title:create'
  | 'title:update'
  | 'title:delete'
  | 'genre:create'
  | 'genre:update'
  | 'genre:delete'
  | 'genre:sync'
  | 'review:create'
  | 'review:update'
  | 'review:delete'
  | 'user:list'
  | 'user:read'
  | 'user:update'
  | 'user:delete'
  | 'metadata:search';

export interface PolicyActor {
  id: number;
  isStaff: boolean;
}

/** A resource that belongs to one user (a review's author, a user's own record). */
export interface OwnedSubject {
  ownerId: number;
}

type Rule = (actor: PolicyActor, subject?: OwnedSubject) => boolean;

const staffOnly: Rule = (actor) => actor.isStaff;
const authenticated: Rule = () => true;
const ownerOnly: Rule = (actor, subject) => subject?.ownerId === actor.id;
const ownerOrStaff: Rule = (actor, subject) =>
  actor.isStaff || ownerOnly(actor, subject);

const RULES: Record<PolicyAction, Rule> = {
  'title:create': staffOnly,
  'title:update': staffOnly,
  'title:delete': staffOnly,
  'genre:create': staffOnly,
  'genre:update': staffOnly,
  'genre:delete': staffOnly,
  'genre:sync': staffOnly,
  'review:create': authenticated,
  'review:update': ownerOnly,
  'review:delete': ownerOrStaff,
  'user:list': staffOnly,
  'user:read': ownerOrStaff,
  'user:update': ownerOrStaff,
  'user:delete': ownerOrStaff,
  'metadata:search': staffOnly,
};

/**
 * Decides whether `actor` may perform `action`, optionally on `subject`.
 * Anonymous actors are always denied; owner rules deny when no subject is given.
 */
export const authorize = (
  actor: PolicyActor | null | undefined,
  action: PolicyAction,
  subject?: OwnedSubject,
): boolean => {
  if (!actor) return false;
  return RULES[action](actor, subject);
};
