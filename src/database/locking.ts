import { EntityManager, EntityTarget, ObjectLiteral } from 'typeorm';

/**
 * Takes a row lock for the rest of the transaction. Drivers without row
 * locks (SQLite) already serialise writers, so the lock is skipped there.
 */
export const lockRowForUpdate = async <T extends ObjectLiteral>(
  manager: EntityManager,
  entity: EntityTarget<T>,
  id: number,
): Promise<T | null> => {
  const query = manager
    .createQueryBuilder(entity, 'locked')
    .where('locked.id = :id', { id });

  if (manager.connection.options.type === 'postgres') {
    query.setLock('pessimistic_write');
  }

  return query.getOne();
};
