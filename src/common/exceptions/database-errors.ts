import { QueryFailedError } from 'typeorm';

const UNIQUE_VIOLATION_CODES = new Set([
  '23505', // postgres
  'SQLITE_CONSTRAINT_UNIQUE',
  'SQLITE_CONSTRAINT_PRIMARYKEY',
]);

/**
 * True when a write failed on a unique or primary-key constraint.
 */
export const isUniqueViolation = (error: unknown): boolean => {
  if (!(error instanceof QueryFailedError)) return false;

  const driverError: unknown = error.driverError;
  if (typeof driverError !== 'object' || driverError === null) return false;
  if (!('code' in driverError)) return false;

  return UNIQUE_VIOLATION_CODES.has(String(driverError.code));
};
