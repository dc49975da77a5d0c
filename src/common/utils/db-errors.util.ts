import { QueryFailedError } from 'typeorm';

const UNIQUE_VIOLATION_CODES = [
  '23505', // postgres
  'SQLITE_CONSTRAINT_UNIQUE',
  'SQLITE_CONSTRAINT_PRIMARYKEY',
];

export function isUniqueViolation(err: unknown): boolean {
  if (!(err instanceof QueryFailedError)) return false;
  const driverError: unknown = err.driverError;
  if (
    typeof driverError === 'object' &&
    driverError !== null &&
    'code' in driverError &&
    typeof driverError.code === 'string'
  ) {
    return UNIQUE_VIOLATION_CODES.includes(driverError.code);
  }
  return /UNIQUE constraint failed|duplicate key/i.test(err.message);
}
