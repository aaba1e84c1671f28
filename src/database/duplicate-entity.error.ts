import { QueryFailedError } from 'typeorm';

const PG_UNIQUE_VIOLATION = '23505';

/** A unique constraint rejected the insert; the caller should re-read. */
export class DuplicateEntityError extends Error {
  constructor(
    readonly entity: string,
    readonly naturalKey: string,
  ) {
    super(`${entity} "${naturalKey}" already exists`);
    this.name = 'DuplicateEntityError';
  }
}

export function isUniqueViolation(error: unknown): boolean {
  if (!(error instanceof QueryFailedError)) return false;
  const driverError: unknown = error.driverError;
  return (
    typeof driverError === 'object' &&
    driverError !== null &&
    'code' in driverError &&
    driverError.code === PG_UNIQUE_VIOLATION
  );
}
