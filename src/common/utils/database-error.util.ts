/** Fields shared by `pg` and PGlite database errors. */
export interface DatabaseErrorLike {
  code: string;
  constraint?: string;
  detail?: string;
}

const SQLSTATE = /^[0-9]{2}[0-9A-Z]{3}$/;

function isDatabaseError(value: unknown): value is DatabaseErrorLike {
  if (typeof value !== 'object' || value === null || !('code' in value)) {
    return false;
  }
  return typeof value.code === 'string' && SQLSTATE.test(value.code);
}

/**
 * Finds the driver error behind an exception. Query builders wrap the driver
 * error, so the `cause` chain is walked until one carrying a SQLSTATE is found.
 */
export function findDatabaseError(exception: unknown): DatabaseErrorLike | undefined {
  let current: unknown = exception;
  for (let depth = 0; depth < 5 && current; depth++) {
    if (isDatabaseError(current)) {
      return current;
    }
    current = current instanceof Error ? current.cause : undefined;
  }
  return undefined;
}
