const UNIQUE_VIOLATION = '23505';
const MAX_CAUSE_DEPTH = 5;

/**
 * True when a driver error (or its cause chain) is a Postgres unique violation.
 */
export function isUniqueViolation(error: unknown): boolean {
  return uniqueViolationConstraint(error) !== undefined;
}

/**
 * Returns the violated constraint name, null when the driver did not report
 * one, or undefined when the error is not a unique violation.
 */
export function uniqueViolationConstraint(error: unknown): string | null | undefined {
  let current: unknown = error;
  for (let depth = 0; depth < MAX_CAUSE_DEPTH; depth += 1) {
    if (typeof current !== 'object' || current === null) {
      return undefined;
    }
    if ('code' in current && current.code === UNIQUE_VIOLATION) {
      return 'constraint_name' in current && typeof current.constraint_name === 'string'
        ? current.constraint_name
        : null;
    }
    current = 'cause' in current ? current.cause : undefined;
  }
  return undefined;
}
