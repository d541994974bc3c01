// Postgres SQLSTATE codes the API reacts to.
export const PG_NUMERIC_OUT_OF_RANGE = '22003';
export const PG_FOREIGN_KEY_VIOLATION = '23503';
export const PG_UNIQUE_VIOLATION = '23505';
export const PG_SERIALIZATION_FAILURE = '40001';
export const PG_DEADLOCK_DETECTED = '40P01';
export const PG_LOCK_NOT_AVAILABLE = '55P03';

/**
 * Finds the SQLSTATE of a driver error. Query errors may arrive wrapped by
 * the ORM, so the `cause` chain is followed.
 */
export function getPgErrorCode(err: unknown): string | undefined {
    let current: unknown = err;
    for (let depth = 0; depth < 5 && typeof current === 'object' && current !== null; depth++) {
        if ('code' in current && typeof current.code === 'string') {
            return current.code;
        }
        current = 'cause' in current ? current.cause : undefined;
    }
    return undefined;
}
