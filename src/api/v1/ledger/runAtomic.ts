import { LEDGER_MAX_ATTEMPTS } from '../config/env';
import { ConsistencyError } from '../utils/AppError';
import type { Ledger, LedgerStore } from './ledgerStore';

/**
 * Runs one atomic unit, retrying it from scratch on lock contention or a
 * detected race. After the last attempt the failure surfaces as a
 * ConsistencyError; any other error propagates unchanged on first sight.
 */
export async function runAtomic<T>(
    ledger: Ledger,
    operation: string,
    work: (store: LedgerStore) => Promise<T>,
): Promise<T> {
    for (let attempt = 1; ; attempt++) {
        try {
            return await ledger.transaction(work);
        } catch (err) {
            if (!ledger.isTransientError(err)) throw err;
            const cause = err instanceof Error ? err.message : String(err);
            if (attempt >= LEDGER_MAX_ATTEMPTS) {
                console.error(`${operation} failed after ${attempt} attempts: ${cause}`);
                throw new ConsistencyError(`${operation} could not complete because the inventory ledger is busy, please retry`);
            }
            console.warn(`${operation} attempt ${attempt} rolled back, retrying: ${cause}`);
        }
    }
}
