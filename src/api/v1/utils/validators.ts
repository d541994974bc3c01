import { getToday, toDay } from './timezone';

// Each validator returns an error message, or null when the value passes.
// An absent value always passes; required-ness is checked by the caller.

export type DateLike = Date | string;

export function noFutureDate(value: DateLike | null | undefined): string | null {
    if (!value) return null;
    const day = toDay(value);
    if (day > getToday()) {
        return `${day} is in the future. This field cannot accept future dates.`;
    }
    return null;
}

export function dateNotBefore(
    value: DateLike | null | undefined,
    reference: DateLike | null | undefined,
): string | null {
    if (!value || !reference) return null;
    const day = toDay(value);
    const base = toDay(reference);
    if (day < base) {
        return `${day} cannot be before ${base}.`;
    }
    return null;
}

export function nonNegative(value: number | null | undefined): string | null {
    if (value === null || value === undefined) return null;
    if (value < 0) {
        return `${value} cannot be negative.`;
    }
    return null;
}

export function currencyRange(
    value: number | null | undefined,
    min: number = 0,
    max: number | null = null,
): string | null {
    if (value === null || value === undefined) return null;
    if (value < min) {
        return `Value cannot be less than ${min}.`;
    }
    if (max !== null && value > max) {
        return `Value cannot be greater than ${max}.`;
    }
    return null;
}

/** Largest magnitude a `numeric(10,2)` column holds. */
export const DECIMAL_LIMIT = 99999999.99;

/**
 * A quantity or amount as stored: finite, at most two decimals and within
 * `min`..`max`. Values with more precision are rejected, not rounded, so a
 * sign check on the input holds for the stored value too.
 */
export function decimalAmount(
    value: number | null | undefined,
    min: number = -DECIMAL_LIMIT,
    max: number = DECIMAL_LIMIT,
): string | null {
    if (value === null || value === undefined) return null;
    if (!Number.isFinite(value)) {
        return 'Value must be a number.';
    }
    if (Number(value.toFixed(2)) !== value) {
        return `${value} cannot have more than 2 decimal places.`;
    }
    return currencyRange(value, min, max);
}

const PHONE_PATTERN = /^(\+\d{1,3}[\s.-]?)?\(?\d{3}\)?[\s.-]?\d{3}[\s.-]?\d{4}$/;

export function phoneFormat(value: string | null | undefined): string | null {
    if (!value) return null;
    const digits = value.replace(/\D/g, '');
    if (digits.length < 7 || digits.length > 15) {
        return `${value} is not a valid phone number. Must have between 7 and 15 digits.`;
    }
    if (!PHONE_PATTERN.test(value)) {
        return `${value} is not a valid phone number format.`;
    }
    return null;
}

const EMAIL_PATTERN = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;

export function emailFormat(value: string | null | undefined): string | null {
    if (!value) return null;
    if (!EMAIL_PATTERN.test(value)) {
        return `${value} is not a valid email address.`;
    }
    return null;
}

/**
 * Collects the first failing message per field, in declaration order.
 * Returns an empty object when every check passes.
 */
export function collectFieldErrors(checks: Array<[field: string, message: string | null]>) {
    const errors: Record<string, string> = {};
    for (const [field, message] of checks) {
        if (message !== null && errors[field] === undefined) {
            errors[field] = message;
        }
    }
    return errors;
}
