import type { Request } from 'express';

export type PaginationOptions = {
    page: number;
    limit: number;
};

export type Paginated<T> = {
    list: T[];
    pagination: PaginationOptions & {
        totalPages: number;
        totalCount: number;
    };
};

const DEFAULT_LIMIT = 20;
const MAX_LIMIT = 100;

export function getPaginationFromRequest(req: Request): PaginationOptions {
    const page = Number(req.query.page);
    const limit = Number(req.query.limit);
    return {
        page: Number.isInteger(page) && page > 0 ? page : 1,
        limit: Number.isInteger(limit) && limit > 0 ? Math.min(limit, MAX_LIMIT) : DEFAULT_LIMIT,
    };
}

/** Single-valued string query parameter, ignoring repeated or empty values. */
export function getQueryString(req: Request, key: string): string | undefined {
    const value = req.query[key];
    return typeof value === 'string' && value.length > 0 ? value : undefined;
}

export function getOffset({ page, limit }: PaginationOptions) {
    return (page - 1) * limit;
}

export function toPaginated<T>(list: T[], totalCount: number, pagination: PaginationOptions): Paginated<T> {
    return {
        list,
        pagination: {
            ...pagination,
            totalPages: Math.ceil(totalCount / pagination.limit),
            totalCount,
        },
    };
}
