import express from 'express';
import { afterAll, beforeAll, describe, expect, it, vi } from 'vitest';
import { z } from 'zod';
import { errorHandler } from '../middleware/errorHandler';
import { ConflictError, ConsistencyError, NotFoundError, ValidationError } from '../utils/AppError';
import { requestHandler } from '../utils/requestHandler';
import { startServer, type TestServer } from './helpers/server';

function buildApp() {
    const app = express();
    app.use(express.json());
    app.get('/validation', requestHandler(async () => {
        throw new ValidationError({ quantity: 'Quantity must be positive for received transactions.' });
    }));
    app.get('/zod', requestHandler(async () => {
        z.object({
            quantity: z.number(),
            items: z.array(z.object({ itemId: z.string().uuid() })),
        }).parse({ quantity: 'ten', items: [{ itemId: 'not-a-uuid' }] });
    }));
    app.get('/not-found', requestHandler(async () => {
        throw new NotFoundError('Order not found');
    }));
    app.get('/conflict', requestHandler(async () => {
        throw new ConflictError('Only placed orders can be received');
    }));
    app.get('/busy', requestHandler(async () => {
        throw new ConsistencyError();
    }));
    app.get('/foreign-key', requestHandler(async () => {
        throw new Error('Failed query: delete from "categories"', { cause: { code: '23503' } });
    }));
    app.get('/unique', requestHandler(async () => {
        throw Object.assign(new Error('duplicate key value'), { code: '23505' });
    }));
    app.get('/out-of-range', requestHandler(async () => {
        throw new Error('Failed query: insert into "inventory_transactions"', { cause: { code: '22003' } });
    }));
    app.get('/boom', requestHandler(async () => {
        throw new Error('kaboom');
    }));
    app.use(errorHandler);
    return app;
}

describe('errorHandler', () => {
    let server: TestServer;

    beforeAll(async () => {
        server = await startServer(buildApp());
    });

    afterAll(async () => {
        await server.close();
    });

    const get = async (path: string) => {
        const response = await fetch(`${server.url}${path}`);
        return { status: response.status, body: await response.json() };
    };

    it('returns field errors of a ValidationError', async () => {
        expect(await get('/validation')).toEqual({
            status: 400,
            body: {
                success: false,
                message: 'Validation failed',
                statusCode: 400,
                data: { errors: { quantity: 'Quantity must be positive for received transactions.' } },
            },
        });
    });

    it('maps zod issues to dotted field paths', async () => {
        const { status, body } = await get('/zod');

        expect(status).toBe(400);
        expect(body).toEqual({
            success: false,
            message: 'Validation failed',
            statusCode: 400,
            data: {
                errors: {
                    quantity: 'Expected number, received string',
                    'items.0.itemId': 'Invalid uuid',
                },
            },
        });
    });

    it('uses the status of operational errors', async () => {
        expect(await get('/not-found')).toEqual({
            status: 404,
            body: { success: false, message: 'Order not found', statusCode: 404, data: {} },
        });
        expect((await get('/conflict')).status).toBe(409);
    });

    it('logs and returns 503 for a ledger consistency failure', async () => {
        const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

        const { status, body } = await get('/busy');

        expect(status).toBe(503);
        expect(body).toMatchObject({ message: 'Inventory ledger is busy, please retry' });
        expect(error).toHaveBeenCalledWith('GET /busy: Inventory ledger is busy, please retry');
        error.mockRestore();
    });

    it('maps foreign key and unique violations to 409', async () => {
        expect(await get('/foreign-key')).toEqual({
            status: 409,
            body: {
                success: false,
                message: 'The record is referenced by other records or references a missing one',
                statusCode: 409,
                data: {},
            },
        });
        expect((await get('/unique')).body).toMatchObject({
            statusCode: 409,
            message: 'A record with the same unique values already exists',
        });
    });

    it('maps a numeric overflow from the database to 400', async () => {
        expect(await get('/out-of-range')).toEqual({
            status: 400,
            body: { success: false, message: 'A numeric value is out of range', statusCode: 400, data: {} },
        });
    });

    it('answers a malformed JSON body with 400 without logging', async () => {
        const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

        const response = await fetch(`${server.url}/validation`, {
            method: 'POST',
            headers: { 'Content-Type': 'application/json' },
            body: '{"quantity": ',
        });

        expect(response.status).toBe(400);
        expect(await response.json()).toEqual({
            success: false,
            message: 'Malformed JSON body',
            statusCode: 400,
            data: {},
        });
        expect(error).not.toHaveBeenCalled();
        error.mockRestore();
    });

    it('hides unexpected errors behind a 500', async () => {
        const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

        expect(await get('/boom')).toEqual({
            status: 500,
            body: { success: false, message: 'Internal Server Error', statusCode: 500, data: {} },
        });
        expect(error).toHaveBeenCalledWith('GET /boom: kaboom');
        error.mockRestore();
    });
});
