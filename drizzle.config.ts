import 'dotenv/config';
import { defineConfig } from 'drizzle-kit';

const url = process.env.DATABASE_URL;
if (!url) {
    throw new Error('DATABASE_URL is not set');
}

export default defineConfig({
    schema: './src/api/v1/drizzle/schema',
    out: './src/api/v1/drizzle/migrations',
    dialect: 'postgresql',
    dbCredentials: {
        url,
    },
});
