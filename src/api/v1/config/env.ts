import "dotenv/config";
import { z } from "zod";

const envSchema = z.object({
    DATABASE_URL: z.string().min(1),
    PORT: z.coerce.number().int().positive().default(3000),
    JWT_SECRET: z.string().min(1),
    JWT_EXPIRES_IN: z.coerce.number().int().positive().default(86400),
    LEDGER_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(3),
    LEDGER_LOCK_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
});

const parsed = envSchema.safeParse(process.env);
if (!parsed.success) {
    const lines = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new Error(`Invalid environment configuration:\n${lines.join("\n")}`);
}

export const DATABASE_URL = parsed.data.DATABASE_URL;
export const PORT = parsed.data.PORT;
export const JWT_SECRET = parsed.data.JWT_SECRET;
export const JWT_EXPIRES_IN = parsed.data.JWT_EXPIRES_IN;
export const LEDGER_MAX_ATTEMPTS = parsed.data.LEDGER_MAX_ATTEMPTS;
export const LEDGER_LOCK_TIMEOUT_MS = parsed.data.LEDGER_LOCK_TIMEOUT_MS;
