import { drizzle } from "drizzle-orm/node-postgres";
import { DATABASE_URL } from "../config/env";

export const db = drizzle(DATABASE_URL);

export type Database = typeof db;
export type DatabaseTransaction = Parameters<Parameters<Database["transaction"]>[0]>[0];
