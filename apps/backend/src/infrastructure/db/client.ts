import { drizzle, type PostgresJsDatabase } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import * as schema from './schema.js';

export type Database = PostgresJsDatabase<typeof schema>;

export interface DatabaseConnection {
    db: Database;
    queryClient: postgres.Sql;
}

/**
 * Open a connection pool for the given PostgreSQL URL
 */
export function createDatabase(databaseUrl: string, options: { max?: number } = {}): DatabaseConnection {
    const queryClient = postgres(databaseUrl, { max: options.max ?? 10 });
    const db = drizzle(queryClient, { schema });
    return { db, queryClient };
}
