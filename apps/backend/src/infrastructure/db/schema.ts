import { pgTable, uuid, text, timestamp, varchar, jsonb, customType, index } from 'drizzle-orm/pg-core';
import { PROVIDERS, type ConversationMetadata } from '@chat-recall/shared-types';

// Custom pgvector type
export const vector = customType<{ data: number[]; driverData: string; config: { dimensions: number } }>({
    dataType(config) {
        return `vector(${config?.dimensions ?? 1536})`;
    },
    toDriver(value: number[]): string {
        return toVectorLiteral(value);
    },
    fromDriver(value: string): number[] {
        return parseVectorLiteral(value);
    },
});

/**
 * Format a number array as a pgvector literal ("[0.1,0.2,0.3]")
 */
export function toVectorLiteral(value: number[]): string {
    return `[${value.join(',')}]`;
}

/**
 * Parse a pgvector literal back into a number array
 */
export function parseVectorLiteral(value: string): number[] {
    const inner = value.trim().replace(/^\[|\]$/g, '');
    return inner.length === 0 ? [] : inner.split(',').map(Number);
}

// === Chat History ===
// The table is created by ConversationRepository.ensureSchema with the
// configured dimensionality; this definition types queries against it.
export const conversations = pgTable('conversations', {
    id: uuid('id').primaryKey().defaultRandom(),
    provider: varchar('provider', { length: 20, enum: PROVIDERS }).notNull(),
    prompt: text('prompt').notNull(),
    response: text('response').notNull(),
    embedding: vector('embedding', { dimensions: 1536 }).notNull(),
    metadata: jsonb('metadata').$type<ConversationMetadata>().notNull().default({}),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
}, (table) => [
    index('conversations_provider_created_at_idx').on(table.provider, table.createdAt),
]);

export type ConversationRow = typeof conversations.$inferSelect;
