// Prepares the conversations table (pgvector extension, table, indexes) with
// the configured embedding dimensionality.

import 'dotenv/config';
import { loadConfig } from '../config/index.js';
import { logger } from '../logging/logger.js';
import { createDatabase } from './client.js';
import { ConversationRepository } from '../../adapters/storage/conversation-repository.js';
import { PgConversationIndex } from '../../adapters/conversation-index/PgConversationIndex.js';

async function runMigrations() {
    const config = loadConfig();
    logger.setLevel(config.logLevel);

    if (config.store.backend !== 'postgres') {
        throw new Error('STORE_BACKEND must be postgres to run migrations');
    }

    logger.info('Running migrations...', { dimensions: config.embedding.dimensions });

    // Connection for migrations (max 1 connection)
    const { db, queryClient } = createDatabase(config.store.databaseUrl, { max: 1 });
    const index = new PgConversationIndex(new ConversationRepository(db), {
        dimensions: config.embedding.dimensions,
        timeoutMs: config.store.timeoutMs,
    });

    try {
        await index.initialize();
        logger.info('Migrations completed successfully');
    } finally {
        await queryClient.end();
    }
}

runMigrations().catch((error) => {
    logger.error('Migration failed', error);
    process.exit(1);
});
