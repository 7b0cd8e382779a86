import { z } from 'zod';
import { getEmbeddingDimension, isKnownEmbeddingModel } from '../ai/config.js';

const modelId = z
    .string()
    .regex(/^(openai|anthropic|google):.+$/, 'Must be in "provider:model" format with a supported provider');

const envSchema = z
    .object({
        NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
        PORT: z.coerce.number().int().positive().default(3000),
        LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

        // Storage
        STORE_BACKEND: z.enum(['postgres', 'memory']).default('postgres'),
        DATABASE_URL: z.string().regex(/^postgres(ql)?:\/\//, 'Must be a PostgreSQL URL').optional(),

        // LLM providers (keys are read by the AI SDK providers themselves)
        OPENAI_API_KEY: z.string().optional(),
        ANTHROPIC_API_KEY: z.string().optional(),
        GOOGLE_GENERATIVE_AI_API_KEY: z.string().optional(),
        OPENAI_CHAT_MODEL: modelId.default('openai:gpt-4o'),
        ANTHROPIC_CHAT_MODEL: modelId.default('anthropic:claude-3-5-sonnet-20241022'),
        GOOGLE_CHAT_MODEL: modelId.default('google:gemini-1.5-pro'),
        LLM_MAX_TOKENS: z.coerce.number().int().positive().default(4000),

        // Embeddings
        EMBEDDING_MODEL: modelId.default('openai:text-embedding-3-small'),
        EMBEDDING_DIMENSIONS: z.coerce.number().int().positive().default(1536),

        // Timeouts for every external call
        EMBEDDING_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
        LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(120000),
        STORE_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),

        // Search
        SEARCH_DEFAULT_SIZE: z.coerce.number().int().positive().default(5),
        SEARCH_MAX_SIZE: z.coerce.number().int().positive().default(50),
    })
    .superRefine((env, ctx) => {
        if (env.STORE_BACKEND === 'postgres' && !env.DATABASE_URL) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['DATABASE_URL'],
                message: 'DATABASE_URL is required when STORE_BACKEND is postgres',
            });
        }
        if (
            isKnownEmbeddingModel(env.EMBEDDING_MODEL) &&
            getEmbeddingDimension(env.EMBEDDING_MODEL) !== env.EMBEDDING_DIMENSIONS
        ) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['EMBEDDING_DIMENSIONS'],
                message: `${env.EMBEDDING_MODEL} produces ${getEmbeddingDimension(env.EMBEDDING_MODEL)}-dimensional embeddings`,
            });
        }
        if (env.SEARCH_DEFAULT_SIZE > env.SEARCH_MAX_SIZE) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['SEARCH_DEFAULT_SIZE'],
                message: 'SEARCH_DEFAULT_SIZE must not exceed SEARCH_MAX_SIZE',
            });
        }
    });

export type Env = z.infer<typeof envSchema>;

/**
 * Application configuration, built once at startup and handed to each
 * component's constructor.
 */
export interface AppConfig {
    env: Env['NODE_ENV'];
    port: number;
    logLevel: Env['LOG_LEVEL'];
    store:
        | { backend: 'postgres'; databaseUrl: string; timeoutMs: number }
        | { backend: 'memory'; timeoutMs: number };
    llm: {
        models: { openai: string; anthropic: string; google: string };
        maxTokens: number;
        timeoutMs: number;
    };
    embedding: {
        model: string;
        dimensions: number;
        timeoutMs: number;
    };
    search: {
        defaultSize: number;
        maxSize: number;
    };
}

export class ConfigError extends Error {
    constructor(public readonly issues: z.ZodIssue[]) {
        super(
            `Invalid environment variables: ${issues
                .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
                .join('; ')}`
        );
        this.name = 'ConfigError';
    }
}

/**
 * Validate an environment map and shape it into an AppConfig
 *
 * @throws ConfigError when a variable is missing or malformed
 */
export function parseConfig(source: Record<string, string | undefined>): AppConfig {
    const result = envSchema.safeParse(source);

    if (!result.success) {
        throw new ConfigError(result.error.issues);
    }

    const env = result.data;

    return {
        env: env.NODE_ENV,
        port: env.PORT,
        logLevel: env.LOG_LEVEL,
        store:
            env.STORE_BACKEND === 'postgres' && env.DATABASE_URL
                ? { backend: 'postgres', databaseUrl: env.DATABASE_URL, timeoutMs: env.STORE_TIMEOUT_MS }
                : { backend: 'memory', timeoutMs: env.STORE_TIMEOUT_MS },
        llm: {
            models: {
                openai: env.OPENAI_CHAT_MODEL,
                anthropic: env.ANTHROPIC_CHAT_MODEL,
                google: env.GOOGLE_CHAT_MODEL,
            },
            maxTokens: env.LLM_MAX_TOKENS,
            timeoutMs: env.LLM_TIMEOUT_MS,
        },
        embedding: {
            model: env.EMBEDDING_MODEL,
            dimensions: env.EMBEDDING_DIMENSIONS,
            timeoutMs: env.EMBEDDING_TIMEOUT_MS,
        },
        search: {
            defaultSize: env.SEARCH_DEFAULT_SIZE,
            maxSize: env.SEARCH_MAX_SIZE,
        },
    };
}

/**
 * Load configuration from process.env, exiting the process when invalid
 */
export function loadConfig(): AppConfig {
    try {
        return parseConfig(process.env);
    } catch (error) {
        if (error instanceof ConfigError) {
            console.error('Invalid environment variables:');
            for (const issue of error.issues) {
                console.error(`  ${issue.path.join('.')}: ${issue.message}`);
            }
            process.exit(1);
        }
        throw error;
    }
}
