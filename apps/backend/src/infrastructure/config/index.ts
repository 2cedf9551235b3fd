import os from 'node:os';
import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from '@facevault/shared-types';

/** The only vector size the pipeline accepts. */
export const REQUIRED_VECTOR_SIZE = 512;

const booleanFlag = (fallback: 'true' | 'false') =>
    z.enum(['true', 'false']).default(fallback).transform((value) => value === 'true');

const envSchema = z.object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

    // Embedding model
    FACEVAULT_MODEL_PATH: z.string().min(1).default('./models/arcface_r100_v1.onnx'),
    FACEVAULT_MODEL_SHA256: z.string().regex(/^[0-9a-fA-F]{64}$/, 'Must be a hex-encoded SHA-256 digest').optional(),
    FACEVAULT_MAX_BATCH_SIZE: z.coerce.number().int().min(1).max(512).default(64),
    FACEVAULT_HEADROOM_FRACTION: z.coerce.number().min(0).lt(1, 'Must be below 1').default(0.1),
    FACEVAULT_MAX_CONCURRENT_BATCHES: z.coerce.number().int().min(1).optional(),
    FACEVAULT_DEGRADED_FALLBACK: booleanFlag('false'),
    FACEVAULT_VERBOSE_LOGGING: booleanFlag('false'),

    // Vector store
    FACEVAULT_VECTOR_SIZE: z.coerce
        .number()
        .int()
        .default(REQUIRED_VECTOR_SIZE)
        .refine((size) => size === REQUIRED_VECTOR_SIZE, `Vector size is fixed at ${REQUIRED_VECTOR_SIZE}`),
    FACEVAULT_COLLECTION: z.string().min(1).default('facevault'),
    FACEVAULT_AUTO_CREATE_COLLECTION: booleanFlag('true'),
    QDRANT_URL: z.string().url().default('http://localhost:6333'),
    QDRANT_API_KEY: z.string().optional(),

    // OpenTelemetry (optional)
    OTEL_ENABLED: booleanFlag('true'),
    OTEL_EXPORTER_OTLP_ENDPOINT: z.string().url().optional(),
    OTEL_SERVICE_NAME: z.string().default('facevault-backend'),
    OTEL_SERVICE_VERSION: z.string().default('0.1.0'),
    OTEL_DEBUG: booleanFlag('false'),
});

export type Env = z.infer<typeof envSchema>;

export type LogLevelName = Env['LOG_LEVEL'];

export interface EmbeddingConfig {
    modelPath: string;
    expectedContentHash?: string;
    maxBatchSize: number;
    headroomFraction: number;
    vectorSize: number;
    maxConcurrentBatches: number;
    degradedFallback: boolean;
    verboseLogging: boolean;
}

export interface VectorStoreConfig {
    collectionName: string;
    vectorSize: number;
    autoCreateCollection: boolean;
    storeEndpoint: string;
    storeApiKey?: string;
}

export interface TelemetryConfig {
    enabled: boolean;
    exporterEndpoint?: string;
    serviceName: string;
    serviceVersion: string;
    debug: boolean;
}

export interface FaceVaultConfig {
    nodeEnv: Env['NODE_ENV'];
    logLevel: LogLevelName;
    embedding: EmbeddingConfig;
    vectorStore: VectorStoreConfig;
    telemetry: TelemetryConfig;
}

/**
 * Half of the available parallel-execution units, never less than one.
 */
export function defaultConcurrency(): number {
    return Math.max(1, Math.floor(os.availableParallelism() / 2));
}

/**
 * Validate an environment map and build the typed configuration.
 * Throws ConfigurationError listing every offending key.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): FaceVaultConfig {
    const result = envSchema.safeParse(env);

    if (!result.success) {
        const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
        throw new ConfigurationError(issues);
    }

    const data = result.data;
    return {
        nodeEnv: data.NODE_ENV,
        logLevel: data.LOG_LEVEL,
        embedding: {
            modelPath: data.FACEVAULT_MODEL_PATH,
            expectedContentHash: data.FACEVAULT_MODEL_SHA256?.toLowerCase(),
            maxBatchSize: data.FACEVAULT_MAX_BATCH_SIZE,
            headroomFraction: data.FACEVAULT_HEADROOM_FRACTION,
            vectorSize: data.FACEVAULT_VECTOR_SIZE,
            maxConcurrentBatches: data.FACEVAULT_MAX_CONCURRENT_BATCHES ?? defaultConcurrency(),
            degradedFallback: data.FACEVAULT_DEGRADED_FALLBACK,
            verboseLogging: data.FACEVAULT_VERBOSE_LOGGING,
        },
        vectorStore: {
            collectionName: data.FACEVAULT_COLLECTION,
            vectorSize: data.FACEVAULT_VECTOR_SIZE,
            autoCreateCollection: data.FACEVAULT_AUTO_CREATE_COLLECTION,
            storeEndpoint: data.QDRANT_URL,
            storeApiKey: data.QDRANT_API_KEY,
        },
        telemetry: {
            enabled: data.OTEL_ENABLED,
            exporterEndpoint: data.OTEL_EXPORTER_OTLP_ENDPOINT,
            serviceName: data.OTEL_SERVICE_NAME,
            serviceVersion: data.OTEL_SERVICE_VERSION,
            debug: data.OTEL_DEBUG,
        },
    };
}

/**
 * Load `.env` (if present) into process.env, then validate it.
 */
export function loadConfigFromEnvironment(): FaceVaultConfig {
    dotenv.config();
    return loadConfig(process.env);
}
