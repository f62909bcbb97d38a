/**
 * Configuration management for Tidewater
 */

import { z } from 'zod';
import { config as dotenvConfig } from 'dotenv';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';

// When started through an npm workspace script the CWD may be a package
// directory (apps/api), so look upwards for the .env file as well
const __dirname = dirname(fileURLToPath(import.meta.url));
const monorepoRoot = resolve(__dirname, '../../../../');

const envPaths = [
  resolve(process.cwd(), '.env'),
  resolve(process.cwd(), '../../.env'),
  resolve(monorepoRoot, '.env'),
];

for (const envPath of envPaths) {
  dotenvConfig({ path: envPath });
}

const booleanString = z
  .union([z.boolean(), z.string()])
  .transform((val) => (typeof val === 'boolean' ? val : ['true', '1', 'yes'].includes(val.toLowerCase())));

const csv = z.string().transform((val) => val.split(',').map((item) => item.trim()).filter(Boolean));

// Configuration schema
const configSchema = z.object({
  // Application
  nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

  // HTTP trigger surface
  server: z.object({
    port: z.coerce.number().default(3000),
    host: z.string().default('0.0.0.0'),
    corsOrigin: z.string().default('*'),
  }),

  // Database
  database: z.object({
    path: z.string().default('./data/tidewater.db'),
  }),

  // Stage cache
  cache: z.object({
    /** 'memory' keeps entries for the life of the process, 'sqlite' persists them across runs */
    backend: z.enum(['memory', 'sqlite']).default('sqlite'),
    /** Maximum number of entries before LRU eviction */
    capacity: z.coerce.number().int().positive().default(1000),
  }),

  // Pipeline defaults
  pipeline: z.object({
    releaseBranch: z.string().default('main'),
    deployOn: csv.pipe(z.array(z.enum(['push', 'pull_request']))).default('push'),
    stageTimeoutMs: z.coerce.number().default(600000), // 10 minutes
    /** Pipeline document the HTTP surface runs */
    specFile: z.string().default('./tidewater.yaml'),
  }),

  // Container registry
  registry: z.object({
    /** Container CLI used to build and push images */
    binary: z.string().default('docker'),
    /** Tag that always points at the newest image */
    mutableTag: z.string().default('latest'),
    /** Length of the commit id used as the immutable tag (0 = full id) */
    commitTagLength: z.coerce.number().int().min(0).default(12),
  }),

  // Kubernetes
  kubernetes: z.object({
    context: z.string().optional(),
    kubeconfig: z.string().optional(),
    rolloutTimeoutMs: z.coerce.number().default(300000), // 5 minutes
    pollIntervalMs: z.coerce.number().default(2000),
    /** Upper bound on a single cluster API call */
    requestTimeoutMs: z.coerce.number().int().positive().default(30000),
    autoRollback: booleanString.default(true),
    /** Serialize deploy stages that target the same cluster */
    serializeDeploys: booleanString.default(true),
    dryRun: booleanString.default(false),
  }),

  // Retry policy for transient infrastructure errors
  retry: z.object({
    maxAttempts: z.coerce.number().int().min(1).default(3),
    baseDelayMs: z.coerce.number().default(1000),
    maxDelayMs: z.coerce.number().default(15000),
    jitterFactor: z.coerce.number().min(0).max(1).default(0.2),
  }),

  // Credentials (read from env, only passed through)
  credentials: z.object({
    registryServer: z.string().optional(),
    registryUsername: z.string().optional(),
    registryPassword: z.string().optional(),
    clusterToken: z.string().optional(),
  }),
});

export type Config = z.infer<typeof configSchema>;

/**
 * Load configuration from environment variables
 */
export function loadConfig(): Config {
  const rawConfig = {
    nodeEnv: process.env.NODE_ENV,
    logLevel: process.env.LOG_LEVEL,

    server: {
      port: process.env.PORT,
      host: process.env.HOST,
      corsOrigin: process.env.CORS_ORIGIN,
    },

    database: {
      path: process.env.DATABASE_PATH,
    },

    cache: {
      backend: process.env.CACHE_BACKEND,
      capacity: process.env.CACHE_CAPACITY,
    },

    pipeline: {
      releaseBranch: process.env.RELEASE_BRANCH,
      deployOn: process.env.DEPLOY_ON,
      stageTimeoutMs: process.env.STAGE_TIMEOUT_MS,
      specFile: process.env.PIPELINE_SPEC_FILE,
    },

    registry: {
      binary: process.env.CONTAINER_CLI,
      mutableTag: process.env.REGISTRY_MUTABLE_TAG,
      commitTagLength: process.env.REGISTRY_COMMIT_TAG_LENGTH,
    },

    kubernetes: {
      context: process.env.K8S_CONTEXT,
      kubeconfig: process.env.KUBECONFIG,
      rolloutTimeoutMs: process.env.K8S_ROLLOUT_TIMEOUT_MS,
      pollIntervalMs: process.env.K8S_POLL_INTERVAL_MS,
      requestTimeoutMs: process.env.K8S_REQUEST_TIMEOUT_MS,
      autoRollback: process.env.K8S_AUTO_ROLLBACK,
      serializeDeploys: process.env.K8S_SERIALIZE_DEPLOYS,
      dryRun: process.env.K8S_DRY_RUN,
    },

    retry: {
      maxAttempts: process.env.RETRY_MAX_ATTEMPTS,
      baseDelayMs: process.env.RETRY_BASE_DELAY_MS,
      maxDelayMs: process.env.RETRY_MAX_DELAY_MS,
      jitterFactor: process.env.RETRY_JITTER_FACTOR,
    },

    credentials: {
      registryServer: process.env.REGISTRY_SERVER,
      registryUsername: process.env.REGISTRY_USERNAME,
      registryPassword: process.env.REGISTRY_PASSWORD,
      clusterToken: process.env.K8S_TOKEN,
    },
  };

  return configSchema.parse(rawConfig);
}

// Singleton config instance
let configInstance: Config | null = null;

export function getConfig(): Config {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

// For testing - reset config
export function resetConfig(): void {
  configInstance = null;
}

// Validate config without loading (for startup checks)
export function validateConfig(): { valid: boolean; errors?: string[] } {
  try {
    loadConfig();
    return { valid: true };
  } catch (error) {
    if (error instanceof z.ZodError) {
      return {
        valid: false,
        errors: error.errors.map((e) => `${e.path.join('.')}: ${e.message}`),
      };
    }
    throw error;
  }
}
