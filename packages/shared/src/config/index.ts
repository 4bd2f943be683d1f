/**
 * Configuration management for KenDB3
 */

import { z } from 'zod';
import { config as dotenvConfig } from 'dotenv';
import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';

// Load environment variables - try multiple locations
// When running via npm workspaces, CWD may be a package directory (apps/api)
// so we need to check parent directories too
const __dirname = dirname(fileURLToPath(import.meta.url));
const monorepoRoot = resolve(__dirname, '../../../../');

const envPaths = [
  resolve(process.cwd(), '.env'),
  resolve(process.cwd(), '../../.env'),
  resolve(monorepoRoot, '.env'),
];

for (const envPath of envPaths) {
  // dotenv never overrides variables that are already set
  dotenvConfig({ path: envPath });
}

/**
 * Boolean coercion that understands "false" and "0"
 * (z.coerce.boolean() turns every non-empty string into true)
 */
const envBoolean = z
  .union([z.boolean(), z.string()])
  .transform((val) => (typeof val === 'boolean' ? val : !['false', '0', 'no', ''].includes(val.toLowerCase())));

// Configuration schema
const configSchema = z.object({
  // Application
  nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

  // Server
  server: z.object({
    port: z.coerce.number().int().positive().default(8000),
    host: z.string().default('0.0.0.0'),
    corsOrigin: z.string().default('*'),
    apiPrefix: z
      .string()
      .regex(/^\/[A-Za-z0-9/_-]*[A-Za-z0-9_-]$/, 'API_PREFIX must start with / and not end with /')
      .default('/api/v0'),
  }),

  // Database
  database: z.object({
    path: z.string().default('./data/kendb3.db'),
    verbose: envBoolean.default(false),
  }),

  // Frontend declaration autogeneration
  frontend: z.object({
    autogenerate: envBoolean.default(true),
    /**
     * Where the generated model declarations are written.
     * The frontend bundle imports this file next to api_lib.ts.
     */
    outputPath: z.string().default('./frontend/src/models.autogenerated.ts'),
  }),
});

export type Config = z.infer<typeof configSchema>;

// Parse and validate configuration
function loadConfig(): Config {
  const rawConfig = {
    nodeEnv: process.env.NODE_ENV,
    logLevel: process.env.LOG_LEVEL,

    server: {
      port: process.env.PORT,
      host: process.env.HOST,
      corsOrigin: process.env.CORS_ORIGIN,
      apiPrefix: process.env.API_PREFIX,
    },

    database: {
      path: process.env.DATABASE_PATH,
      verbose: process.env.DATABASE_VERBOSE,
    },

    frontend: {
      autogenerate: process.env.FRONTEND_AUTOGENERATE,
      outputPath: process.env.FRONTEND_MODELS_PATH,
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
