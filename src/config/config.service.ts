import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';

// Load environment variables from .env file
dotenvConfig();

export const readerEncodings = ['utf8', 'utf-8', 'utf16le', 'latin1', 'ascii'] as const;

export type ReaderEncoding = (typeof readerEncodings)[number];

const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error']).default('info');
const environmentSchema = z.enum(['development', 'production', 'test']).default('development');
const encodingSchema = z.enum(readerEncodings).default('utf8');
const chunkSizeSchema = z.coerce
  .number()
  .int('Chunk size must be a positive integer')
  .positive('Chunk size must be a positive integer')
  .default(65536);

const configSchema = z.object({
  app: z.object({
    logLevel: logLevelSchema,
    environment: environmentSchema,
  }),
  reader: z.object({
    encoding: encodingSchema,
    chunkSize: chunkSizeSchema,
  }),
});

// Same shape, but an invalid value falls back to its default
const lenientConfigSchema = z.object({
  app: z.object({
    logLevel: logLevelSchema.catch('warn'),
    environment: environmentSchema.catch('development'),
  }),
  reader: z.object({
    encoding: encodingSchema.catch('utf8'),
    chunkSize: chunkSizeSchema.catch(65536),
  }),
});

export type Config = z.infer<typeof configSchema>;

/**
 * Error raised when the environment does not describe a valid configuration
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly issues: string[]
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

function rawConfigFrom(env: NodeJS.ProcessEnv) {
  return {
    app: {
      logLevel: env.LOG_LEVEL || (env.NODE_ENV === 'production' ? 'info' : 'warn'),
      environment: env.NODE_ENV || 'development',
    },
    reader: {
      encoding: env.READER_ENCODING || undefined,
      chunkSize: env.READER_CHUNK_SIZE || undefined,
    },
  };
}

/**
 * Parse the environment strictly
 * @throws ConfigurationError listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const result = configSchema.safeParse(rawConfigFrom(env));
  if (!result.success) {
    const issues = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new ConfigurationError(`Configuration validation failed: ${issues.join(', ')}`, issues);
  }

  return result.data;
}

/**
 * Parse the environment, replacing each invalid value with its default
 */
export function loadConfigWithDefaults(env: NodeJS.ProcessEnv = process.env): Config {
  return lenientConfigSchema.parse(rawConfigFrom(env));
}

export const config = loadConfigWithDefaults();
