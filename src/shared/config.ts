import { z } from 'zod'
import dotenv from 'dotenv'

// Load environment variables
dotenv.config()

const loggingSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  filePath: z.string().optional(),
  maxSizeMB: z.number().positive().optional(),
  maxFiles: z.number().int().positive().optional(),
})

const configSchema = z.object({
  // Celestia node
  celestia: z.object({
    rpcUrl: z.string().url(),
    authToken: z.string().optional(),
    tendermintRpcUrl: z.string().url(),
    // Hex encoded v0 namespace id, at most 10 bytes
    namespaceId: z.string().min(1, 'NAMESPACE_ID is required').regex(/^(0x)?[0-9a-fA-F]{2,20}$/, 'NAMESPACE_ID must be hex of at most 10 bytes'),
    gasPrice: z.number().positive().optional(),
    rpcTimeoutMs: z.number().int().positive().default(30000),
  }),

  // Blobstream on the settlement chain
  blobstream: z.object({
    ethRpcUrl: z.string().url(),
    address: z.string().regex(/^0x[0-9a-fA-F]{40}$/, 'BLOBSTREAM_ADDRESS must be a 20 byte hex address'),
  }),

  // Confirmation polling
  polling: z.object({
    intervalMs: z.number().int().positive().default(5000),
    maxAttempts: z.number().int().positive().optional(),
  }),

  // Where NMT preimages are kept
  preimages: z.object({
    backend: z.enum(['memory', 'sqlite', 'redis', 'file']).default('sqlite'),
  }),

  database: z.object({
    sqlitePath: z.string().min(1).default('./data/celestia-da.db'),
  }),

  redis: z.object({
    url: z.string().default('redis://localhost:6379'),
  }),

  stub: z.object({
    dataDir: z.string().min(1).default('./data/stub'),
  }),

  logging: loggingSchema,
})

export type Config = z.infer<typeof configSchema>
export type LoggingConfig = z.infer<typeof loggingSchema>

export const parseEnvNumber = (value: string | undefined, defaultValue?: number): number | undefined => {
  if (value === undefined && defaultValue === undefined) return undefined;
  const parsed = Number(value ?? '');
  return value === undefined || value.trim() === '' || isNaN(parsed) ? defaultValue : parsed;
};

const readLoggingEnv = () => ({
  level: process.env['LOG_LEVEL'] || 'info',
  filePath: process.env['LOG_FILE_PATH'],
  maxSizeMB: parseEnvNumber(process.env['LOG_MAX_SIZE_MB']),
  maxFiles: parseEnvNumber(process.env['LOG_MAX_FILES']),
})

// The logger is created at import time, so it must not depend on the RPC settings being present.
export const loadLoggingConfig = (): LoggingConfig => {
  const parsed = loggingSchema.safeParse(readLoggingEnv())
  return parsed.success ? parsed.data : loggingSchema.parse({})
}

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): Config => {
  const rawConfig = {
    celestia: {
      rpcUrl: env['CELESTIA_RPC_URL'],
      authToken: env['CELESTIA_AUTH_TOKEN'] || undefined,
      tendermintRpcUrl: env['TENDERMINT_RPC_URL'],
      namespaceId: env['NAMESPACE_ID'],
      gasPrice: parseEnvNumber(env['GAS_PRICE']),
      rpcTimeoutMs: parseEnvNumber(env['RPC_TIMEOUT_MS']),
    },
    blobstream: {
      ethRpcUrl: env['ETH_RPC_URL'],
      address: env['BLOBSTREAM_ADDRESS'],
    },
    polling: {
      intervalMs: parseEnvNumber(env['POLL_INTERVAL_MS']),
      maxAttempts: parseEnvNumber(env['POLL_MAX_ATTEMPTS']),
    },
    preimages: {
      backend: env['PREIMAGE_BACKEND'],
    },
    database: {
      sqlitePath: env['SQLITE_PATH'],
    },
    redis: {
      url: env['REDIS_URL'],
    },
    stub: {
      dataDir: env['STUB_DATA_DIR'],
    },
    logging: {
      level: env['LOG_LEVEL'] || 'info',
      filePath: env['LOG_FILE_PATH'],
      maxSizeMB: parseEnvNumber(env['LOG_MAX_SIZE_MB']),
      maxFiles: parseEnvNumber(env['LOG_MAX_FILES']),
    },
  }

  const parsedConfig = configSchema.safeParse(rawConfig)
  if (!parsedConfig.success) {
    console.error('Configuration validation error:', JSON.stringify(parsedConfig.error.issues, null, 2))
    throw new Error('Configuration validation failed')
  }
  return parsedConfig.data
}
