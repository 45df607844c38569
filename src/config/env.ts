export type StorageDriver = 'local' | 's3'
export type MetadataDriver = 'redis' | 'memory'

export interface AppEnv {
  NODE_ENV: 'development' | 'production' | 'test'
  LISTEN_HOST: string
  LISTEN_PORT: number
  BASE_PATH: string
  LOG_LEVEL: string
  CORS_ORIGIN: string
  DOWNLOAD_BASE_URL: string

  RETENTION_DAYS: number
  PLAN_LIMIT_FREE_MB: number
  PLAN_LIMIT_STANDARD_MB: number
  PLAN_LIMIT_PREMIUM_MB: number

  SWEEP_INTERVAL_MINS: number
  SWEEP_BATCH_SIZE: number
  ORPHAN_GRACE_MINS: number

  STAGING_DIR: string
  STORAGE_DRIVER: StorageDriver
  STORAGE_DIR: string

  S3_ENDPOINT?: string
  S3_REGION: string
  S3_BUCKET: string
  S3_ACCESS_KEY_ID: string
  S3_SECRET_ACCESS_KEY: string
  S3_FORCE_PATH_STYLE: boolean

  METADATA_DRIVER: MetadataDriver
  REDIS_HOST: string
  REDIS_PORT: number
  REDIS_PASSWORD?: string
  REDIS_DB: number
  REDIS_KEY_PREFIX: string
}

export type RuntimeEnvSource = Record<string, unknown>

function readString(env: RuntimeEnvSource, key: string, fallback = ''): string {
  const v = env[key]
  if (typeof v === 'string') return v
  if (typeof v === 'number') return String(v)
  if (typeof v === 'boolean') return v ? 'true' : 'false'
  return fallback
}

function readInt(env: RuntimeEnvSource, key: string, fallback: number): number {
  const raw = readString(env, key, '')
  if (raw.trim() === '') return fallback
  const n = Number.parseInt(raw, 10)
  return Number.isFinite(n) ? n : fallback
}

function readBool(env: RuntimeEnvSource, key: string, fallback: boolean): boolean {
  const raw = readString(env, key, '')
  if (raw.trim() === '') return fallback
  return raw === 'true' || raw === '1'
}

function readChoice<T extends string>(
  env: RuntimeEnvSource,
  key: string,
  choices: readonly T[],
  fallback: T
): T {
  const raw = readString(env, key, '').trim().toLowerCase()
  if (raw === '') return fallback
  const match = choices.find((c) => c === raw)
  if (!match) {
    throw new Error(`${key} must be one of: ${choices.join(', ')} (got "${raw}")`)
  }
  return match
}

function readPositiveInt(env: RuntimeEnvSource, key: string, fallback: number): number {
  const n = readInt(env, key, fallback)
  if (n <= 0) {
    throw new Error(`${key} must be a positive integer (got ${n})`)
  }
  return n
}

const NODE_ENVS = ['development', 'production', 'test'] as const

export function loadAppEnv(envSource: RuntimeEnvSource): AppEnv {
  const nodeEnvRaw = readString(envSource, 'NODE_ENV', 'production')
  const NODE_ENV = NODE_ENVS.find((v) => v === nodeEnvRaw) ?? 'production'

  return {
    NODE_ENV,
    LISTEN_HOST: readString(envSource, 'LISTEN_HOST', '0.0.0.0'),
    LISTEN_PORT: readInt(envSource, 'LISTEN_PORT', 5000),
    BASE_PATH: readString(envSource, 'BASE_PATH', '').replace(/^\/+|\/+$/g, ''),
    LOG_LEVEL: readString(envSource, 'LOG_LEVEL', 'info'),
    CORS_ORIGIN: readString(envSource, 'CORS_ORIGIN', '*'),
    DOWNLOAD_BASE_URL: readString(envSource, 'DOWNLOAD_BASE_URL', '').replace(/\/+$/, ''),

    RETENTION_DAYS: readPositiveInt(envSource, 'RETENTION_DAYS', 10),
    PLAN_LIMIT_FREE_MB: readPositiveInt(envSource, 'PLAN_LIMIT_FREE_MB', 100 * 1024),
    PLAN_LIMIT_STANDARD_MB: readPositiveInt(envSource, 'PLAN_LIMIT_STANDARD_MB', 500 * 1024),
    PLAN_LIMIT_PREMIUM_MB: readPositiveInt(envSource, 'PLAN_LIMIT_PREMIUM_MB', 2 * 1024 * 1024),

    SWEEP_INTERVAL_MINS: readInt(envSource, 'SWEEP_INTERVAL_MINS', 60),
    SWEEP_BATCH_SIZE: readPositiveInt(envSource, 'SWEEP_BATCH_SIZE', 500),
    ORPHAN_GRACE_MINS: readInt(envSource, 'ORPHAN_GRACE_MINS', 60),

    STAGING_DIR: readString(envSource, 'STAGING_DIR', ''),
    STORAGE_DRIVER: readChoice(envSource, 'STORAGE_DRIVER', ['local', 's3'], 'local'),
    STORAGE_DIR: readString(envSource, 'STORAGE_DIR', './uploads'),

    S3_ENDPOINT: readString(envSource, 'S3_ENDPOINT', '') || undefined,
    S3_REGION: readString(envSource, 'S3_REGION', 'us-east-1'),
    S3_BUCKET: readString(envSource, 'S3_BUCKET', 'flash-transfer'),
    S3_ACCESS_KEY_ID: readString(envSource, 'S3_ACCESS_KEY_ID', ''),
    S3_SECRET_ACCESS_KEY: readString(envSource, 'S3_SECRET_ACCESS_KEY', ''),
    S3_FORCE_PATH_STYLE: readBool(envSource, 'S3_FORCE_PATH_STYLE', false),

    METADATA_DRIVER: readChoice(envSource, 'METADATA_DRIVER', ['redis', 'memory'], 'redis'),
    REDIS_HOST: readString(envSource, 'REDIS_HOST', '127.0.0.1'),
    REDIS_PORT: readInt(envSource, 'REDIS_PORT', 6379),
    REDIS_PASSWORD: readString(envSource, 'REDIS_PASSWORD', '') || undefined,
    REDIS_DB: readInt(envSource, 'REDIS_DB', 0),
    REDIS_KEY_PREFIX: readString(envSource, 'REDIS_KEY_PREFIX', 'flash-transfer:'),
  }
}
