// services/gateway/src/config.ts

export type SourceMode = 'serial' | 'idle' | 'simulated'

export type GatewayConfig = {
  mode: SourceMode

  serial: {
    path: string
    baudRate: number
    readTimeoutMs: number
    maxBufferedLines: number
  }

  testing: {
    enabled: boolean
    simulateData: boolean
    simulationIntervalMs: number
  }

  cache: {
    host: string
    port: number
    password: string | null
    db: number
    connectTimeoutMs: number
    commandTimeoutMs: number
    key: string
    ttlSec: number
    staleAfterSec: number
  }

  timeseries: {
    host: string
    port: number
    database: string
    user: string
    password: string | null
    poolSize: number
    connectTimeoutMs: number
  }

  retry: {
    maxAttempts: number
    delayMs: number
  }

  loop: {
    iterationErrorPauseMs: number
  }

  diagnostics: {
    enabled: boolean
    host: string
    port: number
    /** Log lines kept in memory for /api/logs. */
    logBufferSize: number
  }
}

export const STANDARD_BAUD_RATES: readonly number[] = [9600, 19200, 38400, 57600, 115200]

function parseBoolSafe(v: string | undefined, def: boolean): boolean {
  if (v === undefined || v === '') return def
  const n = v.trim().toLowerCase()
  if (n === 'true' || n === '1' || n === 'yes' || n === 'on') return true
  if (n === 'false' || n === '0' || n === 'no' || n === 'off') return false
  return def
}

function parseIntSafe(v: string | undefined, def: number): number {
  if (v === undefined || v === '') return def
  const n = Number.parseInt(v, 10)
  return Number.isFinite(n) ? n : def
}

function parseFloatSafe(v: string | undefined, def: number): number {
  if (v === undefined || v === '') return def
  const n = Number.parseFloat(v)
  return Number.isFinite(n) ? n : def
}

function clampInt(n: number, min: number, max: number): number {
  if (!Number.isFinite(n)) return min
  if (n < min) return min
  if (n > max) return max
  return n
}

function str(v: string | undefined, def: string): string {
  return (v ?? '').trim() || def
}

function optionalStr(v: string | undefined): string | null {
  return (v ?? '').trim() || null
}

/**
 * Build GatewayConfig from environment.
 *
 * This loader does NOT throw. Call `validateGatewayConfig(cfg)` before
 * handing the config to the gateway.
 */
export function buildGatewayConfigFromEnv(env: NodeJS.ProcessEnv = process.env): GatewayConfig {
  const testingEnabled = parseBoolSafe(env.TESTING_MODE, false)
  const simulateData = parseBoolSafe(env.SIMULATE_DATA, false)

  const mode: SourceMode = !testingEnabled ? 'serial' : simulateData ? 'simulated' : 'idle'
  const redisConnectTimeoutMs = Math.round(parseFloatSafe(env.REDIS_CONNECT_TIMEOUT, 5) * 1000)

  return {
    mode,
    serial: {
      path: str(env.SERIAL_PORT, '/dev/ttyUSB0'),
      baudRate: parseIntSafe(env.BAUD_RATE, 9600),
      readTimeoutMs: Math.round(parseFloatSafe(env.SERIAL_TIMEOUT, 1) * 1000),
      maxBufferedLines: clampInt(parseIntSafe(env.SERIAL_MAX_BUFFERED_LINES, 100), 1, 10_000),
    },
    testing: {
      enabled: testingEnabled,
      simulateData,
      simulationIntervalMs: Math.round(parseFloatSafe(env.SIMULATION_INTERVAL_SEC, 30) * 1000),
    },
    cache: {
      host: str(env.REDIS_HOST, 'redis'),
      port: parseIntSafe(env.REDIS_PORT, 6379),
      password: optionalStr(env.REDIS_PASSWORD),
      db: clampInt(parseIntSafe(env.REDIS_DB, 0), 0, 15),
      connectTimeoutMs: redisConnectTimeoutMs,
      commandTimeoutMs: Math.round(parseFloatSafe(env.REDIS_COMMAND_TIMEOUT, redisConnectTimeoutMs / 1000) * 1000),
      key: str(env.CACHE_KEY, 'latest_status'),
      ttlSec: parseIntSafe(env.CACHE_TTL_SEC, 300),
      staleAfterSec: parseIntSafe(env.HEARTBEAT_STALE_SEC, 120),
    },
    timeseries: {
      host: str(env.PG_HOST, 'timescaledb'),
      port: parseIntSafe(env.PG_PORT, 5432),
      database: str(env.POSTGRES_DB, 'pond_data'),
      user: str(env.POSTGRES_USER, 'pond_user'),
      password: optionalStr(env.POSTGRES_PASSWORD),
      poolSize: clampInt(parseIntSafe(env.DB_POOL_SIZE, 5), 1, 100),
      connectTimeoutMs: Math.round(parseFloatSafe(env.DB_CONNECT_TIMEOUT, 10) * 1000),
    },
    retry: {
      maxAttempts: parseIntSafe(env.MAX_RETRIES, 3),
      delayMs: Math.round(parseFloatSafe(env.RETRY_DELAY, 5) * 1000),
    },
    loop: {
      iterationErrorPauseMs: clampInt(parseIntSafe(env.ITERATION_ERROR_PAUSE_MS, 1000), 0, 60_000),
    },
    diagnostics: {
      enabled: parseBoolSafe(env.DIAGNOSTICS_ENABLED, true),
      host: str(env.API_HOST, '0.0.0.0'),
      port: parseIntSafe(env.API_PORT, 8081),
      logBufferSize: clampInt(parseIntSafe(env.DIAGNOSTICS_LOG_LINES, 500), 10, 10_000),
    },
  }
}

export type GatewayConfigValidation =
  | { ok: true; warnings: string[] }
  | { ok: false; errors: string[]; warnings: string[] }

/**
 * Startup gate: the daemon refuses to run on a config that fails here.
 */
export function validateGatewayConfig(cfg: GatewayConfig): GatewayConfigValidation {
  const errors: string[] = []
  const warnings: string[] = []

  if (cfg.serial.baudRate <= 0) errors.push(`BAUD_RATE must be positive (got ${cfg.serial.baudRate})`)
  else if (!STANDARD_BAUD_RATES.includes(cfg.serial.baudRate)) {
    warnings.push(`unusual BAUD_RATE ${cfg.serial.baudRate}`)
  }

  if (cfg.serial.readTimeoutMs <= 0) errors.push('SERIAL_TIMEOUT must be positive')
  if (cfg.testing.simulationIntervalMs <= 0) errors.push('SIMULATION_INTERVAL_SEC must be positive')
  if (cfg.retry.maxAttempts < 1) errors.push(`MAX_RETRIES must be at least 1 (got ${cfg.retry.maxAttempts})`)
  if (cfg.retry.delayMs < 0) errors.push('RETRY_DELAY must not be negative')
  if (cfg.cache.commandTimeoutMs <= 0) errors.push('REDIS_COMMAND_TIMEOUT must be positive')
  if (cfg.cache.ttlSec < 1) errors.push(`CACHE_TTL_SEC must be at least 1 (got ${cfg.cache.ttlSec})`)
  if (cfg.cache.staleAfterSec < 1) errors.push('HEARTBEAT_STALE_SEC must be at least 1')
  if (cfg.cache.staleAfterSec > cfg.cache.ttlSec) {
    warnings.push('HEARTBEAT_STALE_SEC exceeds CACHE_TTL_SEC; the key expires before it can read as stale')
  }

  for (const [name, port] of [
    ['REDIS_PORT', cfg.cache.port],
    ['PG_PORT', cfg.timeseries.port],
    ['API_PORT', cfg.diagnostics.port],
  ] as const) {
    if (port < 1 || port > 65_535) errors.push(`${name} out of range (got ${port})`)
  }

  if (!cfg.timeseries.password && !cfg.testing.enabled) {
    errors.push('POSTGRES_PASSWORD is required outside TESTING_MODE')
  }

  return errors.length ? { ok: false, errors, warnings } : { ok: true, warnings }
}

/** Secrets reduced to presence flags, for the startup log. */
export function summarizeConfig(cfg: GatewayConfig): string {
  return [
    `mode=${cfg.mode}`,
    `serial=${cfg.serial.path}@${cfg.serial.baudRate}`,
    `readTimeoutMs=${cfg.serial.readTimeoutMs}`,
    `redis=${cfg.cache.host}:${cfg.cache.port}/${cfg.cache.db}`,
    `cacheKey=${cfg.cache.key}`,
    `cacheTtlSec=${cfg.cache.ttlSec}`,
    `pg=${cfg.timeseries.host}:${cfg.timeseries.port}/${cfg.timeseries.database}`,
    `pgPasswordPresent=${Boolean(cfg.timeseries.password)}`,
    `redisPasswordPresent=${Boolean(cfg.cache.password)}`,
    `retries=${cfg.retry.maxAttempts}`,
    `retryDelayMs=${cfg.retry.delayMs}`,
    `diagnostics=${cfg.diagnostics.enabled ? `${cfg.diagnostics.host}:${cfg.diagnostics.port}` : 'off'}`,
  ].join(' ')
}
