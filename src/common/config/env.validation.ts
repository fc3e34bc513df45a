export interface AppEnv {
  NODE_ENV: 'development' | 'test' | 'production';
  PORT: number;
  CATALOG_DB_URL: string;
  CATALOG_DB_IP_FAMILY?: 4 | 6;
  REDIS_URL?: string;
  CATALOG_CACHE_TTL_MS: number;
  IMAGE_FETCH_TIMEOUT_MS: number;
  IMAGE_PREFETCH_CONCURRENCY: number;
  ARTIFACT_TTL_MS: number;
  CATALOG_TIMEZONE: string;
  CATALOG_DOCUMENT_TITLE: string;
  STOCK_LOCATION_A_LABEL: string;
  STOCK_LOCATION_B_LABEL: string;
  ALLOWED_ORIGINS: string[];
  LOG_LEVEL: 'debug' | 'log' | 'info' | 'warn' | 'error';
}

function parseNumber(value: unknown, fallback: number): number {
  if (value === undefined || value === null || value === '') {
    return fallback;
  }

  const parsed = Number(value);
  if (Number.isNaN(parsed)) {
    throw new Error(`Invalid number value: ${String(value)}`);
  }

  return parsed;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

function parseOrigins(value: unknown): string[] {
  if (typeof value !== 'string' || value.trim() === '') {
    return [];
  }

  return value
    .split(',')
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);
}

function parseNodeEnv(value: unknown): AppEnv['NODE_ENV'] {
  if (value === 'production' || value === 'test') {
    return value;
  }

  return 'development';
}

function parseLogLevel(value: unknown): AppEnv['LOG_LEVEL'] {
  if (
    value === 'debug' ||
    value === 'warn' ||
    value === 'error' ||
    value === 'info' ||
    value === 'log'
  ) {
    return value;
  }

  return 'log';
}

function parseIpFamily(value: unknown): AppEnv['CATALOG_DB_IP_FAMILY'] {
  const parsed = parseNumber(value, 0);
  if (parsed === 4 || parsed === 6) {
    return parsed;
  }

  return undefined;
}

function parseTimeZone(value: unknown, fallback: string): string {
  const candidate = String(value ?? '').trim();
  if (candidate.length === 0) {
    return fallback;
  }

  try {
    new Intl.DateTimeFormat('en-GB', { timeZone: candidate });
  } catch {
    throw new Error(`Invalid CATALOG_TIMEZONE value: ${candidate}`);
  }

  return candidate;
}

function parseLabel(value: unknown, fallback: string): string {
  const candidate = String(value ?? '').trim();
  return candidate.length > 0 ? candidate : fallback;
}

export function validateEnv(config: Record<string, unknown>): AppEnv {
  const NODE_ENV = parseNodeEnv(config.NODE_ENV);
  const CATALOG_DB_URL = String(config.CATALOG_DB_URL ?? '').trim();
  const REDIS_URL = String(config.REDIS_URL ?? '').trim() || undefined;
  const ALLOWED_ORIGINS = parseOrigins(config.ALLOWED_ORIGINS);

  if (CATALOG_DB_URL.length === 0) {
    throw new Error('CATALOG_DB_URL is required');
  }

  if (NODE_ENV === 'production' && ALLOWED_ORIGINS.length === 0) {
    throw new Error('ALLOWED_ORIGINS is required in production');
  }

  return {
    NODE_ENV,
    PORT: parseNumber(config.PORT, 3090),
    CATALOG_DB_URL,
    CATALOG_DB_IP_FAMILY: parseIpFamily(config.CATALOG_DB_IP_FAMILY),
    REDIS_URL,
    CATALOG_CACHE_TTL_MS: Math.max(1_000, parseNumber(config.CATALOG_CACHE_TTL_MS, 300_000)),
    IMAGE_FETCH_TIMEOUT_MS: Math.max(500, parseNumber(config.IMAGE_FETCH_TIMEOUT_MS, 10_000)),
    IMAGE_PREFETCH_CONCURRENCY: clamp(
      Math.trunc(parseNumber(config.IMAGE_PREFETCH_CONCURRENCY, 10)),
      1,
      64,
    ),
    ARTIFACT_TTL_MS: Math.max(10_000, parseNumber(config.ARTIFACT_TTL_MS, 600_000)),
    CATALOG_TIMEZONE: parseTimeZone(config.CATALOG_TIMEZONE, 'America/Bogota'),
    CATALOG_DOCUMENT_TITLE: parseLabel(config.CATALOG_DOCUMENT_TITLE, 'Catálogo de inventario'),
    STOCK_LOCATION_A_LABEL: parseLabel(config.STOCK_LOCATION_A_LABEL, 'Tienda'),
    STOCK_LOCATION_B_LABEL: parseLabel(config.STOCK_LOCATION_B_LABEL, 'Bodega'),
    ALLOWED_ORIGINS,
    LOG_LEVEL: parseLogLevel(config.LOG_LEVEL),
  };
}
