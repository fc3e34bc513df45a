import type { AppEnv } from '../config/env.validation';
import { createLogger } from '../utils/logger';

type CorsOriginCallback = (error: Error | null, allow?: boolean) => void;

export type CorsOriginHandler = (origin: string | undefined, callback: CorsOriginCallback) => void;

export type CorsMode = 'development_permissive' | 'production_strict';

const corsLogger = createLogger('CorsPolicy');

export function normalizeOrigin(origin: string): string {
  const trimmed = origin.trim();
  if (trimmed.length === 0) {
    return trimmed;
  }

  try {
    const parsed = new URL(trimmed);
    return `${parsed.protocol}//${parsed.host}`.toLowerCase();
  } catch {
    return trimmed.replace(/\/+$/, '').toLowerCase();
  }
}

export function resolveCorsMode(env: Pick<AppEnv, 'NODE_ENV'>): CorsMode {
  return env.NODE_ENV === 'production' ? 'production_strict' : 'development_permissive';
}

/**
 * Browsers download catalog PDFs from a separate front end; in production only the
 * configured origins may call the API. Requests without an Origin header pass.
 */
export function buildCorsOriginHandler(
  env: Pick<AppEnv, 'NODE_ENV' | 'ALLOWED_ORIGINS'>,
): CorsOriginHandler {
  const corsMode = resolveCorsMode(env);
  const allowedOrigins = new Set(env.ALLOWED_ORIGINS.map(normalizeOrigin));

  return (origin, callback) => {
    if (corsMode === 'development_permissive' || !origin) {
      callback(null, true);
      return;
    }

    if (allowedOrigins.has(normalizeOrigin(origin))) {
      callback(null, true);
      return;
    }

    corsLogger.warn('cors_origin_rejected', {
      event: 'cors_origin_rejected',
      origin,
      allowed_origins_count: allowedOrigins.size,
    });
    callback(new Error('Origin not allowed by CORS'));
  };
}
