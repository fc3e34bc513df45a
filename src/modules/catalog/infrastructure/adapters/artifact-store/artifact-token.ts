import { randomBytes } from 'node:crypto';

const TOKEN_BYTES = 24;
const TOKEN_PATTERN = /^[0-9a-f]{48}$/;

export const DEFAULT_ARTIFACT_TTL_MS = 600_000;

export function generateArtifactToken(): string {
  return randomBytes(TOKEN_BYTES).toString('hex');
}

export function isWellFormedArtifactToken(token: string): boolean {
  return TOKEN_PATTERN.test(token);
}
