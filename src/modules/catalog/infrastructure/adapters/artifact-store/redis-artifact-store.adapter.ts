import { createClient } from 'redis';
import { createLogger } from '../../../../../common/utils/logger';
import type { ArtifactStorePort } from '../../../application/ports/artifact-store.port';
import { DEFAULT_ARTIFACT_TTL_MS, generateArtifactToken, isWellFormedArtifactToken } from './artifact-token';

const KEY_PREFIX = 'catalog:artifact:';
const MAX_PUT_ATTEMPTS = 3;

const TAKE_SCRIPT = `
local value = redis.call('GET', KEYS[1])
if value then
  redis.call('DEL', KEYS[1])
end
return value
`.trim();

export interface RedisCommandClient {
  isOpen: boolean;
  connect(): Promise<unknown>;
  sendCommand(args: string[]): Promise<unknown>;
  on(event: 'error', listener: (error: Error) => void): unknown;
}

export type RedisClientFactory = (url: string) => RedisCommandClient;

export interface RedisArtifactStoreOptions {
  redisUrl: string;
  ttlMs?: number;
  clientFactory?: RedisClientFactory;
  generateToken?: () => string;
}

/**
 * Shared handoff store for multi-instance deployments. Documents are stored base64
 * encoded with a PX expiry; `take` is an atomic GET+DEL script.
 *
 * The client reconnects on its own after a dropped connection; commands issued while it is
 * offline reject instead of queueing.
 */
export class RedisArtifactStore implements ArtifactStorePort {
  private readonly logger = createLogger(RedisArtifactStore.name);
  private readonly ttlMs: number;
  private readonly clientFactory: RedisClientFactory;
  private readonly generateToken: () => string;
  private clientPromise?: Promise<RedisCommandClient>;

  constructor(private readonly options: RedisArtifactStoreOptions) {
    this.ttlMs = options.ttlMs ?? DEFAULT_ARTIFACT_TTL_MS;
    this.clientFactory = options.clientFactory ?? defaultRedisClientFactory;
    this.generateToken = options.generateToken ?? generateArtifactToken;
  }

  async put(content: Buffer): Promise<string> {
    const client = await this.resolveClient();
    const encoded = content.toString('base64');

    for (let attempt = 1; attempt <= MAX_PUT_ATTEMPTS; attempt += 1) {
      const token = this.generateToken();
      const reply = await this.run(client, [
        'SET',
        buildKey(token),
        encoded,
        'PX',
        String(this.ttlMs),
        'NX',
      ]);

      if (reply !== null) {
        this.logger.artifact('artifact_stored', {
          event: 'artifact_stored',
          backend: 'redis',
          bytes: content.length,
        });
        return token;
      }
    }

    throw new Error('Could not allocate a unique artifact token');
  }

  async take(token: string): Promise<Buffer | null> {
    if (!isWellFormedArtifactToken(token)) {
      return null;
    }

    const client = await this.resolveClient();
    const reply = await this.run(client, ['EVAL', TAKE_SCRIPT, '1', buildKey(token)]);

    return decodeReply(reply);
  }

  private async run(client: RedisCommandClient, args: string[]): Promise<unknown> {
    try {
      return await client.sendCommand(args);
    } catch (error: unknown) {
      this.logger.error('artifact_store_command_failed', error instanceof Error ? error : undefined, {
        event: 'artifact_store_command_failed',
        command: args[0],
      });
      throw error;
    }
  }

  private resolveClient(): Promise<RedisCommandClient> {
    if (!this.clientPromise) {
      this.clientPromise = this.connectClient();
    }

    return this.clientPromise;
  }

  private async connectClient(): Promise<RedisCommandClient> {
    try {
      const client = this.clientFactory(this.options.redisUrl);
      client.on('error', (error) => {
        this.logger.warn('artifact_store_connection_error', {
          event: 'artifact_store_connection_error',
          error_type: error.name,
          error_message: error.message,
        });
      });
      if (!client.isOpen) {
        await client.connect();
      }
      return client;
    } catch (error: unknown) {
      this.clientPromise = undefined;
      throw error;
    }
  }
}

function defaultRedisClientFactory(url: string): RedisCommandClient {
  return createClient({ url, disableOfflineQueue: true }) as unknown as RedisCommandClient;
}

function buildKey(token: string): string {
  return `${KEY_PREFIX}${token}`;
}

function decodeReply(value: unknown): Buffer | null {
  if (typeof value === 'string') {
    return Buffer.from(value, 'base64');
  }

  if (Buffer.isBuffer(value)) {
    return Buffer.from(value.toString('utf8'), 'base64');
  }

  return null;
}
