import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { ImageOriginPort } from '../../../application/ports/image-origin.port';
import { fetchWithTimeout } from '../shared';
import { ImageFetchError } from './errors';

const DEFAULT_TIMEOUT_MS = 10_000;

@Injectable()
export class HttpImageOriginAdapter implements ImageOriginPort {
  private readonly timeoutMs: number;

  constructor(private readonly configService: ConfigService) {
    this.timeoutMs = Math.max(
      500,
      this.configService.get<number>('IMAGE_FETCH_TIMEOUT_MS') ?? DEFAULT_TIMEOUT_MS,
    );
  }

  fetch(url: string): Promise<Buffer> {
    return fetchWithTimeout(
      url,
      { method: 'GET', headers: { Accept: 'image/*' } },
      this.timeoutMs,
      async (response) => {
        if (!response.ok) {
          throw new ImageFetchError(url, response.status);
        }

        return Buffer.from(await response.arrayBuffer());
      },
    );
  }
}
