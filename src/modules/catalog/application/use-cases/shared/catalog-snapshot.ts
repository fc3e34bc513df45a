import { ServiceUnavailableException } from '@nestjs/common';
import { CATALOG_UNAVAILABLE_MESSAGE } from '../../../../../common/constants/error-messages.constants';
import { CatalogSourceError } from '../../../domain/errors';
import type { CatalogCache, CatalogSnapshot } from '../../services/catalog-cache';

/**
 * Reads the cached catalog, turning source failures into a 503 for the current request.
 */
export async function loadCatalogSnapshot(
  cache: Pick<CatalogCache, 'getSnapshot'>,
): Promise<CatalogSnapshot> {
  try {
    return await cache.getSnapshot();
  } catch (error: unknown) {
    if (error instanceof CatalogSourceError) {
      throw new ServiceUnavailableException(CATALOG_UNAVAILABLE_MESSAGE);
    }

    throw error;
  }
}
