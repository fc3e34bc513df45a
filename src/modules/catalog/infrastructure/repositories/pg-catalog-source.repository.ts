import { Inject, Injectable } from '@nestjs/common';
import { Pool } from 'pg';
import { createLogger } from '../../../../common/utils/logger';
import type { CatalogSourcePort } from '../../application/ports/catalog-source.port';
import { PG_POOL } from '../../application/ports/tokens';
import { CatalogSourceError } from '../../domain/errors';
import { buildProductFromRow, type CatalogSourceRow, type Product } from '../../domain/product';

/**
 * Colors arrive slugged ("azul-oscuro") and are shown as "Azul oscuro".
 * Sizes arrive as attribute slugs ("talla-xl") and only the last segment is kept.
 */
export const CATALOG_STOCK_QUERY = `SELECT
   v.id,
   v.sku,
   v.clean_name AS name,
   CASE
     WHEN v.color_raw IS NOT NULL AND btrim(v.color_raw) <> '' THEN
       upper(left(replace(v.color_raw, '-', ' '), 1))
         || lower(substring(replace(v.color_raw, '-', ' ') FROM 2))
     ELSE 'Sin color'
   END AS color,
   CASE
     WHEN v.size_raw IS NOT NULL AND btrim(v.size_raw) <> '' THEN
       upper(regexp_replace(v.size_raw, '^.*-', ''))
     ELSE 'Única'
   END AS size,
   v.stock_int AS stock,
   COALESCE(v.thumbnail_url, '') AS thumbnail_url,
   v.stock_location_a,
   v.stock_location_b
 FROM catalog_stock_view v
 WHERE v.stock_int >= 1
 ORDER BY v.id ASC`;

@Injectable()
export class PgCatalogSourceRepository implements CatalogSourcePort {
  private readonly logger = createLogger(PgCatalogSourceRepository.name);

  constructor(@Inject(PG_POOL) private readonly pool: Pick<Pool, 'query'>) {}

  async fetchAll(): Promise<Product[]> {
    let rows: CatalogSourceRow[];

    try {
      const result = await this.pool.query<CatalogSourceRow>(CATALOG_STOCK_QUERY);
      rows = result.rows;
    } catch (error: unknown) {
      throw new CatalogSourceError('Catalog source query failed', error);
    }

    const products: Product[] = [];
    for (const row of rows) {
      const product = buildProductFromRow(row);
      if (product) {
        products.push(product);
      }
    }

    this.logger.cache('catalog_source_read', {
      event: 'catalog_source_read',
      rows: rows.length,
      products: products.length,
    });

    return products;
  }
}
