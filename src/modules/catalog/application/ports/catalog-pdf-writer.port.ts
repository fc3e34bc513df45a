import type { ResolvedImage } from '../../domain/images';
import type { CatalogPageLayout } from '../../domain/layout';

export interface CatalogPdfWriteInput {
  title: string;
  /** Stamped on every page. */
  timestampLabel: string;
  createdAt: Date;
  pages: CatalogPageLayout[];
  /** Image for a cell, looked up by the product's thumbnail URL. */
  imageFor: (thumbnailUrl: string) => ResolvedImage | undefined;
}

export interface CatalogPdfWriteResult {
  content: Buffer;
  /** Cells drawn with the failure block instead of their image. */
  failedImageCells: number;
}

export interface CatalogPdfWriterPort {
  write(input: CatalogPdfWriteInput): Promise<CatalogPdfWriteResult>;
}
