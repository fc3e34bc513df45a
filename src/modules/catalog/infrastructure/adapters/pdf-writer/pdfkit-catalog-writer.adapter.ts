import { Injectable } from '@nestjs/common';
import PDFDocument from 'pdfkit';
import { createLogger } from '../../../../../common/utils/logger';
import type {
  CatalogPdfWriteInput,
  CatalogPdfWriteResult,
  CatalogPdfWriterPort,
} from '../../../application/ports/catalog-pdf-writer.port';
import type { ResolvedImage } from '../../../domain/images';
import {
  PAGE_HEIGHT,
  PAGE_WIDTH,
  TIMESTAMP_BASELINE,
  TIMESTAMP_FONT_SIZE,
  TIMESTAMP_X,
  type CatalogCellLayout,
  type LayoutRect,
  type LayoutTextLine,
} from '../../../domain/layout';

const BLACK = '#000000';
const WHITE = '#ffffff';

type PdfDocument = InstanceType<typeof PDFDocument>;

@Injectable()
export class PdfkitCatalogWriter implements CatalogPdfWriterPort {
  private readonly logger = createLogger(PdfkitCatalogWriter.name);

  write(input: CatalogPdfWriteInput): Promise<CatalogPdfWriteResult> {
    return new Promise<CatalogPdfWriteResult>((resolve, reject) => {
      const doc = new PDFDocument({
        size: [PAGE_WIDTH, PAGE_HEIGHT],
        margin: 0,
        autoFirstPage: false,
        info: {
          Title: input.title,
          CreationDate: input.createdAt,
        },
      });

      const chunks: Buffer[] = [];
      let failedImageCells = 0;

      doc.on('data', (chunk: Buffer) => chunks.push(chunk));
      doc.on('error', reject);
      doc.on('end', () => resolve({ content: Buffer.concat(chunks), failedImageCells }));

      try {
        for (const page of input.pages) {
          doc.addPage({ size: [PAGE_WIDTH, PAGE_HEIGHT], margin: 0 });
          drawText(doc, {
            text: input.timestampLabel,
            font: 'Helvetica',
            size: TIMESTAMP_FONT_SIZE,
            x: TIMESTAMP_X,
            baseline: TIMESTAMP_BASELINE,
          });

          for (const cell of page.cells) {
            if (!this.drawCell(doc, cell, input.imageFor(cell.product.thumbnailUrl))) {
              failedImageCells += 1;
            }
          }
        }

        doc.end();
      } catch (error: unknown) {
        reject(error);
      }
    });
  }

  /** Returns false when the image could not be placed and the failure block was drawn. */
  private drawCell(doc: PdfDocument, cell: CatalogCellLayout, image: ResolvedImage | undefined): boolean {
    fillRect(doc, cell.background, BLACK);

    const placed = image ? this.placeImage(doc, cell, image) : false;
    if (!placed) {
      fillRect(doc, cell.frame, WHITE);
      for (const line of cell.imageFailureLines) {
        drawText(doc, line);
      }
    }

    doc
      .lineWidth(1)
      .rect(cell.frame.x, cell.frame.y, cell.frame.width, cell.frame.height)
      .stroke(BLACK);

    for (const line of cell.textLines) {
      drawText(doc, line);
    }

    return placed;
  }

  private placeImage(doc: PdfDocument, cell: CatalogCellLayout, image: ResolvedImage): boolean {
    try {
      doc.image(image.data, cell.frame.x, cell.frame.y, {
        width: cell.frame.width,
        height: cell.frame.height,
      });
      return true;
    } catch (error: unknown) {
      this.logger.warn('catalog_image_draw_failed', {
        event: 'catalog_image_draw_failed',
        sku: cell.product.sku,
        origin: image.origin,
        error_type: error instanceof Error ? error.name : 'UnknownError',
      });
      return false;
    }
  }
}

function fillRect(doc: PdfDocument, rect: LayoutRect, color: string): void {
  doc.rect(rect.x, rect.y, rect.width, rect.height).fill(color);
}

function drawText(doc: PdfDocument, line: LayoutTextLine): void {
  doc
    .font(line.font)
    .fontSize(line.size)
    .fillColor(BLACK)
    .text(line.text, line.x, line.baseline, { lineBreak: false, baseline: 'alphabetic' });
}
