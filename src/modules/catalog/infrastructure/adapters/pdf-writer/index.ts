export { PdfkitCatalogWriter } from './pdfkit-catalog-writer.adapter';
