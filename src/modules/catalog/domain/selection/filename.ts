export function buildDocumentFilename(category: string, size: string): string {
  return `${category}_${size}.pdf`;
}
