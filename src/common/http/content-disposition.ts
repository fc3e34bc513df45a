import { stripDiacritics } from '../utils/text-normalize.utils';

const FALLBACK_FILENAME = 'documento.pdf';

/**
 * Keeps only the last path segment of a client-supplied name and forces a .pdf extension.
 */
export function sanitizeDownloadFilename(value: string | undefined): string {
  const base = (value ?? '').split(/[\\/]/).pop()?.replace(/[\u0000-\u001f\u007f]/g, '').trim() ?? '';
  if (base.length === 0) {
    return FALLBACK_FILENAME;
  }

  return /\.pdf$/i.test(base) ? base : `${base}.pdf`;
}

/** `attachment` disposition with an ASCII fallback and the RFC 5987 UTF-8 name. */
export function buildAttachmentDisposition(filename: string): string {
  const ascii = stripDiacritics(filename).replace(/["\\]/g, '_').replace(/[^\x20-\x7e]/g, '_');
  return `attachment; filename="${ascii}"; filename*=UTF-8''${encodeRfc5987(filename)}`;
}

function encodeRfc5987(value: string): string {
  return encodeURIComponent(value).replace(
    /['()*]/g,
    (character) => `%${character.charCodeAt(0).toString(16).toUpperCase()}`,
  );
}
