/**
 * Raw download of an image URL. Rejects on network failure, timeout or non-2xx status.
 */
export interface ImageOriginPort {
  fetch(url: string): Promise<Buffer>;
}
