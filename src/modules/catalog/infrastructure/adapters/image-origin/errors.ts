export class ImageFetchError extends Error {
  constructor(
    readonly url: string,
    readonly status: number,
  ) {
    super(`Image request failed with status ${status}`);
    this.name = 'ImageFetchError';
  }
}
