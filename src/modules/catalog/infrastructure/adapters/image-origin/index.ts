export { ImageFetchError } from './errors';
export { HttpImageOriginAdapter } from './http-image-origin.adapter';
