export type ImageOrigin = 'optimized' | 'original' | 'placeholder';

/**
 * A thumbnail ready for drawing. `data` is always JPEG.
 */
export interface ResolvedImage {
  readonly sourceUrl: string;
  readonly data: Buffer;
  readonly width: number;
  readonly height: number;
  readonly origin: ImageOrigin;
}

export interface DecodedImage {
  readonly data: Buffer;
  readonly width: number;
  readonly height: number;
}
