import type { DecodedImage } from '../../domain/images';

export interface ImageDecoderPort {
  /** Re-encodes arbitrary image bytes as JPEG. Rejects when the bytes are not a readable image. */
  decode(input: Buffer): Promise<DecodedImage>;
  /** Solid white JPEG of the given pixel size. */
  placeholder(width: number, height: number): Promise<DecodedImage>;
}
