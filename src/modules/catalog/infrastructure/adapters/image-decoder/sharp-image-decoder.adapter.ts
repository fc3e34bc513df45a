import { Injectable } from '@nestjs/common';
import sharp from 'sharp';
import type { ImageDecoderPort } from '../../../application/ports/image-decoder.port';
import type { DecodedImage } from '../../../domain/images';

const JPEG_QUALITY = 85;
const WHITE = '#ffffff';

/**
 * Normalizes thumbnails to opaque JPEG so pdfkit can embed any source format
 * (webp and transparent png included).
 */
@Injectable()
export class SharpImageDecoderAdapter implements ImageDecoderPort {
  async decode(input: Buffer): Promise<DecodedImage> {
    const { data, info } = await sharp(input)
      .rotate()
      .flatten({ background: WHITE })
      .jpeg({ quality: JPEG_QUALITY })
      .toBuffer({ resolveWithObject: true });

    return { data, width: info.width, height: info.height };
  }

  async placeholder(width: number, height: number): Promise<DecodedImage> {
    const { data, info } = await sharp({
      create: { width, height, channels: 3, background: WHITE },
    })
      .jpeg({ quality: JPEG_QUALITY })
      .toBuffer({ resolveWithObject: true });

    return { data, width: info.width, height: info.height };
  }
}
