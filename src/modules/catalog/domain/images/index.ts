export {
  deriveOptimizedImageUrl,
  OPTIMIZED_IMAGE_HEIGHT,
  OPTIMIZED_IMAGE_WIDTH,
} from './optimized-url';
export type { DecodedImage, ImageOrigin, ResolvedImage } from './types';
