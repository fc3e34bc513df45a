export const OPTIMIZED_IMAGE_WIDTH = 1070;
export const OPTIMIZED_IMAGE_HEIGHT = 1536;

const SIZED_SUFFIX_PATTERN = /-\d+x\d+\.(jpg|jpeg|png|webp)$/i;
const EXTENSION_PATTERN = /\.(jpg|jpeg|png|webp)$/i;

/**
 * Origin-side resized variant of an image URL: `photo.jpg` -> `photo-1070x1536.jpg`.
 * URLs that already carry a `-<w>x<h>` suffix, or have no recognized extension,
 * come back unchanged.
 */
export function deriveOptimizedImageUrl(url: string): string {
  if (SIZED_SUFFIX_PATTERN.test(url)) {
    return url;
  }

  const match = EXTENSION_PATTERN.exec(url);
  if (!match) {
    return url;
  }

  const base = url.slice(0, url.lastIndexOf('.'));
  return `${base}-${OPTIMIZED_IMAGE_WIDTH}x${OPTIMIZED_IMAGE_HEIGHT}.${match[1]}`;
}
