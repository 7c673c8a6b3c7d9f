/**
 * MIME Type Utilities
 *
 * Shared MIME type detection and mapping utilities.
 */

/**
 * Encodable image formats (templates and outputs)
 */
export type ImageFormat = 'jpeg' | 'png' | 'webp';

const FORMAT_MIME_TYPES: Record<ImageFormat, string> = {
  jpeg: 'image/jpeg',
  png: 'image/png',
  webp: 'image/webp',
};

const FORMAT_EXTENSIONS: Record<ImageFormat, string> = {
  jpeg: 'jpg',
  png: 'png',
  webp: 'webp',
};

/**
 * Image MIME types accepted from remote product image URLs
 */
const FETCHABLE_IMAGE_MIME_TYPES = new Set([
  'image/jpeg',
  'image/jpg',
  'image/pjpeg',
  'image/png',
  'image/webp',
  'image/gif',
  'image/avif',
]);

const FEED_MIME_TYPES = new Set(['application/xml', 'text/xml']);

/**
 * Narrow an arbitrary format name (e.g. from sharp metadata) to an encodable format
 */
export function toImageFormat(format: string | undefined): ImageFormat | null {
  switch (format) {
    case 'jpeg':
    case 'jpg':
      return 'jpeg';
    case 'png':
      return 'png';
    case 'webp':
      return 'webp';
    default:
      return null;
  }
}

/**
 * Get MIME type for an encodable image format
 */
export function getFormatMimeType(format: ImageFormat): string {
  return FORMAT_MIME_TYPES[format];
}

/**
 * Get file extension (without dot) for an encodable image format
 */
export function getFormatExtension(format: ImageFormat): string {
  return FORMAT_EXTENSIONS[format];
}

/**
 * Check if a MIME type is an image type we accept from remote sources
 */
export function isFetchableImageMimeType(mimeType: string): boolean {
  return FETCHABLE_IMAGE_MIME_TYPES.has(mimeType);
}

/**
 * Check if a MIME type is an XML feed type (application/xml, text/xml or any +xml)
 */
export function isFeedMimeType(mimeType: string): boolean {
  return FEED_MIME_TYPES.has(mimeType) || /^application\/[a-z0-9.+-]+\+xml$/.test(mimeType);
}
