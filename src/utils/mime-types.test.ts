import { describe, it, expect } from 'vitest';
import {
  toImageFormat,
  getFormatMimeType,
  getFormatExtension,
  isFetchableImageMimeType,
  isFeedMimeType,
} from './mime-types.js';

describe('mime-types', () => {
  describe('toImageFormat', () => {
    it('should accept encodable formats', () => {
      expect(toImageFormat('jpeg')).toBe('jpeg');
      expect(toImageFormat('jpg')).toBe('jpeg');
      expect(toImageFormat('png')).toBe('png');
      expect(toImageFormat('webp')).toBe('webp');
    });

    it('should return null for anything else', () => {
      expect(toImageFormat('gif')).toBeNull();
      expect(toImageFormat('svg')).toBeNull();
      expect(toImageFormat(undefined)).toBeNull();
    });
  });

  describe('getFormatMimeType', () => {
    it('should map formats to MIME types', () => {
      expect(getFormatMimeType('jpeg')).toBe('image/jpeg');
      expect(getFormatMimeType('png')).toBe('image/png');
      expect(getFormatMimeType('webp')).toBe('image/webp');
    });
  });

  describe('getFormatExtension', () => {
    it('should use jpg for jpeg', () => {
      expect(getFormatExtension('jpeg')).toBe('jpg');
      expect(getFormatExtension('png')).toBe('png');
    });
  });

  describe('isFetchableImageMimeType', () => {
    it('should accept common raster types', () => {
      expect(isFetchableImageMimeType('image/jpeg')).toBe(true);
      expect(isFetchableImageMimeType('image/png')).toBe(true);
      expect(isFetchableImageMimeType('image/webp')).toBe(true);
    });

    it('should reject svg and non-image types', () => {
      expect(isFetchableImageMimeType('image/svg+xml')).toBe(false);
      expect(isFetchableImageMimeType('text/html')).toBe(false);
      expect(isFetchableImageMimeType('application/octet-stream')).toBe(false);
    });
  });

  describe('isFeedMimeType', () => {
    it('should accept XML types', () => {
      expect(isFeedMimeType('application/xml')).toBe(true);
      expect(isFeedMimeType('text/xml')).toBe(true);
      expect(isFeedMimeType('application/atom+xml')).toBe(true);
      expect(isFeedMimeType('application/rss+xml')).toBe(true);
    });

    it('should reject non-XML types', () => {
      expect(isFeedMimeType('text/html')).toBe(false);
      expect(isFeedMimeType('application/json')).toBe(false);
      expect(isFeedMimeType('image/svg+xml')).toBe(false);
    });
  });
});
