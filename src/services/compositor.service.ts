import sharp from 'sharp';
import { getConfig } from '../config/index.js';
import {
  BoundsError,
  CompositeError,
  ConfigurationError,
  errorMessage,
} from '../utils/errors.js';
import { toImageFormat, type ImageFormat } from '../utils/mime-types.js';
import type { OverlayRect } from '../types/project.types.js';

/** Accepted product image size per side, in pixels */
export const MIN_PRODUCT_DIMENSION = 10;
export const MAX_PRODUCT_DIMENSION = 4000;

export interface TemplateMetadata {
  format: ImageFormat;
  width: number;
  height: number;
  bytes: number;
}

export interface TemplateImage {
  buffer: Buffer;
  format: ImageFormat;
  width: number;
  height: number;
}

export interface ImageSize {
  width: number;
  height: number;
}

/**
 * Decoded RGBA pixels of a composite
 */
export interface RawImage {
  data: Buffer;
  width: number;
  height: number;
}

export interface CompositorSettings {
  outputQuality: number;
  templateMaxBytes: number;
}

/**
 * Apply the encoder for a format
 */
export function encodeAs(pipeline: sharp.Sharp, format: ImageFormat, quality: number): sharp.Sharp {
  switch (format) {
    case 'jpeg':
      return pipeline.jpeg({ quality });
    case 'png':
      return pipeline.png();
    case 'webp':
      return pipeline.webp({ quality });
  }
}

/**
 * Load raw RGBA pixels into a sharp pipeline
 */
export function fromRaw(image: RawImage): sharp.Sharp {
  return sharp(image.data, { raw: { width: image.width, height: image.height, channels: 4 } });
}

/**
 * Check that a rectangle lies fully inside an image
 * @throws BoundsError when it does not
 */
export function validateRect(size: ImageSize, rect: OverlayRect): void {
  const { x, y, width, height } = rect;
  const integral = [x, y, width, height].every(Number.isInteger);

  if (!integral || x < 0 || y < 0 || width < 1 || height < 1) {
    throw new BoundsError(
      'Overlay rectangle needs non-negative integer coordinates and a positive size'
    );
  }

  if (x + width > size.width || y + height > size.height) {
    throw new BoundsError(
      `Overlay rectangle (${x}, ${y}, ${width}x${height}) exceeds the ${size.width}x${size.height} template`
    );
  }
}

/**
 * Compositor Service
 *
 * Overlays product images onto frame templates with sharp. Product images are
 * cover-fitted to the overlay rectangle and centre-cropped.
 */
export class CompositorService {
  constructor(private readonly settings?: CompositorSettings) {}

  private resolveSettings(): CompositorSettings {
    if (this.settings) {
      return this.settings;
    }
    const { projects } = getConfig();
    return { outputQuality: projects.outputQuality, templateMaxBytes: projects.templateMaxBytes };
  }

  /**
   * Validate a frame template once, when the project is created
   * @throws ConfigurationError (INVALID_TEMPLATE)
   */
  async inspectTemplate(bytes: Buffer): Promise<TemplateMetadata> {
    const { templateMaxBytes } = this.resolveSettings();

    if (bytes.length === 0) {
      throw new ConfigurationError('Template is empty', 'INVALID_TEMPLATE');
    }
    if (bytes.length > templateMaxBytes) {
      throw new ConfigurationError(
        `Template exceeds the ${templateMaxBytes} byte limit`,
        'INVALID_TEMPLATE'
      );
    }

    let metadata: sharp.Metadata;
    try {
      metadata = await sharp(bytes).metadata();
    } catch (error) {
      throw new ConfigurationError(
        `Template could not be decoded: ${errorMessage(error)}`,
        'INVALID_TEMPLATE'
      );
    }

    const format = toImageFormat(metadata.format);
    if (!format) {
      throw new ConfigurationError(
        `Template format ${metadata.format ?? 'unknown'} is not supported (use jpeg, png or webp)`,
        'INVALID_TEMPLATE'
      );
    }

    if (!metadata.width || !metadata.height) {
      throw new ConfigurationError('Template has no pixel dimensions', 'INVALID_TEMPLATE');
    }

    return { format, width: metadata.width, height: metadata.height, bytes: bytes.length };
  }

  /**
   * Decode, size-check and cover-fit a product image to the rectangle
   */
  private async fitProduct(productBytes: Buffer, rect: OverlayRect): Promise<Buffer> {
    let metadata: sharp.Metadata;
    try {
      metadata = await sharp(productBytes).metadata();
    } catch (error) {
      throw new CompositeError('decode_failed', `Product image could not be decoded: ${errorMessage(error)}`);
    }

    const { width, height } = metadata;
    if (!width || !height) {
      throw new CompositeError('decode_failed', 'Product image has no pixel dimensions');
    }
    if (
      width < MIN_PRODUCT_DIMENSION ||
      height < MIN_PRODUCT_DIMENSION ||
      width > MAX_PRODUCT_DIMENSION ||
      height > MAX_PRODUCT_DIMENSION
    ) {
      throw new CompositeError(
        'invalid_dimensions',
        `Product image ${width}x${height} is outside the ${MIN_PRODUCT_DIMENSION}-${MAX_PRODUCT_DIMENSION} px range`
      );
    }

    try {
      return await sharp(productBytes)
        .resize(rect.width, rect.height, { fit: 'cover', position: 'centre' })
        .png()
        .toBuffer();
    } catch (error) {
      throw new CompositeError('decode_failed', `Product image could not be decoded: ${errorMessage(error)}`);
    }
  }

  /**
   * Composite a product image onto the template and return the raw pixels
   * @throws BoundsError, CompositeError
   */
  async render(template: TemplateImage, rect: OverlayRect, productBytes: Buffer): Promise<RawImage> {
    validateRect(template, rect);

    const fitted = await this.fitProduct(productBytes, rect);

    try {
      const { data, info } = await sharp(template.buffer)
        .composite([{ input: fitted, left: rect.x, top: rect.y }])
        .toColourspace('srgb')
        .ensureAlpha()
        .raw()
        .toBuffer({ resolveWithObject: true });

      if (info.channels !== 4) {
        throw new Error(`expected 4 channels, got ${info.channels}`);
      }
      return { data, width: info.width, height: info.height };
    } catch (error) {
      throw new CompositeError('encode_failed', `Composite failed: ${errorMessage(error)}`);
    }
  }

  /**
   * Composite a product image onto the template, encoded in the template's format
   * @throws BoundsError, CompositeError
   */
  async compose(template: TemplateImage, rect: OverlayRect, productBytes: Buffer): Promise<Buffer> {
    const { outputQuality } = this.resolveSettings();
    const raw = await this.render(template, rect, productBytes);

    try {
      return await encodeAs(fromRaw(raw), template.format, outputQuality).toBuffer();
    } catch (error) {
      throw new CompositeError('encode_failed', `Encoding ${template.format} failed: ${errorMessage(error)}`);
    }
  }
}

export const compositorService = new CompositorService();
