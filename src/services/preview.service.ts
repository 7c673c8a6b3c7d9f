import { getConfig } from '../config/index.js';
import { createChildLogger } from '../utils/logger.js';
import { CompositeError, errorMessage } from '../utils/errors.js';
import { safeFetch } from '../utils/safe-fetch.js';
import type { HostResolver } from '../utils/url-validator.js';
import type { OverlayRect } from '../types/project.types.js';
import {
  compositorService,
  fromRaw,
  validateRect,
  type CompositorService,
  type TemplateImage,
} from './compositor.service.js';

const logger = createChildLogger({ service: 'preview' });

const PREVIEW_CONTENT_TYPE = 'image/jpeg';

export type PreviewSource = { kind: 'bytes'; bytes: Buffer } | { kind: 'url'; url: string };

export interface PreviewResult {
  buffer: Buffer;
  contentType: string;
  dataUri: string;
  width: number;
  height: number;
}

export interface PreviewSettings {
  maxWidth: number;
  maxHeight: number;
  quality: number;
  imageTimeoutMs: number;
  imageMaxBytes: number;
  allowedPorts: readonly number[];
  maxRedirects: number;
  resolver?: HostResolver;
}

/**
 * Preview Service
 * Single-item composites for tuning the overlay rectangle. Nothing is persisted.
 */
export class PreviewService {
  constructor(
    private readonly compositor: CompositorService = compositorService,
    private readonly settings?: PreviewSettings
  ) {}

  private resolveSettings(): PreviewSettings {
    if (this.settings) {
      return this.settings;
    }
    const { preview, fetch } = getConfig();
    return {
      maxWidth: preview.maxWidth,
      maxHeight: preview.maxHeight,
      quality: preview.quality,
      imageTimeoutMs: fetch.imageTimeoutMs,
      imageMaxBytes: fetch.imageMaxBytes,
      allowedPorts: fetch.allowedPorts,
      maxRedirects: fetch.maxRedirects,
    };
  }

  private async loadSource(source: PreviewSource, settings: PreviewSettings): Promise<Buffer> {
    if (source.kind === 'bytes') {
      return source.bytes;
    }
    const response = await safeFetch(source.url, {
      kind: 'image',
      timeoutMs: settings.imageTimeoutMs,
      maxBytes: settings.imageMaxBytes,
      allowedPorts: settings.allowedPorts,
      maxRedirects: settings.maxRedirects,
      resolver: settings.resolver,
    });
    return response.body;
  }

  /**
   * Render a downsized JPEG preview of one composite
   * @throws BoundsError, UnsafeUrlError, FetchFailedError, CompositeError
   */
  async preview(template: TemplateImage, rect: OverlayRect, source: PreviewSource): Promise<PreviewResult> {
    const settings = this.resolveSettings();

    validateRect(template, rect);

    const productBytes = await this.loadSource(source, settings);
    const raw = await this.compositor.render(template, rect, productBytes);

    let encoded: { data: Buffer; info: { width: number; height: number } };
    try {
      encoded = await fromRaw(raw)
        .flatten({ background: '#ffffff' })
        .resize(settings.maxWidth, settings.maxHeight, { fit: 'inside', withoutEnlargement: true })
        .jpeg({ quality: settings.quality })
        .toBuffer({ resolveWithObject: true });
    } catch (error) {
      throw new CompositeError('encode_failed', `Preview encoding failed: ${errorMessage(error)}`);
    }

    logger.debug(
      { source: source.kind, width: encoded.info.width, height: encoded.info.height, bytes: encoded.data.length },
      'Preview rendered'
    );

    return {
      buffer: encoded.data,
      contentType: PREVIEW_CONTENT_TYPE,
      dataUri: `data:${PREVIEW_CONTENT_TYPE};base64,${encoded.data.toString('base64')}`,
      width: encoded.info.width,
      height: encoded.info.height,
    };
  }
}

export const previewService = new PreviewService();
