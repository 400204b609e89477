import sharp from 'sharp';
import { Buffer } from 'node:buffer';
import { config } from './config.js';
import { TranscodeError, UpstreamError, errorMessage } from './errors.js';
import type { Logger } from './logger.js';
import type { UpstreamClient } from './upstream.js';

export type OutputFormat = 'jpeg' | 'png' | 'webp';

export interface ImageCodec {
  dimensions(bytes: Buffer): Promise<{ width: number; height: number }>;
  encode(bytes: Buffer, width: number, height: number, format: OutputFormat): Promise<Buffer>;
}

export const sharpCodec: ImageCodec = {
  async dimensions(bytes) {
    const { width, height } = await sharp(bytes).metadata();
    if (!width || !height) throw new TranscodeError('Image has no readable dimensions');
    return { width, height };
  },
  async encode(bytes, width, height, format) {
    const resized = sharp(bytes).resize(width, height, { fit: 'fill', kernel: 'lanczos3' });
    if (format === 'png') return resized.png({ compressionLevel: 9, adaptiveFiltering: true }).toBuffer();
    if (format === 'webp') return resized.webp({ effort: 6 }).toBuffer();
    return resized.jpeg({ quality: 85, optimizeCoding: true }).toBuffer();
  }
};

export interface TranscodeOptions {
  maxBytes: number;
  maxAttempts: number;
  initialScale: number;
  codec: ImageCodec;
}

export interface TranscodeOutcome {
  bytes: Buffer;
  wasResized: boolean;
  format?: OutputFormat;
}

export interface ManuscriptAsset {
  success: true;
  image_data: string;
  mime_type: string;
  size: number;
  original_size: number;
  was_resized: boolean;
  filename: string;
  title: string;
  source_url: string;
}

export interface DownloadError {
  success: false;
  error: string;
}

export type ManuscriptResult = ManuscriptAsset | DownloadError;

const FORMAT_MIME: Record<OutputFormat, string> = {
  jpeg: 'image/jpeg',
  png: 'image/png',
  webp: 'image/webp'
};

export function detectMimeType(contentType: string | null): string {
  const media = (contentType ?? '').split(';')[0].trim().toLowerCase();
  return media.startsWith('image/') ? media : 'image/jpeg';
}

export function outputFormatFor(mimeType: string): OutputFormat {
  if (mimeType === 'image/png') return 'png';
  if (mimeType === 'image/webp') return 'webp';
  return 'jpeg';
}

function lastPathSegment(imageUrl: string): string {
  try {
    return decodeURIComponent(new URL(imageUrl).pathname.split('/').pop() ?? '');
  } catch {
    return imageUrl.split(/[?#]/)[0].split('/').pop() ?? '';
  }
}

export function filenameFromUrl(imageUrl: string): string {
  const name = lastPathSegment(imageUrl);
  return name.includes('.') ? name : 'manuscript.jpg';
}

const formatBytes = (n: number) => n.toLocaleString('en-US');

/**
 * Shrinks `original` until it fits in `maxBytes`, scaling both dimensions by
 * `initialScale` more on every attempt. Gives back the original bytes when
 * no attempt fits or the codec fails.
 */
export async function transcodeToFit(
  original: Buffer,
  mimeType: string,
  logger: Logger,
  options: TranscodeOptions
): Promise<TranscodeOutcome> {
  if (original.length <= options.maxBytes) return { bytes: original, wasResized: false };

  logger.debug(`Image size ${original.length} bytes exceeds limit of ${options.maxBytes} bytes, resizing...`);
  const format = outputFormatFor(mimeType);
  try {
    const { width, height } = await options.codec.dimensions(original);
    let scale = options.initialScale;
    for (let attempt = 1; attempt <= options.maxAttempts; attempt++) {
      const w = Math.floor(width * scale);
      const h = Math.floor(height * scale);
      if (w < 1 || h < 1) throw new TranscodeError(`Scale ${scale} leaves no pixels of ${width}x${height}`);
      const encoded = await options.codec.encode(original, w, h, format);
      logger.debug(`Resize attempt ${attempt}: ${w}x${h}, size: ${encoded.length} bytes`);
      if (encoded.length <= options.maxBytes) {
        logger.debug(`Successfully resized image from ${original.length} to ${encoded.length} bytes`);
        return { bytes: encoded, wasResized: true, format };
      }
      scale *= options.initialScale;
    }
    logger.warning(`Could not resize image below ${options.maxBytes} bytes after ${options.maxAttempts} attempts`);
  } catch (err) {
    const failure = err instanceof TranscodeError ? err : new TranscodeError(errorMessage(err), err);
    logger.error(`Error during image resize: ${failure.message}`);
  }
  return { bytes: original, wasResized: false };
}

export async function fetchManuscript(
  client: UpstreamClient,
  logger: Logger,
  imageUrl: string,
  manuscriptTitle?: string,
  overrides: Partial<TranscodeOptions & { timeoutMs: number }> = {}
): Promise<ManuscriptResult> {
  const options: TranscodeOptions = {
    maxBytes: overrides.maxBytes ?? config.manuscript.maxBytes,
    maxAttempts: overrides.maxAttempts ?? config.manuscript.maxAttempts,
    initialScale: overrides.initialScale ?? config.manuscript.initialScale,
    codec: overrides.codec ?? sharpCodec
  };
  try {
    logger.debug(`Downloading manuscript image from: ${imageUrl}`);
    const download = await client.fetchBinary(imageUrl, overrides.timeoutMs ?? config.manuscript.timeoutMs);
    const detected = detectMimeType(download.contentType);
    const originalSize = download.bytes.length;

    const outcome = await transcodeToFit(download.bytes, detected, logger, options);
    const finalSize = outcome.bytes.length;
    logger.debug(`Successfully processed manuscript image, final size: ${finalSize} bytes`);

    const filename = filenameFromUrl(imageUrl);
    let title = manuscriptTitle || `Manuscript: ${filename}`;
    if (outcome.wasResized) title += ` (resized from ${formatBytes(originalSize)} to ${formatBytes(finalSize)} bytes)`;

    return {
      success: true,
      image_data: outcome.bytes.toString('base64'),
      mime_type: outcome.wasResized && outcome.format ? FORMAT_MIME[outcome.format] : detected,
      size: finalSize,
      original_size: originalSize,
      was_resized: outcome.wasResized,
      filename,
      title,
      source_url: imageUrl
    };
  } catch (err) {
    if (err instanceof UpstreamError) {
      logger.error(`Error downloading manuscript image: ${err.message}`);
      return { success: false, error: `Error downloading manuscript image: ${err.message}` };
    }
    logger.error(`Error processing manuscript image: ${errorMessage(err)}`);
    return { success: false, error: `Error processing manuscript image: ${errorMessage(err)}` };
  }
}
