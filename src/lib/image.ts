import sharp from 'sharp';

export type ColorMode = 'RGB' | 'RGBA' | 'L' | 'LA' | 'P' | 'CMYK' | 'other';

export type ImageArtifact = {
  bytes: Uint8Array;
  format: string;
  colorMode: ColorMode;
  width: number;
  height: number;
  byteLength: number;
};

export type ThumbnailArtifact = {
  bytes: Buffer;
  width: number;
  height: number;
  contentType: 'image/jpeg';
};

export type ThumbnailOptions = {
  maxDimension: number;
  quality: number;
};

const colorModeOf = (metadata: sharp.Metadata): ColorMode => {
  if (metadata.isPalette) {
    return 'P';
  }

  switch (metadata.space) {
    case 'b-w':
    case 'grey16':
      return metadata.hasAlpha ? 'LA' : 'L';
    case 'srgb':
    case 'rgb16':
      return metadata.hasAlpha ? 'RGBA' : 'RGB';
    case 'cmyk':
      return 'CMYK';
    default:
      return 'other';
  }
};

export const decodeImage = async (bytes: Uint8Array): Promise<ImageArtifact> => {
  const metadata = await sharp(bytes).metadata();

  const { format, width, height } = metadata;
  if (!format || !width || !height) {
    throw new Error(`Unrecognised image (format: ${format ?? 'unknown'}, ${width ?? 0}x${height ?? 0})`);
  }

  return {
    bytes,
    format,
    colorMode: colorModeOf(metadata),
    width,
    height,
    byteLength: bytes.byteLength,
  };
};

/**
 * Largest size with the same aspect ratio that fits inside a `bound` square.
 * Images that already fit are returned unchanged.
 */
export const fitWithin = (width: number, height: number, bound: number) => {
  if (width <= bound && height <= bound) {
    return { width, height };
  }

  const scale = Math.min(bound / width, bound / height);

  return {
    width: Math.max(1, Math.min(bound, Math.round(width * scale))),
    height: Math.max(1, Math.min(bound, Math.round(height * scale))),
  };
};

// JPEG has no alpha channel so everything is flattened to plain RGB first
export const renderThumbnail = async (image: ImageArtifact, options: ThumbnailOptions): Promise<ThumbnailArtifact> => {
  const size = fitWithin(image.width, image.height, options.maxDimension);

  let pipeline = sharp(image.bytes);
  if (image.colorMode !== 'RGB') {
    pipeline = pipeline.toColourspace('srgb').removeAlpha();
  }

  const { data, info } = await pipeline
    .resize(size.width, size.height, { fit: 'fill' })
    .jpeg({ quality: options.quality })
    .toBuffer({ resolveWithObject: true });

  return {
    bytes: data,
    width: info.width,
    height: info.height,
    contentType: 'image/jpeg',
  };
};
