import sharp from 'sharp'

const SUPPORTED_FORMATS = {
  jpeg: { mimeType: 'image/jpeg', extension: 'jpg' },
  png: { mimeType: 'image/png', extension: 'png' },
  webp: { mimeType: 'image/webp', extension: 'webp' },
  gif: { mimeType: 'image/gif', extension: 'gif' },
} as const

type ImageFormat = keyof typeof SUPPORTED_FORMATS

export interface ImageInfo {
  mimeType: string
  extension: string
}

function isSupportedFormat(format: string | undefined): format is ImageFormat {
  return format !== undefined && format in SUPPORTED_FORMATS
}

/**
 * Read the format of raw image bytes.
 * Throws when the bytes are not an image WordPress accepts.
 */
export async function inspectImage(input: Buffer): Promise<ImageInfo> {
  const metadata = await sharp(input).metadata()

  if (!isSupportedFormat(metadata.format)) {
    throw new Error(`Unsupported image format: ${metadata.format ?? 'unknown'}`)
  }

  return { ...SUPPORTED_FORMATS[metadata.format] }
}

/**
 * Optimize an image for web delivery.
 * Resizes to max 1200px wide (maintaining aspect ratio) and converts to WebP.
 */
export async function optimizeForWeb(input: Buffer): Promise<Buffer> {
  return sharp(input)
    .resize({
      width: 1200,
      withoutEnlargement: true,
    })
    .webp({ quality: 80 })
    .toBuffer()
}
