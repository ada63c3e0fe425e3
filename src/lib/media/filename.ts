const MAX_FILENAME_LENGTH = 50

/**
 * Sanitize a text string into a URL/filename-safe slug.
 * Lowercases, removes accents, replaces special chars with hyphens.
 */
export function sanitizeFilename(text: string): string {
  return (
    text
      .toLowerCase()
      .normalize('NFD')
      .replace(/[\u0300-\u036f]/g, '')
      .replace(/[^a-z0-9]+/g, '-')
      .replace(/-{2,}/g, '-')
      .replace(/^-+|-+$/g, '')
      .slice(0, MAX_FILENAME_LENGTH)
      .replace(/-+$/, '')
  )
}

/**
 * Filename for a featured image uploaded with a post: the post title as a
 * slug, or "featured-image" when the title has no usable characters.
 */
export function featuredImageFilename(postTitle: string, extension: string): string {
  const slug = sanitizeFilename(postTitle)
  return `${slug || 'featured-image'}.${extension}`
}
