const UNSPLASH_HOME = 'https://unsplash.com'

/**
 * Photo credit paragraph appended to the post body.
 * Name and link are embedded exactly as received.
 */
export function buildCreditHtml(photographerName: string, photographerLink: string): string {
  return (
    `<p style="font-size:small;">Photo by ` +
    `<a href="${photographerLink}" target="_blank" rel="noopener">` +
    `${photographerName}</a> on ` +
    `<a href="${UNSPLASH_HOME}" target="_blank" rel="noopener">Unsplash</a>.</p>`
  )
}

export function buildAltText(imageUrl: string, photographerName: string): string {
  return photographerName ? `${imageUrl} by ${photographerName}` : imageUrl
}
