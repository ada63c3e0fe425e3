import { describe, expect, it } from 'vitest'
import { featuredImageFilename, sanitizeFilename } from './filename'

describe('sanitizeFilename', () => {
  it('slugifies and strips accents', () => {
    expect(sanitizeFilename('Crème brûlée: 5 Secrets!')).toBe('creme-brulee-5-secrets')
  })

  it('caps the length without a trailing hyphen', () => {
    const slug = sanitizeFilename('a'.repeat(49) + ' bcd')
    expect(slug).toBe('a'.repeat(49))
  })
})

describe('featuredImageFilename', () => {
  it('uses the post title', () => {
    expect(featuredImageFilename('10 Hidden Beaches in Portugal', 'jpg')).toBe(
      '10-hidden-beaches-in-portugal.jpg'
    )
  })

  it('falls back when the title has no usable characters', () => {
    expect(featuredImageFilename('???', 'png')).toBe('featured-image.png')
  })
})
