/**
 * Accept header parsing for content negotiation
 */

export interface AcceptPreference {
  mediaType: string
  quality: number
}

function parseQuality(params: string[]): number {
  for (const param of params) {
    const [key, value] = param.split('=').map(part => part.trim())
    if (key?.toLowerCase() === 'q' && value !== undefined) {
      const quality = Number.parseFloat(value)
      return Number.isFinite(quality) ? Math.min(Math.max(quality, 0), 1) : 1
    }
  }
  return 1
}

/**
 * Parse an Accept header into preferences ordered by descending quality
 * Entries with equal quality keep their header order.
 */
export function parseAccept(header: string | null | undefined): AcceptPreference[] {
  if (!header) {
    return []
  }

  const preferences: AcceptPreference[] = []
  for (const entry of header.split(',')) {
    const [mediaType, ...params] = entry.split(';').map(part => part.trim())
    if (!mediaType) {
      continue
    }
    preferences.push({ mediaType: mediaType.toLowerCase(), quality: parseQuality(params) })
  }

  // Array.prototype.sort is stable
  return preferences.sort((a, b) => b.quality - a.quality)
}

/**
 * Whether the client's top preference names the given media type fragment
 * @example prefers(parseAccept('text/html,application/json'), 'html') // true
 */
export function prefers(preferences: readonly AcceptPreference[], fragment: string): boolean {
  const [first] = preferences
  return first !== undefined && first.mediaType.includes(fragment.toLowerCase())
}
