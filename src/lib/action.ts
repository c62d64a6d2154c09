import { DownloadError } from './errors'

export type ActionKind = 'track' | 'album' | 'artist' | 'playlist'

export interface Action {
  readonly kind: ActionKind
  readonly id: string
}

const KINDS: readonly ActionKind[] = ['track', 'album', 'artist', 'playlist']
const HOSTS = new Set(['tidal.com', 'www.tidal.com', 'listen.tidal.com'])
const NUMERIC_ID = /^\d+$/
const UUID_ID = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i

export function parseAction(reference: string): Action {
  const raw = reference.trim()
  const action = raw.includes('://') ? fromUrl(raw) : fromShorthand(raw)
  if (!action) {
    throw new DownloadError('UNRESOLVED_REFERENCE', `unable to resolve reference "${reference}"`)
  }
  return action
}

export function tryParseAction(reference: string): Action | null {
  try {
    return parseAction(reference)
  } catch (error) {
    if (error instanceof DownloadError) {
      return null
    }
    throw error
  }
}

function fromUrl(raw: string): Action | null {
  let url: URL
  try {
    url = new URL(raw)
  } catch {
    return null
  }
  if (!HOSTS.has(url.hostname.toLowerCase())) {
    return null
  }

  const segments = url.pathname.split('/').filter(Boolean)
  const offset = segments[0]?.toLowerCase() === 'browse' ? 1 : 0
  const kind = segments[offset]
  const id = segments[offset + 1]
  if (kind === undefined || id === undefined) {
    return null
  }
  return build(kind, id)
}

function fromShorthand(raw: string): Action | null {
  const m = raw.match(/^([a-z]+)[:/]([^/\s]+)$/i)
  if (!m) {
    return null
  }
  return build(m[1], m[2])
}

function build(rawKind: string, id: string): Action | null {
  const kind = KINDS.find(k => k === rawKind.toLowerCase())
  if (!kind) {
    return null
  }
  const valid = kind === 'playlist' ? UUID_ID.test(id) : NUMERIC_ID.test(id)
  if (!valid) {
    return null
  }
  return { kind, id: kind === 'playlist' ? id.toLowerCase() : id }
}
