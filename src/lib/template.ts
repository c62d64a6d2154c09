import { homedir } from 'node:os'
import { normalize } from 'node:path'
import { makeValidName } from './sanitize'
import type { Album, Artist, Track } from './types'

type TokenMap<T> = Record<string, (entity: T) => string>

const ARTIST_TOKENS: TokenMap<Artist> = {
  '{artist_name}': a => a.name,
  '{artist_id}': a => String(a.id),
}

const ALBUM_TOKENS: TokenMap<Album> = {
  '{album_id}': a => String(a.id),
  '{album_name}': a => a.title ?? '',
  '{album_duration}': a => optional(a.duration),
  '{album_tracks}': a => optional(a.numberOfTracks),
  '{album_explicit}': a => (a.explicit ? 'E' : ''),
  '{album_quality}': a => a.audioQuality ?? '',
  '{album_release}': a => a.releaseDate ?? '',
  '{album_release_year}': a => (a.releaseDate ?? '').split('-')[0],
}

const TRACK_TOKENS: TokenMap<Track> = {
  '{track_id}': t => String(t.id),
  '{track_name}': t => t.title,
  '{track_duration}': t => String(t.duration),
  '{track_num}': t => String(t.trackNumber),
  '{track_volume}': t => String(t.volumeNumber),
  '{track_isrc}': t => t.isrc,
  '{track_explicit}': t => (t.explicit ? 'E' : ''),
  '{track_quality}': t => t.audioQuality,
}

function optional(value: number | undefined): string {
  return value === undefined ? '' : String(value)
}

function render<T>(template: string, entity: T, tokens: TokenMap<T>): string {
  let out = template
  for (const [token, value] of Object.entries(tokens)) {
    if (out.includes(token)) {
      out = out.split(token).join(makeValidName(value(entity)))
    }
  }
  return out
}

export function renderArtist(template: string, artist: Artist): string {
  return render(template, artist, ARTIST_TOKENS)
}

export function renderAlbum(template: string, album: Album): string {
  return render(template, album, ALBUM_TOKENS)
}

export function renderTrack(template: string, track: Track): string {
  return render(template, track, TRACK_TOKENS)
}

// Expands a leading '~' and $VAR / ${VAR} references. Unset variables are an error.
export function expandPath(path: string, env: NodeJS.ProcessEnv = process.env, home: () => string = homedir): string {
  let out = path
  if (out === '~' || out.startsWith('~/')) {
    out = home() + out.slice(1)
  }
  return out.replace(/\$(?:\{([A-Za-z_][A-Za-z0-9_]*)\}|([A-Za-z_][A-Za-z0-9_]*))/g, (_, braced?: string, bare?: string) => {
    const name = braced ?? bare ?? ''
    const value = env[name]
    if (value === undefined) {
      throw new Error(`environment variable ${name} is not set (in "${path}")`)
    }
    return value
  })
}

// Only the template's own text is expanded: a catalog value containing '$' or a leading '~' stays literal.
export function resolveDownloadPath(
  template: string,
  artist: Artist,
  album: Album,
  track: Track,
  env: NodeJS.ProcessEnv = process.env,
): string {
  const expanded = expandPath(template, env)
  let out = renderArtist(expanded, artist)
  out = renderAlbum(out, album)
  out = renderTrack(out, track)
  return normalize(out)
}
