import type { Album, Artist, Track } from './types'

export function formatBytes(bytes: number): string {
  const unit = 1024
  if (bytes < unit) return `${bytes} B`
  const units = ['B', 'KiB', 'MiB', 'GiB', 'TiB']
  let value = bytes
  let idx = 0
  while (value >= unit && idx < units.length - 1) {
    value /= unit
    idx += 1
  }
  return `${value.toFixed(1)} ${units[idx]}`
}

export function formatRate(bytes: number, durationMs: number): string {
  if (durationMs <= 0) return 'n/a'
  const perSec = Math.round((bytes / durationMs) * 1000)
  return `${formatBytes(perSec)}/s`
}

export function trackInfo(track: Track): string {
  return `${track.artist.name} - ${track.title}`
}

export function searchLine(hit: { kind: 'track'; item: Track } | { kind: 'album'; item: Album } | { kind: 'artist'; item: Artist }): string {
  switch (hit.kind) {
    case 'track':
      return `${hit.item.id}\t${trackInfo(hit.item)}`
    case 'album':
      return `${hit.item.id}\t${hit.item.artist?.name ?? 'Unknown'} - ${hit.item.title ?? ''}`
    case 'artist':
      return `${hit.item.id}\t${hit.item.name}`
  }
}
