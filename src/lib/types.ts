export type AudioQuality = 'LOW' | 'HIGH' | 'LOSSLESS' | 'HI_RES'

export const AUDIO_QUALITIES: readonly AudioQuality[] = ['LOW', 'HIGH', 'LOSSLESS', 'HI_RES']

export interface ArtistRef {
  id: number
  name: string
}

export interface AlbumRef {
  id: number
  title?: string
  cover?: string
  artist?: ArtistRef
}

export interface Track {
  id: number
  title: string
  trackNumber: number
  volumeNumber: number
  isrc: string
  explicit: boolean
  audioQuality: string
  duration: number
  copyright: string
  artist: ArtistRef
  album: AlbumRef
}

export interface Album {
  id: number
  title?: string
  duration?: number
  numberOfTracks?: number
  explicit?: boolean
  audioQuality?: string
  releaseDate?: string
  cover?: string
  artist?: ArtistRef
}

export interface Artist {
  id: number
  name: string
}

export interface StreamManifest {
  urls: string[]
  fileExtension: string
}

export interface CoverArt {
  contentType: string
  data: Uint8Array
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

export interface AppConfig {
  downloadPath: string
  audioQuality: AudioQuality
  showProgress: boolean
  progressRefreshRate: number
  includeSingles: boolean
  downloadCover: boolean
  downloads: number
  workers: number
  httpTimeoutMs: number
  accessToken: string
  countryCode: string
  logLevel: LogLevel
}
