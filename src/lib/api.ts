import { DownloadError, errorMessage } from './errors'
import { withRetry } from './retry'
import type { Album, Artist, AudioQuality, CoverArt, StreamManifest, Track } from './types'

const BASE_URL = 'https://api.tidal.com/v1'
const IMAGE_URL = 'https://resources.tidal.com/images'
const PAGE_SIZE = 100
const RETRY_ATTEMPTS = 3

export type SearchKind = 'track' | 'album' | 'artist'

export interface SearchResults {
  track: Track[]
  album: Album[]
  artist: Artist[]
}

export interface CatalogClient {
  getTrack(id: string): Promise<Track>
  getAlbum(id: string): Promise<Album>
  getArtist(id: string): Promise<Artist>
  getAlbumTracks(id: string): Promise<Track[]>
  getPlaylistTracks(id: string): Promise<Track[]>
  getArtistAlbums(id: string, includeSingles: boolean): Promise<Album[]>
  getStreamManifest(trackId: string): Promise<StreamManifest>
  getCoverBytes(coverId: string): Promise<CoverArt>
}

export interface ApiClientOptions {
  accessToken: string
  countryCode: string
  audioQuality: AudioQuality
  timeoutMs: number
  fetch?: typeof fetch
  retryBackoffMs?: number
}

export class ApiError extends DownloadError {
  constructor(
    message: string,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super('REQUEST_FAILED', message, options)
    this.name = 'ApiError'
  }
}

interface Page<T> {
  limit: number
  offset: number
  totalNumberOfItems: number
  items: T[]
}

interface RawTrack extends Omit<Track, 'isrc' | 'copyright' | 'explicit' | 'volumeNumber'> {
  isrc: string | null
  copyright: string | null
  explicit?: boolean | null
  volumeNumber?: number | null
}

interface ListItem {
  type: string
  item: RawTrack
}

export interface PlaybackInfo {
  trackId: number
  audioQuality: string
  manifestMimeType: string
  manifest: string
}

interface BtsManifest {
  mimeType?: string
  codecs?: string
  encryptionType?: string
  urls: string[]
}

export class ApiClient implements CatalogClient {
  private readonly fetchImpl: typeof fetch

  constructor(private readonly options: ApiClientOptions) {
    this.fetchImpl = options.fetch ?? fetch
  }

  async getTrack(id: string): Promise<Track> {
    return normalizeTrack(await this.getJSON<RawTrack>(`/tracks/${id}`))
  }

  async getAlbum(id: string): Promise<Album> {
    return this.getJSON<Album>(`/albums/${id}`)
  }

  async getArtist(id: string): Promise<Artist> {
    return this.getJSON<Artist>(`/artists/${id}`)
  }

  async getAlbumTracks(id: string): Promise<Track[]> {
    return this.getTrackItems(`/albums/${id}/items`)
  }

  async getPlaylistTracks(id: string): Promise<Track[]> {
    return this.getTrackItems(`/playlists/${id}/items`)
  }

  async getArtistAlbums(id: string, includeSingles: boolean): Promise<Album[]> {
    const albums = await this.getPaged<Album>(`/artists/${id}/albums`)
    if (!includeSingles) {
      return albums
    }
    const singles = await this.getPaged<Album>(`/artists/${id}/albums`, { filter: 'EPSANDSINGLES' })
    return [...albums, ...singles]
  }

  async getStreamManifest(trackId: string): Promise<StreamManifest> {
    const info = await this.getJSON<PlaybackInfo>(`/tracks/${trackId}/playbackinfopostpaywall`, {
      audioquality: this.options.audioQuality,
      playbackmode: 'STREAM',
      assetpresentation: 'FULL',
    })
    return decodeManifest(info)
  }

  async getCoverBytes(coverId: string): Promise<CoverArt> {
    const url = coverUrl(coverId)
    return withRetry(this.retryOptions(), () =>
      this.request(url, 'image/*', async resp => ({
        contentType: resp.headers.get('content-type') ?? 'image/jpeg',
        data: new Uint8Array(await resp.arrayBuffer()),
      })),
    )
  }

  async search<K extends SearchKind>(kind: K, query: string, limit: number): Promise<SearchResults[K]> {
    const out = await this.getJSON<{ items: SearchResults[K] }>(`/search/${kind}s`, { query, limit: String(limit) })
    return out.items
  }

  private async getTrackItems(path: string): Promise<Track[]> {
    const items = await this.getPaged<ListItem>(path)
    return items.filter(entry => entry.type === 'track').map(entry => normalizeTrack(entry.item))
  }

  private async getPaged<T>(path: string, params: Record<string, string> = {}): Promise<T[]> {
    const out: T[] = []
    let offset = 0
    while (true) {
      const page = await this.getJSON<Page<T>>(path, { ...params, limit: String(PAGE_SIZE), offset: String(offset) })
      out.push(...page.items)
      offset += page.items.length
      if (page.items.length === 0 || offset >= page.totalNumberOfItems) {
        return out
      }
    }
  }

  private retryOptions() {
    return {
      attempts: RETRY_ATTEMPTS,
      backoffMs: this.options.retryBackoffMs,
      retryable: isRetryable,
    }
  }

  private async getJSON<T>(path: string, params: Record<string, string> = {}): Promise<T> {
    const url = new URL(`${BASE_URL}${path}`)
    url.searchParams.set('countryCode', this.options.countryCode)
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, value)
    }

    return withRetry(this.retryOptions(), () =>
      this.request(url.toString(), 'application/json', async resp => (await resp.json()) as T),
    )
  }

  // The timeout covers reading the body as well as the headers.
  private async request<T>(url: string, accept: string, read: (resp: Response) => Promise<T>): Promise<T> {
    const controller = new AbortController()
    const timeout = setTimeout(() => controller.abort(), this.options.timeoutMs)

    try {
      const resp = await this.fetchImpl(url, {
        headers: {
          Accept: accept,
          Authorization: `Bearer ${this.options.accessToken}`,
        },
        signal: controller.signal,
      })
      if (!resp.ok) {
        await resp.body?.cancel()
        throw new ApiError(`request ${url} failed with status ${resp.status}`, resp.status)
      }
      return await read(resp)
    } catch (error) {
      if (error instanceof ApiError) {
        throw error
      }
      throw new ApiError(`request ${url}: ${errorMessage(error)}`, undefined, { cause: error })
    } finally {
      clearTimeout(timeout)
    }
  }
}

export function coverUrl(coverId: string): string {
  return `${IMAGE_URL}/${coverId.split('-').join('/')}/1280x1280.jpg`
}

function isRetryable(error: unknown): boolean {
  if (!(error instanceof ApiError) || error.status === undefined) {
    return true
  }
  return error.status === 429 || error.status >= 500
}

function normalizeTrack(track: RawTrack): Track {
  return {
    ...track,
    isrc: track.isrc ?? '',
    copyright: track.copyright ?? '',
    explicit: track.explicit ?? false,
    volumeNumber: track.volumeNumber ?? 1,
  }
}

export function fileExtension(mimeType: string, codecs = ''): string | null {
  const mime = mimeType.toLowerCase()
  const codec = codecs.toLowerCase()
  if (mime.includes('flac') || codec === 'flac') {
    return 'flac'
  }
  if (mime.includes('mp4') || codec.startsWith('mp4a') || codec.includes('aac')) {
    return 'm4a'
  }
  return null
}

export function decodeManifest(info: PlaybackInfo): StreamManifest {
  if (info.manifestMimeType !== 'application/vnd.tidal.bts') {
    throw new DownloadError('MANIFEST_UNAVAILABLE', `unsupported manifest type ${info.manifestMimeType} for track ${info.trackId}`)
  }

  let manifest: BtsManifest
  try {
    manifest = JSON.parse(Buffer.from(info.manifest, 'base64').toString('utf8')) as BtsManifest
  } catch (error) {
    throw new DownloadError('MANIFEST_UNAVAILABLE', `malformed manifest for track ${info.trackId}`, { cause: error })
  }

  if (manifest.encryptionType && manifest.encryptionType !== 'NONE') {
    throw new DownloadError('MANIFEST_UNAVAILABLE', `track ${info.trackId} stream is encrypted (${manifest.encryptionType})`)
  }
  if (!Array.isArray(manifest.urls) || manifest.urls.length === 0) {
    throw new DownloadError('MANIFEST_UNAVAILABLE', `manifest for track ${info.trackId} has no stream urls`)
  }
  const ext = fileExtension(manifest.mimeType ?? '', manifest.codecs)
  if (!ext) {
    throw new DownloadError('MANIFEST_UNAVAILABLE', `unknown stream format ${manifest.mimeType} for track ${info.trackId}`)
  }
  return { urls: manifest.urls, fileExtension: ext }
}
