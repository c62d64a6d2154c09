import type { Action } from './action'
import type { CatalogClient } from './api'
import type { Channel } from './channel'
import type { DownloadOutcome, TrackDownloader } from './downloader'
import { DownloadError, errorMessage } from './errors'
import type { Logger } from './log'
import type { WorkUnit } from './pool'
import type { ProgressSink } from './progress'
import { resolveDownloadPath } from './template'
import type { Track } from './types'

export type PreparationUnit = WorkUnit<boolean>
export type TransferUnit = WorkUnit<DownloadOutcome>

export interface DownloadTaskOptions {
  client: CatalogClient
  downloader: Pick<TrackDownloader, 'download'>
  preparation: Channel<PreparationUnit>
  transfer: Channel<TransferUnit>
  progress: ProgressSink
  logger: Logger
  downloadPath: string
  includeSingles: boolean
  env?: NodeJS.ProcessEnv
}

// Shared context behind every unit of a run. A track id enters the pipeline at most once per task.
export class DownloadTask {
  private readonly submitted = new Set<string>()

  constructor(private readonly options: DownloadTaskOptions) {}

  // Resolves once every track of the action has been handed to the preparation channel.
  async dispatch(action: Action): Promise<number> {
    switch (action.kind) {
      case 'track':
        return (await this.submitTrack(action.id)) ? 1 : 0
      case 'album':
      case 'playlist':
        return this.downloadList(action.kind, action.id)
      case 'artist':
        return this.downloadArtist(action.id)
    }
  }

  async downloadArtist(id: string): Promise<number> {
    const { client, logger, progress } = this.options
    progress.println('Getting Artist Albums')
    const albums = await client.getArtistAlbums(id, this.options.includeSingles).catch(error =>
      Promise.reject(enumerationError(`albums of artist ${id}`, error)),
    )

    let submitted = 0
    for (const album of albums) {
      try {
        submitted += await this.downloadList('album', String(album.id))
      } catch (error) {
        if (error instanceof DownloadError && error.type === 'CHANNEL_CLOSED') {
          throw error
        }
        logger.error(errorMessage(error))
      }
    }
    return submitted
  }

  // Each send is awaited: listing never runs ahead of the preparation channel's capacity.
  async downloadList(kind: 'album' | 'playlist', id: string): Promise<number> {
    const { client } = this.options
    const tracks = await (kind === 'album' ? client.getAlbumTracks(id) : client.getPlaylistTracks(id)).catch(error =>
      Promise.reject(enumerationError(`tracks of ${kind} ${id}`, error)),
    )

    let submitted = 0
    for (const track of tracks) {
      if (await this.submitTrack(String(track.id))) {
        submitted += 1
      }
    }
    return submitted
  }

  // Resolves false when the track was already submitted by this task.
  async submitTrack(id: string): Promise<boolean> {
    if (this.submitted.has(id)) {
      this.options.logger.debug(`track ${id} already queued, skipping`)
      return false
    }
    this.submitted.add(id)
    await this.options.preparation.send(this.prepareTrack(id))
    return true
  }

  prepareTrack(id: string): PreparationUnit {
    return {
      key: id,
      run: async () => {
        const track = await this.options.client.getTrack(id)
        const basePath = await this.resolvePath(track)
        this.options.logger.debug(`queued ${id} -> ${basePath}`)
        await this.options.transfer.send(this.transferTrack(track, basePath))
        return true
      },
    }
  }

  transferTrack(track: Track, basePath: string): TransferUnit {
    return {
      key: String(track.id),
      run: () => this.options.downloader.download(track, basePath),
    }
  }

  // The album artist names the path when the album has one, otherwise the track artist.
  async resolvePath(track: Track): Promise<string> {
    const { client } = this.options
    const artistId = track.album.artist?.id ?? track.artist.id
    const [album, artist] = await Promise.all([client.getAlbum(String(track.album.id)), client.getArtist(String(artistId))])
    return resolveDownloadPath(this.options.downloadPath, artist, album, track, this.options.env)
  }
}

function enumerationError(what: string, error: unknown): DownloadError {
  return new DownloadError('ENUMERATION_FAILURE', `failed to list ${what}: ${errorMessage(error)}`, { cause: error })
}
