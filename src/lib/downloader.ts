import { access, mkdir, rename, rm } from 'node:fs/promises'
import { dirname } from 'node:path'
import type { CatalogClient } from './api'
import { DownloadError, asDownloadError, errorMessage } from './errors'
import type { TagWriter } from './ffmpeg'
import { formatBytes, formatRate, trackInfo } from './format'
import type { Logger } from './log'
import type { ProgressSink, TrackProgress } from './progress'
import type { CoverArt, Track } from './types'
import { BufferedFileWriter, WRITE_BUFFER_BYTES } from './writer'

export type DownloadOutcome = 'completed' | 'skipped'

export interface TrackDownloaderOptions {
  client: CatalogClient
  tagWriter: TagWriter
  progress: ProgressSink
  logger: Logger
  downloadCover: boolean
  fetch?: typeof fetch
  bufferBytes?: number
}

export async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path)
    return true
  } catch {
    return false
  }
}

export class TrackDownloader {
  private readonly fetchImpl: typeof fetch

  constructor(private readonly options: TrackDownloaderOptions) {
    this.fetchImpl = options.fetch ?? fetch
  }

  // basePath is the rendered destination without extension; the manifest decides the extension.
  async download(track: Track, basePath: string): Promise<DownloadOutcome> {
    const { client, progress, logger } = this.options
    const info = trackInfo(track)

    const manifest = await client
      .getStreamManifest(String(track.id))
      .catch(error => Promise.reject(asDownloadError('MANIFEST_UNAVAILABLE', `stream manifest for ${info}`, error)))
    const streamUrl = manifest.urls[0]
    if (streamUrl === undefined) {
      throw new DownloadError('MANIFEST_UNAVAILABLE', `no stream url for ${info}`)
    }
    const path = `${basePath}.${manifest.fileExtension}`

    if (await pathExists(path)) {
      logger.debug(`path exists: ${path}`)
      progress.println(`File Exists | ${info}`)
      return 'skipped'
    }

    const started = Date.now()
    const resp = await this.fetchImpl(streamUrl).catch(error =>
      Promise.reject(new DownloadError('STREAM_IO_FAILURE', `download ${info}: ${errorMessage(error)}`, { cause: error })),
    )
    if (!resp.ok) {
      await this.discard(resp.body)
      throw new DownloadError('STREAM_IO_FAILURE', `download ${info} failed with status ${resp.status}`)
    }
    const totalBytes = contentLength(resp)
    if (totalBytes === null) {
      await this.discard(resp.body)
      throw new DownloadError('MISSING_CONTENT_LENGTH', `failed to get content length for ${info}`)
    }
    if (!resp.body) {
      throw new DownloadError('STREAM_IO_FAILURE', `download ${info} returned empty body`)
    }

    const bar = progress.start(String(track.id), totalBytes, info)
    logger.debug(`content length ${totalBytes} for ${info}`)
    const partPath = `${path}.part`

    const reader = resp.body.getReader()
    let downloaded = 0
    let received = 0
    try {
      await mkdir(dirname(path), { recursive: true })
      const writer = await BufferedFileWriter.open(partPath, this.options.bufferBytes ?? WRITE_BUFFER_BYTES)
      try {
        while (true) {
          const { done, value } = await reader.read()
          if (done) {
            break
          }
          received += value.byteLength
          downloaded = Math.min(received, totalBytes)
          bar.advance(downloaded)
          await writer.write(value)
        }
        if (received < totalBytes) {
          throw new DownloadError('STREAM_IO_FAILURE', `download ${info} ended after ${received} of ${totalBytes} bytes`)
        }
        bar.message(`Writing to Disk | ${info}`)
      } finally {
        await writer.close()
      }
      await rename(partPath, path)
    } catch (error) {
      await this.discard(reader)
      await rm(partPath, { force: true })
      bar.finish(`Download Failed | ${info}`)
      throw asDownloadError('STREAM_IO_FAILURE', `download ${info}`, error)
    }

    bar.message(`Writing metadata | ${info}`)
    await this.writeMetadata(track, path, bar)
    const elapsed = Date.now() - started
    bar.finish(`Download Complete | ${info} (${formatBytes(downloaded)}, ${formatRate(downloaded, elapsed)})`)
    return 'completed'
  }

  // Releases the connection behind an abandoned body. A failure here never replaces the error being reported.
  private async discard(body: { cancel(): Promise<void> } | null): Promise<void> {
    try {
      await body?.cancel()
    } catch (error) {
      this.options.logger.debug(`discarding response body: ${errorMessage(error)}`)
    }
  }

  private async writeMetadata(track: Track, path: string, bar: TrackProgress): Promise<void> {
    try {
      let cover: CoverArt | undefined
      if (this.options.downloadCover && track.album.cover) {
        cover = await this.options.client.getCoverBytes(track.album.cover)
      }
      await this.options.tagWriter.writeTags(
        path,
        {
          title: track.title,
          trackNumber: track.trackNumber,
          artist: track.artist.name,
          album: track.album.title ?? '',
          copyright: track.copyright,
          isrc: track.isrc,
        },
        cover,
      )
      this.options.logger.debug(`metadata written to ${path}`)
    } catch (error) {
      bar.finish(`Metadata Failed | ${trackInfo(track)}`)
      throw asDownloadError('TAG_WRITE_FAILURE', `write metadata for ${trackInfo(track)}`, error)
    }
  }
}

function contentLength(resp: Response): number | null {
  const raw = resp.headers.get('content-length')
  if (raw === null || raw.trim() === '') {
    return null
  }
  const value = Number(raw)
  return Number.isFinite(value) && value >= 0 ? value : null
}
